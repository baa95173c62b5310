import { describe, expect, it, vi } from 'vitest';
import { RunSupervisor, type HarvestJob, type RunNotifier } from '../run-supervisor.js';
import { ConcurrentRunRejectedError } from '../../utils/errors.js';
import { deferred } from '../../__tests__/fixtures.js';

function clock(start: number) {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
  };
}

describe('RunSupervisor', () => {
  it('acknowledges a start at once and reports live progress', async () => {
    const gate = deferred();
    const time = clock(1_000);
    const job = vi.fn<HarvestJob>(async (_request, state) => {
      state.setTask('Processing products');
      state.setProgress(45);
      await gate.promise;
    });
    const supervisor = new RunSupervisor({ job, now: time.now });

    const ack = supervisor.start({ mode: 'full' });

    expect(ack).toEqual({ mode: 'full', gpuName: undefined, startedAt: new Date(1_000) });
    time.advance(500);
    expect(supervisor.getStatus()).toEqual({
      isRunning: true,
      state: 'running',
      mode: 'full',
      current: {
        products: 0,
        specs: 0,
        reviews: 0,
        updatedReviews: 0,
        errors: 0,
        task: 'Processing products',
        progress: 45,
        elapsedSeconds: 0.5,
      },
      lastResult: null,
    });

    gate.resolve();
    await supervisor.waitForIdle();
    expect(supervisor.getStatus().isRunning).toBe(false);
  });

  it('rejects a second start while a run is active', async () => {
    const gate = deferred();
    const supervisor = new RunSupervisor({ job: () => gate.promise });

    supervisor.start({ mode: 'default' });

    expect(() => supervisor.start({ mode: 'incremental' })).toThrow(ConcurrentRunRejectedError);
    expect(() => supervisor.start({ mode: 'incremental' })).toThrow('A default run is already in progress');

    gate.resolve();
    await supervisor.waitForIdle();
    expect(() => supervisor.start({ mode: 'incremental' })).not.toThrow();
    await supervisor.waitForIdle();
  });

  it('builds the summary of a finished run and sends it', async () => {
    const time = clock(10_000);
    const notify = vi.fn<RunNotifier>(async () => undefined);
    const supervisor = new RunSupervisor({
      job: async (_request, state) => {
        state.addProduct(1);
        state.addProduct(1);
        state.addSpecs(12);
        state.addReview();
        time.advance(2_500);
      },
      notify,
      now: time.now,
    });

    const summary = await supervisor.run({ mode: 'default', gpuName: 'Acme X1' });

    expect(summary).toEqual({
      mode: 'default',
      gpuName: 'Acme X1',
      products: 1,
      specs: 12,
      reviews: 1,
      updatedReviews: 0,
      errors: 0,
      startedAt: new Date(10_000),
      completedAt: new Date(12_500),
      elapsedSeconds: 2.5,
      success: true,
    });
    expect(notify).toHaveBeenCalledWith(summary);
    expect(supervisor.getStatus()).toMatchObject({ isRunning: false, state: 'completed', lastResult: summary });
  });

  it('records a failed run with partial counts and still notifies', async () => {
    const notify = vi.fn<RunNotifier>(async () => undefined);
    const supervisor = new RunSupervisor({
      job: async (_request, state) => {
        state.addProduct(3);
        throw new Error('catalog markup changed');
      },
      notify,
    });

    const summary = await supervisor.run({ mode: 'incremental' });

    expect(summary).toMatchObject({ success: false, error: 'catalog markup changed', products: 1 });
    expect(notify).toHaveBeenCalledTimes(1);
    expect(supervisor.getStatus().state).toBe('failed');
  });

  it('does not let a failing notification change the outcome', async () => {
    const supervisor = new RunSupervisor({
      job: async () => undefined,
      notify: async () => {
        throw new Error('mail down');
      },
    });

    const summary = await supervisor.run({ mode: 'full' });

    expect(summary.success).toBe(true);
    expect(supervisor.getStatus().state).toBe('completed');
  });

  it('has nothing to wait for before the first run', async () => {
    const supervisor = new RunSupervisor({ job: async () => undefined });
    await expect(supervisor.waitForIdle()).rejects.toThrow('No run has been started');
  });
});
