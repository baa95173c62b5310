/**
 * Run Supervisor
 *
 * Single owner of the run state. Start requests go through `start`, which
 * rejects while a run is active; the status path only reads.
 */

import { ConcurrentRunRejectedError, errorMessage } from '../utils/errors.js';
import { componentLogger, type Logger } from '../utils/logger.js';
import { RunState, type RunProgress } from './run-state.js';
import type { RunMode, RunStatus, RunSummary } from '../types/index.js';

export interface RunRequest {
  mode: RunMode;
  gpuName?: string;
}

export type HarvestJob = (request: RunRequest, state: RunState) => Promise<void>;
export type RunNotifier = (summary: RunSummary) => Promise<void>;

export interface RunSupervisorOptions {
  job: HarvestJob;
  notify?: RunNotifier;
  now?: () => number;
  logger?: Logger;
}

export interface RunAck {
  mode: RunMode;
  gpuName?: string;
  startedAt: Date;
}

export interface SupervisorStatus {
  isRunning: boolean;
  state: RunStatus;
  mode: RunMode | null;
  current: RunProgress | null;
  lastResult: RunSummary | null;
}

export class RunSupervisor {
  private readonly job: HarvestJob;
  private readonly notify?: RunNotifier;
  private readonly now: () => number;
  private readonly logger: Logger;

  private status: RunStatus = 'idle';
  private active: { request: RunRequest; state: RunState } | null = null;
  private pending: Promise<RunSummary> | null = null;
  private lastResult: RunSummary | null = null;

  constructor(options: RunSupervisorOptions) {
    this.job = options.job;
    this.notify = options.notify;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? componentLogger('supervisor');
  }

  /**
   * Start a run in the background and acknowledge it immediately
   */
  start(request: RunRequest): RunAck {
    if (this.active) {
      throw new ConcurrentRunRejectedError(this.active.request.mode);
    }

    const startedAt = this.now();
    const state = new RunState(startedAt);
    this.status = 'running';
    this.active = { request, state };
    this.pending = this.execute(request, state, startedAt);

    this.logger.info({ mode: request.mode, gpuName: request.gpuName }, 'Run started');
    return { mode: request.mode, gpuName: request.gpuName, startedAt: new Date(startedAt) };
  }

  /**
   * Start a run and wait for its summary
   */
  async run(request: RunRequest): Promise<RunSummary> {
    this.start(request);
    return this.waitForIdle();
  }

  /**
   * Resolves with the summary of the active run, or the last one
   */
  async waitForIdle(): Promise<RunSummary> {
    if (!this.pending) {
      throw new Error('No run has been started');
    }
    return this.pending;
  }

  getStatus(): SupervisorStatus {
    return {
      isRunning: this.active !== null,
      state: this.status,
      mode: this.active?.request.mode ?? null,
      current: this.active ? this.active.state.snapshot(this.now()) : null,
      lastResult: this.lastResult,
    };
  }

  private async execute(request: RunRequest, state: RunState, startedAt: number): Promise<RunSummary> {
    let failure: unknown = null;

    try {
      await this.job(request, state);
    } catch (error) {
      failure = error;
      this.logger.error({ mode: request.mode, error: errorMessage(error) }, 'Run failed');
    }

    const completedAt = this.now();
    const summary: RunSummary = {
      mode: request.mode,
      ...(request.gpuName ? { gpuName: request.gpuName } : {}),
      ...state.getCounters(),
      startedAt: new Date(startedAt),
      completedAt: new Date(completedAt),
      elapsedSeconds: Math.round((completedAt - startedAt) / 10) / 100,
      success: failure === null,
      ...(failure === null ? {} : { error: errorMessage(failure) }),
    };

    this.lastResult = summary;
    this.status = summary.success ? 'completed' : 'failed';
    this.active = null;

    this.logger.info(
      {
        mode: summary.mode,
        success: summary.success,
        products: summary.products,
        specs: summary.specs,
        reviews: summary.reviews,
        updatedReviews: summary.updatedReviews,
        errors: summary.errors,
        elapsedSeconds: summary.elapsedSeconds,
      },
      'Run finished'
    );

    if (this.notify) {
      try {
        await this.notify(summary);
      } catch (error) {
        this.logger.error({ error: errorMessage(error) }, 'Run notification failed');
      }
    }

    return summary;
  }
}
