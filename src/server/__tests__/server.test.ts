import { afterEach, describe, expect, it } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildServer } from '../index.js';
import { RunSupervisor, type RunRequest } from '../../state/run-supervisor.js';
import { deferred } from '../../__tests__/fixtures.js';

function setup() {
  const gate = deferred();
  const requests: RunRequest[] = [];
  const supervisor = new RunSupervisor({
    job: async (request) => {
      requests.push(request);
      await gate.promise;
    },
  });
  const server = buildServer({ supervisor });
  return { server, supervisor, gate, requests };
}

describe('control surface', () => {
  let server: FastifyInstance | null = null;

  afterEach(async () => {
    await server?.close();
    server = null;
  });

  it('answers the liveness check', async () => {
    const ctx = setup();
    server = ctx.server;

    const response = await server.inject({ method: 'GET', url: '/' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ message: 'GPU catalog harvester is running' });
  });

  it('starts a run in the requested mode and refuses a second one', async () => {
    const ctx = setup();
    server = ctx.server;

    const started = await server.inject({ method: 'GET', url: '/run-scraper?mode=incremental' });
    expect(started.statusCode).toBe(200);
    expect(started.json()).toMatchObject({ success: true, mode: 'incremental', message: 'incremental run started' });

    const rejected = await server.inject({ method: 'GET', url: '/run-scraper' });
    expect(rejected.statusCode).toBe(409);
    expect(rejected.json()).toEqual({
      success: false,
      message: 'A incremental run is already in progress',
      activeMode: 'incremental',
    });

    const running = await server.inject({ method: 'GET', url: '/status' });
    expect(running.json()).toMatchObject({ isRunning: true, state: 'running', mode: 'incremental', lastResult: null });

    ctx.gate.resolve();
    await ctx.supervisor.waitForIdle();

    const finished = await server.inject({ method: 'GET', url: '/status' });
    expect(finished.json()).toMatchObject({
      isRunning: false,
      state: 'completed',
      current: null,
      lastResult: { mode: 'incremental', success: true },
    });
    expect(ctx.requests).toEqual([{ mode: 'incremental' }]);
  });

  it('defaults to a catalog crawl', async () => {
    const ctx = setup();
    server = ctx.server;

    const response = await server.inject({ method: 'GET', url: '/run-scraper' });

    expect(response.json()).toMatchObject({ success: true, mode: 'default' });
    ctx.gate.resolve();
    await ctx.supervisor.waitForIdle();
  });

  it('rejects an unknown mode', async () => {
    const ctx = setup();
    server = ctx.server;

    const response = await server.inject({ method: 'GET', url: '/run-scraper?mode=weekly' });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({ success: false, message: 'Invalid mode. Use default, full or incremental' });
    expect(ctx.supervisor.getStatus().isRunning).toBe(false);
  });

  it('crawls one GPU by name', async () => {
    const ctx = setup();
    server = ctx.server;

    const missing = await server.inject({ method: 'GET', url: '/run-scraper-selected' });
    expect(missing.statusCode).toBe(400);

    const response = await server.inject({ method: 'GET', url: '/run-scraper-selected?gpu_name=Acme%20X1' });
    expect(response.json()).toMatchObject({ success: true, mode: 'default', gpuName: 'Acme X1' });

    ctx.gate.resolve();
    await ctx.supervisor.waitForIdle();
    expect(ctx.requests).toEqual([{ mode: 'default', gpuName: 'Acme X1' }]);
  });
});
