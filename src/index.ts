/**
 * GPU Catalog Harvester
 *
 * Usage:
 *   node dist/src/index.js --service                      HTTP control surface + nightly scheduler
 *   node dist/src/index.js --run                          Catalog crawl once and exit
 *   node dist/src/index.js --run --mode=full              Full review update once and exit
 *   node dist/src/index.js --run --mode=incremental       Incremental review update once and exit
 *   node dist/src/index.js --run --gpu="GeForce RTX 4090" Crawl a single GPU
 *   node dist/src/index.js                                Default: service mode
 */

import { config } from './config/index.js';
import { logger } from './utils/logger.js';
import { initDatabase, closeDatabase } from './db/index.js';
import { getStats } from './db/queries.js';
import { sendRunSummary } from './notify/email.js';
import { createHarvestJob } from './pipeline.js';
import { startScheduler } from './scheduler.js';
import { buildServer } from './server/index.js';
import { RunSupervisor, type RunRequest } from './state/run-supervisor.js';
import type { RunMode } from './types/index.js';

const RUN_MODES: readonly RunMode[] = ['default', 'full', 'incremental'];

export interface CliOptions {
  service: boolean;
  request: RunRequest;
}

function isRunMode(value: string): value is RunMode {
  return RUN_MODES.some((mode) => mode === value);
}

function flagValue(args: readonly string[], name: string): string | undefined {
  const prefix = `--${name}=`;
  return args.find((arg) => arg.startsWith(prefix))?.slice(prefix.length);
}

export function parseArgs(args: readonly string[]): CliOptions {
  const isRunOnce = args.includes('--run');
  const mode = flagValue(args, 'mode') ?? 'default';
  if (!isRunMode(mode)) {
    throw new Error(`Unknown mode "${mode}". Use ${RUN_MODES.join(', ')}`);
  }

  const gpuName = flagValue(args, 'gpu')?.trim();
  return {
    service: args.includes('--service') || !isRunOnce,
    request: gpuName ? { mode, gpuName } : { mode },
  };
}

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));
  logger.info(
    { env: config.app.env, mode: options.service ? 'service' : 'run-once' },
    'Starting GPU catalog harvester'
  );

  try {
    initDatabase(config.database.path);
    const stats = getStats();
    logger.info(
      {
        products: stats.totalProducts,
        specs: stats.totalSpecs,
        reviews: stats.totalReviews,
        lastUpdated: stats.lastUpdatedAt?.toISOString() ?? 'never',
      },
      'Database ready'
    );
  } catch (error) {
    logger.fatal({ error }, 'Failed to initialize database');
    process.exit(1);
  }

  const supervisor = new RunSupervisor({
    job: createHarvestJob(),
    notify: (summary) => sendRunSummary(summary),
  });

  if (!options.service) {
    const summary = await supervisor.run(options.request);
    closeDatabase();
    process.exit(summary.success ? 0 : 1);
  }

  const server = buildServer({ supervisor });
  const task = config.scheduler.enabled ? startScheduler(supervisor) : null;

  const shutdown = async (): Promise<void> => {
    logger.info('Shutting down...');
    task?.stop();
    await server.close();
    closeDatabase();
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());

  await server.listen({ port: config.server.port, host: config.server.host });
  logger.info({ port: config.server.port }, 'Control surface listening');
}

const isDirectRun = process.argv[1]?.endsWith('index.ts') || process.argv[1]?.endsWith('index.js');
if (isDirectRun) {
  main().catch((error: unknown) => {
    logger.fatal({ error }, 'Application failed');
    process.exit(1);
  });
}
