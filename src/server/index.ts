/**
 * HTTP control surface
 *
 *   GET /                        liveness
 *   GET /run-scraper?mode=       start a run (default | full | incremental)
 *   GET /run-scraper-selected    start a default crawl for one GPU (?gpu_name=)
 *   GET /status                  live progress and last run summary
 */

import Fastify, { type FastifyInstance, type FastifyReply } from 'fastify';
import { z } from 'zod';
import { ConcurrentRunRejectedError } from '../utils/errors.js';
import { componentLogger, type Logger } from '../utils/logger.js';
import type { RunRequest, RunSupervisor } from '../state/run-supervisor.js';

const runQuerySchema = z.object({
  mode: z.enum(['default', 'full', 'incremental']).default('default'),
});

const selectedQuerySchema = z.object({
  gpu_name: z.string().trim().min(1, 'gpu_name is required'),
});

export interface BuildServerOptions {
  supervisor: RunSupervisor;
  logger?: Logger;
}

export function buildServer(options: BuildServerOptions): FastifyInstance {
  const { supervisor } = options;
  const logger = options.logger ?? componentLogger('server');

  const server = Fastify({ logger: false });

  server.addHook('onResponse', async (request, reply) => {
    logger.info(
      { method: request.method, url: request.url, statusCode: reply.statusCode },
      'request completed'
    );
  });

  const startRun = (request: RunRequest, reply: FastifyReply) => {
    try {
      const ack = supervisor.start(request);
      return reply.send({
        success: true,
        message: `${ack.mode} run started`,
        mode: ack.mode,
        gpuName: ack.gpuName,
        startedAt: ack.startedAt.toISOString(),
      });
    } catch (error) {
      if (error instanceof ConcurrentRunRejectedError) {
        return reply.code(409).send({ success: false, message: error.message, activeMode: error.activeMode });
      }
      throw error;
    }
  };

  server.get('/', async () => ({ message: 'GPU catalog harvester is running' }));

  server.get('/run-scraper', async (request, reply) => {
    const parsed = runQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.code(400).send({
        success: false,
        message: 'Invalid mode. Use default, full or incremental',
      });
    }
    return startRun({ mode: parsed.data.mode }, reply);
  });

  server.get('/run-scraper-selected', async (request, reply) => {
    const parsed = selectedQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.code(400).send({ success: false, message: 'gpu_name is required' });
    }
    return startRun({ mode: 'default', gpuName: parsed.data.gpu_name }, reply);
  });

  server.get('/status', async () => supervisor.getStatus());

  return server;
}
