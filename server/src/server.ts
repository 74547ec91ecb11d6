import Fastify, { type FastifyInstance } from 'fastify';
import { registerJobRoutes } from './api/jobs.js';
import type { JobRegistry } from './engine/job-registry.js';

export interface ServerOptions {
  registry: JobRegistry;
  /** Pino level, or false to disable request logging */
  logLevel: string | false;
}

/**
 * Status server: health check and visibility into running jobs.
 */
export async function buildServer(options: ServerOptions): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: options.logLevel === false ? false : { level: options.logLevel },
  });

  fastify.get('/health', async () => {
    return { success: true, data: { status: 'ok' } };
  });

  await registerJobRoutes(fastify, options.registry);
  return fastify;
}
