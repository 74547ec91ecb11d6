import type { FastifyInstance } from 'fastify';
import type { JobRegistry } from '../engine/job-registry.js';

export async function registerJobRoutes(fastify: FastifyInstance, registry: JobRegistry): Promise<void> {
  // List active jobs
  fastify.get('/api/jobs', async () => {
    return { success: true, data: registry.list().map((job) => job.summary()) };
  });

  // Get a guild's active job
  fastify.get<{ Params: { guildId: string } }>('/api/jobs/:guildId', async (request, reply) => {
    const job = registry.get(request.params.guildId);
    if (!job) {
      return reply.status(404).send({
        success: false,
        error: { code: 'NOT_FOUND', message: 'No verification job is running for this guild' },
      });
    }
    return { success: true, data: job.summary() };
  });
}
