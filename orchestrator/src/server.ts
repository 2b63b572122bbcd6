import Fastify, { type FastifyInstance } from 'fastify';
import { z } from 'zod';
import { InvalidRequestError, OrchestratorError, type ErrorCode } from './errors.js';
import type { WorkerStatus } from './generationWorker.js';
import type { JobService } from './jobService.js';
import { logger } from './logger.js';
import type { JobQueue } from './queue/jobQueue.js';
import { DEFAULT_LIST_LIMIT } from './storage/jobStore.js';

export interface ServerDependencies {
  service: JobService;
  queue: JobQueue;
  worker: { getStatus(): WorkerStatus };
}

const STATUS_BY_CODE: Partial<Record<ErrorCode, number>> = {
  InvalidRequest: 400,
  ProviderUnavailable: 400,
  JobNotFound: 404,
  AlreadyTerminal: 409,
  QueueUnavailable: 503
};

const videoBodySchema = z.object({
  personaIds: z.array(z.string()).default([]),
  prompt: z.string(),
  parameters: z.record(z.unknown()).default({})
});

const listQuerySchema = z.object({
  status: z.enum(['queued', 'processing', 'completed', 'failed', 'cancelled']).optional(),
  limit: z.coerce.number().int().min(1).max(200).default(DEFAULT_LIST_LIMIT)
});

function parseOrReject<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, label: string): T {
  const result = schema.safeParse(value ?? {});
  if (!result.success) {
    const issues = result.error.errors.map((e) => `${[label, ...e.path].join('.')}: ${e.message}`);
    throw new InvalidRequestError(`Invalid ${label}: ${issues.join(', ')}`, issues);
  }
  return result.data;
}

/** HTTP surface over the job service, served from the worker process. */
export function buildServer(deps: ServerDependencies): FastifyInstance {
  const { service, queue, worker } = deps;
  const app = Fastify({ logger: false });

  app.addHook('onResponse', async (request, reply) => {
    logger.debug({ method: request.method, url: request.url, statusCode: reply.statusCode }, 'Request handled');
  });

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof OrchestratorError) {
      const statusCode = STATUS_BY_CODE[error.code] ?? 500;
      if (statusCode >= 500) {
        logger.error({ url: request.url, error }, 'Request failed');
      }
      return reply.status(statusCode).send({ error: error.code, message: error.message });
    }

    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      logger.error({ url: request.url, error }, 'Request failed');
      return reply.status(500).send({ error: 'InternalError', message: 'Internal server error' });
    }
    return reply.status(statusCode).send({ error: 'InvalidRequest', message: error.message });
  });

  app.get('/health', async () => ({
    status: 'healthy',
    backend: queue.backend,
    queueSize: await queue.size(),
    worker: worker.getStatus(),
    providers: service.listProviders()
  }));

  app.get('/providers', async () => ({ providers: service.listProviders() }));

  app.post('/generate/video', async (request, reply) => {
    const body = parseOrReject(videoBodySchema, request.body, 'body');
    const jobId = await service.submit('video', body.personaIds, body.prompt, body.parameters);
    reply.status(202);
    return { jobId, status: 'queued', message: 'Video generation job queued successfully' };
  });

  app.get('/generate/jobs', async (request) => {
    const query = parseOrReject(listQuerySchema, request.query, 'query');
    const jobs = await service.listJobs(query);
    return { jobs, count: jobs.length };
  });

  app.get<{ Params: { jobId: string } }>('/generate/jobs/:jobId', async (request) => {
    return await service.getStatus(request.params.jobId);
  });

  app.delete<{ Params: { jobId: string } }>('/generate/jobs/:jobId', async (request, reply) => {
    const { jobId } = request.params;
    const result = await service.cancel(jobId);
    if (result === 'alreadyTerminal') {
      const job = await service.getStatus(jobId);
      reply.status(409);
      return { error: 'AlreadyTerminal', message: `Job ${jobId} is already ${job.status}` };
    }
    return { jobId, status: 'cancelled', message: 'Job cancelled successfully' };
  });

  return app;
}
