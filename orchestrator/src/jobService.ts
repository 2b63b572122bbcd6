import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import {
  InvalidRequestError,
  JobNotFoundError,
  OrchestratorError,
  QueueUnavailableError,
  errorMessageOf,
  formatJobError,
  toErrorCode
} from './errors.js';
import { logger } from './logger.js';
import { AUTO_PROVIDER, type ProviderRouter } from './providerRouter.js';
import type { ProviderInfo } from './providers/types.js';
import type { JobQueue } from './queue/jobQueue.js';
import type { JobListFilter, JobStore } from './storage/jobStore.js';
import { isTerminal, type JobParameters, type JobRecord, type JobStatusView } from './types.js';

export type CancelResult = 'ok' | 'alreadyTerminal';

export interface JobServiceOptions {
  store: JobStore;
  queue: JobQueue;
  router: ProviderRouter;
  defaultMaxAttempts: number;
  idFactory?: () => string;
}

function parametersSchema(router: ProviderRouter, defaultMaxAttempts: number) {
  return z
    .object({
      provider: z
        .string()
        .trim()
        .min(1)
        .refine((name) => name === AUTO_PROVIDER || router.has(name), (name) => ({
          message: `Unknown provider: ${name}`
        }))
        .optional(),
      quality: z.enum(['standard', 'hd']).default('standard'),
      durationSeconds: z.number().int().min(1).max(60).default(8),
      aspectRatio: z.enum(['16:9', '9:16']).default('16:9'),
      resolution: z.enum(['720p', '1080p']).optional(),
      generateAudio: z.boolean().optional(),
      maxAttempts: z.number().int().min(1).max(5).default(defaultMaxAttempts)
    })
    .strict();
}

const submissionSchema = z.object({
  kind: z.literal('video'),
  personaIds: z.array(z.string().trim().min(1)),
  prompt: z.string().trim().min(1, 'Prompt must not be empty').max(4000)
});

export function toStatusView(job: JobRecord): JobStatusView {
  const view: JobStatusView = {
    jobId: job.jobId,
    status: job.status,
    progress: job.progress,
    currentStep: job.currentStep
  };
  if (job.resultRef !== undefined) view.resultRef = job.resultRef;
  if (job.errorMessage !== undefined) view.errorMessage = job.errorMessage;
  return view;
}

/** Submission, status, cancellation and capability queries. */
export class JobService {
  private readonly store: JobStore;
  private readonly queue: JobQueue;
  private readonly router: ProviderRouter;
  private readonly parameters: ReturnType<typeof parametersSchema>;
  private readonly idFactory: () => string;

  constructor(options: JobServiceOptions) {
    this.store = options.store;
    this.queue = options.queue;
    this.router = options.router;
    this.parameters = parametersSchema(options.router, options.defaultMaxAttempts);
    this.idFactory = options.idFactory ?? randomUUID;
  }

  async submit(kind: string, personaIds: readonly string[], prompt: string, parameters: Record<string, unknown> = {}): Promise<string> {
    const submission = submissionSchema.safeParse({ kind, personaIds, prompt });
    const params = this.parameters.safeParse(parameters);
    const issues = [
      ...(submission.success ? [] : submission.error.errors),
      ...(params.success ? [] : params.error.errors.map((e) => ({ ...e, path: ['parameters', ...e.path] })))
    ].map((e) => `${e.path.join('.')}: ${e.message}`);

    if (!submission.success || !params.success) {
      throw new InvalidRequestError(`Invalid job request: ${issues.join(', ')}`, issues);
    }

    const now = new Date().toISOString();
    const jobParameters: JobParameters = params.data;
    const job: JobRecord = {
      jobId: this.idFactory(),
      kind: submission.data.kind,
      personaIds: submission.data.personaIds,
      prompt: submission.data.prompt,
      parameters: jobParameters,
      status: 'queued',
      progress: 0,
      currentStep: 'Queued',
      attempts: 0,
      createdAt: now,
      updatedAt: now
    };

    await this.store.create(job);

    try {
      await this.queue.enqueue({ jobId: job.jobId, kind: job.kind, enqueuedAt: now });
    } catch (error) {
      const queueError =
        error instanceof OrchestratorError
          ? error
          : new QueueUnavailableError(`Could not enqueue job ${job.jobId}: ${errorMessageOf(error)}`, { cause: error });
      await this.store.compareAndTransition(
        job.jobId,
        { status: ['queued'] },
        {
          status: 'failed',
          currentStep: 'Failed',
          errorMessage: formatJobError(queueError),
          errorCode: toErrorCode(queueError)
        }
      );
      logger.error({ jobId: job.jobId, error: queueError.message }, 'Job could not be enqueued');
      throw queueError;
    }

    logger.info({ jobId: job.jobId, provider: jobParameters.provider ?? AUTO_PROVIDER, backend: this.queue.backend }, 'Job queued');
    return job.jobId;
  }

  async getJob(jobId: string): Promise<JobRecord> {
    const job = await this.store.get(jobId);
    if (!job) {
      throw new JobNotFoundError(jobId);
    }
    return job;
  }

  async getStatus(jobId: string): Promise<JobStatusView> {
    return toStatusView(await this.getJob(jobId));
  }

  async cancel(jobId: string): Promise<CancelResult> {
    const job = await this.getJob(jobId);
    if (isTerminal(job.status)) {
      return 'alreadyTerminal';
    }

    const cancelled = await this.store.compareAndTransition(
      jobId,
      { status: ['queued', 'processing'] },
      { status: 'cancelled', currentStep: 'Cancelled' }
    );
    if (!cancelled) {
      // Reached a terminal state between the read and the write
      await this.getJob(jobId);
      return 'alreadyTerminal';
    }

    logger.info({ jobId, previousStatus: job.status }, 'Job cancelled');
    return 'ok';
  }

  listProviders(): ProviderInfo[] {
    return this.router.listProviders();
  }

  async listJobs(filter: JobListFilter = {}): Promise<JobStatusView[]> {
    const jobs = await this.store.list(filter);
    return jobs.map(toStatusView);
  }
}
