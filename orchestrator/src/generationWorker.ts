import {
  GenerationFailedError,
  JobCancelledError,
  OperationTimeoutError,
  errorMessageOf,
  formatJobError,
  isRetryable,
  toErrorCode
} from './errors.js';
import { logger } from './logger.js';
import type { ProviderRouter, RoutedResult } from './providerRouter.js';
import { outputRef, type GenerationOutput, type OperationHandle, type VideoProvider } from './providers/types.js';
import type { JobDescriptor, JobQueue } from './queue/jobQueue.js';
import type { JobPrecondition, JobStore } from './storage/jobStore.js';
import type { GenerationRequest, JobRecord, PersonaResolver } from './types.js';
import { sleep as defaultSleep, type Sleep } from './utils/sleep.js';

export interface JobNotifier {
  notifyFailure(job: JobRecord): Promise<void>;
}

export interface GenerationWorkerOptions {
  workerId: string;
  store: JobStore;
  queue: JobQueue;
  router: ProviderRouter;
  personaResolver: PersonaResolver;
  notifier?: JobNotifier;
  dequeueTimeoutMs: number;
  idleBackoffMs: number;
  errorBackoffMs: number;
  pollIntervalMs: number;
  operationTimeoutMs: number;
  sleep?: Sleep;
  now?: () => number;
}

export interface WorkerStatus {
  workerId: string;
  running: boolean;
  processedCount: number;
  currentJobId: string | null;
}

interface ProviderRun {
  output: GenerationOutput;
  modelId: string;
  operation?: string;
}

type ClaimResult = { claimed: true; job: JobRecord } | { claimed: false; job: JobRecord | null };

const PROGRESS_STARTED = 10;
const PROGRESS_REFERENCES = 20;
const PROGRESS_SUBMITTED = 30;
const PROGRESS_POLL_CEILING = 85;
const PROGRESS_FINALIZING = 90;

/**
 * Drains the queue one job at a time. Every write after the claim is
 * conditioned on the job still being `processing` and owned by this
 * worker, so a cancellation recorded meanwhile always wins.
 */
export class GenerationWorker {
  readonly workerId: string;
  private readonly store: JobStore;
  private readonly queue: JobQueue;
  private readonly router: ProviderRouter;
  private readonly personaResolver: PersonaResolver;
  private readonly notifier?: JobNotifier;
  private readonly sleep: Sleep;
  private readonly now: () => number;
  private running = false;
  private loop: Promise<void> | null = null;
  private processedCount = 0;
  private currentJobId: string | null = null;

  constructor(private readonly options: GenerationWorkerOptions) {
    this.workerId = options.workerId;
    this.store = options.store;
    this.queue = options.queue;
    this.router = options.router;
    this.personaResolver = options.personaResolver;
    this.notifier = options.notifier;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  getStatus(): WorkerStatus {
    return {
      workerId: this.workerId,
      running: this.running,
      processedCount: this.processedCount,
      currentJobId: this.currentJobId
    };
  }

  start(): Promise<void> {
    if (!this.loop) {
      this.running = true;
      this.loop = this.runLoop().finally(() => {
        this.loop = null;
      });
    }
    return this.loop;
  }

  /** Lets the job in flight finish, then resolves once the loop has exited. */
  async stop(): Promise<void> {
    this.running = false;
    if (this.loop) {
      await this.loop;
    }
  }

  private async runLoop(): Promise<void> {
    logger.info({ workerId: this.workerId, backend: this.queue.backend }, 'Worker started');

    while (this.running) {
      try {
        const processed = await this.processNext();
        if (!processed && this.running) {
          await this.sleep(this.options.idleBackoffMs);
        }
      } catch (error) {
        logger.error({ workerId: this.workerId, error }, 'Error in worker loop');
        if (this.running) {
          await this.sleep(this.options.errorBackoffMs);
        }
      }
    }

    logger.info({ workerId: this.workerId, processedCount: this.processedCount }, 'Worker stopped');
  }

  /** Returns false when the queue stayed empty for the whole wait. */
  async processNext(): Promise<boolean> {
    const descriptor = await this.queue.dequeue(this.options.dequeueTimeoutMs);
    if (!descriptor) {
      return false;
    }
    await this.processJob(descriptor);
    return true;
  }

  async processJob(descriptor: JobDescriptor): Promise<JobRecord | null> {
    const { jobId } = descriptor;
    let claim: ClaimResult;
    try {
      claim = await this.claim(jobId);
    } catch (error) {
      // The descriptor is already off the queue; hand it back before giving up
      await this.restore(descriptor, error);
      throw error;
    }
    if (!claim.claimed) {
      return claim.job;
    }

    const claimed = claim.job;
    logger.info({ jobId, workerId: this.workerId, attempt: claimed.attempts }, 'Processing job');
    this.currentJobId = jobId;
    const startedAt = this.now();

    try {
      return await this.run(claimed, startedAt);
    } catch (error) {
      return await this.handleFailure(claimed, error);
    } finally {
      this.currentJobId = null;
      this.processedCount += 1;
    }
  }

  private async claim(jobId: string): Promise<ClaimResult> {
    const existing = await this.store.get(jobId);
    if (!existing) {
      logger.warn({ jobId }, 'Dequeued job does not exist, skipping');
      return { claimed: false, job: null };
    }
    if (existing.status !== 'queued') {
      logger.info({ jobId, status: existing.status }, 'Dequeued job is not queued, skipping');
      return { claimed: false, job: existing };
    }

    const claimed = await this.store.compareAndTransition(
      jobId,
      { status: ['queued'] },
      {
        status: 'processing',
        progress: PROGRESS_STARTED,
        currentStep: 'Starting generation',
        ownerWorkerId: this.workerId,
        attempts: existing.attempts + 1
      }
    );
    if (!claimed) {
      logger.info({ jobId }, 'Job changed state before it could be claimed, skipping');
      return { claimed: false, job: await this.store.get(jobId) };
    }
    return { claimed: true, job: claimed };
  }

  private async restore(descriptor: JobDescriptor, error: unknown): Promise<void> {
    const { jobId } = descriptor;
    try {
      await this.queue.enqueue(descriptor);
      logger.warn({ jobId, error: errorMessageOf(error) }, 'Claim failed, job handed back to the queue');
    } catch (enqueueError) {
      logger.error(
        { jobId, error: errorMessageOf(error), enqueueError: errorMessageOf(enqueueError) },
        'Claim failed and the job could not be handed back to the queue'
      );
    }
  }

  private get ownership(): JobPrecondition {
    return { status: ['processing'], ownerWorkerId: this.workerId };
  }

  private async run(job: JobRecord, startedAt: number): Promise<JobRecord | null> {
    await this.advance(job.jobId, PROGRESS_REFERENCES, 'Resolving persona references');
    const referenceAssets = await this.personaResolver.resolveReferences(job.prompt, job.personaIds);

    const request: GenerationRequest = {
      jobId: job.jobId,
      prompt: job.prompt,
      durationSeconds: job.parameters.durationSeconds,
      quality: job.parameters.quality,
      aspectRatio: job.parameters.aspectRatio,
      resolution: job.parameters.resolution,
      generateAudio: job.parameters.generateAudio,
      referenceAssets
    };

    const routed = await this.router.route(job.parameters.provider, (provider) =>
      this.runOnProvider(job.jobId, provider, request)
    );

    await this.advance(job.jobId, PROGRESS_FINALIZING, 'Finalizing');
    return await this.complete(job.jobId, routed, startedAt);
  }

  private async runOnProvider(jobId: string, provider: VideoProvider, request: GenerationRequest): Promise<ProviderRun> {
    const outcome = await provider.submit(request);
    await this.advance(jobId, PROGRESS_SUBMITTED, `Generating video with ${provider.name}`);

    if (outcome.kind === 'result') {
      return { output: outcome.output, modelId: provider.modelId };
    }

    const output = await this.waitForOperation(jobId, provider, outcome.operation);
    return { output, modelId: provider.modelId, operation: outcome.operation.name };
  }

  private async waitForOperation(jobId: string, provider: VideoProvider, operation: OperationHandle): Promise<GenerationOutput> {
    const { pollIntervalMs, operationTimeoutMs } = this.options;
    const startedAt = this.now();

    for (;;) {
      await this.sleep(pollIntervalMs);
      await this.ensureNotCancelled(jobId);

      const result = await provider.poll(operation);
      if (result.done) {
        if (result.ok) {
          return result.output;
        }
        throw new GenerationFailedError(
          `Operation ${operation.shortName} failed: ${result.error.message}`,
          provider.name
        );
      }

      const elapsed = this.now() - startedAt;
      if (elapsed >= operationTimeoutMs) {
        throw new OperationTimeoutError(operation.name, operationTimeoutMs);
      }

      const span = PROGRESS_POLL_CEILING - PROGRESS_SUBMITTED;
      const progress = PROGRESS_SUBMITTED + Math.floor((span * elapsed) / operationTimeoutMs);
      await this.advance(jobId, Math.min(progress, PROGRESS_POLL_CEILING), `Waiting for ${provider.name} to finish rendering`);
    }
  }

  private async ensureNotCancelled(jobId: string): Promise<void> {
    const job = await this.store.get(jobId);
    if (!job || job.status === 'cancelled') {
      throw new JobCancelledError(jobId);
    }
  }

  /** In-place progress update; the store keeps progress from going backwards. */
  private async advance(jobId: string, progress: number, currentStep: string): Promise<void> {
    const updated = await this.store.compareAndTransition(jobId, this.ownership, { progress, currentStep });
    if (updated) {
      return;
    }

    const job = await this.store.get(jobId);
    if (!job || job.status === 'cancelled') {
      throw new JobCancelledError(jobId);
    }
    throw new GenerationFailedError(`Job ${jobId} is ${job.status} and no longer owned by worker ${this.workerId}`);
  }

  private async complete(
    jobId: string,
    routed: RoutedResult<ProviderRun>,
    startedAt: number
  ): Promise<JobRecord | null> {
    const { output, modelId, operation } = routed.value;
    const resultMetadata: Record<string, unknown> = {
      providerUsed: routed.providerUsed,
      fallbackUsed: routed.fallbackUsed,
      selectionReason: routed.selectionReason,
      modelId,
      failedAttempts: routed.attempts,
      durationMs: this.now() - startedAt
    };
    if (operation) resultMetadata.operation = operation;
    if (output.mimeType) resultMetadata.mimeType = output.mimeType;
    if (output.kind === 'stored') resultMetadata.sizeBytes = output.sizeBytes;

    const completed = await this.store.compareAndTransition(jobId, this.ownership, {
      status: 'completed',
      progress: 100,
      currentStep: 'Completed',
      resultRef: outputRef(output),
      resultMetadata
    });

    if (!completed) {
      logger.warn({ jobId }, 'Completion write rejected, job changed state meanwhile');
      return await this.store.get(jobId);
    }

    logger.info(
      { jobId, provider: routed.providerUsed, fallbackUsed: routed.fallbackUsed, resultRef: completed.resultRef },
      'Job completed'
    );
    return completed;
  }

  private async handleFailure(job: JobRecord, error: unknown): Promise<JobRecord | null> {
    const { jobId } = job;

    if (error instanceof JobCancelledError) {
      logger.info({ jobId }, 'Job cancelled while processing, dropping result');
      return await this.store.get(jobId);
    }

    const maxAttempts = job.parameters.maxAttempts;
    if (isRetryable(error) && job.attempts < maxAttempts) {
      return await this.requeue(job, error);
    }

    const failed = await this.store.compareAndTransition(jobId, this.ownership, {
      status: 'failed',
      currentStep: 'Failed',
      errorMessage: formatJobError(error),
      errorCode: toErrorCode(error)
    });

    if (!failed) {
      logger.warn({ jobId, error: errorMessageOf(error) }, 'Failure write rejected, job changed state meanwhile');
      return await this.store.get(jobId);
    }

    logger.error({ jobId, error: failed.errorMessage, attempts: job.attempts }, 'Job failed');
    await this.notify(failed);
    return failed;
  }

  private async requeue(job: JobRecord, error: unknown): Promise<JobRecord | null> {
    const { jobId } = job;
    const requeued = await this.store.compareAndTransition(jobId, this.ownership, {
      status: 'queued',
      progress: 0,
      currentStep: `Retrying (attempt ${job.attempts + 1} of ${job.parameters.maxAttempts}) after ${formatJobError(error)}`
    });
    if (!requeued) {
      logger.warn({ jobId }, 'Retry write rejected, job changed state meanwhile');
      return await this.store.get(jobId);
    }

    try {
      await this.queue.enqueue({ jobId, kind: job.kind, enqueuedAt: new Date().toISOString() });
    } catch (enqueueError) {
      logger.error({ jobId, error: enqueueError }, 'Could not re-enqueue job for retry');
      const failed = await this.store.compareAndTransition(
        jobId,
        { status: ['queued'] },
        {
          status: 'failed',
          currentStep: 'Failed',
          errorMessage: formatJobError(enqueueError),
          errorCode: toErrorCode(enqueueError)
        }
      );
      if (failed) {
        await this.notify(failed);
      }
      return failed ?? (await this.store.get(jobId));
    }

    logger.warn({ jobId, attempt: job.attempts, error: errorMessageOf(error) }, 'Job re-enqueued for retry');
    return requeued;
  }

  private async notify(job: JobRecord): Promise<void> {
    if (!this.notifier) {
      return;
    }
    try {
      await this.notifier.notifyFailure(job);
    } catch (error) {
      logger.warn({ jobId: job.jobId, error }, 'Failure notification could not be sent');
    }
  }
}
