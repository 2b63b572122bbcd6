import type { ErrorCode } from '../errors.js';
import type { JobRecord, JobStatus } from '../types.js';

/** State the record must be in for a transition to apply. */
export interface JobPrecondition {
  status: readonly JobStatus[];
  ownerWorkerId?: string;
}

export interface JobUpdate {
  status?: JobStatus;
  progress?: number;
  currentStep?: string;
  resultRef?: string;
  resultMetadata?: Record<string, unknown>;
  errorMessage?: string;
  errorCode?: ErrorCode;
  ownerWorkerId?: string;
  attempts?: number;
}

export interface JobListFilter {
  status?: JobStatus;
  limit?: number;
}

export const DEFAULT_LIST_LIMIT = 50;

export interface JobStore {
  create(job: JobRecord): Promise<void>;
  get(jobId: string): Promise<JobRecord | null>;
  list(filter?: JobListFilter): Promise<JobRecord[]>;
  /**
   * Applies `update` only if the record currently satisfies `expected`.
   * Returns the updated record, or null when the record is missing or the
   * precondition does not hold. Within an unchanged status, progress never
   * decreases.
   */
  compareAndTransition(jobId: string, expected: JobPrecondition, update: JobUpdate): Promise<JobRecord | null>;
}

export function clampProgress(progress: number): number {
  return Math.min(100, Math.max(0, Math.round(progress)));
}

export function matchesPrecondition(job: JobRecord, expected: JobPrecondition): boolean {
  if (!expected.status.includes(job.status)) {
    return false;
  }
  return expected.ownerWorkerId === undefined || job.ownerWorkerId === expected.ownerWorkerId;
}

export function applyJobUpdate(current: JobRecord, update: JobUpdate, now: string): JobRecord {
  const statusChanged = update.status !== undefined && update.status !== current.status;
  const next: JobRecord = { ...current, updatedAt: now };

  if (update.status !== undefined) next.status = update.status;
  if (update.currentStep !== undefined) next.currentStep = update.currentStep;
  if (update.ownerWorkerId !== undefined) next.ownerWorkerId = update.ownerWorkerId;
  if (update.attempts !== undefined) next.attempts = update.attempts;
  if (update.resultRef !== undefined) next.resultRef = update.resultRef;
  if (update.resultMetadata !== undefined) next.resultMetadata = update.resultMetadata;
  if (update.errorMessage !== undefined) next.errorMessage = update.errorMessage;
  if (update.errorCode !== undefined) next.errorCode = update.errorCode;

  if (update.progress !== undefined) {
    const progress = clampProgress(update.progress);
    next.progress = statusChanged ? progress : Math.max(current.progress, progress);
  }

  if (statusChanged) {
    if (next.status === 'processing') {
      next.startedAt = now;
    }
    if (next.status === 'completed' || next.status === 'failed' || next.status === 'cancelled') {
      next.completedAt = now;
    }
  }

  if (next.status !== 'failed') {
    delete next.errorMessage;
    delete next.errorCode;
  }
  if (next.status !== 'completed') {
    delete next.resultRef;
    delete next.resultMetadata;
  }

  return next;
}

export class InMemoryJobStore implements JobStore {
  private readonly jobs = new Map<string, JobRecord>();

  async create(job: JobRecord): Promise<void> {
    if (this.jobs.has(job.jobId)) {
      throw new Error(`Job ${job.jobId} already exists`);
    }
    this.jobs.set(job.jobId, structuredClone(job));
  }

  async get(jobId: string): Promise<JobRecord | null> {
    const job = this.jobs.get(jobId);
    return job ? structuredClone(job) : null;
  }

  async list(filter: JobListFilter = {}): Promise<JobRecord[]> {
    const limit = filter.limit ?? DEFAULT_LIST_LIMIT;
    return Array.from(this.jobs.values())
      .filter((job) => !filter.status || job.status === filter.status)
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt))
      .slice(0, limit)
      .map((job) => structuredClone(job));
  }

  async compareAndTransition(
    jobId: string,
    expected: JobPrecondition,
    update: JobUpdate
  ): Promise<JobRecord | null> {
    const current = this.jobs.get(jobId);
    if (!current || !matchesPrecondition(current, expected)) {
      return null;
    }

    const next = applyJobUpdate(current, update, new Date().toISOString());
    this.jobs.set(jobId, next);
    return structuredClone(next);
  }
}
