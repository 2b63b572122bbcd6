import { MongoClient, type Collection, type Db, type Filter, type UpdateFilter } from 'mongodb';
import { logger } from '../logger.js';
import type { JobRecord } from '../types.js';
import {
  DEFAULT_LIST_LIMIT,
  clampProgress,
  type JobListFilter,
  type JobPrecondition,
  type JobStore,
  type JobUpdate
} from './jobStore.js';

interface MongoJobStoreOptions {
  mongoUri: string;
  databaseName: string;
  collectionName?: string;
}

type UnsetFields = Partial<Record<keyof JobRecord, ''>>;

const EXCLUSIVE_FIELDS = ['errorMessage', 'errorCode', 'resultRef', 'resultMetadata'] as const;

export class MongoJobStore implements JobStore {
  private client: MongoClient;
  private db: Db;
  private jobsCollection: Collection<JobRecord>;

  constructor(options: MongoJobStoreOptions) {
    this.client = new MongoClient(options.mongoUri);
    this.db = this.client.db(options.databaseName);
    this.jobsCollection = this.db.collection<JobRecord>(options.collectionName ?? 'generation_jobs');
  }

  async connect(): Promise<void> {
    await this.client.connect();
    await this.ensureIndexes();
    logger.info('JobStore connected to MongoDB');
  }

  async disconnect(): Promise<void> {
    await this.client.close();
  }

  private async ensureIndexes(): Promise<void> {
    await this.jobsCollection.createIndex({ jobId: 1 }, { unique: true });
    await this.jobsCollection.createIndex({ status: 1, createdAt: -1 });
  }

  async create(job: JobRecord): Promise<void> {
    await this.jobsCollection.insertOne({ ...job });
    logger.debug({ jobId: job.jobId }, 'Job saved to database');
  }

  async get(jobId: string): Promise<JobRecord | null> {
    return await this.jobsCollection.findOne({ jobId }, { projection: { _id: 0 } });
  }

  async list(filter: JobListFilter = {}): Promise<JobRecord[]> {
    const query: Filter<JobRecord> = filter.status ? { status: filter.status } : {};
    return await this.jobsCollection
      .find(query, { projection: { _id: 0 } })
      .sort({ createdAt: -1 })
      .limit(filter.limit ?? DEFAULT_LIST_LIMIT)
      .toArray();
  }

  async compareAndTransition(
    jobId: string,
    expected: JobPrecondition,
    update: JobUpdate
  ): Promise<JobRecord | null> {
    const query: Filter<JobRecord> = { jobId, status: { $in: [...expected.status] } };
    if (expected.ownerWorkerId !== undefined) {
      query.ownerWorkerId = expected.ownerWorkerId;
    }

    return await this.jobsCollection.findOneAndUpdate(query, buildUpdate(update, new Date().toISOString()), {
      returnDocument: 'after',
      projection: { _id: 0 }
    });
  }
}

/**
 * Mirrors applyJobUpdate: a status change sets progress outright, an
 * in-place update can only raise it.
 */
export function buildUpdate(update: JobUpdate, now: string): UpdateFilter<JobRecord> {
  const set: Partial<JobRecord> = { updatedAt: now };
  const unset: UnsetFields = {};
  const result: UpdateFilter<JobRecord> = { $set: set };

  if (update.currentStep !== undefined) set.currentStep = update.currentStep;
  if (update.ownerWorkerId !== undefined) set.ownerWorkerId = update.ownerWorkerId;
  if (update.attempts !== undefined) set.attempts = update.attempts;
  if (update.resultRef !== undefined) set.resultRef = update.resultRef;
  if (update.resultMetadata !== undefined) set.resultMetadata = update.resultMetadata;
  if (update.errorMessage !== undefined) set.errorMessage = update.errorMessage;
  if (update.errorCode !== undefined) set.errorCode = update.errorCode;

  if (update.status === undefined) {
    if (update.progress !== undefined) {
      result.$max = { progress: clampProgress(update.progress) };
    }
    return result;
  }

  set.status = update.status;
  if (update.progress !== undefined) {
    set.progress = clampProgress(update.progress);
  }
  if (update.status === 'processing') {
    set.startedAt = now;
  }
  if (update.status === 'completed' || update.status === 'failed' || update.status === 'cancelled') {
    set.completedAt = now;
  }
  if (update.status !== 'failed') {
    unset.errorMessage = '';
    unset.errorCode = '';
  }
  if (update.status !== 'completed') {
    unset.resultRef = '';
    unset.resultMetadata = '';
  }
  // Status rules win over explicit values, as in applyJobUpdate
  for (const key of EXCLUSIVE_FIELDS) {
    if (unset[key] !== undefined) {
      delete set[key];
    }
  }
  result.$unset = unset;

  return result;
}
