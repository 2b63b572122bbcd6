import { MongoClient, type Collection, type Db } from 'mongodb';
import { QueueUnavailableError, errorMessageOf } from '../errors.js';
import { logger } from '../logger.js';
import { sleep as defaultSleep, type Sleep } from '../utils/sleep.js';
import type { JobDescriptor, JobQueue } from './jobQueue.js';

interface MongoJobQueueOptions {
  mongoUri: string;
  databaseName: string;
  collectionName?: string;
  pollIntervalMs?: number;
  sleep?: Sleep;
}

/**
 * Durable queue backed by a MongoDB collection. A claim is a single
 * findOneAndDelete, so concurrent workers never receive the same entry.
 */
export class MongoJobQueue implements JobQueue {
  readonly backend = 'mongo' as const;
  private client: MongoClient;
  private db: Db;
  private queueCollection: Collection<JobDescriptor>;
  private readonly pollIntervalMs: number;
  private readonly sleep: Sleep;
  private interrupted = false;

  constructor(options: MongoJobQueueOptions) {
    this.client = new MongoClient(options.mongoUri);
    this.db = this.client.db(options.databaseName);
    this.queueCollection = this.db.collection<JobDescriptor>(options.collectionName ?? 'job_queue');
    this.pollIntervalMs = options.pollIntervalMs ?? 500;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async connect(): Promise<void> {
    await this.client.connect();
    await this.queueCollection.createIndex({ enqueuedAt: 1 });
    await this.queueCollection.createIndex({ jobId: 1 }, { unique: true });
    logger.info('JobQueue connected to MongoDB');
  }

  interrupt(): void {
    this.interrupted = true;
  }

  async close(): Promise<void> {
    this.interrupt();
    await this.client.close();
  }

  async enqueue(job: JobDescriptor): Promise<string> {
    try {
      await this.queueCollection.insertOne({ ...job });
    } catch (error) {
      logger.error({ error, jobId: job.jobId }, 'Failed to enqueue job');
      throw new QueueUnavailableError(`Could not enqueue job ${job.jobId}: ${errorMessageOf(error)}`, {
        cause: error
      });
    }

    logger.debug({ jobId: job.jobId }, 'Added job to durable queue');
    return job.jobId;
  }

  async dequeue(waitTimeoutMs: number): Promise<JobDescriptor | null> {
    const deadline = Date.now() + waitTimeoutMs;

    while (!this.interrupted) {
      const entry = await this.queueCollection.findOneAndDelete(
        {},
        { sort: { enqueuedAt: 1, _id: 1 }, projection: { _id: 0 } }
      );
      if (entry) {
        return { jobId: entry.jobId, kind: entry.kind, enqueuedAt: entry.enqueuedAt };
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        return null;
      }
      await this.sleep(Math.min(this.pollIntervalMs, remaining));
    }

    return null;
  }

  async size(): Promise<number> {
    return await this.queueCollection.countDocuments();
  }
}
