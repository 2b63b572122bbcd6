import type { JobKind } from '../types.js';

export interface JobDescriptor {
  jobId: string;
  kind: JobKind;
  enqueuedAt: string;
}

export type QueueBackend = 'memory' | 'mongo';

/**
 * FIFO of pending jobs. Every implementation delivers a descriptor to
 * exactly one dequeue call and fails enqueue loudly instead of dropping.
 */
export interface JobQueue {
  readonly backend: QueueBackend;
  enqueue(job: JobDescriptor): Promise<string>;
  /** Resolves with null once `waitTimeoutMs` passes with nothing available. */
  dequeue(waitTimeoutMs: number): Promise<JobDescriptor | null>;
  size(): Promise<number>;
  /** Wakes pending and future dequeue calls with null; enqueue keeps working. */
  interrupt(): void;
  close(): Promise<void>;
}

interface Waiter {
  resolve: (job: JobDescriptor | null) => void;
  timer: NodeJS.Timeout;
}

export class InMemoryJobQueue implements JobQueue {
  readonly backend = 'memory' as const;
  private readonly items: JobDescriptor[] = [];
  private readonly waiters: Waiter[] = [];
  private interrupted = false;

  async enqueue(job: JobDescriptor): Promise<string> {
    const waiter = this.waiters.shift();
    if (waiter) {
      clearTimeout(waiter.timer);
      waiter.resolve(job);
    } else {
      this.items.push(job);
    }
    return job.jobId;
  }

  async dequeue(waitTimeoutMs: number): Promise<JobDescriptor | null> {
    if (this.interrupted) {
      return null;
    }
    const next = this.items.shift();
    if (next) {
      return next;
    }
    if (waitTimeoutMs <= 0) {
      return null;
    }

    return new Promise((resolvePromise) => {
      const waiter: Waiter = {
        resolve: resolvePromise,
        timer: setTimeout(() => {
          const index = this.waiters.indexOf(waiter);
          if (index !== -1) {
            this.waiters.splice(index, 1);
          }
          resolvePromise(null);
        }, waitTimeoutMs)
      };
      this.waiters.push(waiter);
    });
  }

  async size(): Promise<number> {
    return this.items.length;
  }

  interrupt(): void {
    this.interrupted = true;
    for (const waiter of this.waiters.splice(0)) {
      clearTimeout(waiter.timer);
      waiter.resolve(null);
    }
  }

  async close(): Promise<void> {
    this.interrupt();
  }
}
