import type { RuntimeConfig } from './config.js';
import { GenerationWorker } from './generationWorker.js';
import { JobService } from './jobService.js';
import { logger } from './logger.js';
import { ProviderRouter } from './providerRouter.js';
import type { FetchLike } from './providers/http.js';
import { createProviders } from './providers/registry.js';
import { InMemoryJobQueue, type JobQueue } from './queue/jobQueue.js';
import { MongoJobQueue } from './queue/mongoJobQueue.js';
import { LocalBlobStore } from './storage/blobStore.js';
import { InMemoryJobStore, type JobStore } from './storage/jobStore.js';
import { MongoJobStore } from './storage/mongoJobStore.js';
import { createTelegramNotifier, type TelegramNotifier } from './telegram.js';
import { noReferences, type PersonaResolver } from './types.js';

export interface Runtime {
  store: JobStore;
  queue: JobQueue;
  router: ProviderRouter;
  service: JobService;
  worker: GenerationWorker;
  notifier: TelegramNotifier | null;
  /** Stops the worker after its job in flight, then releases connections. */
  shutdown(): Promise<void>;
  close(): Promise<void>;
}

export interface StoppableRuntime {
  worker: GenerationWorker;
  queue: JobQueue;
  close(): Promise<void>;
}

export async function shutdownRuntime(runtime: StoppableRuntime): Promise<void> {
  const stopped = runtime.worker.stop();
  // Connections stay open until the job in flight has finished its writes
  runtime.queue.interrupt();
  await stopped;
  await runtime.close();
}

export interface RuntimeDependencies {
  personaResolver?: PersonaResolver;
  fetchImpl?: FetchLike;
}

async function createBackend(config: RuntimeConfig): Promise<{ store: JobStore; queue: JobQueue; close(): Promise<void> }> {
  if (config.QUEUE_BACKEND === 'memory') {
    const queue = new InMemoryJobQueue();
    return { store: new InMemoryJobStore(), queue, close: () => queue.close() };
  }

  // Validated by the config schema whenever the backend is mongo
  const mongoUri = config.MONGODB_URI ?? '';
  const store = new MongoJobStore({ mongoUri, databaseName: config.MONGODB_DATABASE });
  const queue = new MongoJobQueue({ mongoUri, databaseName: config.MONGODB_DATABASE });
  await store.connect();
  await queue.connect();

  return {
    store,
    queue,
    close: async () => {
      await queue.close();
      await store.disconnect();
    }
  };
}

/** Wires store, queue, providers, router, service and worker from configuration. */
export async function createRuntime(config: RuntimeConfig, dependencies: RuntimeDependencies = {}): Promise<Runtime> {
  const backend = await createBackend(config);
  const blobStore = new LocalBlobStore(config.OUTPUT_DIR);
  const providers = createProviders(config, blobStore, dependencies.fetchImpl);

  const router = new ProviderRouter({
    providers,
    priority: config.PROVIDER_PRIORITY,
    defaultProvider: config.DEFAULT_PROVIDER,
    strictExplicitProvider: config.STRICT_EXPLICIT_PROVIDER
  });

  const notifier = createTelegramNotifier({ botToken: config.TELEGRAM_BOT_TOKEN, chatId: config.TELEGRAM_CHAT_ID });

  const service = new JobService({
    store: backend.store,
    queue: backend.queue,
    router,
    defaultMaxAttempts: config.MAX_ATTEMPTS
  });

  const worker = new GenerationWorker({
    workerId: config.WORKER_ID,
    store: backend.store,
    queue: backend.queue,
    router,
    personaResolver: dependencies.personaResolver ?? noReferences,
    notifier: notifier ?? undefined,
    dequeueTimeoutMs: config.DEQUEUE_TIMEOUT_SECONDS * 1000,
    idleBackoffMs: config.IDLE_BACKOFF_SECONDS * 1000,
    errorBackoffMs: config.ERROR_BACKOFF_SECONDS * 1000,
    pollIntervalMs: config.OPERATION_POLL_INTERVAL_SECONDS * 1000,
    operationTimeoutMs: config.OPERATION_TIMEOUT_MINUTES * 60 * 1000
  });

  logger.info(
    { backend: config.QUEUE_BACKEND, workerId: config.WORKER_ID, providers: router.listProviders() },
    'Runtime initialized'
  );

  const close = backend.close;
  return {
    store: backend.store,
    queue: backend.queue,
    router,
    service,
    worker,
    notifier,
    shutdown: () => shutdownRuntime({ worker, queue: backend.queue, close }),
    close
  };
}
