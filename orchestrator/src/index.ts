#!/usr/bin/env node
import type { FastifyInstance } from 'fastify';
import { createRuntime, type Runtime } from './bootstrap.js';
import { loadRuntimeConfig } from './config.js';
import { logger } from './logger.js';
import { buildServer } from './server.js';

let runtimeInstance: Runtime | null = null;
let serverInstance: FastifyInstance | null = null;
let shuttingDown = false;

async function shutdown(): Promise<void> {
  if (shuttingDown || !runtimeInstance) {
    return;
  }
  shuttingDown = true;

  if (serverInstance) {
    await serverInstance.close();
  }
  logger.info({ worker: runtimeInstance.worker.getStatus() }, 'Shutting down, waiting for the job in flight');
  await runtimeInstance.shutdown();
  logger.info('Worker shutdown complete');
}

async function main(): Promise<void> {
  const config = loadRuntimeConfig();
  logger.info({ backend: config.QUEUE_BACKEND, workerId: config.WORKER_ID }, 'Starting video job worker');

  const runtime = await createRuntime(config);
  runtimeInstance = runtime;

  const app = buildServer({ service: runtime.service, queue: runtime.queue, worker: runtime.worker });
  serverInstance = app;
  await app.listen({ port: config.PORT, host: config.HOST });
  logger.info({ port: config.PORT, host: config.HOST }, 'Job API listening');

  if (runtime.notifier) {
    await runtime.notifier.sendMessage(`🚀 Video job worker <code>${config.WORKER_ID}</code> started`);
  }

  await runtime.worker.start();
}

function handleSignal(signal: NodeJS.Signals): void {
  logger.info({ signal }, 'Shutting down worker');
  shutdown()
    .then(() => process.exit(0))
    .catch((error) => {
      logger.error({ error }, 'Error during shutdown');
      process.exit(1);
    });
}

process.on('SIGINT', handleSignal);
process.on('SIGTERM', handleSignal);

main().catch((error) => {
  logger.fatal({ error }, 'Fatal error in worker');
  process.exit(1);
});
