#!/usr/bin/env node
import { createRuntime } from '../orchestrator/src/bootstrap.js';
import { loadRuntimeConfig } from '../orchestrator/src/config.js';
import { AlreadyTerminalError, errorMessageOf } from '../orchestrator/src/errors.js';

async function cancel(): Promise<void> {
  const jobId = process.argv[2];
  if (!jobId) {
    console.error('Usage: cancel-job <jobId>');
    process.exit(1);
  }

  const runtime = await createRuntime(loadRuntimeConfig());
  try {
    const result = await runtime.service.cancel(jobId);
    if (result === 'alreadyTerminal') {
      const { status } = await runtime.service.getStatus(jobId);
      throw new AlreadyTerminalError(jobId, status);
    }
    console.log(`Cancelled job ${jobId}`);
  } finally {
    await runtime.close();
  }
}

cancel().catch((error) => {
  console.error(`Cancel failed: ${errorMessageOf(error)}`);
  process.exit(1);
});
