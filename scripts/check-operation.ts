#!/usr/bin/env node
import { loadRuntimeConfig } from '../orchestrator/src/config.js';
import { errorMessageOf } from '../orchestrator/src/errors.js';
import { createProviders } from '../orchestrator/src/providers/registry.js';
import { outputRef } from '../orchestrator/src/providers/types.js';
import { LocalBlobStore } from '../orchestrator/src/storage/blobStore.js';
import { sleep } from '../orchestrator/src/utils/sleep.js';

// Drives its own poll schedule against a single operation handle
async function check(): Promise<void> {
  const [providerName, handle] = process.argv.slice(2);
  if (!providerName || !handle) {
    console.error('Usage: check-operation <provider> <operation name or id>');
    process.exit(1);
  }

  const config = loadRuntimeConfig();
  const provider = createProviders(config, new LocalBlobStore(config.OUTPUT_DIR)).find((p) => p.name === providerName);
  if (!provider) {
    console.error(`Unknown provider: ${providerName}`);
    process.exit(1);
  }

  const intervalMs = config.OPERATION_POLL_INTERVAL_SECONDS * 1000;
  const deadline = Date.now() + config.OPERATION_TIMEOUT_MINUTES * 60 * 1000;
  let checks = 0;

  while (Date.now() < deadline) {
    checks += 1;
    const result = await provider.poll(handle);

    if (!result.done) {
      console.log(`[${checks}] Still running...`);
      await sleep(intervalMs);
      continue;
    }

    if (!result.ok) {
      console.error(`Operation failed: ${result.error.message}`);
      process.exit(1);
    }

    console.log(`Operation finished after ${checks} check(s)`);
    console.log(`Result: ${outputRef(result.output)}`);
    return;
  }

  console.error(`Operation still running after ${config.OPERATION_TIMEOUT_MINUTES} minutes`);
  process.exit(1);
}

check().catch((error) => {
  console.error(`Check failed: ${errorMessageOf(error)}`);
  process.exit(1);
});
