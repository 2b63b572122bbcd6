#!/usr/bin/env node
import { parseArgs } from 'node:util';
import { createRuntime } from '../orchestrator/src/bootstrap.js';
import { loadRuntimeConfig } from '../orchestrator/src/config.js';
import { errorMessageOf } from '../orchestrator/src/errors.js';

const usage = 'Usage: submit-job "<prompt>" [--provider veo|rest|auto] [--duration 8] [--aspect 16:9|9:16] [--quality standard|hd] [--persona <id>]...';

async function submit(): Promise<void> {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      provider: { type: 'string' },
      duration: { type: 'string' },
      aspect: { type: 'string' },
      quality: { type: 'string' },
      persona: { type: 'string', multiple: true }
    }
  });

  const prompt = positionals.join(' ').trim();
  if (!prompt) {
    console.error(usage);
    process.exit(1);
  }

  const config = loadRuntimeConfig();
  if (config.QUEUE_BACKEND !== 'mongo') {
    console.error('QUEUE_BACKEND=mongo is required: an in-memory queue does not outlive this process');
    process.exit(1);
  }

  const parameters: Record<string, unknown> = {};
  if (values.provider) parameters.provider = values.provider;
  if (values.duration) parameters.durationSeconds = Number(values.duration);
  if (values.aspect) parameters.aspectRatio = values.aspect;
  if (values.quality) parameters.quality = values.quality;

  const runtime = await createRuntime(config);
  try {
    const jobId = await runtime.service.submit('video', values.persona ?? [], prompt, parameters);
    console.log(`Queued job ${jobId}`);
    console.log(JSON.stringify(await runtime.service.getStatus(jobId), null, 2));
  } finally {
    await runtime.close();
  }
}

submit().catch((error) => {
  console.error(`Submission failed: ${errorMessageOf(error)}`);
  process.exit(1);
});
