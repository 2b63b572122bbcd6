import { config as loadEnv } from 'dotenv';
import { randomUUID } from 'node:crypto';
import { resolve } from 'node:path';
import { z } from 'zod';
import { logger } from './logger.js';

const envPaths = [
  resolve(process.cwd(), '../.env'),      // Parent directory (service started from orchestrator/)
  resolve(process.cwd(), '../../.env'),
  resolve(process.cwd(), '.env')
];

export function loadEnvFiles(): void {
  for (const envPath of envPaths) {
    const result = loadEnv({ path: envPath });
    if (!result.error) {
      console.log(`[config] Loaded .env from: ${envPath}`);
      return;
    }
  }

  console.warn(`[config] Could not load .env. Tried paths:`, envPaths);
}

// Blank values in .env files count as unset
const blankToUndefined = (val: unknown): unknown =>
  typeof val === 'string' && val.trim() === '' ? undefined : val;

const optionalString = z.preprocess(blankToUndefined, z.string().optional());

const flag = (fallback: boolean) =>
  z.preprocess(
    (val) => {
      if (val === undefined || val === null) return fallback;
      if (typeof val === 'boolean') return val;
      if (typeof val === 'string') {
        const lower = val.toLowerCase().trim();
        if (lower === '') return fallback;
        return lower === 'true' || lower === '1';
      }
      return fallback;
    },
    z.boolean()
  );

const schema = z
  .object({
    QUEUE_BACKEND: z.preprocess(blankToUndefined, z.enum(['memory', 'mongo']).default('memory')),
    MONGODB_URI: optionalString,
    MONGODB_DATABASE: z.preprocess(blankToUndefined, z.string().min(1).default('video_jobs')),
    PORT: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).max(65535).default(8000)),
    HOST: z.preprocess(blankToUndefined, z.string().min(1).default('0.0.0.0')),
    WORKER_ID: z.preprocess(blankToUndefined, z.string().min(1).default(() => randomUUID())),
    DEQUEUE_TIMEOUT_SECONDS: z.preprocess(blankToUndefined, z.coerce.number().positive().default(5)),
    IDLE_BACKOFF_SECONDS: z.preprocess(blankToUndefined, z.coerce.number().nonnegative().default(5)),
    ERROR_BACKOFF_SECONDS: z.preprocess(blankToUndefined, z.coerce.number().nonnegative().default(10)),
    OPERATION_POLL_INTERVAL_SECONDS: z.preprocess(blankToUndefined, z.coerce.number().positive().default(10)),
    OPERATION_TIMEOUT_MINUTES: z.preprocess(blankToUndefined, z.coerce.number().positive().default(25)),
    DEFAULT_PROVIDER: z.preprocess(blankToUndefined, z.string().min(1).default('auto')),
    PROVIDER_PRIORITY: z
      .preprocess(blankToUndefined, z.string().default('veo,rest'))
      .transform((value) =>
        value
          .split(',')
          .map((name) => name.trim())
          .filter((name) => name.length > 0)
      )
      .refine((names) => names.length > 0, 'PROVIDER_PRIORITY must name at least one provider'),
    STRICT_EXPLICIT_PROVIDER: flag(true),
    MAX_ATTEMPTS: z.preprocess(blankToUndefined, z.coerce.number().int().min(1).max(5).default(1)),
    GOOGLE_ACCESS_TOKEN: optionalString,
    GOOGLE_PROJECT_ID: optionalString,
    GOOGLE_LOCATION: z.preprocess(blankToUndefined, z.string().min(1).default('us-central1')),
    VEO_MODEL: z.preprocess(blankToUndefined, z.string().min(1).default('veo-3.1-generate-preview')),
    VEO_USE_REFERENCE_IMAGES: flag(true),
    REST_VIDEO_API_URL: z.preprocess(blankToUndefined, z.string().url().optional()),
    REST_VIDEO_API_KEY: optionalString,
    REST_VIDEO_MODEL: z.preprocess(blankToUndefined, z.string().min(1).default('rest-video-1')),
    OUTPUT_DIR: z.preprocess(blankToUndefined, z.string().min(1).default('data/outputs')),
    TELEGRAM_BOT_TOKEN: optionalString,
    TELEGRAM_CHAT_ID: optionalString,
    LOG_LEVEL: z.preprocess(
      blankToUndefined,
      z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info')
    )
  })
  .superRefine((value, ctx) => {
    if (value.QUEUE_BACKEND === 'mongo' && !value.MONGODB_URI) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['MONGODB_URI'],
        message: 'MongoDB URI is required when QUEUE_BACKEND=mongo'
      });
    }
  });

export type RuntimeConfig = z.infer<typeof schema>;

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Configuration validation failed: ${issues.join(', ')}`);
    this.name = 'ConfigError';
  }
}

export function parseRuntimeConfig(env: NodeJS.ProcessEnv): RuntimeConfig {
  const result = schema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`));
  }
  return result.data;
}

/** Reads `.env` and the process environment, then applies LOG_LEVEL to the shared logger. */
export function loadRuntimeConfig(): RuntimeConfig {
  loadEnvFiles();
  try {
    const config = parseRuntimeConfig(process.env);
    logger.level = config.LOG_LEVEL;
    return config;
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`[config] ${error.message}`);
      console.error(`[config] Please check your .env file. Looked in:`, envPaths);
    }
    throw error;
  }
}
