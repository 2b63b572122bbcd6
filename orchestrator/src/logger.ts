import { pino, type Logger } from 'pino';

export type { Logger };

const level = process.env.LOG_LEVEL ?? (process.env.VITEST ? 'silent' : 'info');

export const logger: Logger = pino({
  name: 'video-job-orchestrator',
  level,
  base: { pid: process.pid }
});
