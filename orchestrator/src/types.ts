import type { ErrorCode } from './errors.js';

export type JobKind = 'video';

export type JobStatus = 'queued' | 'processing' | 'completed' | 'failed' | 'cancelled';

export const TERMINAL_STATUSES: readonly JobStatus[] = ['completed', 'failed', 'cancelled'];

export function isTerminal(status: JobStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export type AspectRatio = '16:9' | '9:16';

export type VideoQuality = 'standard' | 'hd';

export interface JobParameters {
  provider?: string;
  quality: VideoQuality;
  durationSeconds: number;
  aspectRatio: AspectRatio;
  resolution?: '720p' | '1080p';
  generateAudio?: boolean;
  maxAttempts: number;
}

export interface JobRecord {
  jobId: string;
  kind: JobKind;
  personaIds: string[];
  prompt: string;
  parameters: JobParameters;
  status: JobStatus;
  progress: number;
  currentStep: string;
  resultRef?: string;
  resultMetadata?: Record<string, unknown>;
  errorMessage?: string;
  errorCode?: ErrorCode;
  ownerWorkerId?: string;
  attempts: number;
  createdAt: string;
  updatedAt: string;
  startedAt?: string;
  completedAt?: string;
}

export interface JobStatusView {
  jobId: string;
  status: JobStatus;
  progress: number;
  currentStep: string;
  resultRef?: string;
  errorMessage?: string;
}

export type ReferenceRole = 'subject' | 'style' | 'asset';

export type ReferenceSource =
  | { kind: 'bytes'; data: Uint8Array }
  | { kind: 'uri'; uri: string };

export interface ReferenceAsset {
  source: ReferenceSource;
  mimeType: string;
  role: ReferenceRole;
}

/** Provider-agnostic view of a job handed to adapters. */
export interface GenerationRequest {
  jobId?: string;
  prompt: string;
  durationSeconds: number;
  quality: VideoQuality;
  aspectRatio: AspectRatio;
  resolution?: '720p' | '1080p';
  generateAudio?: boolean;
  referenceAssets: ReferenceAsset[];
}

/**
 * Resolves persona mentions in a prompt into reference media.
 * Implemented outside this service.
 */
export interface PersonaResolver {
  resolveReferences(promptText: string, personaIds: readonly string[]): Promise<ReferenceAsset[]>;
}

export const noReferences: PersonaResolver = {
  resolveReferences: async () => []
};
