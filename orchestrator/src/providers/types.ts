import type { GenerationRequest } from '../types.js';

/**
 * Remote operation address. `name` is the fully qualified resource path,
 * `shortName` the bare id; providers accept either inconsistently.
 */
export interface OperationHandle {
  provider: string;
  name: string;
  shortName: string;
}

export type GenerationOutput =
  | { kind: 'stored'; ref: string; mimeType: string; sizeBytes: number }
  | { kind: 'uri'; uri: string; mimeType?: string };

export type SubmitOutcome =
  | { kind: 'result'; output: GenerationOutput }
  | { kind: 'operation'; operation: OperationHandle };

export interface ProviderReportedError {
  code?: number | string;
  message: string;
}

export type PollResult =
  | { done: false; metadata?: Record<string, unknown> }
  | { done: true; ok: true; output: GenerationOutput; metadata?: Record<string, unknown> }
  | { done: true; ok: false; error: ProviderReportedError; metadata?: Record<string, unknown> };

export interface VideoProvider {
  readonly name: string;
  readonly modelId: string;
  /** False while the backend lacks credentials or configuration. */
  isAvailable(): boolean;
  submit(request: GenerationRequest): Promise<SubmitOutcome>;
  poll(handle: OperationHandle | string): Promise<PollResult>;
}

export interface ProviderInfo {
  name: string;
  available: boolean;
  modelId: string;
}

export function outputRef(output: GenerationOutput): string {
  return output.kind === 'stored' ? output.ref : output.uri;
}
