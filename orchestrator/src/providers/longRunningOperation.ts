import { z } from 'zod';
import { DecodeError, OperationNotFoundError } from '../errors.js';
import { logger } from '../logger.js';
import type { BlobStore } from '../storage/blobStore.js';
import type { GenerationRequest } from '../types.js';
import { decodeVideoPayload, materializePayload } from './payloadDecoder.js';
import type { OperationHandle, PollResult, SubmitOutcome } from './types.js';

export type FetchOutcome = { found: true; body: unknown } | { found: false };

/** Wire-level half of an asynchronous backend. */
export interface OperationTransport {
  submit(request: GenerationRequest): Promise<unknown>;
  fetchOperation(operationName: string): Promise<FetchOutcome>;
  /** Builds the fully qualified resource path for a bare operation id. */
  qualify(shortName: string): string;
}

const OPERATIONS_SEGMENT = '/operations/';

const operationSchema = z
  .object({
    name: z.string().optional(),
    done: z.boolean().optional(),
    error: z
      .object({
        code: z.union([z.number(), z.string()]).optional(),
        message: z.string().optional()
      })
      .passthrough()
      .optional(),
    response: z.unknown().optional(),
    metadata: z.record(z.unknown()).optional()
  })
  .passthrough();

export function operationHandle(provider: string, handle: string, qualify: (shortName: string) => string): OperationHandle {
  const index = handle.lastIndexOf(OPERATIONS_SEGMENT);
  if (index !== -1) {
    return { provider, name: handle, shortName: handle.slice(index + OPERATIONS_SEGMENT.length) };
  }
  return { provider, name: qualify(handle), shortName: handle };
}

/**
 * Submit/poll/decode for backends that finish asynchronously. Holds no
 * state between calls: whoever calls poll owns the schedule and timeout.
 */
export class LongRunningOperationClient {
  constructor(
    private readonly provider: string,
    private readonly transport: OperationTransport,
    private readonly blobStore: BlobStore
  ) {}

  async submit(request: GenerationRequest): Promise<SubmitOutcome> {
    const body = await this.transport.submit(request);
    const parsed = operationSchema.safeParse(body);
    if (!parsed.success) {
      throw new DecodeError('Submit response is not a JSON object');
    }

    if (parsed.data.name) {
      const operation = this.resolveHandle(parsed.data.name);
      logger.info({ provider: this.provider, operation: operation.name }, 'Video generation started');
      return { kind: 'operation', operation };
    }

    // Immediate mode: the response already carries the video
    const output = await materializePayload(decodeVideoPayload(body), this.blobStore, this.provider);
    return { kind: 'result', output };
  }

  resolveHandle(handle: OperationHandle | string): OperationHandle {
    const raw = typeof handle === 'string' ? handle : handle.name;
    return operationHandle(this.provider, raw, (shortName) => this.transport.qualify(shortName));
  }

  async poll(handle: OperationHandle | string): Promise<PollResult> {
    const operation = this.resolveHandle(handle);

    let fetched = await this.transport.fetchOperation(operation.name);
    if (!fetched.found && operation.shortName !== operation.name) {
      logger.info(
        { provider: this.provider, operation: operation.name, shortName: operation.shortName },
        'Operation not found by qualified name, retrying with short name'
      );
      fetched = await this.transport.fetchOperation(operation.shortName);
    }
    if (!fetched.found) {
      throw new OperationNotFoundError(operation.name, operation.shortName);
    }

    const parsed = operationSchema.safeParse(fetched.body);
    if (!parsed.success) {
      throw new DecodeError('Operation status is not a JSON object');
    }

    const { done, error, response, metadata } = parsed.data;
    if (!done) {
      return { done: false, metadata };
    }
    if (error) {
      return {
        done: true,
        ok: false,
        error: { code: error.code, message: error.message ?? 'Operation failed without a message' },
        metadata
      };
    }
    if (response === undefined) {
      throw new DecodeError('Operation finished without a response payload');
    }

    const output = await materializePayload(decodeVideoPayload(response), this.blobStore, this.provider);
    return { done: true, ok: true, output, metadata };
  }
}
