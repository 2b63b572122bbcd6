import { ProviderUnavailableError } from '../errors.js';
import type { BlobStore } from '../storage/blobStore.js';
import type { GenerationRequest } from '../types.js';
import { LongRunningOperationClient, type OperationTransport } from './longRunningOperation.js';
import type { OperationHandle, PollResult, SubmitOutcome, VideoProvider } from './types.js';

export interface LongRunningVideoProviderOptions {
  name: string;
  modelId: string;
  /** Null when the backend has no credentials: the provider reports itself unconfigured. */
  transport: OperationTransport | null;
  blobStore: BlobStore;
}

export class LongRunningVideoProvider implements VideoProvider {
  readonly name: string;
  readonly modelId: string;
  private readonly client: LongRunningOperationClient | null;

  constructor(options: LongRunningVideoProviderOptions) {
    this.name = options.name;
    this.modelId = options.modelId;
    this.client = options.transport
      ? new LongRunningOperationClient(options.name, options.transport, options.blobStore)
      : null;
  }

  isAvailable(): boolean {
    return this.client !== null;
  }

  private requireClient(): LongRunningOperationClient {
    if (!this.client) {
      throw new ProviderUnavailableError(this.name);
    }
    return this.client;
  }

  async submit(request: GenerationRequest): Promise<SubmitOutcome> {
    return await this.requireClient().submit(request);
  }

  async poll(handle: OperationHandle | string): Promise<PollResult> {
    return await this.requireClient().poll(handle);
  }
}
