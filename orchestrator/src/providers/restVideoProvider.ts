import { GenerationFailedError } from '../errors.js';
import type { BlobStore } from '../storage/blobStore.js';
import type { GenerationRequest, ReferenceAsset } from '../types.js';
import { apiErrorMessage, isNotFound, requestJson, type FetchLike } from './http.js';
import type { FetchOutcome, OperationTransport } from './longRunningOperation.js';
import { LongRunningVideoProvider } from './longRunningVideoProvider.js';

export const REST_PROVIDER = 'rest';

export interface RestVideoSettings {
  baseUrl?: string;
  apiKey?: string;
  model: string;
}

function toWireAsset(asset: ReferenceAsset): Record<string, string> {
  const base = { mimeType: asset.mimeType, role: asset.role };
  return asset.source.kind === 'bytes'
    ? { ...base, bytesBase64Encoded: Buffer.from(asset.source.data).toString('base64') }
    : { ...base, uri: asset.source.uri };
}

/**
 * Generic JSON backend: POST /videos answers with either the video or an
 * operation name, GET /operations/{name} reports its state.
 */
export class RestVideoTransport implements OperationTransport {
  private readonly baseUrl: string;

  constructor(
    baseUrl: string,
    private readonly apiKey: string,
    private readonly model: string,
    private readonly fetchImpl: FetchLike = fetch
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  async submit(request: GenerationRequest): Promise<unknown> {
    const response = await requestJson(
      this.fetchImpl,
      `${this.baseUrl}/videos`,
      {
        method: 'POST',
        headers: { 'X-API-Key': this.apiKey },
        body: {
          model: this.model,
          prompt: request.prompt,
          durationSeconds: request.durationSeconds,
          aspectRatio: request.aspectRatio,
          quality: request.quality,
          referenceAssets: request.referenceAssets.map(toWireAsset)
        }
      },
      REST_PROVIDER
    );

    if (!response.ok) {
      throw new GenerationFailedError(`REST video API error (${response.status}): ${apiErrorMessage(response)}`, REST_PROVIDER);
    }
    return response.body;
  }

  async fetchOperation(operationName: string): Promise<FetchOutcome> {
    const response = await requestJson(
      this.fetchImpl,
      `${this.baseUrl}/operations/${encodeURIComponent(operationName)}`,
      { method: 'GET', headers: { 'X-API-Key': this.apiKey } },
      REST_PROVIDER
    );

    if (isNotFound(response)) {
      return { found: false };
    }
    if (!response.ok) {
      throw new GenerationFailedError(
        `REST video operation check failed (${response.status}): ${apiErrorMessage(response)}`,
        REST_PROVIDER
      );
    }
    return { found: true, body: response.body };
  }

  qualify(shortName: string): string {
    return `models/${this.model}/operations/${shortName}`;
  }
}

export function createRestVideoProvider(
  settings: RestVideoSettings,
  blobStore: BlobStore,
  fetchImpl: FetchLike = fetch
): LongRunningVideoProvider {
  const { baseUrl, apiKey } = settings;
  const transport = baseUrl && apiKey ? new RestVideoTransport(baseUrl, apiKey, settings.model, fetchImpl) : null;

  return new LongRunningVideoProvider({
    name: REST_PROVIDER,
    modelId: settings.model,
    transport,
    blobStore
  });
}
