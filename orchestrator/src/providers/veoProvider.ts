import { GenerationFailedError } from '../errors.js';
import { logger } from '../logger.js';
import type { BlobStore } from '../storage/blobStore.js';
import type { GenerationRequest, ReferenceAsset } from '../types.js';
import { apiErrorMessage, isNotFound, requestJson, type FetchLike } from './http.js';
import type { FetchOutcome, OperationTransport } from './longRunningOperation.js';
import { LongRunningVideoProvider } from './longRunningVideoProvider.js';

export const VEO_PROVIDER = 'veo';

// The model rejects more than three reference images per request
const MAX_REFERENCE_IMAGES = 3;

export interface VeoSettings {
  accessToken?: string;
  projectId?: string;
  location: string;
  model: string;
  useReferenceImages: boolean;
}

interface VeoReferenceImage {
  image: { bytesBase64Encoded: string; mimeType: string } | { gcsUri: string; mimeType: string };
  referenceType: 'asset' | 'style';
}

function toReferenceImage(asset: ReferenceAsset): VeoReferenceImage {
  const image =
    asset.source.kind === 'bytes'
      ? { bytesBase64Encoded: Buffer.from(asset.source.data).toString('base64'), mimeType: asset.mimeType }
      : { gcsUri: asset.source.uri, mimeType: asset.mimeType };
  return { image, referenceType: asset.role === 'style' ? 'style' : 'asset' };
}

/** Vertex AI predictLongRunning / fetchPredictOperation. */
export class VeoTransport implements OperationTransport {
  private readonly modelPath: string;
  private readonly endpoint: string;

  constructor(
    private readonly accessToken: string,
    private readonly projectId: string,
    private readonly settings: Pick<VeoSettings, 'location' | 'model' | 'useReferenceImages'>,
    private readonly fetchImpl: FetchLike = fetch
  ) {
    const { location, model } = settings;
    this.modelPath = `projects/${projectId}/locations/${location}/publishers/google/models/${model}`;
    this.endpoint = `https://${location}-aiplatform.googleapis.com/v1/${this.modelPath}`;
  }

  private get headers(): Record<string, string> {
    return { Authorization: `Bearer ${this.accessToken}` };
  }

  buildPayload(request: GenerationRequest): Record<string, unknown> {
    const instance: Record<string, unknown> = { prompt: request.prompt };

    if (this.settings.useReferenceImages && request.referenceAssets.length > 0) {
      const references = request.referenceAssets.slice(0, MAX_REFERENCE_IMAGES);
      if (references.length < request.referenceAssets.length) {
        logger.warn(
          { provided: request.referenceAssets.length, used: references.length },
          'Dropping reference images beyond the model limit'
        );
      }
      instance.referenceImages = references.map(toReferenceImage);
    }

    return {
      instances: [instance],
      parameters: {
        aspectRatio: request.aspectRatio,
        sampleCount: 1,
        durationSeconds: request.durationSeconds,
        personGeneration: 'allow_all',
        addWatermark: false,
        includeRaiReason: true,
        generateAudio: request.generateAudio ?? true,
        resolution: request.resolution ?? (request.quality === 'hd' ? '1080p' : '720p')
      }
    };
  }

  async submit(request: GenerationRequest): Promise<unknown> {
    const url = `${this.endpoint}:predictLongRunning`;
    const response = await requestJson(
      this.fetchImpl,
      url,
      { method: 'POST', headers: this.headers, body: this.buildPayload(request) },
      VEO_PROVIDER
    );

    if (!response.ok) {
      throw new GenerationFailedError(`Veo API error (${response.status}): ${apiErrorMessage(response)}`, VEO_PROVIDER);
    }
    return response.body;
  }

  async fetchOperation(operationName: string): Promise<FetchOutcome> {
    const response = await requestJson(
      this.fetchImpl,
      `${this.endpoint}:fetchPredictOperation`,
      { method: 'POST', headers: this.headers, body: { operationName } },
      VEO_PROVIDER
    );

    if (isNotFound(response)) {
      return { found: false };
    }
    if (!response.ok) {
      throw new GenerationFailedError(
        `Veo operation check failed (${response.status}): ${apiErrorMessage(response)}`,
        VEO_PROVIDER
      );
    }
    return { found: true, body: response.body };
  }

  qualify(shortName: string): string {
    return `${this.modelPath}/operations/${shortName}`;
  }
}

export function createVeoProvider(
  settings: VeoSettings,
  blobStore: BlobStore,
  fetchImpl: FetchLike = fetch
): LongRunningVideoProvider {
  const { accessToken, projectId } = settings;
  const transport =
    accessToken && projectId ? new VeoTransport(accessToken, projectId, settings, fetchImpl) : null;

  return new LongRunningVideoProvider({
    name: VEO_PROVIDER,
    modelId: settings.model,
    transport,
    blobStore
  });
}
