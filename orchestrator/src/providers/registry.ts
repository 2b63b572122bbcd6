import type { RuntimeConfig } from '../config.js';
import type { BlobStore } from '../storage/blobStore.js';
import type { FetchLike } from './http.js';
import { createRestVideoProvider } from './restVideoProvider.js';
import type { VideoProvider } from './types.js';
import { createVeoProvider } from './veoProvider.js';

export function createProviders(
  config: RuntimeConfig,
  blobStore: BlobStore,
  fetchImpl: FetchLike = fetch
): VideoProvider[] {
  return [
    createVeoProvider(
      {
        accessToken: config.GOOGLE_ACCESS_TOKEN,
        projectId: config.GOOGLE_PROJECT_ID,
        location: config.GOOGLE_LOCATION,
        model: config.VEO_MODEL,
        useReferenceImages: config.VEO_USE_REFERENCE_IMAGES
      },
      blobStore,
      fetchImpl
    ),
    createRestVideoProvider(
      {
        baseUrl: config.REST_VIDEO_API_URL,
        apiKey: config.REST_VIDEO_API_KEY,
        model: config.REST_VIDEO_MODEL
      },
      blobStore,
      fetchImpl
    )
  ];
}
