import { z } from 'zod';
import { DecodeError, GenerationFailedError } from '../errors.js';
import type { BlobStore } from '../storage/blobStore.js';
import type { GenerationOutput } from './types.js';

const videoEntrySchema = z
  .object({
    bytesBase64Encoded: z.string().optional(),
    uri: z.string().optional(),
    gcsUri: z.string().optional(),
    videoUrl: z.string().optional(),
    mimeType: z.string().optional()
  })
  .passthrough();

const sampleSchema = z.object({ video: videoEntrySchema.optional() }).passthrough();

const predictionSchema = videoEntrySchema.extend({
  generatedSamples: z.array(sampleSchema).optional()
});

// A bare entry at the top level is accepted too
const responseSchema = videoEntrySchema.extend({
  videos: z.array(videoEntrySchema).optional(),
  generatedSamples: z.array(sampleSchema).optional(),
  predictions: z.array(predictionSchema).optional(),
  video: videoEntrySchema.optional(),
  raiMediaFilteredCount: z.number().optional(),
  raiMediaFilteredReasons: z.array(z.string()).optional()
});

type VideoEntry = z.infer<typeof videoEntrySchema>;

export type DecodedPayload =
  | { kind: 'inline'; bytes: Buffer; mimeType: string }
  | { kind: 'uri'; uri: string; mimeType?: string };

const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;
const URI_PATTERN = /^[a-z][a-z0-9+.-]*:\/\/\S+$/i;
const DEFAULT_MIME_TYPE = 'video/mp4';

function firstVideoEntry(response: z.infer<typeof responseSchema>): VideoEntry | undefined {
  if (response.videos?.length) {
    return response.videos[0];
  }
  if (response.generatedSamples?.length) {
    return response.generatedSamples[0].video;
  }
  if (response.predictions?.length) {
    const prediction = response.predictions[0];
    return prediction.generatedSamples?.length ? prediction.generatedSamples[0].video : prediction;
  }
  return response.video ?? response;
}

export function decodeBase64(data: string): Buffer {
  const compact = data.replace(/\s+/g, '');
  if (compact.length === 0 || compact.length % 4 !== 0 || !BASE64_PATTERN.test(compact)) {
    throw new DecodeError('Inline video payload is not valid base64');
  }
  return Buffer.from(compact, 'base64');
}

/**
 * Reads the first generated video out of a provider response. Inline bytes
 * and remote URIs are both accepted; anything else is a DecodeError.
 */
export function decodeVideoPayload(payload: unknown): DecodedPayload {
  const parsed = responseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new DecodeError('Provider response is not a JSON object');
  }

  const response = parsed.data;
  const entry = firstVideoEntry(response);

  if (entry?.bytesBase64Encoded !== undefined) {
    return {
      kind: 'inline',
      bytes: decodeBase64(entry.bytesBase64Encoded),
      mimeType: entry.mimeType ?? DEFAULT_MIME_TYPE
    };
  }

  const uri = entry?.uri ?? entry?.gcsUri ?? entry?.videoUrl;
  if (uri !== undefined) {
    if (!URI_PATTERN.test(uri)) {
      throw new DecodeError(`Video reference is not a URI: ${uri.slice(0, 80)}`);
    }
    return { kind: 'uri', uri, mimeType: entry?.mimeType };
  }

  if ((response.raiMediaFilteredCount ?? 0) > 0) {
    const reasons = response.raiMediaFilteredReasons ?? [];
    throw new GenerationFailedError(
      `Generation blocked by safety filters${reasons.length ? `: ${reasons.join('; ')}` : ''}`
    );
  }

  const keys = Object.keys(response);
  throw new DecodeError(`Unrecognized video payload (keys: ${keys.length ? keys.join(', ') : 'none'})`);
}

function extensionFor(mimeType: string): string {
  if (mimeType === 'video/webm') return 'webm';
  if (mimeType === 'video/quicktime') return 'mov';
  return 'mp4';
}

/** Inline bytes go to the blob store; URIs pass through untouched. */
export async function materializePayload(
  payload: DecodedPayload,
  blobStore: BlobStore,
  provider: string
): Promise<GenerationOutput> {
  if (payload.kind === 'uri') {
    return { kind: 'uri', uri: payload.uri, mimeType: payload.mimeType };
  }

  const timestamp = new Date().toISOString().replace(/[-:]/g, '').replace('T', '_').slice(0, 15);
  const ref = await blobStore.put(payload.bytes, `${provider}-${timestamp}.${extensionFor(payload.mimeType)}`);
  return { kind: 'stored', ref, mimeType: payload.mimeType, sizeBytes: payload.bytes.byteLength };
}
