import { vi, type Mock } from 'vitest';
import type { FetchLike } from '../src/providers/http.js';
import type { OperationHandle, PollResult, SubmitOutcome, VideoProvider } from '../src/providers/types.js';
import type { BlobStore } from '../src/storage/blobStore.js';
import type { GenerationRequest, JobRecord } from '../src/types.js';

export function makeJob(overrides: Partial<JobRecord> = {}): JobRecord {
  return {
    jobId: 'job-1',
    kind: 'video',
    personaIds: [],
    prompt: 'a calm lake at sunrise',
    parameters: { quality: 'standard', durationSeconds: 8, aspectRatio: '16:9', maxAttempts: 1 },
    status: 'queued',
    progress: 0,
    currentStep: 'Queued',
    attempts: 0,
    createdAt: '2026-01-01T00:00:00.000Z',
    updatedAt: '2026-01-01T00:00:00.000Z',
    ...overrides
  };
}

export const sampleRequest: GenerationRequest = {
  prompt: 'a calm lake at sunrise',
  durationSeconds: 8,
  quality: 'standard',
  aspectRatio: '16:9',
  referenceAssets: []
};

export class MemoryBlobStore implements BlobStore {
  readonly blobs = new Map<string, Uint8Array>();

  async put(bytes: Uint8Array, suggestedName: string): Promise<string> {
    const ref = `memory://${suggestedName}`;
    this.blobs.set(ref, bytes);
    return ref;
  }
}

export interface FakeProvider extends VideoProvider {
  submit: Mock<(request: GenerationRequest) => Promise<SubmitOutcome>>;
  poll: Mock<(handle: OperationHandle | string) => Promise<PollResult>>;
}

export function fakeProvider(name: string, available = true): FakeProvider {
  return {
    name,
    modelId: `${name}-model`,
    isAvailable: () => available,
    submit: vi.fn<(request: GenerationRequest) => Promise<SubmitOutcome>>(async () => ({
      kind: 'result',
      output: { kind: 'uri', uri: `https://cdn.test/${name}.mp4` }
    })),
    poll: vi.fn<(handle: OperationHandle | string) => Promise<PollResult>>(async () => ({ done: false }))
  };
}

export function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' }
  });
}

export function mockFetch(...responses: Response[]) {
  const fetchMock = vi.fn<FetchLike>();
  for (const response of responses) {
    fetchMock.mockResolvedValueOnce(response);
  }
  return fetchMock;
}

/** Manual clock whose sleep advances time and yields to the event loop. */
export function fakeClock() {
  let current = 0;
  return {
    now: () => current,
    sleep: vi.fn(async (ms: number) => {
      current += ms;
      await new Promise<void>((resolve) => setImmediate(resolve));
    })
  };
}
