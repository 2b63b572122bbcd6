import { describe, expect, it, vi } from 'vitest';
import { GenerationFailedError } from '../src/errors.js';
import { GenerationWorker, type JobNotifier } from '../src/generationWorker.js';
import { JobService } from '../src/jobService.js';
import { ProviderRouter } from '../src/providerRouter.js';
import type { OperationHandle } from '../src/providers/types.js';
import { InMemoryJobQueue } from '../src/queue/jobQueue.js';
import { InMemoryJobStore, type JobPrecondition, type JobUpdate } from '../src/storage/jobStore.js';
import { noReferences, type JobRecord, type JobStatus, type PersonaResolver } from '../src/types.js';
import { fakeClock, fakeProvider, type FakeProvider } from './helpers.js';

/** Records every successful write so tests can inspect the progress history. */
class RecordingStore extends InMemoryJobStore {
  readonly history: Array<{ status: JobStatus; progress: number }> = [];

  override async compareAndTransition(jobId: string, expected: JobPrecondition, update: JobUpdate): Promise<JobRecord | null> {
    const result = await super.compareAndTransition(jobId, expected, update);
    if (result) {
      this.history.push({ status: result.status, progress: result.progress });
    }
    return result;
  }
}

const OPERATION: OperationHandle = { provider: 'veo', name: 'models/veo/operations/op-1', shortName: 'op-1' };

interface SetupOptions {
  providers?: FakeProvider[];
  notifier?: JobNotifier;
  personaResolver?: PersonaResolver;
  maxAttempts?: number;
}

function setup(options: SetupOptions = {}) {
  const providers = options.providers ?? [fakeProvider('veo'), fakeProvider('rest')];
  const store = new RecordingStore();
  const queue = new InMemoryJobQueue();
  const router = new ProviderRouter({ providers, priority: ['veo', 'rest'], defaultProvider: 'auto', strictExplicitProvider: true });
  let counter = 0;
  const service = new JobService({
    store,
    queue,
    router,
    defaultMaxAttempts: options.maxAttempts ?? 1,
    idFactory: () => `job-${++counter}`
  });
  const clock = fakeClock();
  const worker = new GenerationWorker({
    workerId: 'worker-1',
    store,
    queue,
    router,
    personaResolver: options.personaResolver ?? noReferences,
    notifier: options.notifier,
    dequeueTimeoutMs: 0,
    idleBackoffMs: 0,
    errorBackoffMs: 0,
    pollIntervalMs: 1000,
    operationTimeoutMs: 10_000,
    sleep: clock.sleep,
    now: clock.now
  });
  return { store, queue, router, service, worker, clock };
}

describe('GenerationWorker', () => {
  it('takes a job from queued to completed', async () => {
    const { service, worker, store } = setup();
    const jobId = await service.submit('video', [], 'a calm lake at sunrise', { durationSeconds: 8 });

    expect(await worker.processNext()).toBe(true);

    const job = await store.get(jobId);
    expect(job?.status).toBe('completed');
    expect(job?.progress).toBe(100);
    expect(job?.resultRef).toBe('https://cdn.test/veo.mp4');
    expect(job?.ownerWorkerId).toBe('worker-1');
    expect(job?.attempts).toBe(1);
    expect(job?.resultMetadata).toMatchObject({
      providerUsed: 'veo',
      fallbackUsed: false,
      selectionReason: 'Auto-selected veo (first available in priority order)',
      modelId: 'veo-model'
    });
    expect(store.history.map((entry) => entry.progress)).toEqual([10, 20, 30, 90, 100]);
  });

  it('passes resolved references and job parameters to the provider', async () => {
    const veo = fakeProvider('veo');
    const personaResolver: PersonaResolver = {
      resolveReferences: vi.fn(async () => [
        { source: { kind: 'uri' as const, uri: 'gs://bucket/ada.png' }, mimeType: 'image/png', role: 'subject' as const }
      ])
    };
    const { service, worker } = setup({ providers: [veo], personaResolver });
    await service.submit('video', ['persona-ada'], 'Ada walks on the beach', { aspectRatio: '9:16', quality: 'hd' });

    await worker.processNext();

    expect(personaResolver.resolveReferences).toHaveBeenCalledWith('Ada walks on the beach', ['persona-ada']);
    expect(veo.submit).toHaveBeenCalledWith({
      jobId: 'job-1',
      prompt: 'Ada walks on the beach',
      durationSeconds: 8,
      quality: 'hd',
      aspectRatio: '9:16',
      resolution: undefined,
      generateAudio: undefined,
      referenceAssets: [{ source: { kind: 'uri', uri: 'gs://bucket/ada.png' }, mimeType: 'image/png', role: 'subject' }]
    });
  });

  it('polls an operation with monotonic progress until it finishes', async () => {
    const veo = fakeProvider('veo');
    veo.submit.mockResolvedValueOnce({ kind: 'operation', operation: OPERATION });
    veo.poll
      .mockResolvedValueOnce({ done: false })
      .mockResolvedValueOnce({ done: false })
      .mockResolvedValueOnce({ done: true, ok: true, output: { kind: 'stored', ref: '/outputs/veo.mp4', mimeType: 'video/mp4', sizeBytes: 2048 } });
    const { service, worker, store, clock } = setup({ providers: [veo] });
    const jobId = await service.submit('video', [], 'a calm lake at sunrise');

    await worker.processNext();

    const job = await store.get(jobId);
    expect(job?.status).toBe('completed');
    expect(job?.resultRef).toBe('/outputs/veo.mp4');
    expect(job?.resultMetadata).toMatchObject({
      operation: 'models/veo/operations/op-1',
      mimeType: 'video/mp4',
      sizeBytes: 2048,
      durationMs: 3000
    });
    expect(store.history.map((entry) => entry.progress)).toEqual([10, 20, 30, 35, 41, 90, 100]);
    expect(veo.poll).toHaveBeenCalledTimes(3);
    expect(veo.poll).toHaveBeenCalledWith(OPERATION);
    expect(clock.sleep).toHaveBeenCalledWith(1000);
  });

  it('fails an explicit unavailable provider without fallback', async () => {
    const veo = fakeProvider('veo', false);
    const rest = fakeProvider('rest');
    const notifier = { notifyFailure: vi.fn(async (_job: JobRecord) => undefined) };
    const { service, worker, store } = setup({ providers: [veo, rest], notifier });
    const jobId = await service.submit('video', [], 'a calm lake at sunrise', { provider: 'veo' });

    await worker.processNext();

    const job = await store.get(jobId);
    expect(job?.status).toBe('failed');
    expect(job?.errorMessage).toBe('ProviderUnavailable: Provider veo is not configured');
    expect(job?.errorCode).toBe('ProviderUnavailable');
    expect(job?.resultRef).toBeUndefined();
    expect(rest.submit).not.toHaveBeenCalled();
    expect(notifier.notifyFailure).toHaveBeenCalledTimes(1);
    expect(notifier.notifyFailure.mock.calls[0][0].status).toBe('failed');
  });

  it('falls back automatically when the preferred provider is unavailable', async () => {
    const { service, worker, store } = setup({ providers: [fakeProvider('veo', false), fakeProvider('rest')] });
    const jobId = await service.submit('video', [], 'a calm lake at sunrise');

    await worker.processNext();

    const job = await store.get(jobId);
    expect(job?.resultRef).toBe('https://cdn.test/rest.mp4');
    expect(job?.resultMetadata).toMatchObject({
      providerUsed: 'rest',
      fallbackUsed: true,
      selectionReason: 'Auto-fallback from veo (unavailable) to rest'
    });
  });

  it('falls back when an operation fails while polling', async () => {
    const veo = fakeProvider('veo');
    const rest = fakeProvider('rest');
    veo.submit.mockResolvedValueOnce({ kind: 'operation', operation: OPERATION });
    veo.poll.mockResolvedValueOnce({ done: true, ok: false, error: { code: 3, message: 'content policy' } });
    const { service, worker, store } = setup({ providers: [veo, rest] });
    const jobId = await service.submit('video', [], 'a calm lake at sunrise');

    await worker.processNext();

    const job = await store.get(jobId);
    expect(job?.status).toBe('completed');
    expect(job?.resultMetadata).toMatchObject({
      providerUsed: 'rest',
      fallbackUsed: true,
      selectionReason: 'Auto-fallback from veo (failed) to rest',
      failedAttempts: [{ provider: 'veo', error: 'Operation op-1 failed: content policy' }]
    });
    expect(job?.resultMetadata?.operation).toBeUndefined();
  });

  it('records every provider attempted when all fail', async () => {
    const veo = fakeProvider('veo');
    const rest = fakeProvider('rest');
    veo.submit.mockRejectedValueOnce(new Error('quota exceeded'));
    rest.submit.mockRejectedValueOnce(new GenerationFailedError('REST video API error (500): upstream down', 'rest'));
    const { service, worker, store } = setup({ providers: [veo, rest] });
    const jobId = await service.submit('video', [], 'a calm lake at sunrise');

    await worker.processNext();

    const job = await store.get(jobId);
    expect(job?.status).toBe('failed');
    expect(job?.errorMessage).toBe(
      'AllProvidersFailed: All providers failed: veo: quota exceeded; rest: REST video API error (500): upstream down'
    );
  });

  it('fails with OperationTimeout when an operation never finishes', async () => {
    const veo = fakeProvider('veo');
    veo.submit.mockResolvedValueOnce({ kind: 'operation', operation: OPERATION });
    const { service, worker, store } = setup({ providers: [veo] });
    const jobId = await service.submit('video', [], 'a calm lake at sunrise', { provider: 'veo' });

    await worker.processNext();

    const job = await store.get(jobId);
    expect(job?.status).toBe('failed');
    expect(job?.errorMessage).toBe('OperationTimeout: Operation models/veo/operations/op-1 did not finish within 10s');
    expect(job?.progress).toBe(79);
    expect(veo.poll).toHaveBeenCalledTimes(10);
  });

  it('skips a job cancelled before it was claimed', async () => {
    const veo = fakeProvider('veo');
    const { service, worker, store } = setup({ providers: [veo] });
    const jobId = await service.submit('video', [], 'a calm lake at sunrise');
    expect(await service.cancel(jobId)).toBe('ok');

    expect(await worker.processNext()).toBe(true);

    expect((await store.get(jobId))?.status).toBe('cancelled');
    expect(veo.submit).not.toHaveBeenCalled();
  });

  it('drops a result that arrives after cancellation', async () => {
    const veo = fakeProvider('veo');
    const { service, worker, store } = setup({ providers: [veo] });
    const jobId = await service.submit('video', [], 'a calm lake at sunrise');
    veo.submit.mockResolvedValueOnce({ kind: 'operation', operation: OPERATION });
    veo.poll.mockImplementationOnce(async () => {
      await service.cancel(jobId);
      return { done: true, ok: true, output: { kind: 'uri', uri: 'https://cdn.test/late.mp4' } };
    });

    const result = await worker.processNext();

    expect(result).toBe(true);
    const job = await store.get(jobId);
    expect(job?.status).toBe('cancelled');
    expect(job?.resultRef).toBeUndefined();
    expect(job?.errorMessage).toBeUndefined();
  });

  it('stops polling once the job is cancelled', async () => {
    const veo = fakeProvider('veo');
    const { service, worker, store } = setup({ providers: [veo] });
    const jobId = await service.submit('video', [], 'a calm lake at sunrise');
    veo.submit.mockResolvedValueOnce({ kind: 'operation', operation: OPERATION });
    veo.poll.mockImplementationOnce(async () => {
      await service.cancel(jobId);
      return { done: false };
    });

    await worker.processNext();

    expect((await store.get(jobId))?.status).toBe('cancelled');
    expect(veo.poll).toHaveBeenCalledTimes(1);
  });

  it('re-enqueues a retryable failure while attempts remain', async () => {
    const veo = fakeProvider('veo');
    veo.submit.mockRejectedValueOnce(new Error('socket hang up'));
    const { service, worker, store, queue } = setup({ providers: [veo], maxAttempts: 2 });
    const jobId = await service.submit('video', [], 'a calm lake at sunrise');

    await worker.processNext();

    const retried = await store.get(jobId);
    expect(retried?.status).toBe('queued');
    expect(retried?.progress).toBe(0);
    expect(retried?.attempts).toBe(1);
    expect(retried?.currentStep).toBe(
      'Retrying (attempt 2 of 2) after AllProvidersFailed: All providers failed: veo: socket hang up'
    );
    expect(retried?.errorMessage).toBeUndefined();
    expect(await queue.size()).toBe(1);

    await worker.processNext();

    const job = await store.get(jobId);
    expect(job?.status).toBe('completed');
    expect(job?.attempts).toBe(2);
  });

  it('does not retry non-retryable errors', async () => {
    const { service, worker, store, queue } = setup({ providers: [fakeProvider('veo', false), fakeProvider('rest')], maxAttempts: 3 });
    const jobId = await service.submit('video', [], 'a calm lake at sunrise', { provider: 'veo' });

    await worker.processNext();

    expect((await store.get(jobId))?.status).toBe('failed');
    expect(await queue.size()).toBe(0);
  });

  it('keeps the job failed when the notifier throws', async () => {
    const veo = fakeProvider('veo');
    veo.submit.mockRejectedValueOnce(new Error('boom'));
    const notifier = { notifyFailure: vi.fn(async () => Promise.reject(new Error('telegram down'))) };
    const { service, worker, store } = setup({ providers: [veo], notifier });
    const jobId = await service.submit('video', [], 'a calm lake at sunrise');

    await worker.processNext();

    expect((await store.get(jobId))?.status).toBe('failed');
    expect(notifier.notifyFailure).toHaveBeenCalledTimes(1);
  });

  it('hands a dequeued job back to the queue when reading it fails', async () => {
    const { service, worker, store, queue } = setup();
    const jobId = await service.submit('video', [], 'a calm lake at sunrise');
    vi.spyOn(store, 'get').mockRejectedValueOnce(new Error('store blip'));

    await expect(worker.processNext()).rejects.toThrow('store blip');
    expect(await queue.size()).toBe(1);
    expect((await store.get(jobId))?.status).toBe('queued');

    expect(await worker.processNext()).toBe(true);
    expect((await store.get(jobId))?.status).toBe('completed');
    expect(await queue.size()).toBe(0);
  });

  it('hands a dequeued job back to the queue when the claim write fails', async () => {
    const { service, worker, store, queue } = setup();
    const jobId = await service.submit('video', [], 'a calm lake at sunrise');
    vi.spyOn(store, 'compareAndTransition').mockRejectedValueOnce(new Error('write timed out'));

    await expect(worker.processNext()).rejects.toThrow('write timed out');
    expect(await queue.size()).toBe(1);

    expect(await worker.processNext()).toBe(true);
    const job = await store.get(jobId);
    expect(job?.status).toBe('completed');
    expect(job?.attempts).toBe(1);
  });

  it('returns false when the queue is empty', async () => {
    const { worker } = setup();

    expect(await worker.processNext()).toBe(false);
    expect(worker.getStatus()).toEqual({ workerId: 'worker-1', running: false, processedCount: 0, currentJobId: null });
  });

  it('keeps draining the queue after failures and loop errors', async () => {
    const veo = fakeProvider('veo');
    veo.submit.mockRejectedValueOnce(new Error('boom'));
    const { service, worker, store, queue } = setup({ providers: [veo] });
    vi.spyOn(queue, 'dequeue').mockRejectedValueOnce(new Error('queue offline'));
    const failing = await service.submit('video', [], 'first prompt');
    const succeeding = await service.submit('video', [], 'second prompt');

    const loop = worker.start();
    expect(worker.getStatus().running).toBe(true);

    await vi.waitFor(async () => {
      expect((await store.get(succeeding))?.status).toBe('completed');
    });
    await worker.stop();
    await loop;

    expect((await store.get(failing))?.status).toBe('failed');
    expect(worker.getStatus()).toEqual({ workerId: 'worker-1', running: false, processedCount: 2, currentJobId: null });
  });
});
