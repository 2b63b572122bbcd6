import { beforeEach, describe, expect, it, vi } from 'vitest';
import { createTelegramNotifier, formatFailureMessage } from '../src/telegram.js';
import { makeJob } from './helpers.js';

const { sendMessage, constructed } = vi.hoisted(() => ({
  sendMessage: vi.fn(async () => ({ message_id: 1 })),
  constructed: vi.fn()
}));

vi.mock('node-telegram-bot-api', () => ({
  default: class {
    constructor(token: string) {
      constructed(token);
    }
    sendMessage = sendMessage;
  }
}));

const failedJob = makeJob({
  status: 'failed',
  attempts: 1,
  parameters: { provider: 'veo', quality: 'standard', durationSeconds: 8, aspectRatio: '16:9', maxAttempts: 1 },
  errorMessage: 'GenerationFailed: <bad> & worse'
});

beforeEach(() => {
  sendMessage.mockClear();
  constructed.mockClear();
});

describe('telegram notifier', () => {
  it('is disabled without a token and chat id', () => {
    expect(createTelegramNotifier({ botToken: 'test-token' })).toBeNull();
    expect(constructed).not.toHaveBeenCalled();
  });

  it('formats failures as escaped HTML', () => {
    expect(formatFailureMessage(failedJob)).toBe(
      '🚨 <b>Video job failed</b>\n\n' +
        'Job ID: <code>job-1</code>\n' +
        'Provider: <code>veo</code>\n' +
        'Attempts: 1\n' +
        'Error: <code>GenerationFailed: &lt;bad&gt; &amp; worse</code>'
    );
  });

  it('sends failure notifications to the configured chat', async () => {
    const notifier = createTelegramNotifier({ botToken: 'test-token', chatId: '-100123' });

    await notifier?.notifyFailure(failedJob);

    expect(constructed).toHaveBeenCalledWith('test-token');
    expect(sendMessage).toHaveBeenCalledWith('-100123', formatFailureMessage(failedJob), { parse_mode: 'HTML' });
  });

  it('swallows delivery errors after logging them', async () => {
    sendMessage.mockRejectedValueOnce(new Error('telegram down'));
    const notifier = createTelegramNotifier({ botToken: 'test-token', chatId: '-100123' });

    await expect(notifier?.notifyFailure(failedJob)).resolves.toBeUndefined();
  });
});
