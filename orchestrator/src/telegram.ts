import TelegramBot from 'node-telegram-bot-api';
import type { JobNotifier } from './generationWorker.js';
import { logger } from './logger.js';
import type { JobRecord } from './types.js';

export interface TelegramSettings {
  botToken?: string;
  chatId?: string;
}

function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

export function formatFailureMessage(job: JobRecord): string {
  const provider = job.parameters.provider;
  return `
🚨 <b>Video job failed</b>

Job ID: <code>${escapeHtml(job.jobId)}</code>
${provider ? `Provider: <code>${escapeHtml(provider)}</code>\n` : ''}Attempts: ${job.attempts}
Error: <code>${escapeHtml(job.errorMessage ?? 'unknown error')}</code>
  `.trim();
}

export class TelegramNotifier implements JobNotifier {
  private readonly bot: TelegramBot;

  constructor(botToken: string, private readonly chatId: string) {
    this.bot = new TelegramBot(botToken);
  }

  async sendMessage(message: string): Promise<void> {
    try {
      await this.bot.sendMessage(this.chatId, message, { parse_mode: 'HTML' });
    } catch (error) {
      logger.error({ error }, 'Failed to send Telegram message');
    }
  }

  async notifyFailure(job: JobRecord): Promise<void> {
    await this.sendMessage(formatFailureMessage(job));
  }
}

export function createTelegramNotifier(settings: TelegramSettings): TelegramNotifier | null {
  if (!settings.botToken || !settings.chatId) {
    logger.warn('Telegram bot token or chat ID not configured, skipping Telegram notifications');
    return null;
  }

  logger.info('Telegram bot initialized');
  return new TelegramNotifier(settings.botToken, settings.chatId);
}
