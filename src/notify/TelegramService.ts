import { Notifier } from './Notifier';
import { JsonHttpClient } from '../lib/httpClient';
import { StructuredLogger, logger as rootLogger } from '../core/StructuredLogger';
import { toError } from '../core/errors';
import { isRecord } from '../utils/responseShape';

export interface TelegramConfig {
  botToken: string;
  chatId: string;
  baseUrl: string;
  timeoutMs: number;
}

export class TelegramService implements Notifier {
  private readonly config: TelegramConfig;
  private readonly logger: StructuredLogger;
  private sentCount = 0;
  private failedCount = 0;

  constructor(
    private readonly http: JsonHttpClient,
    config: Pick<TelegramConfig, 'botToken' | 'chatId'> & Partial<TelegramConfig>,
    logger: StructuredLogger = rootLogger
  ) {
    this.config = {
      baseUrl: 'https://api.telegram.org/bot',
      timeoutMs: 10000,
      ...config
    };
    this.logger = logger.child('telegram');
  }

  async notify(text: string): Promise<void> {
    try {
      await this.sendToTelegram(text);
      this.sentCount++;
      this.logger.info(`✅ Telegram message sent (${text.length} chars)`);
    } catch (error) {
      this.failedCount++;
      this.logger.error('❌ Telegram delivery failed, message dropped', toError(error));
    }
  }

  private async sendToTelegram(text: string): Promise<void> {
    if (!this.config.botToken || !this.config.chatId) {
      throw new Error('Configuration Telegram manquante');
    }

    const url = `${this.config.baseUrl}${this.config.botToken}/sendMessage`;
    const response = await this.http.postJSON(url, {
      chat_id: this.config.chatId,
      text,
      disable_web_page_preview: true
    }, this.config.timeoutMs);

    const description = isRecord(response.data) && typeof response.data.description === 'string'
      ? response.data.description
      : undefined;

    if (!response.ok) {
      throw new Error(`HTTP ${response.status}: ${description ?? 'request rejected'}`);
    }

    if (!isRecord(response.data) || response.data.ok !== true) {
      throw new Error(`Telegram API error: ${description ?? 'unexpected response'}`);
    }
  }

  getStats(): { sent: number; failed: number } {
    return { sent: this.sentCount, failed: this.failedCount };
  }
}
