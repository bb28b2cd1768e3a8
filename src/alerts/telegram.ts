import axios from 'axios';
import { formatError } from '../utils/formatError';
import { logger } from '../utils/logger';
import { retry } from '../utils/retry';

export interface NotificationChannel {
  readonly name: string;
  send(title: string, message: string): Promise<void>;
}

export interface TelegramSettings {
  token: string;
  chatId: string;
  attempts?: number;
  delayMs?: number;
}

export class TelegramChannel implements NotificationChannel {
  readonly name = 'telegram';

  constructor(private readonly settings: TelegramSettings) {}

  static isConfigured(token: string, chatId: string) {
    return token.length > 0 && chatId.length > 0;
  }

  async send(title: string, message: string) {
    const { token, chatId } = this.settings;
    const url = `https://api.telegram.org/bot${token}/sendMessage`;
    await retry(
      () => axios.post(url, { chat_id: chatId, text: `${title}\n\n${message}` }),
      {
        attempts: this.settings.attempts ?? 3,
        delayMs: this.settings.delayMs ?? 500,
        backoffFactor: 2,
        onRetry: (error, attempt) => {
          logger.warn('telegram_send_retry', {
            event: 'telegram_send_retry',
            attempt,
            error: formatError(error),
            chatId,
          });
        },
      }
    );
  }
}
