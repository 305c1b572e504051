/**
 * Telegram Notification Service
 * Delivers alerts, summaries and lifecycle messages to a Telegram chat
 */

import { LoggerService, TelegramConfig } from '../types';
import { createErrorLogObject } from '../utils/error.utils';

/**
 * Anything that can deliver a formatted (HTML) message.
 * Resolves false when the message was not delivered.
 */
export interface Notifier {
  send(text: string): Promise<boolean>;
}

const TELEGRAM_API_URL = 'https://api.telegram.org';

export class TelegramService implements Notifier {
  private readonly botToken: string | null;
  private readonly chatId: string | null;
  private readonly enabled: boolean;

  constructor(
    config: TelegramConfig,
    private logger: LoggerService,
  ) {
    this.botToken = config.botToken || null;
    this.chatId = config.chatId || null;
    this.enabled = config.enabled && this.botToken !== null && this.chatId !== null;

    if (this.enabled) {
      this.logger.info('✅ Telegram notifications ENABLED', {
        chatId: this.chatId,
      });
    } else {
      this.logger.info('⚠️ Telegram notifications DISABLED (set telegram config in config.json)');
    }
  }

  /**
   * Send an HTML message. Never throws.
   */
  async send(text: string): Promise<boolean> {
    if (!this.enabled || !this.botToken || !this.chatId) {
      return false;
    }

    try {
      const response = await fetch(`${TELEGRAM_API_URL}/bot${this.botToken}/sendMessage`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          chat_id: this.chatId,
          text,
          parse_mode: 'HTML',
          disable_web_page_preview: true,
        }),
      });

      if (!response.ok) {
        const errorText = await response.text();
        throw new Error(`Telegram API error: ${response.status} ${errorText}`);
      }

      this.logger.debug('📤 Telegram notification sent', {
        messageLength: text.length,
      });
      return true;
    } catch (error) {
      this.logger.error('❌ Failed to send Telegram notification', createErrorLogObject(error));
      return false;
    }
  }

  /**
   * Notification: monitor stopped
   */
  async notifyStopped(reason?: string): Promise<boolean> {
    const message = `
🛑 <b>MONITOR STOPPED</b>

⏰ Time: ${new Date().toISOString()}
${reason ? `📝 Reason: ${reason}` : ''}
`.trim();

    return this.send(message);
  }
}
