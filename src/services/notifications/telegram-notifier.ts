import { Telegram } from 'telegraf';
import { logger } from '../../utils/logger';
import { DeliveryError } from '../../utils/error-handler';

export type TelegramSender = Pick<Telegram, 'sendMessage' | 'getMe'>;

export interface TelegramNotifierConfig {
  telegram: TelegramSender;
  chatId: string;
}

/**
 * Sends HTML messages to the single configured chat.
 */
export class TelegramNotifier {
  private telegram: TelegramSender;
  private chatId: string;

  constructor(notifierConfig: TelegramNotifierConfig) {
    this.telegram = notifierConfig.telegram;
    this.chatId = notifierConfig.chatId;
  }

  async send(message: string): Promise<void> {
    if (!this.chatId) {
      throw new DeliveryError('Telegram chat id is not configured');
    }

    try {
      await this.telegram.sendMessage(this.chatId, message, {
        parse_mode: 'HTML',
        link_preview_options: { is_disabled: true },
      });
      logger.debug('Notification sent', { chatId: this.chatId, length: message.length });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new DeliveryError(`Telegram delivery failed: ${reason}`, error);
    }
  }

  async testConnection(): Promise<{ success: boolean; message: string }> {
    try {
      const me = await this.telegram.getMe();
      return { success: true, message: `Connected as @${me.username}` };
    } catch (error) {
      return {
        success: false,
        message: `Connection failed: ${error instanceof Error ? error.message : String(error)}`,
      };
    }
  }
}
