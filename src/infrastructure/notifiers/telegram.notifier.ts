import TelegramBot from 'node-telegram-bot-api';
import type { AlertEvent } from '../../domain/entities/alert.entity';
import type { INotifier } from '../../domain/interfaces/services.interface';
import { Logger } from '../../shared/logger';
import { formatHtml } from './alert-format';

export type TelegramSender = Pick<TelegramBot, 'sendMessage'>;

/** Sends one HTML message per event. The bot never polls. */
export class TelegramNotifier implements INotifier {
  readonly name = 'telegram';
  private readonly logger = new Logger(TelegramNotifier.name);
  private readonly bot: TelegramSender;

  constructor(token: string, private readonly chatId: string, bot?: TelegramSender) {
    if (!token && !bot) {
      throw new Error('Telegram Bot Token is not provided!');
    }
    this.bot = bot ?? new TelegramBot(token, { polling: false });
  }

  async send(events: readonly AlertEvent[]): Promise<void> {
    for (const event of events) {
      await this.bot.sendMessage(this.chatId, formatHtml(event), {
        parse_mode: 'HTML',
        disable_web_page_preview: true,
      });
    }
    this.logger.debug(`Sent ${events.length} alerts to chat ${this.chatId}`);
  }
}
