import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import TelegramBot from 'node-telegram-bot-api';
import { describeError } from '../common/errors';
import { appConfig, AppConfigType } from '../config/configuration';

export type TelegramMessageHandler = (chatId: number, text: string) => Promise<void>;

/**
 * Single bot instance shared by push notifications and the command front end.
 * Everything is a no-op when no bot token is configured.
 */
@Injectable()
export class TelegramService implements OnModuleDestroy {
  private readonly logger = new Logger(TelegramService.name);
  private readonly bot?: TelegramBot;
  private readonly chatId?: string;
  private polling = false;

  constructor(@Inject(appConfig.KEY) config: AppConfigType) {
    const telegram = config.notifications.telegram;
    if (telegram) {
      // polling starts only when a command handler is registered
      this.bot = new TelegramBot(telegram.botToken, { polling: false });
      this.chatId = telegram.chatId;
      this.logger.log(`🚀 Telegram notifications enabled for chat ${telegram.chatId}`);
    }
  }

  get enabled(): boolean {
    return this.bot !== undefined;
  }

  async sendMessage(text: string, chatId: number | string | undefined = this.chatId): Promise<void> {
    if (!this.bot || chatId === undefined) {
      return;
    }

    try {
      await this.bot.sendMessage(chatId, text, { parse_mode: 'HTML' });
    } catch (error) {
      this.logger.error(`❌ Failed to send Telegram message: ${describeError(error)}`);
    }
  }

  async listen(handler: TelegramMessageHandler): Promise<void> {
    if (!this.bot || this.polling) {
      return;
    }

    this.bot.on('message', (message) => {
      if (!message.text) {
        return;
      }
      handler(message.chat.id, message.text).catch((error) =>
        this.logger.error(`❌ Telegram command failed: ${describeError(error)}`),
      );
    });
    this.bot.on('polling_error', (error) =>
      this.logger.warn(`⚠️ Telegram polling error: ${error.message}`),
    );

    await this.bot.startPolling();
    this.polling = true;
    this.logger.log('🤖 Telegram command polling started');
  }

  async onModuleDestroy() {
    if (this.bot && this.polling) {
      await this.bot.stopPolling();
      this.polling = false;
    }
  }
}
