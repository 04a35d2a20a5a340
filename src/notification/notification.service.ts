import { Injectable } from '@nestjs/common';
import { LoopStatusMap } from '../scheduler/loop.interface';
import { TradingGateway } from '../websocket/trading.gateway';
import { TelegramService } from './telegram.service';

/**
 * Out-of-band push sink: socket.io clients and the configured Telegram chat.
 */
@Injectable()
export class NotificationService {
  constructor(
    private readonly telegram: TelegramService,
    private readonly gateway: TradingGateway,
  ) {}

  /** Telegram goes to `chatId`, or the configured chat when omitted. */
  async notify(text: string, chatId?: number | string): Promise<void> {
    this.gateway.broadcastNotification(text);
    await this.telegram.sendMessage(text, chatId);
  }

  publishLoopStatus(status: LoopStatusMap): void {
    this.gateway.broadcastLoopStatus(status);
  }
}
