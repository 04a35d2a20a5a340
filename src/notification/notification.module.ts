import { Module } from '@nestjs/common';
import { TradingGateway } from '../websocket/trading.gateway';
import { NotificationService } from './notification.service';
import { TelegramService } from './telegram.service';

@Module({
  providers: [TelegramService, TradingGateway, NotificationService],
  exports: [TelegramService, NotificationService],
})
export class NotificationModule {}
