import { Module } from '@nestjs/common';
import { ArbitrageModule } from '../arbitrage/arbitrage.module';
import { NotificationModule } from '../notification/notification.module';
import { SchedulerModule } from '../scheduler/scheduler.module';
import { TelegramCommandsService } from './telegram-commands.service';

@Module({
  imports: [ArbitrageModule, NotificationModule, SchedulerModule],
  providers: [TelegramCommandsService],
})
export class BotModule {}
