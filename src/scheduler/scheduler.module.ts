import { Module } from '@nestjs/common';
import { ArbitrageModule } from '../arbitrage/arbitrage.module';
import { NotificationModule } from '../notification/notification.module';
import { ArbitrageLoopManager } from './arbitrage-loop.manager';

@Module({
  imports: [ArbitrageModule, NotificationModule],
  providers: [ArbitrageLoopManager],
  exports: [ArbitrageLoopManager],
})
export class SchedulerModule {}
