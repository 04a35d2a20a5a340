import { Module } from '@nestjs/common';
import { ArbitrageModule } from '../arbitrage/arbitrage.module';
import { SchedulerModule } from '../scheduler/scheduler.module';
import { ArbitrageController } from './arbitrage.controller';

@Module({
  imports: [ArbitrageModule, SchedulerModule],
  controllers: [ArbitrageController],
})
export class ApiModule {}
