import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { appConfig } from './config/configuration';
import { ExchangesModule } from './exchanges/exchanges.module';
import { DataModule } from './data/data.module';
import { ArbitrageModule } from './arbitrage/arbitrage.module';
import { TradingModule } from './trading/trading.module';
import { NotificationModule } from './notification/notification.module';
import { ApiModule } from './api/api.module';
import { SchedulerModule } from './scheduler/scheduler.module';
import { BotModule } from './bot/bot.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, cache: true, load: [appConfig] }),
    ExchangesModule,
    DataModule,
    ArbitrageModule,
    TradingModule,
    NotificationModule,
    ApiModule,
    SchedulerModule,
    BotModule,
  ],
  controllers: [AppController],
  providers: [AppService],
})
export class AppModule {}
