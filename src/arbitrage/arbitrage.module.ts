import { Module } from '@nestjs/common';
import { DataModule } from '../data/data.module';
import { ExchangesModule } from '../exchanges/exchanges.module';
import { TradingModule } from '../trading/trading.module';
import { ArbitrageDetector } from './arbitrage-detector.service';
import { ArbitrageService } from './arbitrage.service';

@Module({
  imports: [ExchangesModule, DataModule, TradingModule],
  providers: [ArbitrageDetector, ArbitrageService],
  exports: [ArbitrageDetector, ArbitrageService],
})
export class ArbitrageModule {}
