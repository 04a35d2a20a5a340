import { Module } from '@nestjs/common';
import { DataModule } from '../data/data.module';
import { ExchangesModule } from '../exchanges/exchanges.module';
import { TradeExecutor } from './trade-executor.service';
import { TradeLedgerService } from './trade-ledger.service';

@Module({
  imports: [ExchangesModule, DataModule],
  providers: [TradeExecutor, TradeLedgerService],
  exports: [TradeExecutor, TradeLedgerService],
})
export class TradingModule {}
