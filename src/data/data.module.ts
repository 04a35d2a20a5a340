import { Module } from '@nestjs/common';
import { ExchangesModule } from '../exchanges/exchanges.module';
import { MarketDataService } from './market-data.service';

@Module({
  imports: [ExchangesModule],
  providers: [MarketDataService],
  exports: [MarketDataService],
})
export class DataModule {}
