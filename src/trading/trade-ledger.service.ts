import { Inject, Injectable } from '@nestjs/common';
import { appConfig, AppConfigType } from '../config/configuration';
import { TradeLedger } from './trade-ledger';
import { TradeRecord, TradingMode } from './trade.interface';

export const DEFAULT_HISTORY_LIMIT = 10;

/**
 * Process-wide ledgers, one per trading mode.
 */
@Injectable()
export class TradeLedgerService {
  private readonly ledgers: Record<TradingMode, TradeLedger>;

  constructor(@Inject(appConfig.KEY) config: AppConfigType) {
    this.ledgers = {
      simulation: new TradeLedger(config.ledger.maxRecords),
      real: new TradeLedger(config.ledger.maxRecords),
    };
  }

  append(record: TradeRecord): void {
    this.ledgers[record.mode].append(record);
  }

  recent(mode: TradingMode, n = DEFAULT_HISTORY_LIMIT): TradeRecord[] {
    return this.ledgers[mode].recent(n);
  }

  size(mode: TradingMode): number {
    return this.ledgers[mode].size;
  }
}
