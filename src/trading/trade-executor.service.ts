import { Inject, Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { describeError } from '../common/errors';
import { formatUsd } from '../common/helper';
import { appConfig, AppConfigType } from '../config/configuration';
import { MarketDataService } from '../data/market-data.service';
import { VenueId } from '../exchanges/exchange.interface';
import { VenueRegistry } from '../exchanges/venue-registry';
import { TradeLedgerService } from './trade-ledger.service';
import {
  TradeAction,
  TradeRecord,
  TradingMode,
} from './trade.interface';

type LegResult = Pick<TradeRecord, 'status' | 'orderId' | 'failureReason'>;

/**
 * Executes one leg of an arbitrage and records it. Every call appends
 * exactly one record, whatever the outcome. Order submission is never retried.
 */
@Injectable()
export class TradeExecutor {
  private readonly logger = new Logger(TradeExecutor.name);

  constructor(
    private readonly venues: VenueRegistry,
    private readonly marketData: MarketDataService,
    private readonly ledger: TradeLedgerService,
    @Inject(appConfig.KEY) private readonly config: AppConfigType,
  ) {}

  async execute(
    action: TradeAction,
    venue: VenueId,
    price: number,
    mode: TradingMode,
  ): Promise<TradeRecord> {
    const result = mode === 'simulation'
      ? this.simulate(action, venue, price)
      : await this.executeReal(action, venue, price);

    const record: TradeRecord = Object.freeze({
      id: randomUUID(),
      timestamp: new Date(),
      mode,
      action,
      venue,
      price,
      amount: this.config.trading.tradeAmount,
      ...result,
    });

    this.ledger.append(record);
    return record;
  }

  private simulate(action: TradeAction, venue: VenueId, price: number): LegResult {
    this.logger.log(
      `[SIMULATION] ${action} on ${venue} at ${formatUsd(price)} ${this.config.trading.quoteCurrency}`,
    );
    return { status: 'SIMULATED' };
  }

  private async executeReal(
    action: TradeAction,
    venue: VenueId,
    price: number,
  ): Promise<LegResult> {
    const { symbol, tradeAmount, quoteCurrency } = this.config.trading;

    try {
      const connector = this.venues.get(venue);

      // SELL legs assume the base asset is already held; only BUY is gated
      if (action === 'BUY') {
        const balance = await this.marketData.fetchFreeBalance(venue, quoteCurrency);
        if (!balance.ok) {
          return this.fail(action, venue, `balance unavailable: ${balance.error.message}`);
        }

        const required = price * tradeAmount;
        if (balance.value < required) {
          return this.fail(
            action,
            venue,
            `insufficient balance: ${formatUsd(balance.value)} ${quoteCurrency} available, ${formatUsd(required)} ${quoteCurrency} required`,
          );
        }
      }

      const order = await connector.submitMarketOrder(symbol, action, tradeAmount);
      this.logger.log(`[REAL] ${action} on ${venue}: order ${order.orderId}`);
      return { status: 'FILLED', orderId: order.orderId };
    } catch (error) {
      return this.fail(action, venue, describeError(error));
    }
  }

  private fail(action: TradeAction, venue: VenueId, reason: string): LegResult {
    this.logger.error(`❌ [REAL] ${action} on ${venue} failed: ${reason}`);
    return { status: 'FAILED', failureReason: reason };
  }
}
