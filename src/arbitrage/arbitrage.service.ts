import { Inject, Injectable, Logger } from '@nestjs/common';
import { appConfig, AppConfigType } from '../config/configuration';
import { MarketDataService, QuotePair } from '../data/market-data.service';
import { VenueId } from '../exchanges/exchange.interface';
import { VenueRegistry } from '../exchanges/venue-registry';
import { DEFAULT_HISTORY_LIMIT, TradeLedgerService } from '../trading/trade-ledger.service';
import { TradeExecutor } from '../trading/trade-executor.service';
import { TradeRecord, TradingMode } from '../trading/trade.interface';
import { ArbitrageDetector } from './arbitrage-detector.service';
import {
  AccountStatus,
  ArbitrageReport,
  CommandResult,
  ExecutionOutcome,
  ExecutionPlan,
  MarketStatus,
  VenueAccount,
} from './arbitrage.interface';
import { ProfitCalculator } from './profit-calculator';

export const PRICES_UNAVAILABLE = 'Could not retrieve prices';
export const BALANCES_UNAVAILABLE = 'Could not retrieve account balances';

export type CycleOutcome =
  | { kind: 'UNAVAILABLE'; error: string }
  | { kind: 'CANCELLED' }
  | { kind: 'NO_OPPORTUNITY'; report: ArbitrageReport }
  | { kind: 'EXECUTED'; report: ArbitrageReport & { execution: ExecutionOutcome } };

/**
 * Owns one arbitrage pass (fetch → evaluate → execute) and the read-only
 * queries the front ends expose. Holds the initial balance snapshot.
 */
@Injectable()
export class ArbitrageService {
  private readonly logger = new Logger(ArbitrageService.name);
  private readonly initialBalances = new Map<VenueId, number>();

  constructor(
    private readonly marketData: MarketDataService,
    private readonly detector: ArbitrageDetector,
    private readonly executor: TradeExecutor,
    private readonly ledger: TradeLedgerService,
    private readonly venues: VenueRegistry,
    @Inject(appConfig.KEY) private readonly config: AppConfigType,
  ) {}

  async status(): Promise<CommandResult<MarketStatus>> {
    const quotes = await this.marketData.fetchQuotes();
    if (!quotes.ok) {
      return { success: false, error: PRICES_UNAVAILABLE };
    }

    const { a, b } = quotes.value;
    return {
      success: true,
      data: {
        symbol: this.config.trading.symbol,
        quotes: { a, b },
        spreads: {
          A_TO_B: ProfitCalculator.spread(a.ask, b.bid),
          B_TO_A: ProfitCalculator.spread(b.ask, a.bid),
        },
      },
    };
  }

  /**
   * One on-demand pass, executing the plan if the threshold is cleared.
   */
  async arbitrageOnce(mode: TradingMode): Promise<CommandResult<ArbitrageReport>> {
    const outcome = await this.runCycle(mode);
    switch (outcome.kind) {
      case 'UNAVAILABLE':
        return { success: false, error: outcome.error };
      case 'CANCELLED':
        return { success: false, error: 'Cancelled' };
      default:
        return { success: true, data: outcome.report };
    }
  }

  /**
   * A cancelled `signal` only interrupts the quote fetch; once quotes are in,
   * the pass (including both trade legs) runs to completion.
   */
  async runCycle(mode: TradingMode, signal?: AbortSignal): Promise<CycleOutcome> {
    const quotes = await this.marketData.fetchQuotes(signal);
    if (!quotes.ok) {
      if (quotes.error.kind === 'CANCELLED') {
        return { kind: 'CANCELLED' };
      }
      this.logger.error(`❌ ${PRICES_UNAVAILABLE} (${mode}): ${quotes.error.message}`);
      return { kind: 'UNAVAILABLE', error: PRICES_UNAVAILABLE };
    }

    const report = this.analyze(quotes.value);
    if (!report.plan) {
      this.logger.log(`No ${mode} opportunity this iteration`);
      return { kind: 'NO_OPPORTUNITY', report };
    }

    const execution = await this.executePlan(report.plan, mode);
    return { kind: 'EXECUTED', report: { ...report, execution } };
  }

  /**
   * Buy leg then sell leg. The sell leg runs even if the buy failed, and a
   * filled leg is never unwound: an unbalanced result is flagged `partial`.
   */
  async executePlan(plan: ExecutionPlan, mode: TradingMode): Promise<ExecutionOutcome> {
    const buy = await this.executor.execute('BUY', plan.buy.venue, plan.buy.price, mode);
    const sell = await this.executor.execute('SELL', plan.sell.venue, plan.sell.price, mode);

    const partial = (buy.status === 'FAILED') !== (sell.status === 'FAILED');
    if (partial) {
      this.logger.warn(
        `⚠️ Partial execution (${mode}): BUY ${buy.venue} ${buy.status}, SELL ${sell.venue} ${sell.status}`,
      );
    }

    return {
      plan,
      buy,
      sell,
      partial,
      expectedProfit: ProfitCalculator.expectedTradeProfit(
        plan.estimate,
        this.config.trading.tradeAmount,
      ),
    };
  }

  /**
   * Free quote-currency balances and their change since the first query.
   */
  async accountStatus(): Promise<CommandResult<AccountStatus>> {
    const currency = this.config.trading.quoteCurrency;
    const accounts: VenueAccount[] = [];

    for (const connector of this.venues.list()) {
      const balance = await this.marketData.fetchFreeBalance(connector.venue, currency);
      if (!balance.ok) {
        return { success: false, error: BALANCES_UNAVAILABLE };
      }
      accounts.push(this.trackBalance(connector.venue, balance.value));
    }

    return { success: true, data: { currency, venues: accounts } };
  }

  history(mode: TradingMode, n = DEFAULT_HISTORY_LIMIT): TradeRecord[] {
    return this.ledger.recent(mode, n);
  }

  private analyze({ a, b }: QuotePair): ArbitrageReport {
    return {
      symbol: this.config.trading.symbol,
      ...this.detector.analyze(a, b),
      execution: null,
    };
  }

  private trackBalance(venue: VenueId, free: number): VenueAccount {
    let initial = this.initialBalances.get(venue);
    if (initial === undefined) {
      initial = free;
      this.initialBalances.set(venue, free);
    }
    return { venue, free, initial, change: free - initial };
  }
}
