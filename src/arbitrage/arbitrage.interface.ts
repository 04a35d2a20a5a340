import { Quote, VenueId } from '../exchanges/exchange.interface';
import { TradeRecord } from '../trading/trade.interface';

/** A_TO_B buys on venue A and sells on venue B */
export type ArbitrageDirection = 'A_TO_B' | 'B_TO_A';

export interface ProfitEstimate {
  direction: ArbitrageDirection;
  buyVenue: VenueId;
  sellVenue: VenueId;
  buyPrice: number;
  sellPrice: number;
  /** sellPrice - buyPrice, before fees */
  spread: number;
  /** Per unit of base currency, in quote currency */
  netProfit: number;
  netProfitPercent: number;
}

export interface ExecutionPlan {
  direction: ArbitrageDirection;
  buy: { venue: VenueId; price: number };
  sell: { venue: VenueId; price: number };
  estimate: ProfitEstimate;
}

export interface ArbitrageAnalysis {
  quotes: { a: Quote; b: Quote };
  estimates: Record<ArbitrageDirection, ProfitEstimate>;
  thresholdPercent: number;
  plan: ExecutionPlan | null;
}

export interface ExecutionOutcome {
  plan: ExecutionPlan;
  buy: TradeRecord;
  sell: TradeRecord;
  /** Exactly one leg failed: the position is unbalanced */
  partial: boolean;
  /** Net profit for the configured trade amount */
  expectedProfit: number;
}

export interface ArbitrageReport extends ArbitrageAnalysis {
  symbol: string;
  execution: ExecutionOutcome | null;
}

export interface MarketStatus {
  symbol: string;
  quotes: { a: Quote; b: Quote };
  spreads: Record<ArbitrageDirection, number>;
}

export interface VenueAccount {
  venue: VenueId;
  free: number;
  initial: number;
  change: number;
}

export interface AccountStatus {
  currency: string;
  venues: VenueAccount[];
}

export type CommandResult<T> =
  | { success: true; data: T }
  | { success: false; error: string };
