import { OrderSide, VenueId } from '../exchanges/exchange.interface';

export const TRADING_MODES = ['simulation', 'real'] as const;

export type TradingMode = (typeof TRADING_MODES)[number];

export type TradeAction = OrderSide;

export type TradeStatus = 'SIMULATED' | 'FILLED' | 'FAILED';

export interface TradeRecord {
  readonly id: string;
  readonly timestamp: Date;
  readonly mode: TradingMode;
  readonly action: TradeAction;
  readonly venue: VenueId;
  readonly price: number;
  readonly amount: number;
  readonly status: TradeStatus;
  /** Venue-assigned order id, real fills only */
  readonly orderId?: string;
  readonly failureReason?: string;
}

export const isTradingMode = (value: string): value is TradingMode =>
  (TRADING_MODES as readonly string[]).includes(value);
