export type VenueId = string;

export type OrderSide = 'BUY' | 'SELL';

export interface Quote {
  venue: VenueId;
  /** Lowest price the venue sells at */
  ask: number;
  /** Highest price the venue buys at */
  bid: number;
  timestamp: number;
}

export interface OrderResult {
  orderId: string;
  symbol: string;
  side: OrderSide;
  /** Requested amount in base currency */
  amount: number;
  filled: number;
  avgPrice?: number;
  timestamp: number;
}

/**
 * The three venue calls the arbitrage core relies on.
 */
export abstract class VenueConnector {
  abstract readonly venue: VenueId;

  abstract getQuote(symbol: string): Promise<Quote>;
  abstract getFreeBalance(currency: string): Promise<number>;
  abstract submitMarketOrder(
    symbol: string,
    side: OrderSide,
    amount: number,
  ): Promise<OrderResult>;
}
