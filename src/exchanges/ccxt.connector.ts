import { Logger } from '@nestjs/common';
import { Exchange } from 'ccxt';
import { describeError } from '../common/errors';
import { OrderResult, OrderSide, Quote, VenueConnector } from './exchange.interface';

const isPositivePrice = (value: unknown): value is number =>
  typeof value === 'number' && Number.isFinite(value) && value > 0;

/**
 * Spot connector over a ccxt exchange instance.
 */
export abstract class CcxtConnector extends VenueConnector {
  protected abstract readonly logger: Logger;
  protected abstract readonly exchange: Exchange;

  async getQuote(symbol: string): Promise<Quote> {
    const ticker = await this.exchange.fetchTicker(symbol);

    if (!isPositivePrice(ticker.ask) || !isPositivePrice(ticker.bid)) {
      throw new Error(
        `${this.venue} returned an incomplete ticker for ${symbol} (ask=${ticker.ask}, bid=${ticker.bid})`,
      );
    }

    return {
      venue: this.venue,
      ask: ticker.ask,
      bid: ticker.bid,
      timestamp: ticker.timestamp ?? Date.now(),
    };
  }

  async getFreeBalance(currency: string): Promise<number> {
    const balances = await this.exchange.fetchBalance();
    const free = balances[currency]?.free;
    return typeof free === 'number' && Number.isFinite(free) ? free : 0;
  }

  async submitMarketOrder(
    symbol: string,
    side: OrderSide,
    amount: number,
  ): Promise<OrderResult> {
    try {
      const order = await this.exchange.createOrder(
        symbol,
        'market',
        side === 'BUY' ? 'buy' : 'sell',
        amount,
      );
      this.logger.log(`✅ ${side} ${amount} ${symbol} on ${this.venue}: order ${order.id}`);

      return {
        orderId: order.id,
        symbol,
        side,
        amount,
        filled: order.filled ?? 0,
        avgPrice: order.average ?? undefined,
        timestamp: order.timestamp ?? Date.now(),
      };
    } catch (error) {
      this.logger.error(`❌ ${side} order on ${this.venue} failed: ${describeError(error)}`);
      throw error;
    }
  }

  protected logCredentials(apiKey: string) {
    this.logger.log(
      `🔑 ${this.venue} API Key: ${apiKey ? `${apiKey.substring(0, 4)}...` : 'Not configured'}`,
    );
  }
}
