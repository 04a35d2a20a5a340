import { Quote } from '../exchanges/exchange.interface';
import { ArbitrageDirection, ProfitEstimate } from './arbitrage.interface';

export class ProfitCalculator {
  /**
   * Raw spread of buying at `ask` and selling at `bid`.
   */
  static spread(ask: number, bid: number): number {
    return bid - ask;
  }

  /**
   * Net profit per unit after paying `feeRate` on both legs, and that profit
   * as a percentage of the fee-inclusive cost. `buyPrice` must be positive.
   */
  static profitAfterFees(
    buyPrice: number,
    sellPrice: number,
    feeRate: number,
  ): { netProfit: number; netProfitPercent: number } {
    const effectiveBuy = buyPrice * (1 + feeRate);
    const effectiveSell = sellPrice * (1 - feeRate);
    const netProfit = effectiveSell - effectiveBuy;

    return {
      netProfit,
      netProfitPercent: (netProfit / effectiveBuy) * 100,
    };
  }

  static estimate(
    direction: ArbitrageDirection,
    buyQuote: Quote,
    sellQuote: Quote,
    feeRate: number,
  ): ProfitEstimate {
    const { netProfit, netProfitPercent } = this.profitAfterFees(
      buyQuote.ask,
      sellQuote.bid,
      feeRate,
    );

    return {
      direction,
      buyVenue: buyQuote.venue,
      sellVenue: sellQuote.venue,
      buyPrice: buyQuote.ask,
      sellPrice: sellQuote.bid,
      spread: this.spread(buyQuote.ask, sellQuote.bid),
      netProfit,
      netProfitPercent,
    };
  }

  static expectedTradeProfit(estimate: ProfitEstimate, amount: number): number {
    return estimate.netProfit * amount;
  }

  static formatProfitPercentage(percent: number): string {
    return `${percent.toFixed(2)}%`;
  }
}
