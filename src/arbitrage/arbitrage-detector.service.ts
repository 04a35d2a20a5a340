import { Inject, Injectable, Logger } from '@nestjs/common';
import { appConfig, AppConfigType } from '../config/configuration';
import { Quote } from '../exchanges/exchange.interface';
import {
  ArbitrageAnalysis,
  ExecutionPlan,
  ProfitEstimate,
} from './arbitrage.interface';
import { ProfitCalculator } from './profit-calculator';

/**
 * Decides whether a pair of quotes is worth trading. Stateless.
 */
@Injectable()
export class ArbitrageDetector {
  private readonly logger = new Logger(ArbitrageDetector.name);

  constructor(@Inject(appConfig.KEY) private readonly config: AppConfigType) {}

  /**
   * Estimate both directions and pick at most one plan.
   * A→B is checked first, so it wins when both clear the threshold.
   */
  analyze(quoteA: Quote, quoteB: Quote): ArbitrageAnalysis {
    const { feeRate, profitThresholdPercent } = this.config.trading;

    const aToB = ProfitCalculator.estimate('A_TO_B', quoteA, quoteB, feeRate);
    const bToA = ProfitCalculator.estimate('B_TO_A', quoteB, quoteA, feeRate);

    let plan: ExecutionPlan | null = null;
    if (aToB.netProfitPercent > profitThresholdPercent) {
      plan = this.toPlan(aToB);
    } else if (bToA.netProfitPercent > profitThresholdPercent) {
      plan = this.toPlan(bToA);
    }

    if (plan) {
      this.logger.log(
        `🔴 Opportunity ${plan.buy.venue} → ${plan.sell.venue}: ${ProfitCalculator.formatProfitPercentage(plan.estimate.netProfitPercent)}`,
      );
    } else {
      this.logger.debug(
        `No opportunity (A→B ${aToB.netProfitPercent.toFixed(4)}%, B→A ${bToA.netProfitPercent.toFixed(4)}%)`,
      );
    }

    return {
      quotes: { a: quoteA, b: quoteB },
      estimates: { A_TO_B: aToB, B_TO_A: bToA },
      thresholdPercent: profitThresholdPercent,
      plan,
    };
  }

  evaluate(quoteA: Quote, quoteB: Quote): ExecutionPlan | null {
    return this.analyze(quoteA, quoteB).plan;
  }

  private toPlan(estimate: ProfitEstimate): ExecutionPlan {
    return {
      direction: estimate.direction,
      buy: { venue: estimate.buyVenue, price: estimate.buyPrice },
      sell: { venue: estimate.sellVenue, price: estimate.sellPrice },
      estimate,
    };
  }
}
