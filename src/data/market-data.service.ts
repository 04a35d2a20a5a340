import { Inject, Injectable, Logger } from '@nestjs/common';
import { FetchResult, withRetry } from '../common/retry';
import { appConfig, AppConfigType } from '../config/configuration';
import { Quote, VenueId } from '../exchanges/exchange.interface';
import { VenueRegistry } from '../exchanges/venue-registry';

export interface QuotePair {
  a: Quote;
  b: Quote;
}

/**
 * Retry-wrapped reads from both venues.
 */
@Injectable()
export class MarketDataService {
  private readonly logger = new Logger(MarketDataService.name);

  constructor(
    private readonly venues: VenueRegistry,
    @Inject(appConfig.KEY) private readonly config: AppConfigType,
  ) {}

  get symbol(): string {
    return this.config.trading.symbol;
  }

  async fetchQuote(venue: VenueId, signal?: AbortSignal): Promise<FetchResult<Quote>> {
    const connector = this.venues.get(venue);
    return withRetry(
      `${venue}.getQuote(${this.symbol})`,
      () => connector.getQuote(this.symbol),
      this.config.retry,
      { logger: this.logger, signal },
    );
  }

  /**
   * Quotes from venue A then venue B. Fails as a whole if either is unavailable.
   */
  async fetchQuotes(signal?: AbortSignal): Promise<FetchResult<QuotePair>> {
    const a = await this.fetchQuote(this.venues.venueA.venue, signal);
    if (!a.ok) {
      return a;
    }

    const b = await this.fetchQuote(this.venues.venueB.venue, signal);
    if (!b.ok) {
      return b;
    }

    return { ok: true, value: { a: a.value, b: b.value } };
  }

  async fetchFreeBalance(
    venue: VenueId,
    currency: string,
    signal?: AbortSignal,
  ): Promise<FetchResult<number>> {
    const connector = this.venues.get(venue);
    return withRetry(
      `${venue}.getFreeBalance(${currency})`,
      () => connector.getFreeBalance(currency),
      this.config.retry,
      { logger: this.logger, signal },
    );
  }
}
