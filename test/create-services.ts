import { ArbitrageDetector } from '../src/arbitrage/arbitrage-detector.service';
import { ArbitrageService } from '../src/arbitrage/arbitrage.service';
import { MarketDataService } from '../src/data/market-data.service';
import { VenueRegistry } from '../src/exchanges/venue-registry';
import { NotificationService } from '../src/notification/notification.service';
import { TelegramService } from '../src/notification/telegram.service';
import { ArbitrageLoopManager } from '../src/scheduler/arbitrage-loop.manager';
import { TradeExecutor } from '../src/trading/trade-executor.service';
import { TradeLedgerService } from '../src/trading/trade-ledger.service';
import { TradingGateway } from '../src/websocket/trading.gateway';
import { FakeVenueConnector } from './fake-venue.connector';
import { createTestConfig } from './test-config';

/**
 * The arbitrage core wired by hand over two fake venues (OKX as A, KRAKEN as B).
 */
export function createServices(env: Record<string, string> = {}) {
  const config = createTestConfig(env);
  const venueA = new FakeVenueConnector('OKX');
  const venueB = new FakeVenueConnector('KRAKEN');
  const venues = new VenueRegistry(venueA, venueB);

  const marketData = new MarketDataService(venues, config);
  const ledger = new TradeLedgerService(config);
  const executor = new TradeExecutor(venues, marketData, ledger, config);
  const detector = new ArbitrageDetector(config);
  const arbitrage = new ArbitrageService(marketData, detector, executor, ledger, venues, config);

  const telegram = new TelegramService(config);
  const gateway = new TradingGateway();
  const notifications = new NotificationService(telegram, gateway);
  const loopManager = new ArbitrageLoopManager(arbitrage, notifications, config);

  return {
    config,
    venueA,
    venueB,
    venues,
    marketData,
    ledger,
    executor,
    detector,
    arbitrage,
    telegram,
    gateway,
    notifications,
    loopManager,
  };
}

/** Quotes that make buying on OKX and selling on KRAKEN clear a 0.5% threshold. */
export function givenAToBOpportunity(venueA: FakeVenueConnector, venueB: FakeVenueConnector) {
  venueA.quote = { ask: 100, bid: 99.5 };
  venueB.quote = { ask: 101.5, bid: 101 };
}

export async function waitFor(condition: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error('Timed out waiting for condition');
    }
    await new Promise((resolve) => setTimeout(resolve, 1));
  }
}
