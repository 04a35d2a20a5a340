import { createServices, givenAToBOpportunity } from '../../test/create-services';
import { BALANCES_UNAVAILABLE, PRICES_UNAVAILABLE } from './arbitrage.service';

describe('ArbitrageService', () => {
  describe('status', () => {
    it('reports both quotes and the raw spread in each direction', async () => {
      const { arbitrage, venueA, venueB } = createServices();
      givenAToBOpportunity(venueA, venueB);

      const result = await arbitrage.status();

      if (!result.success) throw new Error(result.error);
      expect(result.data.symbol).toBe('BTC/USDT');
      expect(result.data.quotes.a).toMatchObject({ venue: 'OKX', ask: 100, bid: 99.5 });
      expect(result.data.quotes.b).toMatchObject({ venue: 'KRAKEN', ask: 101.5, bid: 101 });
      expect(result.data.spreads).toEqual({ A_TO_B: 1, B_TO_A: -2 });
    });

    it('fails once either venue is still unreachable after retries', async () => {
      const { arbitrage, venueA, venueB } = createServices();
      venueB.quote = new Error('503 Service Unavailable');

      const result = await arbitrage.status();

      expect(result).toEqual({ success: false, error: PRICES_UNAVAILABLE });
      expect(venueA.quoteCalls).toBe(1);
      expect(venueB.quoteCalls).toBe(3);
    });
  });

  describe('arbitrageOnce', () => {
    it('executes both legs in simulation when the threshold is cleared', async () => {
      const { arbitrage, ledger, venueA, venueB } = createServices();
      givenAToBOpportunity(venueA, venueB);

      const result = await arbitrage.arbitrageOnce('simulation');

      if (!result.success) throw new Error(result.error);
      const { execution } = result.data;
      expect(execution?.buy).toMatchObject({ action: 'BUY', venue: 'OKX', price: 100, status: 'SIMULATED' });
      expect(execution?.sell).toMatchObject({ action: 'SELL', venue: 'KRAKEN', price: 101, status: 'SIMULATED' });
      expect(execution?.partial).toBe(false);
      expect(execution?.expectedProfit).toBeCloseTo(0.000799, 10);
      expect(ledger.size('simulation')).toBe(2);
      expect(venueA.orders).toHaveLength(0);
      expect(venueB.orders).toHaveLength(0);
    });

    it('reports the analysis without trading when no direction clears the threshold', async () => {
      const { arbitrage, ledger } = createServices();

      const result = await arbitrage.arbitrageOnce('simulation');

      if (!result.success) throw new Error(result.error);
      expect(result.data.plan).toBeNull();
      expect(result.data.execution).toBeNull();
      expect(ledger.size('simulation')).toBe(0);
    });

    it('fails without trading when prices are unavailable', async () => {
      const { arbitrage, ledger, venueA } = createServices();
      venueA.quote = new Error('timeout');

      const result = await arbitrage.arbitrageOnce('real');

      expect(result).toEqual({ success: false, error: PRICES_UNAVAILABLE });
      expect(ledger.size('real')).toBe(0);
    });

    it('flags a real execution where only the sell leg failed as partial', async () => {
      const { arbitrage, ledger, venueA, venueB } = createServices();
      givenAToBOpportunity(venueA, venueB);
      venueB.orderError = new Error('EAPI:Invalid nonce');

      const result = await arbitrage.arbitrageOnce('real');

      if (!result.success) throw new Error(result.error);
      const { execution } = result.data;
      expect(execution?.buy.status).toBe('FILLED');
      expect(execution?.sell.status).toBe('FAILED');
      expect(execution?.sell.failureReason).toBe('EAPI:Invalid nonce');
      expect(execution?.partial).toBe(true);
      expect(ledger.size('real')).toBe(2);
      expect(ledger.size('simulation')).toBe(0);
    });

    it('still runs the sell leg after a refused buy', async () => {
      const { arbitrage, venueA, venueB } = createServices();
      givenAToBOpportunity(venueA, venueB);
      venueA.balance = 0;

      const result = await arbitrage.arbitrageOnce('real');

      if (!result.success) throw new Error(result.error);
      expect(result.data.execution?.buy.status).toBe('FAILED');
      expect(result.data.execution?.sell.status).toBe('FILLED');
      expect(result.data.execution?.partial).toBe(true);
      expect(venueA.orders).toHaveLength(0);
      expect(venueB.orders).toEqual([{ symbol: 'BTC/USDT', side: 'SELL', amount: 0.001 }]);
    });

    it('does not flag a real execution where both legs failed as partial', async () => {
      const { arbitrage, venueA, venueB } = createServices();
      givenAToBOpportunity(venueA, venueB);
      venueA.orderError = new Error('rejected');
      venueB.orderError = new Error('rejected');

      const result = await arbitrage.arbitrageOnce('real');

      if (!result.success) throw new Error(result.error);
      expect(result.data.execution?.partial).toBe(false);
    });
  });

  describe('runCycle', () => {
    it('skips the pass when cancelled before quotes arrive', async () => {
      const { arbitrage, venueA, venueB } = createServices();
      givenAToBOpportunity(venueA, venueB);
      const controller = new AbortController();
      controller.abort();

      const outcome = await arbitrage.runCycle('simulation', controller.signal);

      expect(outcome).toEqual({ kind: 'CANCELLED' });
      expect(venueA.quoteCalls).toBe(0);
      expect(venueB.quoteCalls).toBe(0);
    });
  });

  describe('accountStatus', () => {
    it('reports the change against the first snapshot', async () => {
      const { arbitrage, venueA, venueB } = createServices();
      venueA.balance = 1000;
      venueB.balance = 500;

      const first = await arbitrage.accountStatus();
      if (!first.success) throw new Error(first.error);
      expect(first.data.currency).toBe('USDT');
      expect(first.data.venues).toEqual([
        { venue: 'OKX', free: 1000, initial: 1000, change: 0 },
        { venue: 'KRAKEN', free: 500, initial: 500, change: 0 },
      ]);

      venueA.balance = 1100;
      venueB.balance = 450;
      const second = await arbitrage.accountStatus();
      if (!second.success) throw new Error(second.error);
      expect(second.data.venues).toEqual([
        { venue: 'OKX', free: 1100, initial: 1000, change: 100 },
        { venue: 'KRAKEN', free: 450, initial: 500, change: -50 },
      ]);
    });

    it('fails when a balance cannot be fetched', async () => {
      const { arbitrage, venueB } = createServices();
      venueB.balance = new Error('Invalid API key');

      const result = await arbitrage.accountStatus();

      expect(result).toEqual({ success: false, error: BALANCES_UNAVAILABLE });
    });
  });

  describe('history', () => {
    it('returns the most recent records of one mode', async () => {
      const { arbitrage, executor } = createServices();
      for (const price of [100, 101, 102]) {
        await executor.execute('BUY', 'OKX', price, 'simulation');
      }
      await executor.execute('SELL', 'KRAKEN', 103, 'real');

      expect(arbitrage.history('simulation', 2).map((r) => r.price)).toEqual([101, 102]);
      expect(arbitrage.history('real').map((r) => r.price)).toEqual([103]);
    });
  });
});
