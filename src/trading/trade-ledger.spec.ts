import { createTestConfig } from '../../test/test-config';
import { TradeLedger } from './trade-ledger';
import { TradeLedgerService } from './trade-ledger.service';
import { TradeRecord, TradingMode } from './trade.interface';

const record = (price: number, mode: TradingMode = 'simulation'): TradeRecord => ({
  id: `trade-${price}`,
  timestamp: new Date(0),
  mode,
  action: 'BUY',
  venue: 'OKX',
  price,
  amount: 0.001,
  status: mode === 'simulation' ? 'SIMULATED' : 'FILLED',
});

const prices = (records: TradeRecord[]) => records.map((r) => r.price);

describe('TradeLedger', () => {
  it('returns the last n records, oldest first', () => {
    const ledger = new TradeLedger();
    for (let i = 1; i <= 15; i++) {
      ledger.append(record(i));
    }

    expect(prices(ledger.recent(10))).toEqual([6, 7, 8, 9, 10, 11, 12, 13, 14, 15]);
    expect(prices(ledger.recent(3))).toEqual([13, 14, 15]);
    expect(ledger.size).toBe(15);
  });

  it('returns everything when fewer than n records exist', () => {
    const ledger = new TradeLedger();
    ledger.append(record(1));
    ledger.append(record(2));

    expect(prices(ledger.recent(10))).toEqual([1, 2]);
  });

  it('returns nothing for an empty ledger or a non-positive n', () => {
    const ledger = new TradeLedger();
    expect(ledger.recent(10)).toEqual([]);

    ledger.append(record(1));
    expect(ledger.recent(0)).toEqual([]);
    expect(ledger.recent(-3)).toEqual([]);
    expect(ledger.recent(0.5)).toEqual([]);
  });

  it('rounds a fractional n down', () => {
    const ledger = new TradeLedger();
    [1, 2, 3].forEach((price) => ledger.append(record(price)));

    expect(prices(ledger.recent(2.9))).toEqual([2, 3]);
  });

  it('drops the oldest records beyond its capacity', () => {
    const ledger = new TradeLedger(5);
    for (let i = 1; i <= 8; i++) {
      ledger.append(record(i));
    }

    expect(ledger.size).toBe(5);
    expect(prices(ledger.recent(10))).toEqual([4, 5, 6, 7, 8]);
  });

  it('rejects a capacity that is not a positive integer', () => {
    expect(() => new TradeLedger(0)).toThrow(RangeError);
    expect(() => new TradeLedger(2.5)).toThrow('maxRecords must be a positive integer, got 2.5');
  });
});

describe('TradeLedgerService', () => {
  it('keeps simulation and real records apart', () => {
    const service = new TradeLedgerService(createTestConfig());

    service.append(record(1, 'simulation'));
    service.append(record(2, 'real'));
    service.append(record(3, 'simulation'));

    expect(prices(service.recent('simulation'))).toEqual([1, 3]);
    expect(prices(service.recent('real'))).toEqual([2]);
    expect(service.size('real')).toBe(1);
  });

  it('bounds each ledger by LEDGER_MAX_RECORDS', () => {
    const service = new TradeLedgerService(createTestConfig({ LEDGER_MAX_RECORDS: '2' }));

    [1, 2, 3].forEach((price) => service.append(record(price)));

    expect(prices(service.recent('simulation'))).toEqual([2, 3]);
  });
});
