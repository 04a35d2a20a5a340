import { TradeRecord } from './trade.interface';

/**
 * Append-only trade history. Once `maxRecords` is reached the oldest
 * records are dropped; the survivors keep their insertion order.
 */
export class TradeLedger {
  private readonly records: TradeRecord[] = [];

  constructor(private readonly maxRecords = 1000) {
    if (!Number.isInteger(maxRecords) || maxRecords < 1) {
      throw new RangeError(`maxRecords must be a positive integer, got ${maxRecords}`);
    }
  }

  append(record: TradeRecord): void {
    this.records.push(record);
    const overflow = this.records.length - this.maxRecords;
    if (overflow > 0) {
      this.records.splice(0, overflow);
    }
  }

  /** Last `n` records, oldest first. */
  recent(n: number): TradeRecord[] {
    const count = Math.floor(n);
    if (!Number.isFinite(count) || count <= 0) {
      return [];
    }
    return this.records.slice(-count);
  }

  get size(): number {
    return this.records.length;
  }
}
