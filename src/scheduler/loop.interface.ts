import { TradingMode } from '../trading/trade.interface';

export type LoopAck = 'STARTED' | 'ALREADY_RUNNING' | 'STOPPED' | 'NOT_RUNNING';

export interface LoopHandle {
  readonly mode: TradingMode;
  readonly controller: AbortController;
  readonly startedAt: Date;
  task: Promise<void>;
  finished: boolean;
  stopping: boolean;
  iterations: number;
  lastCycleAt?: Date;
  /** Telegram chat that started the loop */
  readonly chatId?: number | string;
}

export interface LoopStatus {
  running: boolean;
  startedAt?: Date;
  iterations: number;
  lastCycleAt?: Date;
}

export type LoopStatusMap = Record<TradingMode, LoopStatus>;
