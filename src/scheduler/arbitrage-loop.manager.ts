import {
  Inject,
  Injectable,
  Logger,
  OnApplicationShutdown,
} from '@nestjs/common';
import { ArbitrageService, CycleOutcome } from '../arbitrage/arbitrage.service';
import { describeError } from '../common/errors';
import { sleep } from '../common/helper';
import { appConfig, AppConfigType } from '../config/configuration';
import { formatOpportunityNotification } from '../notification/message-formatter';
import { NotificationService } from '../notification/notification.service';
import { TRADING_MODES, TradingMode } from '../trading/trade.interface';
import { LoopAck, LoopHandle, LoopStatus, LoopStatusMap } from './loop.interface';

/**
 * Runs at most one background arbitrage loop per trading mode.
 *
 * Cancellation is cooperative: `stop` aborts the handle's controller, which
 * cuts short any backoff or polling wait, and then awaits the task. A pass
 * that already has its quotes finishes its trade legs before the loop exits.
 */
@Injectable()
export class ArbitrageLoopManager implements OnApplicationShutdown {
  private readonly logger = new Logger(ArbitrageLoopManager.name);
  private readonly handles = new Map<TradingMode, LoopHandle>();

  constructor(
    private readonly arbitrageService: ArbitrageService,
    private readonly notifications: NotificationService,
    @Inject(appConfig.KEY) private readonly config: AppConfigType,
  ) {}

  /**
   * `chatId` is where the loop's Telegram notifications go; the configured
   * chat when omitted.
   */
  start(mode: TradingMode, chatId?: number | string): LoopAck {
    if (this.isRunning(mode)) {
      this.logger.log(`${mode} loop already running`);
      return 'ALREADY_RUNNING';
    }

    const handle: LoopHandle = {
      mode,
      controller: new AbortController(),
      startedAt: new Date(),
      task: Promise.resolve(),
      finished: false,
      stopping: false,
      iterations: 0,
      chatId,
    };
    handle.task = this.runLoop(handle)
      .catch((error) => this.logger.error(`❌ ${mode} loop crashed: ${describeError(error)}`))
      .finally(() => {
        handle.finished = true;
      });
    this.handles.set(mode, handle);

    this.logger.log(
      `🚀 Starting ${mode} arbitrage loop (every ${this.config.trading.pollingIntervalMs}ms)`,
    );
    this.publishStatus();
    return 'STARTED';
  }

  async stop(mode: TradingMode): Promise<LoopAck> {
    const handle = this.handles.get(mode);
    if (!handle || handle.finished) {
      return 'NOT_RUNNING';
    }
    if (handle.stopping) {
      // another caller already aborted it; wait for the same exit
      await handle.task;
      return 'STOPPED';
    }

    handle.stopping = true;
    handle.controller.abort();
    await handle.task;
    if (this.handles.get(mode) === handle) {
      this.handles.delete(mode);
    }

    this.logger.log(`🛑 ${mode} arbitrage loop stopped after ${handle.iterations} iterations`);
    this.publishStatus();
    return 'STOPPED';
  }

  isRunning(mode: TradingMode): boolean {
    const handle = this.handles.get(mode);
    return handle !== undefined && !handle.finished;
  }

  getStatus(): LoopStatusMap {
    const status = (mode: TradingMode): LoopStatus => {
      const handle = this.handles.get(mode);
      if (!handle || handle.finished) {
        return { running: false, iterations: 0 };
      }
      return {
        running: true,
        startedAt: handle.startedAt,
        iterations: handle.iterations,
        lastCycleAt: handle.lastCycleAt,
      };
    };

    return { simulation: status('simulation'), real: status('real') };
  }

  async stopAll(): Promise<void> {
    await Promise.all(TRADING_MODES.map((mode) => this.stop(mode)));
  }

  async onApplicationShutdown(signal?: string) {
    this.logger.log(`Shutting down arbitrage loops${signal ? ` (${signal})` : ''}`);
    await this.stopAll();
  }

  private async runLoop(handle: LoopHandle): Promise<void> {
    const { signal } = handle.controller;

    while (!signal.aborted) {
      try {
        const outcome = await this.arbitrageService.runCycle(handle.mode, signal);
        await this.publishOutcome(handle, outcome);
      } catch (error) {
        this.logger.error(`❌ ${handle.mode} loop iteration failed: ${describeError(error)}`);
      }

      handle.iterations++;
      handle.lastCycleAt = new Date();
      await sleep(this.config.trading.pollingIntervalMs, signal);
    }
  }

  private async publishOutcome(handle: LoopHandle, outcome: CycleOutcome): Promise<void> {
    if (outcome.kind !== 'EXECUTED') {
      return;
    }

    await this.notifications.notify(
      formatOpportunityNotification(outcome.report, handle.mode, this.config.trading.quoteCurrency),
      handle.chatId,
    );
  }

  private publishStatus() {
    this.notifications.publishLoopStatus(this.getStatus());
  }
}
