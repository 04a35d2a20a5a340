import { Inject, Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { ArbitrageService } from '../arbitrage/arbitrage.service';
import { appConfig, AppConfigType } from '../config/configuration';
import {
  HELP_TEXT,
  formatAccountStatus,
  formatArbitrageReport,
  formatError,
  formatHistory,
  formatLoopAck,
  formatMarketStatus,
} from '../notification/message-formatter';
import { TelegramService } from '../notification/telegram.service';
import { ArbitrageLoopManager } from '../scheduler/arbitrage-loop.manager';
import { DEFAULT_HISTORY_LIMIT } from '../trading/trade-ledger.service';
import { TradingMode } from '../trading/trade.interface';

type CommandHandler = (args: string[], chatId?: number) => Promise<string>;

const MAX_HISTORY_LIMIT = 50;

/**
 * Chat front end: maps bot commands onto the arbitrage core and renders
 * the results as Telegram HTML.
 */
@Injectable()
export class TelegramCommandsService implements OnApplicationBootstrap {
  private readonly logger = new Logger(TelegramCommandsService.name);
  private readonly commands: Map<string, CommandHandler>;

  constructor(
    private readonly telegram: TelegramService,
    private readonly arbitrageService: ArbitrageService,
    private readonly loopManager: ArbitrageLoopManager,
    @Inject(appConfig.KEY) private readonly config: AppConfigType,
  ) {
    this.commands = new Map(Object.entries<CommandHandler>({
      start: async () => `🤖 <b>Spot arbitrage bot</b>\n\n${HELP_TEXT}`,
      help: async () => HELP_TEXT,

      status: () => this.status('simulation'),
      arbitrage: () => this.arbitrage('simulation'),
      account_status: () => this.account(),
      history: (args) => this.history('simulation', args),
      start_loop: async (_args, chatId) => this.startLoop('simulation', chatId),
      stop_loop: () => this.stopLoop('simulation'),

      real_status: () => this.status('real'),
      real_account: () => this.account(),
      real_history: (args) => this.history('real', args),
      real_arbitrage: () => this.arbitrage('real'),
      start_real_loop: async (_args, chatId) => this.startLoop('real', chatId),
      stop_real_loop: () => this.stopLoop('real'),
    }));
  }

  async onApplicationBootstrap() {
    if (!this.config.notifications.telegram?.commandsEnabled) {
      return;
    }
    await this.telegram.listen((chatId, text) => this.handleMessage(chatId, text));
  }

  async handleMessage(chatId: number, text: string): Promise<void> {
    const reply = await this.dispatch(text, chatId);
    if (reply !== null) {
      await this.telegram.sendMessage(reply, chatId);
    }
  }

  /**
   * Reply for a `/command args` message, or null when it is not a command.
   * Loops started with a `chatId` notify that chat.
   */
  async dispatch(text: string, chatId?: number): Promise<string | null> {
    const [head, ...args] = text.trim().split(/\s+/);
    if (!head || !head.startsWith('/')) {
      return null;
    }

    // "/status@SomeBot" in group chats
    const name = head.slice(1).split('@')[0].toLowerCase();
    const handler = this.commands.get(name);
    if (!handler) {
      return `Unknown command /${name}. Send /help for the list.`;
    }

    this.logger.log(`📩 /${name}`);
    return handler(args, chatId);
  }

  private async status(mode: TradingMode): Promise<string> {
    const result = await this.arbitrageService.status();
    return result.success
      ? formatMarketStatus(result.data, mode, this.config.trading.quoteCurrency)
      : formatError(result.error);
  }

  private async arbitrage(mode: TradingMode): Promise<string> {
    const result = await this.arbitrageService.arbitrageOnce(mode);
    return result.success
      ? formatArbitrageReport(result.data, mode, this.config.trading.quoteCurrency)
      : formatError(result.error);
  }

  private async account(): Promise<string> {
    const result = await this.arbitrageService.accountStatus();
    return result.success ? formatAccountStatus(result.data) : formatError(result.error);
  }

  private async history(mode: TradingMode, args: string[]): Promise<string> {
    const requested = args[0] === undefined ? DEFAULT_HISTORY_LIMIT : Number.parseInt(args[0], 10);
    if (!Number.isInteger(requested) || requested < 1) {
      return formatError(`History size must be a positive integer, got "${args[0]}"`);
    }
    const limit = Math.min(requested, MAX_HISTORY_LIMIT);
    return formatHistory(this.arbitrageService.history(mode, limit), mode);
  }

  private startLoop(mode: TradingMode, chatId?: number): string {
    const ack = this.loopManager.start(mode, chatId);
    return formatLoopAck(ack, mode, this.config.trading.pollingIntervalMs);
  }

  private async stopLoop(mode: TradingMode): Promise<string> {
    const ack = await this.loopManager.stop(mode);
    return formatLoopAck(ack, mode, this.config.trading.pollingIntervalMs);
  }
}
