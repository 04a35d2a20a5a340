import { Controller, Get, Param, Post, Query } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { ArbitrageService } from '../arbitrage/arbitrage.service';
import { HistoryQueryDto, TradingModeParamDto } from '../common/dto/trading.dto';
import { ArbitrageLoopManager } from '../scheduler/arbitrage-loop.manager';
import { DEFAULT_HISTORY_LIMIT } from '../trading/trade-ledger.service';

@ApiTags('arbitrage')
@Controller('arbitrage')
export class ArbitrageController {
  constructor(
    private readonly arbitrageService: ArbitrageService,
    private readonly loopManager: ArbitrageLoopManager,
  ) {}

  @Get('status')
  @ApiOperation({ summary: 'Current quotes and raw spreads on both venues' })
  getStatus() {
    return this.arbitrageService.status();
  }

  @Post('run/:mode')
  @ApiOperation({ summary: 'Run one arbitrage pass, executing the plan if profitable' })
  runOnce(@Param() { mode }: TradingModeParamDto) {
    return this.arbitrageService.arbitrageOnce(mode);
  }

  @Get('account')
  @ApiOperation({ summary: 'Free quote balances and change since the first query' })
  getAccount() {
    return this.arbitrageService.accountStatus();
  }

  @Get('history/:mode')
  @ApiOperation({ summary: 'Most recent trades of a mode, oldest first' })
  getHistory(@Param() { mode }: TradingModeParamDto, @Query() query: HistoryQueryDto) {
    const records = this.arbitrageService.history(mode, query.limit ?? DEFAULT_HISTORY_LIMIT);
    return { mode, total: records.length, records };
  }

  @Get('loops')
  @ApiOperation({ summary: 'State of the background loops' })
  getLoops() {
    return this.loopManager.getStatus();
  }

  @Post('loops/:mode/start')
  @ApiOperation({ summary: 'Start the background loop of a mode' })
  startLoop(@Param() { mode }: TradingModeParamDto) {
    return { mode, result: this.loopManager.start(mode) };
  }

  @Post('loops/:mode/stop')
  @ApiOperation({ summary: 'Stop the background loop of a mode and wait for it to exit' })
  async stopLoop(@Param() { mode }: TradingModeParamDto) {
    return { mode, result: await this.loopManager.stop(mode) };
  }
}
