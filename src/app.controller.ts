import { Controller, Get, Inject } from '@nestjs/common';
import { AppService } from './app.service';
import { appConfig, AppConfigType } from './config/configuration';
import { ArbitrageLoopManager } from './scheduler/arbitrage-loop.manager';

@Controller()
export class AppController {
  constructor(
    private readonly appService: AppService,
    private readonly loopManager: ArbitrageLoopManager,
    @Inject(appConfig.KEY) private readonly config: AppConfigType,
  ) {}

  @Get()
  getHello(): string {
    return this.appService.getHello();
  }

  @Get('health')
  getHealth() {
    return {
      status: 'healthy',
      timestamp: new Date(),
      symbol: this.config.trading.symbol,
      loops: this.loopManager.getStatus(),
    };
  }
}
