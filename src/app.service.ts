import { Injectable } from '@nestjs/common';

@Injectable()
export class AppService {
  getHello(): string {
    return `
    🚀 Spot Arbitrage Bot API

    📊 Available Endpoints:
    - GET  /health - Health check
    - GET  /arbitrage/status - Quotes and spreads
    - POST /arbitrage/run/:mode - One arbitrage pass (simulation | real)
    - GET  /arbitrage/account - Balances and change since first check
    - GET  /arbitrage/history/:mode - Recent trades
    - GET  /arbitrage/loops - Background loop state
    - POST /arbitrage/loops/:mode/start | stop - Control a loop

    📖 Documentation: /api
    `;
  }
}
