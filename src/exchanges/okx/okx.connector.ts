import { Inject, Injectable, Logger } from '@nestjs/common';
import { okx } from 'ccxt';
import { appConfig, AppConfigType } from '../../config/configuration';
import { CcxtConnector } from '../ccxt.connector';

@Injectable()
export class OkxConnector extends CcxtConnector {
  protected readonly logger = new Logger(OkxConnector.name);
  readonly venue = 'OKX';
  protected readonly exchange: okx;

  constructor(@Inject(appConfig.KEY) config: AppConfigType) {
    super();
    const { apiKey, secret, password } = config.exchanges.okx;
    // OKX requires the passphrase as ccxt's `password`
    this.exchange = new okx({ apiKey, secret, password, enableRateLimit: true });
    this.logCredentials(apiKey);
  }
}
