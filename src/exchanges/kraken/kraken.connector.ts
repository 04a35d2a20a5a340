import { Inject, Injectable, Logger } from '@nestjs/common';
import { kraken } from 'ccxt';
import { appConfig, AppConfigType } from '../../config/configuration';
import { CcxtConnector } from '../ccxt.connector';

@Injectable()
export class KrakenConnector extends CcxtConnector {
  protected readonly logger = new Logger(KrakenConnector.name);
  readonly venue = 'KRAKEN';
  protected readonly exchange: kraken;

  constructor(@Inject(appConfig.KEY) config: AppConfigType) {
    super();
    const { apiKey, secret } = config.exchanges.kraken;
    this.exchange = new kraken({ apiKey, secret, enableRateLimit: true });
    this.logCredentials(apiKey);
  }
}
