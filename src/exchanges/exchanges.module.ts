import { Module } from '@nestjs/common';
import { KrakenConnector } from './kraken/kraken.connector';
import { OkxConnector } from './okx/okx.connector';
import { VenueRegistry } from './venue-registry';

/**
 * OKX is venue A, Kraken venue B.
 */
@Module({
  providers: [
    OkxConnector,
    KrakenConnector,
    {
      provide: VenueRegistry,
      useFactory: (okx: OkxConnector, kraken: KrakenConnector) => new VenueRegistry(okx, kraken),
      inject: [OkxConnector, KrakenConnector],
    },
  ],
  exports: [VenueRegistry],
})
export class ExchangesModule {}
