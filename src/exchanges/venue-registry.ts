import { UnknownVenueError } from '../common/errors';
import { VenueConnector, VenueId } from './exchange.interface';

/**
 * The two venues being arbitraged. `venueA` is always evaluated first.
 */
export class VenueRegistry {
  constructor(
    readonly venueA: VenueConnector,
    readonly venueB: VenueConnector,
  ) {
    if (venueA.venue === venueB.venue) {
      throw new Error(`Both venues are ${venueA.venue}`);
    }
  }

  get(venue: VenueId): VenueConnector {
    if (venue === this.venueA.venue) return this.venueA;
    if (venue === this.venueB.venue) return this.venueB;
    throw new UnknownVenueError(venue);
  }

  list(): VenueConnector[] {
    return [this.venueA, this.venueB];
  }
}
