import type { Itinerary, TripRequest } from '@shared/schema';
import type { FlightOffer, HotelOffer, Place } from '../providers/types';

/** Raw provider data the final itinerary is checked against */
export interface ReconciliationContext {
  request: TripRequest;
  flights: FlightOffer[];
  hotels: HotelOffer[];
  places: Place[];
}

/**
 * A step edits its own copy of the itinerary in place and returns notes for
 * the report. A step that throws leaves the previous itinerary untouched.
 */
export type ReconciliationStep = (itinerary: Itinerary, context: ReconciliationContext) => string[];

/** Lowest total price first; ties keep provider order */
export function cheapest<T extends { price: { total: number } }>(offers: T[]): T | undefined {
  let best: T | undefined;
  for (const offer of offers) {
    if (!best || offer.price.total < best.price.total) best = offer;
  }
  return best;
}
