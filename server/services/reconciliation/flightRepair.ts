import type { SelectedFlight, TripRequest } from '@shared/schema';
import type { FlightLeg, FlightOffer } from '../providers/types';
import { cleanseLocation } from '../orchestrator/collaborationOrchestrator';
import { cheapest, type ReconciliationStep } from './types';

/** "ICN 09:00 → NRT 11:20" */
export function legSummary(leg: FlightLeg | null): string {
  if (!leg) return '';
  return `${leg.departure.airport} ${leg.departure.time.slice(11, 16)} → ${leg.arrival.airport} ${leg.arrival.time.slice(11, 16)}`;
}

export function flightBookingUrl(offer: FlightOffer, request: TripRequest): string {
  const from = offer.outbound?.departure.airport ?? cleanseLocation(request.origin);
  const to = offer.outbound?.arrival.airport ?? cleanseLocation(request.destination);
  const query = `flights from ${from} to ${to} on ${request.departureDate} return on ${request.returnDate}`;
  return `https://www.google.com/flights?q=${encodeURIComponent(query)}`;
}

export function toSelectedFlight(offer: FlightOffer, request: TripRequest): SelectedFlight {
  return {
    airline: offer.validatingAirlineCodes.join(', ') || 'N/A',
    price: offer.price.total,
    outbound: legSummary(offer.outbound),
    inbound: legSummary(offer.inbound),
    bookingUrl: flightBookingUrl(offer, request),
  };
}

/** Replace an incomplete selectedFlight with the cheapest live offer. */
export const repairSelectedFlight: ReconciliationStep = (itinerary, { request, flights }) => {
  const offer = cheapest(flights);
  if (!offer) return [];

  const current = itinerary.selectedFlight;
  if (current?.outbound && current.inbound) {
    if (!current.bookingUrl) current.bookingUrl = flightBookingUrl(offer, request);
    return [];
  }

  itinerary.selectedFlight = toSelectedFlight(offer, request);
  return [`Selected flight rebuilt from offer ${offer.offerId}`];
};
