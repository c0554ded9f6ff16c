import type { ReconciliationStep } from './types';

const AIR_TRAVEL = /\b(flight|air|airplane|plane)\b|비행기|항공|飛行機/i;

/** "Flight", "plane", "비행기" yes; "airport bus" no. */
export function isAirTravel(type: string): boolean {
  return AIR_TRAVEL.test(type);
}

/**
 * Day 1 carries the outbound flight (only when the model already planned air
 * travel that day); the last day carries the inbound flight and no lodging.
 */
export const injectFlightTransport: ReconciliationStep = (itinerary) => {
  const notes: string[] = [];
  const days = itinerary.itinerary;
  const flight = itinerary.selectedFlight;

  if (days.length === 0) return notes;
  const first = days[0];
  const last = days[days.length - 1];

  if (flight?.outbound && isAirTravel(first.transportation.type)) {
    first.transportation = {
      type: first.transportation.type,
      details: `Outbound: ${flight.outbound}`,
      cost: first.transportation.cost || flight.price || 0,
      airline: flight.airline,
      bookingUrl: flight.bookingUrl,
    };
    notes.push('Day 1 transportation set to the outbound flight');
  }

  if (days.length > 1 && flight?.inbound) {
    last.transportation = {
      type: 'flight',
      details: `Inbound: ${flight.inbound}`,
      cost: last.transportation.cost,
      airline: flight.airline,
      bookingUrl: flight.bookingUrl,
    };
    notes.push(`Day ${last.day} transportation set to the inbound flight`);
  }

  last.accommodation = null;
  return notes;
};
