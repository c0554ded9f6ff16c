/**
 * Refinement instruction: the draft, the reviewer's hotel analysis and the
 * raw provider data, plus the booking and budget rules the final itinerary
 * has to satisfy.
 */

import type { HotelAnalysis, Itinerary, TripRequest } from '@shared/schema';
import type { FlightLeg, FlightOffer, HotelOffer, Place, WeatherReport } from '../providers/types';
import { formatAmount, getReferenceCurrency } from '../currency';

export interface RefinementInput {
  request: TripRequest;
  draft: Itinerary;
  hotelAnalysis: HotelAnalysis;
  flights: FlightOffer[];
  hotels: HotelOffer[];
  weather?: WeatherReport;
  places: Place[];
}

const FLIGHT_LIMIT = 3;
const HOTEL_LIMIT = 3;
const PLACE_LIMIT = 5;

/** Budget overage still accepted for a direct flight */
const DIRECT_FLIGHT_TOLERANCE = 0.05;

function compactLeg(leg: FlightLeg | null) {
  if (!leg) return null;
  return {
    from: leg.departure.airport,
    departs: leg.departure.time.slice(0, 16),
    to: leg.arrival.airport,
    arrives: leg.arrival.time.slice(0, 16),
    duration: leg.duration,
    stops: leg.stops,
  };
}

function compactFlights(flights: FlightOffer[]) {
  return flights.slice(0, FLIGHT_LIMIT).map((flight) => ({
    airline: flight.validatingAirlineCodes.join(', '),
    price: flight.price.total,
    currency: flight.price.currency,
    outbound: compactLeg(flight.outbound),
    inbound: compactLeg(flight.inbound),
  }));
}

function compactHotels(hotels: HotelOffer[]) {
  return hotels.slice(0, HOTEL_LIMIT).map((hotel) => ({
    name: hotel.name,
    address: hotel.address,
    rating: hotel.rating,
    total: hotel.price.total,
    perNight: hotel.price.perNight,
    currency: hotel.price.currency,
  }));
}

function compactPlaces(places: Place[]) {
  return places.slice(0, PLACE_LIMIT).map((place) => ({
    name: place.name,
    address: place.address,
    rating: place.rating,
    restaurants: place.nearbyRestaurants.map((r) => r.name),
  }));
}

export function buildRefinementInstruction(input: RefinementInput): string {
  const { request, draft, hotelAnalysis } = input;
  const currency = getReferenceCurrency();
  const weather = input.weather?.daily ?? [];

  return [
    'Refine the draft itinerary below using the hotel review analysis and the live search data.',
    '',
    `Draft itinerary:\n${JSON.stringify(draft, null, 2)}`,
    '',
    `Hotel review analysis:\n${JSON.stringify(hotelAnalysis, null, 2)}`,
    '',
    `Flight options:\n${JSON.stringify(compactFlights(input.flights), null, 2)}`,
    '',
    `Hotel options:\n${JSON.stringify(compactHotels(input.hotels), null, 2)}`,
    '',
    `Weather:\n${JSON.stringify(weather, null, 2)}`,
    '',
    `Attractions:\n${JSON.stringify(compactPlaces(input.places), null, 2)}`,
    '',
    'Rules:',
    `1. Keep exactly ${request.days} days. Day 1 transportation is the outbound flight; the last day's transportation is the inbound flight.`,
    '2. The last day has no accommodation (null). Its activities end 3 hours before the inbound departure.',
    '3. Charge the full round-trip fare to day 1 transportation.',
    '4. Split the hotel total evenly across the nights stayed and use that as each night\'s accommodation cost.',
    '5. Other transportation costs are local transit estimates.',
    `6. Flight + hotel + food + attractions must not exceed the budget of ${formatAmount(request.budget)} ${currency}.`,
    `7. Prefer a direct flight. If it pushes the total over budget by less than 5% of the budget (${formatAmount(request.budget * DIRECT_FLIGHT_TOLERANCE)} ${currency}), still choose it; choose a connecting flight only when no direct flight exists or the overage is larger.`,
    '8. Each day\'s dailyCost is the sum of its transportation, accommodation, attraction and meal costs.',
    `9. Consider the reviewers' top pick (${hotelAnalysis.topPick}) when choosing the hotel.`,
    '',
    'Return the complete itinerary as JSON in the same shape as the draft.',
  ].join('\n');
}
