/**
 * Test factories and in-process fakes shared by the unit tests.
 */

import type { Itinerary, ItineraryDay, TripRequest } from '@shared/schema';
import type { CompletionRequest, LanguageModel } from '../services/languageModel';
import type { FlightLeg, FlightOffer, HotelOffer, Place, Restaurant } from '../services/providers/types';

// ============================================================================
// REQUESTS
// ============================================================================

export const createTripRequest = (overrides: Partial<TripRequest> = {}): TripRequest => ({
  origin: 'Seoul',
  destination: 'Tokyo, Japan',
  departureDate: '2025-11-10',
  returnDate: '2025-11-12',
  tripDays: 3,
  days: 3,
  people: 2,
  budget: 2000000,
  preferences: {},
  ...overrides,
});

// ============================================================================
// PROVIDER DATA
// ============================================================================

export const createLeg = (overrides: Partial<FlightLeg> = {}): FlightLeg => ({
  departure: { airport: 'ICN', time: '2025-11-10T09:00:00' },
  arrival: { airport: 'NRT', time: '2025-11-10T11:20:00' },
  duration: '2h 20m',
  stops: 0,
  layovers: [],
  carriers: ['KE'],
  ...overrides,
});

export const createFlightOffer = (overrides: Partial<FlightOffer> = {}): FlightOffer => ({
  offerId: 'offer-1',
  price: { total: 500000, currency: 'KRW', perPerson: 250000 },
  outbound: createLeg(),
  inbound: createLeg({
    departure: { airport: 'NRT', time: '2025-11-12T18:00:00' },
    arrival: { airport: 'ICN', time: '2025-11-12T20:30:00' },
    duration: '2h 30m',
  }),
  validatingAirlineCodes: ['KE'],
  ...overrides,
});

export const createHotelOffer = (overrides: Partial<HotelOffer> = {}): HotelOffer => ({
  hotelId: 'HTL1',
  name: 'Hotel Sakura',
  rating: 4,
  address: '1-2-3 Shinjuku, Tokyo, JP',
  cityCode: 'TYO',
  price: { total: 300000, currency: 'KRW', base: 270000, taxTotal: 30000, perNight: 150000 },
  roomType: 'STANDARD',
  boardType: 'ROOM_ONLY',
  offerId: 'hotel-offer-1',
  ...overrides,
});

export const createRestaurant = (name: string): Restaurant => ({
  placeId: `r-${name}`,
  name,
  address: 'Tokyo',
  rating: 4.2,
  priceLevel: null,
});

export const createPlace = (overrides: Partial<Place> = {}): Place => ({
  placeId: 'p-1',
  name: 'Senso-ji',
  address: 'Asakusa, Tokyo',
  rating: 4.6,
  location: { lat: 35.71, lng: 139.79 },
  photoUrl: null,
  nearbyRestaurants: [],
  ...overrides,
});

// ============================================================================
// ITINERARIES
// ============================================================================

export const createDay = (day: number, overrides: Partial<ItineraryDay> = {}): ItineraryDay => ({
  day,
  date: `2025-11-${(9 + day).toString().padStart(2, '0')}`,
  transportation: { type: 'subway', details: 'Metro', cost: 5000 },
  accommodation: { name: 'Model Hotel', address: 'Somewhere', type: 'Hotel', estimatedCost: 100000 },
  attractions: [
    { name: 'Senso-ji', description: 'Temple', estimatedCost: 0 },
    { name: 'Tokyo Tower', description: 'Tower', estimatedCost: 20000 },
  ],
  meals: [{ type: 'lunch', suggestion: 'Ramen Ichiran - ramen (near Senso-ji)', estimatedCost: 15000 }],
  dailyCost: 140000,
  ...overrides,
});

export const createItinerary = (overrides: Partial<Itinerary> = {}): Itinerary => ({
  destination: 'Tokyo, Japan',
  days: 3,
  people: 2,
  estimatedCost: 1500000,
  itinerary: [createDay(1), createDay(2), createDay(3)],
  budgetBreakdown: {},
  ...overrides,
});

// ============================================================================
// LANGUAGE MODEL
// ============================================================================

/** Answers each call with the next scripted reply; an Error reply is thrown. */
export class ScriptedLanguageModel implements LanguageModel {
  readonly requests: CompletionRequest[] = [];

  constructor(private readonly replies: Array<string | Error>) {}

  async complete(request: CompletionRequest): Promise<string> {
    this.requests.push(request);
    const reply = this.replies.shift();
    if (reply === undefined) throw new Error('No scripted reply left');
    if (reply instanceof Error) throw reply;
    return reply;
  }
}

// ============================================================================
// HTTP
// ============================================================================

export interface FakeRoute {
  /** Substring of the request URL */
  match: string;
  status?: number;
  body: unknown;
}

export interface RecordedCall {
  url: string;
  method: string;
  headers: Record<string, string>;
  body: string | null;
}

/** fetch stand-in answering from a route table; the first matching route wins. */
export function createFakeFetch(routes: FakeRoute[]) {
  const calls: RecordedCall[] = [];

  const fetchImpl: typeof fetch = async (input, init) => {
    const url = input instanceof Request ? input.url : String(input);
    const headers: Record<string, string> = {};
    new Headers(init?.headers).forEach((value, key) => {
      headers[key] = value;
    });
    calls.push({
      url,
      method: init?.method ?? 'GET',
      headers,
      body: typeof init?.body === 'string' ? init.body : null,
    });

    const route = routes.find((r) => url.includes(r.match));
    if (!route) {
      return new Response(JSON.stringify({ error: 'no route' }), { status: 404 });
    }
    const text = typeof route.body === 'string' ? route.body : JSON.stringify(route.body);
    return new Response(text, { status: route.status ?? 200, headers: { 'Content-Type': 'application/json' } });
  };

  return { fetchImpl, calls };
}
