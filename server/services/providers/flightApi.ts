/**
 * Flight API Integration
 * Amadeus flight-offers search with duplicate-offer collapsing and price ordering.
 */

import { z } from 'zod';
import type { AmadeusClient } from './amadeusClient';
import { errorMessage } from './http';
import {
  ok,
  fail,
  type FlightLeg,
  type FlightOffer,
  type FlightSearch,
  type FlightSearchData,
  type FlightSearchParams,
  type ProviderResult,
} from './types';

const FLIGHT_TIMEOUT_MS = 20000;
// Amadeus caps flight-offers at 250 per request
const MAX_OFFERS_REQUESTED = 250;

// ============================================================================
// RESPONSE SCHEMA
// ============================================================================

const endpointSchema = z.object({ iataCode: z.string(), at: z.string() });

const segmentSchema = z.object({
  departure: endpointSchema,
  arrival: endpointSchema,
  carrierCode: z.string().default(''),
});

const itinerarySchema = z.object({
  duration: z.string().optional(),
  segments: z.array(segmentSchema).default([]),
});

const offerSchema = z.object({
  id: z.string().default(''),
  price: z.object({ total: z.coerce.number(), currency: z.string() }),
  itineraries: z.array(itinerarySchema).default([]),
  numberOfBookableSeats: z.number().optional(),
  validatingAirlineCodes: z.array(z.string()).default([]),
});

const flightOffersResponseSchema = z.object({ data: z.array(offerSchema).default([]) });

type RawItinerary = z.infer<typeof itinerarySchema>;

// ============================================================================
// PARSING
// ============================================================================

/** "PT2H20M" → "2h 20m" */
export function formatIsoDuration(duration: string | undefined): string {
  if (!duration) return 'N/A';
  const match = /^PT(?:(\d+)H)?(?:(\d+)M)?$/.exec(duration);
  if (!match) return 'N/A';
  const parts: string[] = [];
  if (match[1] && Number(match[1]) > 0) parts.push(`${Number(match[1])}h`);
  if (match[2] && Number(match[2]) > 0) parts.push(`${Number(match[2])}m`);
  return parts.length > 0 ? parts.join(' ') : 'N/A';
}

function formatLayover(arrival: string, departure: string): string {
  const diffMs = new Date(departure).getTime() - new Date(arrival).getTime();
  if (!Number.isFinite(diffMs)) return 'N/A';
  const hours = Math.floor(diffMs / 3600000);
  const minutes = Math.floor((diffMs % 3600000) / 60000);
  const parts: string[] = [];
  if (hours > 0) parts.push(`${hours}h`);
  if (minutes > 0) parts.push(`${minutes}m`);
  return parts.length > 0 ? parts.join(' ') : '<1m';
}

function parseLeg(itinerary: RawItinerary | undefined): FlightLeg | null {
  const segments = itinerary?.segments ?? [];
  if (!itinerary || segments.length === 0) return null;

  const first = segments[0];
  const last = segments[segments.length - 1];
  const layovers = segments.slice(0, -1).map((segment, i) => ({
    airport: segment.arrival.iataCode,
    duration: formatLayover(segment.arrival.at, segments[i + 1].departure.at),
  }));

  return {
    departure: { airport: first.departure.iataCode, time: first.departure.at },
    arrival: { airport: last.arrival.iataCode, time: last.arrival.at },
    duration: formatIsoDuration(itinerary.duration),
    stops: segments.length - 1,
    layovers,
    carriers: segments.map((segment) => segment.carrierCode),
  };
}

/**
 * Collapse offers sharing outbound time, inbound time and rounded total,
 * then order by price.
 */
export function parseFlightOffers(raw: unknown, adults: number): FlightOffer[] {
  const response = flightOffersResponseSchema.parse(raw);
  const unique = new Map<string, FlightOffer>();

  for (const offer of response.data) {
    const outbound = parseLeg(offer.itineraries[0]);
    const inbound = parseLeg(offer.itineraries[1]);
    const parsed: FlightOffer = {
      offerId: offer.id,
      price: {
        total: offer.price.total,
        currency: offer.price.currency,
        perPerson: offer.price.total / Math.max(adults, 1),
      },
      outbound,
      inbound,
      seatsAvailable: offer.numberOfBookableSeats,
      validatingAirlineCodes: offer.validatingAirlineCodes,
    };

    const key = `${outbound?.departure.time ?? ''}|${inbound?.departure.time ?? ''}|${Math.round(offer.price.total)}`;
    if (!unique.has(key)) unique.set(key, parsed);
  }

  return Array.from(unique.values()).sort((a, b) => a.price.total - b.price.total);
}

// ============================================================================
// ADAPTER
// ============================================================================

export class AmadeusFlightSearch implements FlightSearch {
  constructor(private readonly client: AmadeusClient) {}

  async searchFlights(params: FlightSearchParams): Promise<ProviderResult<FlightSearchData>> {
    try {
      const [originCode, destinationCode] = await Promise.all([
        this.client.resolveLocationCode(params.origin),
        this.client.resolveLocationCode(params.destination),
      ]);

      if (!originCode || !destinationCode) {
        return fail(`Could not resolve airport code for ${!originCode ? params.origin : params.destination}`);
      }

      const travelClass = params.travelClass ?? 'ECONOMY';
      const query = new URLSearchParams({
        originLocationCode: originCode,
        destinationLocationCode: destinationCode,
        departureDate: params.departureDate,
        adults: String(params.adults),
        currencyCode: params.currency ?? 'KRW',
        max: String(Math.min(params.maxResults * 5, MAX_OFFERS_REQUESTED)),
        travelClass,
      });
      if (params.returnDate) query.set('returnDate', params.returnDate);
      if (params.nonStop) query.set('nonStop', 'true');

      console.log(`[FlightAPI] Searching ${originCode} → ${destinationCode} on ${params.departureDate}`);
      const raw = await this.client.get(`/v2/shopping/flight-offers?${query}`, FLIGHT_TIMEOUT_MS);
      const flights = parseFlightOffers(raw, params.adults).slice(0, params.maxResults);

      return ok({
        flights,
        searchParams: {
          origin: originCode,
          destination: destinationCode,
          departure: params.departureDate,
          return: params.returnDate,
          adults: params.adults,
          travelClass,
        },
      });
    } catch (error) {
      console.error('[FlightAPI] Search failed:', errorMessage(error));
      return fail(`Flight search failed: ${errorMessage(error)}`);
    }
  }
}
