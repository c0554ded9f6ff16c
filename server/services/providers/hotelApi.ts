/**
 * Hotel API Integration
 * Two-step Amadeus lookup: hotel ids by city, then best offers for those ids.
 */

import { z } from 'zod';
import type { AmadeusClient } from './amadeusClient';
import { errorMessage } from './http';
import {
  ok,
  fail,
  type HotelOffer,
  type HotelSearch,
  type HotelSearchData,
  type HotelSearchParams,
  type ProviderResult,
} from './types';

const HOTEL_TIMEOUT_MS = 15000;
const SEARCH_RADIUS_KM = 20;
// hotel-offers accepts a bounded id list per call
const MAX_IDS_PER_OFFER_QUERY = 20;
const NO_ADDRESS = 'Address unavailable';

// ============================================================================
// RESPONSE SCHEMAS
// ============================================================================

const addressSchema = z
  .object({
    lines: z.array(z.string()).optional(),
    cityName: z.string().optional(),
    countryCode: z.string().optional(),
  })
  .optional();

const hotelsByCitySchema = z.object({
  data: z
    .array(
      z.object({
        hotelId: z.string(),
        name: z.string().optional(),
        address: addressSchema,
        rating: z.coerce.number().optional().catch(undefined),
      }),
    )
    .default([]),
});

const hotelOffersSchema = z.object({
  data: z
    .array(
      z.object({
        hotel: z.object({
          hotelId: z.string(),
          name: z.string().default('N/A'),
          cityCode: z.string().optional(),
          address: addressSchema,
          rating: z.coerce.number().optional().catch(undefined),
        }),
        offers: z
          .array(
            z.object({
              id: z.string().default(''),
              boardType: z.string().default('N/A'),
              room: z.object({ type: z.string().optional() }).default({}),
              price: z.object({
                total: z.coerce.number(),
                currency: z.string(),
                taxes: z.array(z.object({ amount: z.coerce.number().default(0) })).default([]),
              }),
            }),
          )
          .default([]),
      }),
    )
    .default([]),
});

type RawAddress = z.infer<typeof addressSchema>;

// ============================================================================
// HELPERS
// ============================================================================

export function formatAddress(address: RawAddress): string {
  if (!address) return NO_ADDRESS;
  const parts = [
    ...(address.lines ?? []).map((line) => line.trim()).filter(Boolean),
    ...(address.cityName ? [address.cityName] : []),
    ...(address.countryCode ? [address.countryCode] : []),
  ];
  return parts.length > 0 ? parts.join(', ') : NO_ADDRESS;
}

export function nightsBetween(checkIn: string, checkOut: string): number {
  const diff = new Date(`${checkOut}T00:00:00Z`).getTime() - new Date(`${checkIn}T00:00:00Z`).getTime();
  return Number.isFinite(diff) ? Math.round(diff / 86400000) : 0;
}

export function parseHotelOffers(
  raw: unknown,
  listing: Map<string, { address: string; rating: number | null }>,
  params: Pick<HotelSearchParams, 'checkIn' | 'checkOut'>,
  cityCode: string,
): HotelOffer[] {
  const nights = nightsBetween(params.checkIn, params.checkOut);
  const hotels: HotelOffer[] = [];

  for (const entry of hotelOffersSchema.parse(raw).data) {
    if (entry.offers.length === 0) continue;
    const best = entry.offers.reduce((a, b) => (b.price.total < a.price.total ? b : a));

    const total = best.price.total;
    const taxTotal = best.price.taxes.reduce((sum, tax) => sum + tax.amount, 0);
    const fallback = listing.get(entry.hotel.hotelId);
    const address = formatAddress(entry.hotel.address);

    hotels.push({
      hotelId: entry.hotel.hotelId,
      name: entry.hotel.name,
      rating: entry.hotel.rating ?? fallback?.rating ?? null,
      address: address === NO_ADDRESS && fallback ? fallback.address : address,
      cityCode: entry.hotel.cityCode ?? cityCode,
      price: {
        total,
        currency: best.price.currency,
        base: Math.round((total - taxTotal) * 100) / 100,
        taxTotal,
        perNight: nights > 0 ? Math.round(total / nights) : total,
      },
      roomType: best.room.type ?? 'N/A',
      boardType: best.boardType,
      offerId: best.id,
    });
  }

  return hotels.sort((a, b) => a.price.total - b.price.total);
}

// ============================================================================
// ADAPTER
// ============================================================================

export class AmadeusHotelSearch implements HotelSearch {
  constructor(private readonly client: AmadeusClient) {}

  async searchHotels(params: HotelSearchParams): Promise<ProviderResult<HotelSearchData>> {
    try {
      const cityCode = await this.client.resolveLocationCode(params.city);
      if (!cityCode) {
        return fail(`Could not resolve city code for "${params.city}"`);
      }

      const byCity = new URLSearchParams({
        cityCode,
        radius: String(SEARCH_RADIUS_KM),
        radiusUnit: 'KM',
      });
      const listingRaw = await this.client.get(
        `/v1/reference-data/locations/hotels/by-city?${byCity}`,
        HOTEL_TIMEOUT_MS,
      );

      const listing = new Map<string, { address: string; rating: number | null }>();
      for (const hotel of hotelsByCitySchema.parse(listingRaw).data) {
        listing.set(hotel.hotelId, { address: formatAddress(hotel.address), rating: hotel.rating ?? null });
      }

      const hotelIds = Array.from(listing.keys()).slice(0, Math.min(params.maxResults * 4, MAX_IDS_PER_OFFER_QUERY));
      if (hotelIds.length === 0) {
        return fail(`No hotels found in ${cityCode}`);
      }

      const offersQuery = new URLSearchParams({
        hotelIds: hotelIds.join(','),
        checkInDate: params.checkIn,
        checkOutDate: params.checkOut,
        adults: String(params.adults),
        currency: params.currency ?? 'KRW',
        roomQuantity: '1',
        bestRateOnly: 'true',
      });
      const offersRaw = await this.client.get(`/v3/shopping/hotel-offers?${offersQuery}`, HOTEL_TIMEOUT_MS);
      const hotels = parseHotelOffers(offersRaw, listing, params, cityCode).slice(0, params.maxResults);

      console.log(`[HotelAPI] ${hotels.length} priced hotels in ${cityCode}`);
      return ok({
        hotels,
        searchParams: { cityCode, checkIn: params.checkIn, checkOut: params.checkOut, adults: params.adults },
      });
    } catch (error) {
      console.error('[HotelAPI] Search failed:', errorMessage(error));
      return fail(`Hotel search failed: ${errorMessage(error)}`);
    }
  }
}
