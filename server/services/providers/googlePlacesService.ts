/**
 * Google Places API (New) Service
 * Text search for attractions and nearby search for restaurants around them.
 */

import { z } from 'zod';
import { fetchJson, errorMessage, type FetchFn } from './http';
import {
  ok,
  fail,
  type Place,
  type PlacesData,
  type PlacesSearch,
  type ProviderResult,
  type Restaurant,
} from './types';

const PLACES_BASE_URL = 'https://places.googleapis.com/v1';
const TEXT_SEARCH_TIMEOUT_MS = 15000;
const NEARBY_TIMEOUT_MS = 10000;
const MAX_PAGE_SIZE = 20;
const MAX_RESTAURANTS = 5;

const TEXT_SEARCH_FIELDS = [
  'places.id',
  'places.displayName',
  'places.formattedAddress',
  'places.rating',
  'places.location',
  'places.photos',
].join(',');

const NEARBY_FIELDS = [
  'places.id',
  'places.displayName',
  'places.formattedAddress',
  'places.shortFormattedAddress',
  'places.rating',
  'places.priceLevel',
].join(',');

// ============================================================================
// RESPONSE SCHEMA
// ============================================================================

const placeSchema = z.object({
  id: z.string().default(''),
  displayName: z.object({ text: z.string() }).optional(),
  formattedAddress: z.string().optional(),
  shortFormattedAddress: z.string().optional(),
  rating: z.number().optional(),
  priceLevel: z.string().optional(),
  location: z.object({ latitude: z.number(), longitude: z.number() }).optional(),
  photos: z.array(z.object({ name: z.string() })).optional(),
});

const placesResponseSchema = z.object({ places: z.array(placeSchema).default([]) });

// ============================================================================
// SERVICE
// ============================================================================

export class GooglePlacesService implements PlacesSearch {
  private readonly fetchImpl: FetchFn;
  private readonly languageCode: string | undefined;

  constructor(
    private readonly apiKey: string,
    options: { fetchImpl?: FetchFn; languageCode?: string } = {},
  ) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.languageCode = options.languageCode;
  }

  private headers(fieldMask: string): Record<string, string> {
    return {
      'Content-Type': 'application/json',
      'X-Goog-Api-Key': this.apiKey,
      'X-Goog-FieldMask': fieldMask,
    };
  }

  photoUrl(photoName: string): string {
    return `${PLACES_BASE_URL}/${photoName}/media?maxHeightPx=400&maxWidthPx=400&key=${this.apiKey}`;
  }

  async searchAttractions(destination: string, limit: number): Promise<ProviderResult<PlacesData>> {
    try {
      const raw = await fetchJson(`${PLACES_BASE_URL}/places:searchText`, {
        method: 'POST',
        headers: this.headers(TEXT_SEARCH_FIELDS),
        body: JSON.stringify({
          textQuery: `tourist attractions in ${destination}`,
          pageSize: Math.min(limit, MAX_PAGE_SIZE),
          ...(this.languageCode ? { languageCode: this.languageCode } : {}),
        }),
        timeoutMs: TEXT_SEARCH_TIMEOUT_MS,
        fetchImpl: this.fetchImpl,
      });

      const places: Place[] = placesResponseSchema.parse(raw).places.map((place) => ({
        placeId: place.id,
        name: place.displayName?.text ?? 'N/A',
        address: place.formattedAddress ?? 'N/A',
        rating: place.rating ?? null,
        location: place.location ? { lat: place.location.latitude, lng: place.location.longitude } : null,
        photoUrl: place.photos?.[0] ? this.photoUrl(place.photos[0].name) : null,
        nearbyRestaurants: [],
      }));

      return ok({ places: places.slice(0, limit) });
    } catch (error) {
      console.error('[GooglePlaces] Attraction search failed:', errorMessage(error));
      return fail(`Places search failed: ${errorMessage(error)}`);
    }
  }

  async searchRestaurantsNearPlace(place: Place, radiusMeters: number): Promise<ProviderResult<Restaurant[]>> {
    if (!place.location) {
      return fail(`No location for ${place.name}`);
    }

    try {
      const raw = await fetchJson(`${PLACES_BASE_URL}/places:searchNearby`, {
        method: 'POST',
        headers: this.headers(NEARBY_FIELDS),
        body: JSON.stringify({
          includedTypes: ['restaurant'],
          maxResultCount: MAX_RESTAURANTS,
          locationRestriction: {
            circle: {
              center: { latitude: place.location.lat, longitude: place.location.lng },
              radius: Math.min(radiusMeters, 50000),
            },
          },
          ...(this.languageCode ? { languageCode: this.languageCode } : {}),
        }),
        timeoutMs: NEARBY_TIMEOUT_MS,
        fetchImpl: this.fetchImpl,
      });

      const restaurants = placesResponseSchema
        .parse(raw)
        .places.slice(0, MAX_RESTAURANTS)
        .map((restaurant) => ({
          placeId: restaurant.id,
          name: restaurant.displayName?.text ?? 'N/A',
          address: restaurant.shortFormattedAddress ?? restaurant.formattedAddress ?? 'N/A',
          rating: restaurant.rating ?? null,
          priceLevel: restaurant.priceLevel ?? null,
        }));

      return ok(restaurants);
    } catch (error) {
      console.warn(`[GooglePlaces] Nearby restaurants failed for ${place.name}:`, errorMessage(error));
      return fail(`Nearby search failed: ${errorMessage(error)}`);
    }
  }
}
