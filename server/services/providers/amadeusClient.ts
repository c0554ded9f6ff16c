/**
 * Amadeus client: OAuth2 client-credentials token cache plus place → IATA
 * code resolution (static table, bounded cache, then the locations API).
 */

import { z } from 'zod';
import { BoundedMap } from '../../utils/boundedMap';
import { lookupCityCode } from '../referenceData';
import { fetchJson, errorMessage, type FetchFn } from './http';

const DEFAULT_BASE_URL = 'https://api.amadeus.com';
const TOKEN_TIMEOUT_MS = 10000;
const LOCATION_TIMEOUT_MS = 10000;
// Refresh a minute before the token actually expires
const TOKEN_SKEW_MS = 60 * 1000;

const tokenResponseSchema = z.object({
  access_token: z.string(),
  expires_in: z.number().default(1799),
});

const locationsResponseSchema = z.object({
  data: z
    .array(
      z.object({
        subType: z.string().optional(),
        iataCode: z.string().optional(),
      }),
    )
    .default([]),
});

export interface AmadeusConfig {
  apiKey: string;
  apiSecret: string;
  baseUrl?: string;
  fetchImpl?: FetchFn;
}

export class AmadeusClient {
  readonly baseUrl: string;
  readonly fetchImpl: FetchFn;
  private accessToken: string | null = null;
  private tokenExpiresAt = 0;
  private codeCache = new BoundedMap<string, string>({ maxSize: 500, ttlMs: 24 * 60 * 60 * 1000 });

  constructor(private readonly config: AmadeusConfig) {
    this.baseUrl = (config.baseUrl || DEFAULT_BASE_URL).replace(/\/$/, '');
    this.fetchImpl = config.fetchImpl ?? fetch;
  }

  async getAccessToken(): Promise<string> {
    if (this.accessToken && Date.now() < this.tokenExpiresAt) {
      return this.accessToken;
    }

    const body = new URLSearchParams({
      grant_type: 'client_credentials',
      client_id: this.config.apiKey,
      client_secret: this.config.apiSecret,
    });

    const raw = await fetchJson(`${this.baseUrl}/v1/security/oauth2/token`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: body.toString(),
      timeoutMs: TOKEN_TIMEOUT_MS,
      fetchImpl: this.fetchImpl,
    });

    const token = tokenResponseSchema.parse(raw);
    this.accessToken = token.access_token;
    this.tokenExpiresAt = Date.now() + token.expires_in * 1000 - TOKEN_SKEW_MS;
    return token.access_token;
  }

  /** GET an Amadeus endpoint with the bearer token */
  async get(pathAndQuery: string, timeoutMs: number): Promise<unknown> {
    const token = await this.getAccessToken();
    return fetchJson(`${this.baseUrl}${pathAndQuery}`, {
      headers: { Authorization: `Bearer ${token}` },
      timeoutMs,
      fetchImpl: this.fetchImpl,
    });
  }

  /**
   * Resolve free text ("Tokyo", "서울, 인천공항", "NRT") to an IATA code.
   * Priority: 1) already a code 2) static table 3) cache 4) locations API
   */
  async resolveLocationCode(place: string): Promise<string | null> {
    const trimmed = place.trim();
    if (/^[A-Z]{3}$/.test(trimmed)) return trimmed;

    const fromTable = lookupCityCode(trimmed);
    if (fromTable) return fromTable;

    const keyword = trimmed.split(',')[0].trim();
    const cacheKey = keyword.toLowerCase();
    const cached = this.codeCache.get(cacheKey);
    if (cached) return cached;

    try {
      const params = new URLSearchParams({
        keyword,
        subType: 'AIRPORT,CITY',
        'page[limit]': '5',
      });
      const raw = await this.get(`/v1/reference-data/locations?${params}`, LOCATION_TIMEOUT_MS);
      const locations = locationsResponseSchema.parse(raw).data;

      const best =
        locations.find((loc) => loc.subType === 'AIRPORT' && loc.iataCode) ??
        locations.find((loc) => loc.subType === 'CITY' && loc.iataCode);

      if (best?.iataCode) {
        console.log(`[Amadeus] Resolved "${place}" → ${best.iataCode} via locations API`);
        this.codeCache.set(cacheKey, best.iataCode);
        return best.iataCode;
      }

      console.warn(`[Amadeus] No location found for "${place}"`);
      return null;
    } catch (error) {
      console.warn(`[Amadeus] Location lookup failed for "${place}":`, errorMessage(error));
      return null;
    }
  }
}
