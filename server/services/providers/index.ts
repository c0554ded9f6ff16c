/**
 * Builds the provider registry from environment variables. An adapter is
 * registered only when its credentials are present.
 */

import { isEmbeddingConfigured } from '../aiClientFactory';
import { AmadeusClient } from './amadeusClient';
import { AmadeusFlightSearch } from './flightApi';
import { AmadeusHotelSearch } from './hotelApi';
import { GooglePlacesService } from './googlePlacesService';
import { OpenWeatherForecast } from './weatherApi';
import { PineconeReviewSearch, createOpenAIEmbedder } from './reviewSearch';
import type { ProviderRegistry } from './types';

export function createProviderRegistry(env: NodeJS.ProcessEnv = process.env): ProviderRegistry {
  const registry: ProviderRegistry = {};

  if (env.AMADEUS_API_KEY && env.AMADEUS_API_SECRET) {
    const amadeus = new AmadeusClient({
      apiKey: env.AMADEUS_API_KEY,
      apiSecret: env.AMADEUS_API_SECRET,
      baseUrl: env.AMADEUS_BASE_URL,
    });
    registry.flights = new AmadeusFlightSearch(amadeus);
    registry.hotels = new AmadeusHotelSearch(amadeus);
  }

  if (env.GOOGLE_PLACES_API_KEY) {
    registry.places = new GooglePlacesService(env.GOOGLE_PLACES_API_KEY);
  }

  if (env.OPENWEATHER_API_KEY) {
    registry.weather = new OpenWeatherForecast(env.OPENWEATHER_API_KEY);
  }

  if (env.PINECONE_API_KEY && env.PINECONE_INDEX_HOST && isEmbeddingConfigured(env)) {
    registry.reviews = new PineconeReviewSearch({
      apiKey: env.PINECONE_API_KEY,
      indexHost: env.PINECONE_INDEX_HOST,
      embed: createOpenAIEmbedder(),
    });
  }

  return registry;
}

export function describeProviders(registry: ProviderRegistry): Record<keyof ProviderRegistry, boolean> {
  return {
    flights: Boolean(registry.flights),
    hotels: Boolean(registry.hotels),
    places: Boolean(registry.places),
    weather: Boolean(registry.weather),
    reviews: Boolean(registry.reviews),
  };
}
