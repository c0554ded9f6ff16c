/**
 * Unit Tests for the review search and the provider registry
 *
 * Run with: npx vitest run server/services/providers/reviewSearch.test.ts
 */

import { describe, it, expect } from 'vitest';
import { PineconeReviewSearch, type Embedder } from './reviewSearch';
import { createProviderRegistry, describeProviders } from './index';
import { createFakeFetch } from '../../testing/fixtures';

const fixedEmbedder: Embedder = async () => [0.1, 0.2, 0.3];

const queryResponse = {
  matches: [
    { id: 'rv-1', score: 0.92, metadata: { text: 'Great location near the station', hotel: 'Hotel Sakura', rating: '5' } },
    { id: 'rv-2', score: 0.81, metadata: { text: 'Rooms are small', hotel_name: 'Hotel Sakura' } },
    { id: 'rv-3', score: 0.5 },
  ],
};

describe('PineconeReviewSearch', () => {
  it('should embed the query and map matches', async () => {
    const { fetchImpl, calls } = createFakeFetch([{ match: '/query', body: queryResponse }]);
    const search = new PineconeReviewSearch({
      apiKey: 'test-key',
      indexHost: 'https://reviews.pinecone.test/',
      embed: fixedEmbedder,
      fetchImpl,
    });

    const result = await search.searchReviews('Hotel Sakura Tokyo', 5);

    expect(result).toEqual({
      success: true,
      data: [
        { id: 'rv-1', score: 0.92, text: 'Great location near the station', hotel: 'Hotel Sakura', rating: 5 },
        { id: 'rv-2', score: 0.81, text: 'Rooms are small', hotel: 'Hotel Sakura', rating: null },
        { id: 'rv-3', score: 0.5, text: '', hotel: null, rating: null },
      ],
    });
    expect(calls[0].url).toBe('https://reviews.pinecone.test/query');
    expect(calls[0].headers['api-key']).toBe('test-key');
    expect(JSON.parse(calls[0].body ?? '{}')).toEqual({ vector: [0.1, 0.2, 0.3], topK: 5, includeMetadata: true });
  });

  it('should report an embedding failure as a search failure', async () => {
    const { fetchImpl, calls } = createFakeFetch([]);
    const search = new PineconeReviewSearch({
      apiKey: 'test-key',
      indexHost: 'reviews.pinecone.test',
      embed: async () => {
        throw new Error('Embedding dimension mismatch: expected 384, got 1536');
      },
      fetchImpl,
    });

    const result = await search.searchReviews('Hotel Sakura Tokyo', 5);

    expect(result).toEqual({
      success: false,
      error: 'Review search failed: Embedding dimension mismatch: expected 384, got 1536',
    });
    expect(calls).toHaveLength(0);
  });
});

describe('createProviderRegistry', () => {
  it('should register only the providers whose keys are set', () => {
    const registry = createProviderRegistry({
      AMADEUS_API_KEY: 'test-key',
      AMADEUS_API_SECRET: 'test-secret',
      OPENWEATHER_API_KEY: 'test-key',
    });

    expect(describeProviders(registry)).toEqual({
      flights: true,
      hotels: true,
      places: false,
      weather: true,
      reviews: false,
    });
  });

  it('should need an embedding endpoint for review search', () => {
    const withoutEmbeddings = createProviderRegistry({
      PINECONE_API_KEY: 'test-key',
      PINECONE_INDEX_HOST: 'reviews.pinecone.test',
      DEEPSEEK_API_KEY: 'test-key',
    });
    const withEmbeddings = createProviderRegistry({
      PINECONE_API_KEY: 'test-key',
      PINECONE_INDEX_HOST: 'reviews.pinecone.test',
      OPENAI_API_KEY: 'test-key',
    });

    expect(describeProviders(withoutEmbeddings).reviews).toBe(false);
    expect(describeProviders(withEmbeddings).reviews).toBe(true);
  });
});
