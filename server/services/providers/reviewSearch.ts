/**
 * Hotel Review Search
 *
 * Semantic search over an indexed hotel-review corpus. Queries are embedded
 * with the OpenAI embeddings endpoint and matched against a Pinecone index
 * through its REST query API.
 *
 * Environment Variables:
 * - PINECONE_API_KEY / PINECONE_INDEX_HOST: index credentials and data-plane host
 * - REVIEW_EMBEDDING_MODEL: embedding model (default: text-embedding-3-small)
 * - REVIEW_EMBEDDING_DIM: vector size the index was built with (default: 384)
 */

import { z } from 'zod';
import { getAIClient } from '../aiClientFactory';
import { fetchJson, errorMessage, type FetchFn } from './http';
import { ok, fail, type ProviderResult, type ReviewMatch, type ReviewSearch } from './types';

const QUERY_TIMEOUT_MS = 10000;
const DEFAULT_EMBEDDING_MODEL = 'text-embedding-3-small';
const DEFAULT_EMBEDDING_DIM = 384;

// ============================================================================
// TYPES
// ============================================================================

export type Embedder = (text: string) => Promise<number[]>;

export interface PineconeReviewSearchConfig {
  apiKey: string;
  indexHost: string;
  embed: Embedder;
  fetchImpl?: FetchFn;
}

const queryResponseSchema = z.object({
  matches: z
    .array(
      z.object({
        id: z.string(),
        score: z.number().default(0),
        metadata: z
          .object({
            text: z.string().default(''),
            hotel: z.string().optional(),
            hotel_name: z.string().optional(),
            rating: z.coerce.number().optional().catch(undefined),
          })
          .passthrough()
          .default({}),
      }),
    )
    .default([]),
});

// ============================================================================
// EMBEDDINGS
// ============================================================================

export function createOpenAIEmbedder(
  model = process.env.REVIEW_EMBEDDING_MODEL || DEFAULT_EMBEDDING_MODEL,
  dimensions = Number(process.env.REVIEW_EMBEDDING_DIM) || DEFAULT_EMBEDDING_DIM,
): Embedder {
  return async (text: string) => {
    const { openai } = getAIClient('lookup');
    const response = await openai.embeddings.create({ model, input: text, dimensions });
    const embedding = response.data[0]?.embedding;
    if (!embedding || embedding.length !== dimensions) {
      throw new Error(`Embedding dimension mismatch: expected ${dimensions}, got ${embedding?.length ?? 0}`);
    }
    return embedding;
  };
}

// ============================================================================
// SEARCH
// ============================================================================

export class PineconeReviewSearch implements ReviewSearch {
  private readonly endpoint: string;
  private readonly fetchImpl: FetchFn;

  constructor(private readonly config: PineconeReviewSearchConfig) {
    const host = config.indexHost.replace(/^https?:\/\//, '').replace(/\/$/, '');
    this.endpoint = `https://${host}/query`;
    this.fetchImpl = config.fetchImpl ?? fetch;
  }

  async searchReviews(query: string, topK: number): Promise<ProviderResult<ReviewMatch[]>> {
    try {
      const vector = await this.config.embed(query);
      const raw = await fetchJson(this.endpoint, {
        method: 'POST',
        headers: { 'Api-Key': this.config.apiKey, 'Content-Type': 'application/json' },
        body: JSON.stringify({ vector, topK, includeMetadata: true }),
        timeoutMs: QUERY_TIMEOUT_MS,
        fetchImpl: this.fetchImpl,
      });

      const matches = queryResponseSchema.parse(raw).matches.map((match) => ({
        id: match.id,
        score: match.score,
        text: match.metadata.text,
        hotel: match.metadata.hotel ?? match.metadata.hotel_name ?? null,
        rating: match.metadata.rating ?? null,
      }));

      return ok(matches);
    } catch (error) {
      console.error(`[ReviewSearch] Query failed for "${query}":`, errorMessage(error));
      return fail(`Review search failed: ${errorMessage(error)}`);
    }
  }
}
