/**
 * Review Synthesizer
 *
 * Retrieves guest reviews for each candidate hotel from the review search
 * and asks the reviewer-tier model for per-hotel sentiment and a ranking.
 */

import {
  hotelAnalysisResponseSchema,
  type HotelAnalysis,
} from '@shared/schema';
import type { LanguageModel } from '../languageModel';
import { parseModelJson } from '../languageModel';
import type { HotelOffer, ReviewMatch, ReviewSearch } from '../providers/types';

export type ReviewOutcome =
  | { ok: true; analysis: HotelAnalysis }
  | { ok: false; error: string; rawOutput?: string };

const REVIEWS_PER_QUERY = 5;
const REVIEWS_PER_HOTEL = 5;
const REVIEW_TEXT_LIMIT = 200;
const REVIEW_TEMPERATURE = 0.7;

const REVIEW_ROLE = 'You are a hotel review analyst. Respond in valid JSON format.';

const OUTPUT_SHAPE = `{
  "analysis": [
    {
      "hotel": "hotel name",
      "overallScore": 4.5,
      "sentiment": { "location": 4.5, "room": 4.0, "service": 4.2, "value": 3.8 },
      "strengths": ["..."],
      "weaknesses": ["..."],
      "suitableFor": "couples, families"
    }
  ],
  "recommendations": [ { "rank": 1, "hotel": "hotel name", "reason": "..." } ]
}`;

export function buildReviewInstruction(
  reviewsByHotel: Map<string, ReviewMatch[]>,
  preferences: Record<string, string>,
): string {
  const blocks: string[] = [];
  reviewsByHotel.forEach((reviews, hotel) => {
    const lines = reviews.map((review, i) => {
      const rating = review.rating !== null ? ` (rating ${review.rating})` : '';
      return `  ${i + 1}. ${review.text.slice(0, REVIEW_TEXT_LIMIT)}${rating}`;
    });
    blocks.push(`[${hotel}]\n${lines.join('\n')}`);
  });

  return [
    'Analyze the guest reviews below for each hotel.',
    '',
    `Traveller preferences: ${JSON.stringify(preferences)}`,
    '',
    'Reviews:',
    blocks.join('\n\n'),
    '',
    'For each hotel score location, room, service and value from 1 to 5,',
    'list its strengths and weaknesses, give an overall score from 1 to 5 and say who it suits.',
    'Then rank the hotels for these preferences.',
    '',
    'Output JSON only, in this shape:',
    OUTPUT_SHAPE,
  ].join('\n');
}

export class ReviewSynthesizer {
  constructor(
    private readonly model: LanguageModel,
    private readonly reviews?: ReviewSearch,
  ) {}

  async analyze(
    hotels: HotelOffer[],
    preferences: Record<string, string>,
    destination: string,
  ): Promise<ReviewOutcome> {
    if (hotels.length === 0) {
      return { ok: false, error: 'No hotels to analyze' };
    }
    if (!this.reviews) {
      return { ok: false, error: 'Review search is not configured' };
    }

    const reviewsByHotel = new Map<string, ReviewMatch[]>();
    let total = 0;
    for (const hotel of hotels) {
      const result = await this.reviews.searchReviews(`${hotel.name} ${destination}`, REVIEWS_PER_QUERY);
      if (!result.success) {
        console.warn(`[ReviewSynthesizer] Review search failed for ${hotel.name}: ${result.error}`);
        continue;
      }
      const matches = result.data.slice(0, REVIEWS_PER_HOTEL);
      if (matches.length === 0) continue;
      const existing = reviewsByHotel.get(hotel.name) ?? [];
      reviewsByHotel.set(hotel.name, [...existing, ...matches].slice(0, REVIEWS_PER_HOTEL));
      total += matches.length;
    }

    if (total === 0) {
      return { ok: false, error: 'No reviews found for any hotel' };
    }
    console.log(`[ReviewSynthesizer] ${total} review(s) across ${reviewsByHotel.size} hotel(s)`);

    let raw = '';
    try {
      raw = await this.model.complete({
        role: REVIEW_ROLE,
        instruction: buildReviewInstruction(reviewsByHotel, preferences),
        temperature: REVIEW_TEMPERATURE,
        json: true,
        tier: 'reviewer',
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error('[ReviewSynthesizer] Model call failed:', message);
      return { ok: false, error: `Model call failed: ${message}` };
    }

    const parsed = parseModelJson(raw, hotelAnalysisResponseSchema);
    if (!parsed.ok) {
      return { ok: false, error: parsed.error, rawOutput: raw };
    }

    return {
      ok: true,
      analysis: {
        analysis: parsed.data.analysis,
        recommendations: parsed.data.recommendations,
        topPick: parsed.data.recommendations[0]?.hotel ?? 'N/A',
        totalReviewsAnalyzed: total,
      },
    };
  }
}
