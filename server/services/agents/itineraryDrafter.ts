/**
 * Itinerary Drafter
 *
 * Turns the trip request, a similar past trip, the style analysis and all
 * available provider data into one JSON-mode instruction, and parses the
 * model's itinerary. Also issues the refinement call on the orchestrator's
 * behalf. Both calls degrade rather than throw: the draft to a stub, the
 * refinement to the itinerary it was asked to improve.
 */

import {
  MAX_ITINERARY_DAYS,
  itinerarySchema,
  type Itinerary,
  type StyleAnalysis,
  type TripRequest,
} from '@shared/schema';
import type { LanguageModel } from '../languageModel';
import { parseModelJson } from '../languageModel';
import type { FlightSearchData, HotelSearchData, PlacesData, WeatherReport } from '../providers/types';
import { getTripExamples, type TripExample } from '../referenceData';
import { formatAmount, getReferenceCurrency } from '../currency';
import { summarizeFlights, summarizeHotels, summarizePlaces, summarizeWeather } from './contextSummaries';

// ============================================================================
// TYPES
// ============================================================================

export interface DraftContext {
  weather?: WeatherReport;
  flights?: FlightSearchData;
  hotels?: HotelSearchData;
  places?: PlacesData;
}

export type DraftOutcome =
  | { status: 'ok'; itinerary: Itinerary; exampleUsed: TripExample | null }
  | { status: 'degraded'; itinerary: Itinerary; exampleUsed: TripExample | null; reason: string; rawOutput: string };

export type RefineOutcome =
  | { status: 'ok'; itinerary: Itinerary }
  | { status: 'degraded'; itinerary: Itinerary; reason: string; rawOutput: string };

export interface ItineraryDrafterOptions {
  examples?: TripExample[];
  /** Uniform [0, 1) source for example selection */
  random?: () => number;
}

const DRAFT_TEMPERATURE = 0.7;
const RAW_OUTPUT_LIMIT = 500;

const DRAFT_ROLE = 'You are an expert travel planner who strictly outputs only JSON.';
const REFINE_ROLE = 'Update the itinerary with hotel recommendations and API data. Respond in valid JSON format.';

const OUTPUT_SHAPE = `{
  "destination": "City, Country",
  "days": <number of days>,
  "people": <party size>,
  "estimatedCost": <integer>,
  "selectedFlight": { "airline": "", "price": 0, "outbound": "ICN 09:00 → NRT 11:20", "inbound": "NRT 18:00 → ICN 20:30", "bookingUrl": "" },
  "selectedHotel": { "name": "", "address": "", "type": "", "estimatedCost": 0, "perNightCost": 0, "currency": "" },
  "itinerary": [
    {
      "day": 1,
      "date": "YYYY-MM-DD",
      "transportation": { "type": "flight | subway | bus | walk", "details": "", "cost": 0 },
      "accommodation": { "name": "", "address": "", "type": "", "estimatedCost": 0 },
      "attractions": [ { "name": "", "description": "", "estimatedCost": 0, "reason": "" } ],
      "meals": [ { "type": "lunch | dinner", "suggestion": "Restaurant - dish (near Attraction)", "estimatedCost": 0 } ],
      "dailyCost": 0
    }
  ],
  "budgetBreakdown": { "flightTotal": 0, "hotelTotal": 0, "foodTotal": 0, "attractionsTotal": 0, "transportationTotal": 0, "total": 0 }
}`;

// ============================================================================
// EXAMPLE SELECTION
// ============================================================================

/**
 * Destination substring match (either direction) first, then examples within
 * one day of the requested length, then anything. Ties broken by `random`.
 */
export function selectSimilarExample(
  examples: TripExample[],
  destination: string,
  days: number,
  random: () => number = Math.random,
): TripExample | null {
  if (examples.length === 0) return null;

  const dest = destination.trim().toLowerCase();
  const byDestination = dest
    ? examples.filter((example) => {
        const exampleDest = example.destination.toLowerCase();
        return dest.includes(exampleDest) || exampleDest.includes(dest);
      })
    : [];
  const byDays = examples.filter((example) => Math.abs(example.days - days) <= 1);

  const pool = byDestination.length > 0 ? byDestination : byDays.length > 0 ? byDays : examples;
  const index = Math.min(pool.length - 1, Math.floor(random() * pool.length));
  return pool[index];
}

// ============================================================================
// INSTRUCTION
// ============================================================================

export function buildDraftInstruction(
  request: TripRequest,
  style: StyleAnalysis,
  context: DraftContext,
  example: TripExample | null,
): string {
  const days = Math.min(Math.max(request.days, 1), MAX_ITINERARY_DAYS);
  const currency = getReferenceCurrency();
  const sections: string[] = [];

  sections.push(
    [
      'Plan a detailed trip for the request below.',
      '',
      'Trip request:',
      `- Origin: ${request.origin}`,
      `- Destination: ${request.destination}`,
      `- Departure: ${request.departureDate}`,
      `- Return: ${request.returnDate}`,
      `- Length: ${days} days (detailed plans cover at most ${MAX_ITINERARY_DAYS} days)`,
      `- Travellers: ${request.people}`,
      `- Budget: ${formatAmount(request.budget)} ${currency}`,
      `- Preferences: ${JSON.stringify(request.preferences)}`,
      `- Travel style: ${style.styleName} (${style.characteristics.join(', ')})`,
    ].join('\n'),
  );

  if (example) {
    sections.push(`Similar past trip (for shape only, do not copy its places):\n${JSON.stringify(example, null, 2)}`);
  }
  if (context.weather) {
    sections.push(`Weather:\n${summarizeWeather(context.weather)}`);
  }
  if (context.flights && context.flights.flights.length > 0) {
    sections.push(`Candidate flights:\n${summarizeFlights(context.flights.flights, 3)}`);
  }
  if (context.hotels && context.hotels.hotels.length > 0) {
    sections.push(`Candidate hotels:\n${summarizeHotels(context.hotels.hotels, 3)}`);
  }
  if (context.places && context.places.places.length > 0) {
    sections.push(`Attractions and nearby restaurants:\n${summarizePlaces(context.places.places, 5, 3)}`);
  }

  sections.push(
    [
      'Rules:',
      `1. Plan only for ${request.destination}; use no city from the example.`,
      `2. "days" must equal ${days} and "itinerary" must hold exactly one entry for each of day 1 to day ${days}.`,
      '3. Write every name and description in the local language of the destination.',
      '4. Choose exactly one flight and one hotel from the candidates above and name them on day 1 and in each night\'s accommodation.',
      '5. Each day has exactly 3 attractions, each with a one or two sentence description.',
      '6. Meals must name real restaurants from the nearby-restaurant lists, formatted "Restaurant - dish (near Attraction)".',
      '7. Flight plus hotel must stay within 80% of the budget; fill in dailyCost for every day and the budgetBreakdown.',
      '8. Output JSON only, in this shape:',
      OUTPUT_SHAPE,
    ].join('\n'),
  );

  return sections.join('\n\n');
}

// ============================================================================
// DRAFTER
// ============================================================================

export function stubItinerary(request: TripRequest): Itinerary {
  return {
    destination: request.destination,
    days: request.days,
    people: request.people,
    estimatedCost: request.budget,
    itinerary: [],
    budgetBreakdown: {},
  };
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class ItineraryDrafter {
  private readonly examples: TripExample[] | undefined;
  private readonly random: () => number;

  constructor(
    private readonly model: LanguageModel,
    options: ItineraryDrafterOptions = {},
  ) {
    this.examples = options.examples;
    this.random = options.random ?? Math.random;
  }

  async draft(request: TripRequest, style: StyleAnalysis, context: DraftContext): Promise<DraftOutcome> {
    const example = selectSimilarExample(this.examples ?? getTripExamples(), request.destination, request.days, this.random);
    const instruction = buildDraftInstruction(request, style, context, example);

    let raw = '';
    try {
      raw = await this.model.complete({
        role: DRAFT_ROLE,
        instruction,
        temperature: DRAFT_TEMPERATURE,
        json: true,
        tier: 'planner',
      });
    } catch (error) {
      console.error('[ItineraryDrafter] Model call failed:', describeError(error));
      return {
        status: 'degraded',
        itinerary: stubItinerary(request),
        exampleUsed: example,
        reason: `Model call failed: ${describeError(error)}`,
        rawOutput: '',
      };
    }

    const parsed = parseModelJson(raw, itinerarySchema);
    if (!parsed.ok) {
      console.warn(`[ItineraryDrafter] Unusable draft output: ${parsed.error}`);
      return {
        status: 'degraded',
        itinerary: stubItinerary(request),
        exampleUsed: example,
        reason: parsed.error,
        rawOutput: raw.slice(0, RAW_OUTPUT_LIMIT),
      };
    }

    console.log(`[ItineraryDrafter] Draft ready: ${parsed.data.itinerary.length} day(s)`);
    return { status: 'ok', itinerary: parsed.data, exampleUsed: example };
  }

  /** One stateless refinement call; falls back to `previous` on any failure. */
  async refine(instruction: string, previous: Itinerary): Promise<RefineOutcome> {
    let raw = '';
    try {
      raw = await this.model.complete({
        role: REFINE_ROLE,
        instruction,
        temperature: DRAFT_TEMPERATURE,
        json: true,
        tier: 'planner',
      });
    } catch (error) {
      console.error('[ItineraryDrafter] Refinement call failed:', describeError(error));
      return { status: 'degraded', itinerary: previous, reason: `Model call failed: ${describeError(error)}`, rawOutput: '' };
    }

    const parsed = parseModelJson(raw, itinerarySchema);
    if (!parsed.ok) {
      console.warn(`[ItineraryDrafter] Unusable refinement output, keeping draft: ${parsed.error}`);
      return { status: 'degraded', itinerary: previous, reason: parsed.error, rawOutput: raw.slice(0, RAW_OUTPUT_LIMIT) };
    }
    return { status: 'ok', itinerary: parsed.data };
  }
}
