/**
 * Collaboration Orchestrator
 *
 * Runs one trip request through the tools and agents in a fixed order,
 * recording every step in a CollaborationLog:
 *
 *   weather → flights → hotels → places → style → draft → hotel review → refinement
 *
 * Tool failures leave their context absent. Agent failures degrade to the
 * best earlier state, except a missing planner (or a missing reviewer while
 * hotel offers exist), which ends the request.
 */

import {
  EMPTY_HOTEL_ANALYSIS,
  MAX_ITINERARY_DAYS,
  type CollaborationLog as CollaborationLogSnapshot,
  type HotelAnalysis,
  type Itinerary,
  type StyleAnalysis,
  type TripRequest,
} from '@shared/schema';
import type { DraftContext, DraftOutcome, RefineOutcome } from '../agents/itineraryDrafter';
import type { ReviewOutcome } from '../agents/reviewSynthesizer';
import type {
  DailyForecast,
  FlightOffer,
  FlightSearchData,
  HotelOffer,
  HotelSearchData,
  Place,
  ProviderRegistry,
  WeatherForecast,
  WeatherReport,
} from '../providers/types';
import { CollaborationLog } from './collaborationLog';
import { buildRefinementInstruction } from './refinementPrompt';

// ============================================================================
// AGENT CONTRACTS
// ============================================================================

export interface PlannerAgent {
  draft(request: TripRequest, style: StyleAnalysis, context: DraftContext): Promise<DraftOutcome>;
  refine(instruction: string, previous: Itinerary): Promise<RefineOutcome>;
}

export interface ReviewerAgent {
  analyze(hotels: HotelOffer[], preferences: Record<string, string>, destination: string): Promise<ReviewOutcome>;
}

export type StyleClassifier = (request: Record<string, unknown>) => StyleAnalysis;

export interface OrchestratorDependencies {
  classifier: StyleClassifier;
  providers: ProviderRegistry;
  drafter?: PlannerAgent;
  reviewer?: ReviewerAgent;
  now?: () => Date;
}

// ============================================================================
// RESULT
// ============================================================================

export interface OrchestrationSuccess {
  ok: true;
  request: TripRequest;
  styleAnalysis: StyleAnalysis;
  draft: Itinerary;
  hotelAnalysis: HotelAnalysis;
  finalItinerary: Itinerary;
  weather?: WeatherReport;
  flights: FlightOffer[];
  hotels: HotelOffer[];
  places: Place[];
  degraded: { draft: boolean; review: boolean; refinement: boolean };
  warnings: string[];
  collaborationLog: CollaborationLogSnapshot;
}

export interface OrchestrationFailure {
  ok: false;
  error: string;
  collaborationLog: CollaborationLogSnapshot;
}

export type OrchestrationResult = OrchestrationSuccess | OrchestrationFailure;

// ============================================================================
// CONSTANTS
// ============================================================================

export const MAX_FLIGHT_RESULTS = 3;
export const MAX_HOTEL_RESULTS = 5;
const ATTRACTION_LIMIT = 10;
const RESTAURANT_LOOKUPS = 5;
const RESTAURANT_RADIUS_METERS = 500;

// ============================================================================
// HELPERS
// ============================================================================

/** "Tokyo, Japan" → "Tokyo" */
export function cleanseLocation(value: string): string {
  return value.split(',')[0].trim();
}

/** Union by date; the first report wins on duplicates. */
export function mergeForecasts(primary: DailyForecast[], extra: DailyForecast[]): DailyForecast[] {
  const byDate = new Map<string, DailyForecast>();
  for (const day of [...primary, ...extra]) {
    if (!byDate.has(day.date)) byDate.set(day.date, day);
  }
  return Array.from(byDate.values()).sort((a, b) => a.date.localeCompare(b.date));
}

function styleInput(request: TripRequest): Record<string, unknown> {
  return {
    origin: request.origin,
    destination: request.destination,
    people: request.people,
    budget: request.budget,
    preferences: request.preferences,
    travelStyle: request.travelStyle,
  };
}

// ============================================================================
// ORCHESTRATOR
// ============================================================================

const COMMANDS_BY_RECIPIENT: Record<string, string[]> = {
  stylist: ['ANALYZE_TRAVEL_STYLE'],
  planner: ['CREATE_ITINERARY', 'REQUEST_REFINEMENT'],
  reviewer: ['ANALYZE_HOTELS'],
  weather_api: ['GET_WEATHER_INFO'],
  flight_api: ['SEARCH_FLIGHTS'],
  hotel_api: ['SEARCH_HOTELS'],
  places_api: ['SEARCH_ATTRACTIONS'],
};

export class CollaborationOrchestrator {
  constructor(private readonly deps: OrchestratorDependencies) {}

  /** Agents, tools and the commands they answer, for status reporting. */
  describe(): { agents: string[]; tools: string[]; commands: string[] } {
    const { providers } = this.deps;
    const agents = ['stylist'];
    if (this.deps.drafter) agents.push('planner');
    if (this.deps.reviewer) agents.push('reviewer');

    const tools: string[] = [];
    if (providers.weather) tools.push('weather_api');
    if (providers.flights) tools.push('flight_api');
    if (providers.hotels) tools.push('hotel_api');
    if (providers.places) tools.push('places_api');
    if (providers.reviews) tools.push('review_search');

    const commands = [...agents, ...tools].flatMap((name) => COMMANDS_BY_RECIPIENT[name] ?? []);
    return { agents, tools, commands };
  }

  async run(request: TripRequest): Promise<OrchestrationResult> {
    const log = new CollaborationLog(this.deps.now);
    const { providers } = this.deps;
    const warnings: string[] = [];
    const origin = cleanseLocation(request.origin);
    const destination = cleanseLocation(request.destination);

    console.log(`[Orchestrator] Planning ${origin} → ${destination}, ${request.departureDate}..${request.returnDate}`);

    // 1. Weather
    let weather: WeatherReport | undefined;
    if (providers.weather) {
      weather = await this.fetchWeather(log, providers.weather, destination, request);
    }

    // 2. Flights
    let flightData: FlightSearchData | undefined;
    if (providers.flights) {
      const id = log.send('system', 'flight_api', 'SEARCH_FLIGHTS', {
        origin,
        destination,
        departureDate: request.departureDate,
        returnDate: request.returnDate,
        adults: request.people,
        maxResults: MAX_FLIGHT_RESULTS,
      });
      const result = await providers.flights.searchFlights({
        origin,
        destination,
        departureDate: request.departureDate,
        returnDate: request.returnDate,
        adults: request.people,
        maxResults: MAX_FLIGHT_RESULTS,
      });
      if (result.success) {
        flightData = result.data;
        log.complete(id, 'completed', `${flightData.flights.length} flight offer(s)`);
      } else {
        log.complete(id, 'failed', result.error);
      }
    }

    // 3. Hotels
    let hotelData: HotelSearchData | undefined;
    if (providers.hotels) {
      const id = log.send('system', 'hotel_api', 'SEARCH_HOTELS', {
        city: destination,
        checkIn: request.departureDate,
        checkOut: request.returnDate,
        adults: request.people,
        maxResults: MAX_HOTEL_RESULTS,
      });
      const result = await providers.hotels.searchHotels({
        city: destination,
        checkIn: request.departureDate,
        checkOut: request.returnDate,
        adults: request.people,
        maxResults: MAX_HOTEL_RESULTS,
      });
      if (result.success) {
        hotelData = result.data;
        log.complete(id, 'completed', `${hotelData.hotels.length} hotel offer(s)`);
      } else {
        log.complete(id, 'failed', result.error);
      }
    }

    const flights = flightData?.flights ?? [];
    const hotels = hotelData?.hotels ?? [];

    // 4. Places (before drafting, so the planner sees real restaurants)
    let places: Place[] = [];
    if (providers.places) {
      const placesApi = providers.places;
      const id = log.send('system', 'places_api', 'SEARCH_ATTRACTIONS', { destination, limit: ATTRACTION_LIMIT });
      const result = await placesApi.searchAttractions(destination, ATTRACTION_LIMIT);
      if (result.success) {
        places = [];
        for (const [index, place] of result.data.places.entries()) {
          if (index >= RESTAURANT_LOOKUPS) {
            places.push(place);
            continue;
          }
          const restaurants = await placesApi.searchRestaurantsNearPlace(place, RESTAURANT_RADIUS_METERS);
          if (restaurants.success) {
            places.push({ ...place, nearbyRestaurants: restaurants.data });
          } else {
            console.warn(`[Orchestrator] Restaurants near ${place.name} unavailable: ${restaurants.error}`);
            places.push(place);
          }
        }
        log.complete(id, 'completed', `${places.length} place(s)`);
      } else {
        log.complete(id, 'failed', result.error);
      }
    }

    // 5. Style
    const styleId = log.send('system', 'stylist', 'ANALYZE_TRAVEL_STYLE', {
      travelStyle: request.travelStyle ?? null,
      preferences: request.preferences,
    });
    const styleAnalysis = this.deps.classifier(styleInput(request));
    log.complete(styleId, 'completed', `${styleAnalysis.styleName} (confidence ${styleAnalysis.confidence})`);

    // 6. Draft
    const draftId = log.send('user', 'planner', 'CREATE_ITINERARY', {
      destination: request.destination,
      days: Math.min(request.days, MAX_ITINERARY_DAYS),
      style: styleAnalysis.primaryStyle,
    });
    if (!this.deps.drafter) {
      log.complete(draftId, 'failed', 'No planner agent registered');
      log.finish();
      return { ok: false, error: 'No planner agent registered', collaborationLog: log.snapshot() };
    }
    const drafter = this.deps.drafter;
    const draftOutcome = await drafter.draft(request, styleAnalysis, {
      weather,
      flights: flightData,
      hotels: hotelData,
      places: places.length > 0 ? { places } : undefined,
    });
    const draft = draftOutcome.itinerary;
    if (draftOutcome.status === 'ok') {
      log.complete(draftId, 'completed', `${draft.itinerary.length} day(s) drafted`);
    } else {
      warnings.push(`Draft degraded: ${draftOutcome.reason}`);
      log.complete(draftId, 'completed_with_warning', draftOutcome.reason);
    }

    // 7. Hotel review (only when there are hotel offers to review)
    let hotelAnalysis: HotelAnalysis = EMPTY_HOTEL_ANALYSIS;
    let reviewDegraded = false;
    if (hotels.length > 0) {
      const reviewId = log.send('planner', 'reviewer', 'ANALYZE_HOTELS', {
        hotels: hotels.map((h) => h.name),
        destination,
      });
      if (!this.deps.reviewer) {
        log.complete(reviewId, 'failed', 'No reviewer agent registered');
        log.finish();
        return { ok: false, error: 'No reviewer agent registered', collaborationLog: log.snapshot() };
      }
      const review = await this.deps.reviewer.analyze(hotels, request.preferences, destination);
      if (review.ok) {
        hotelAnalysis = review.analysis;
        log.complete(reviewId, 'completed', `Top pick: ${hotelAnalysis.topPick} (${hotelAnalysis.totalReviewsAnalyzed} reviews)`);
      } else {
        reviewDegraded = true;
        warnings.push(`Hotel review unavailable: ${review.error}`);
        log.complete(reviewId, 'failed', review.error);
      }
    }

    // 8. Refinement
    const refineId = log.send('reviewer', 'planner', 'REQUEST_REFINEMENT', {
      topPick: hotelAnalysis.topPick,
      flights: Math.min(flights.length, MAX_FLIGHT_RESULTS),
      hotels: hotels.length,
      places: places.length,
    });
    const instruction = buildRefinementInstruction({
      request,
      draft,
      hotelAnalysis,
      flights,
      hotels,
      weather,
      places,
    });
    const refined = await drafter.refine(instruction, draft);
    if (refined.status === 'ok') {
      log.complete(refineId, 'completed', `${refined.itinerary.itinerary.length} day(s) refined`);
    } else {
      warnings.push(`Refinement degraded, keeping draft: ${refined.reason}`);
      log.complete(refineId, 'completed_with_warning', refined.reason);
    }

    log.finish();
    console.log(`[Orchestrator] Finished with ${log.size} command(s), ${warnings.length} warning(s)`);

    return {
      ok: true,
      request,
      styleAnalysis,
      draft,
      hotelAnalysis,
      finalItinerary: refined.itinerary,
      weather,
      flights,
      hotels,
      places,
      degraded: {
        draft: draftOutcome.status === 'degraded',
        review: reviewDegraded,
        refinement: refined.status === 'degraded',
      },
      warnings,
      collaborationLog: log.snapshot(),
    };
  }

  private async fetchWeather(
    log: CollaborationLog,
    weatherApi: WeatherForecast,
    city: string,
    request: TripRequest,
  ): Promise<WeatherReport | undefined> {
    const id = log.send('system', 'weather_api', 'GET_WEATHER_INFO', {
      city,
      startDate: request.departureDate,
      endDate: request.returnDate,
    });
    const result = await weatherApi.forecastForDates(city, request.departureDate, request.returnDate);
    if (!result.success) {
      log.complete(id, 'failed', result.error);
      return undefined;
    }

    let report = result.data;
    if (report.daily.length < request.tripDays) {
      const extra = await weatherApi.forecast(city, Math.min(request.tripDays, MAX_ITINERARY_DAYS));
      if (extra.success) {
        report = { ...report, daily: mergeForecasts(report.daily, extra.data.daily) };
      } else {
        console.warn(`[Orchestrator] Supplementary forecast failed: ${extra.error}`);
      }
    }

    log.complete(id, 'completed', `${report.daily.length} day(s) of forecast`);
    return report;
  }
}
