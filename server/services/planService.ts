/**
 * Plan Service
 *
 * Validates the trip dates, runs the orchestrator, reconciles its output
 * against the live provider data and stores the finished plan.
 */

import {
  MAX_ITINERARY_DAYS,
  MAX_TRIP_SPAN_DAYS,
  type CollaborationLog,
  type PlanRequest,
  type TripRequest,
} from '@shared/schema';
import { isAIConfigured } from './aiClientFactory';
import { ItineraryDrafter } from './agents/itineraryDrafter';
import { ReviewSynthesizer } from './agents/reviewSynthesizer';
import { classifyTravelStyle } from './agents/styleClassifier';
import { OpenAILanguageModel } from './languageModel';
import {
  CollaborationOrchestrator,
  type OrchestratorDependencies,
} from './orchestrator/collaborationOrchestrator';
import { PlanStore, type PlanRecord } from './planStore';
import { createProviderRegistry } from './providers';
import type { ProviderRegistry } from './providers/types';
import { reconcileItinerary } from './reconciliation';

// ============================================================================
// REQUEST VALIDATION
// ============================================================================

export class PlanValidationError extends Error {
  constructor(
    message: string,
    readonly field?: string,
  ) {
    super(message);
    this.name = 'PlanValidationError';
  }
}

const DAY_MS = 24 * 60 * 60 * 1000;

function parseIsoDate(value: string, field: string): number {
  const time = new Date(`${value}T00:00:00Z`).getTime();
  // Reject dates the Date parser would roll over, e.g. 2025-02-30
  if (!Number.isFinite(time) || new Date(time).toISOString().slice(0, 10) !== value) {
    throw new PlanValidationError(`Invalid date: ${value}`, field);
  }
  return time;
}

export function buildTripRequest(input: PlanRequest): TripRequest {
  const departure = parseIsoDate(input.departureDate, 'departureDate');
  const ret = parseIsoDate(input.returnDate, 'returnDate');

  const tripDays = Math.round((ret - departure) / DAY_MS) + 1;
  if (tripDays <= 0) {
    throw new PlanValidationError('Return date must not be before the departure date', 'returnDate');
  }
  if (tripDays > MAX_TRIP_SPAN_DAYS) {
    throw new PlanValidationError(`Trips are limited to ${MAX_TRIP_SPAN_DAYS} days`, 'returnDate');
  }

  return {
    origin: input.origin,
    destination: input.destination,
    departureDate: input.departureDate,
    returnDate: input.returnDate,
    tripDays,
    days: Math.min(tripDays, MAX_ITINERARY_DAYS),
    people: input.people,
    budget: input.budget,
    preferences: input.preferences,
    ...(input.travelStyle ? { travelStyle: input.travelStyle } : {}),
  };
}

// ============================================================================
// SERVICE
// ============================================================================

export type CreatePlanResult =
  | { ok: true; plan: PlanRecord }
  | { ok: false; error: string; collaborationLog: CollaborationLog };

type Orchestrator = Pick<CollaborationOrchestrator, 'run' | 'describe'>;

export class PlanService {
  constructor(
    private readonly orchestrator: Orchestrator,
    private readonly store: PlanStore = new PlanStore(),
  ) {}

  async createPlan(input: PlanRequest): Promise<CreatePlanResult> {
    const request = buildTripRequest(input);
    const result = await this.orchestrator.run(request);
    if (!result.ok) {
      console.error(`[PlanService] Orchestration failed: ${result.error}`);
      return result;
    }

    const reconciled = reconcileItinerary(result.finalItinerary, {
      request,
      flights: result.flights,
      hotels: result.hotels,
      places: result.places,
    });

    const plan = this.store.save({
      request,
      styleAnalysis: result.styleAnalysis,
      draft: result.draft,
      hotelAnalysis: result.hotelAnalysis,
      itinerary: reconciled.itinerary,
      budgetSummary: reconciled.budgetSummary,
      weather: result.weather,
      flights: result.flights,
      hotels: result.hotels,
      places: result.places,
      degraded: result.degraded,
      warnings: result.warnings,
      reconciliation: reconciled.report,
      collaborationLog: result.collaborationLog,
    });
    console.log(`[PlanService] Stored plan ${plan.id} (${plan.itinerary.itinerary.length} day(s))`);
    return { ok: true, plan };
  }

  getPlan(id: string): PlanRecord | undefined {
    return this.store.get(id);
  }

  status(): { agents: string[]; tools: string[]; storedPlans: number } {
    return { ...this.orchestrator.describe(), storedPlans: this.store.size };
  }
}

/**
 * Wire the service from the environment: providers whose keys are present,
 * and the language-model agents when an AI provider is configured.
 */
export function createPlanService(registry: ProviderRegistry = createProviderRegistry()): PlanService {
  const deps: OrchestratorDependencies = { classifier: classifyTravelStyle, providers: registry };

  if (isAIConfigured()) {
    const model = new OpenAILanguageModel();
    deps.drafter = new ItineraryDrafter(model);
    // Without a review index the reviewer still runs and reports no reviews
    deps.reviewer = new ReviewSynthesizer(model, registry.reviews);
  }

  return new PlanService(new CollaborationOrchestrator(deps));
}
