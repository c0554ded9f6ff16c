/**
 * Finished plans, keyed by id. In memory only: LRU-bounded with a TTL, so
 * a plan can be fetched again for a while after it was created.
 */

import { randomUUID } from 'crypto';
import type {
  BudgetSummary,
  CollaborationLog,
  HotelAnalysis,
  Itinerary,
  StyleAnalysis,
  TripRequest,
} from '@shared/schema';
import { BoundedMap } from '../utils/boundedMap';
import type { FlightOffer, HotelOffer, Place, WeatherReport } from './providers/types';
import type { ReconciliationReport } from './reconciliation';

export interface PlanRecord {
  id: string;
  createdAt: string;
  request: TripRequest;
  styleAnalysis: StyleAnalysis;
  draft: Itinerary;
  hotelAnalysis: HotelAnalysis;
  itinerary: Itinerary;
  budgetSummary: BudgetSummary;
  weather?: WeatherReport;
  flights: FlightOffer[];
  hotels: HotelOffer[];
  places: Place[];
  degraded: { draft: boolean; review: boolean; refinement: boolean };
  warnings: string[];
  reconciliation: ReconciliationReport;
  collaborationLog: CollaborationLog;
}

export type NewPlan = Omit<PlanRecord, 'id' | 'createdAt'>;

export const PLAN_STORE_MAX_ENTRIES = 200;
export const PLAN_STORE_TTL_MS = 60 * 60 * 1000;

export interface PlanStoreOptions {
  maxEntries?: number;
  ttlMs?: number;
  now?: () => number;
  generateId?: () => string;
}

export class PlanStore {
  private readonly plans: BoundedMap<string, PlanRecord>;
  private readonly now: () => number;
  private readonly generateId: () => string;

  constructor(options: PlanStoreOptions = {}) {
    this.now = options.now ?? Date.now;
    this.generateId = options.generateId ?? randomUUID;
    this.plans = new BoundedMap({
      maxSize: options.maxEntries ?? PLAN_STORE_MAX_ENTRIES,
      ttlMs: options.ttlMs ?? PLAN_STORE_TTL_MS,
      now: this.now,
    });
  }

  save(plan: NewPlan): PlanRecord {
    const record: PlanRecord = {
      ...plan,
      id: this.generateId(),
      createdAt: new Date(this.now()).toISOString(),
    };
    this.plans.set(record.id, record);
    return record;
  }

  get(id: string): PlanRecord | undefined {
    return this.plans.get(id);
  }

  get size(): number {
    return this.plans.size;
  }
}
