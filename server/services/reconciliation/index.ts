/**
 * Reconciliation
 *
 * Deterministic pass over the refined itinerary, checking it against the live
 * provider data. Steps run in order, each on its own copy: a step that throws
 * is recorded and skipped, and the itinerary keeps whatever the model wrote.
 *
 * Usage:
 *   const { itinerary, budgetSummary, report } = reconcileItinerary(finalItinerary, context);
 */

import type { BudgetSummary, Itinerary } from '@shared/schema';
import { summarizeBudget } from './budgetSummary';
import { enforceDailyCostFloor } from './dailyCost';
import { normalizeDayCount } from './dayCount';
import { repairSelectedFlight } from './flightRepair';
import { repairSelectedHotel } from './hotelRepair';
import { replaceRestaurantPlaceholders } from './restaurantPlaceholders';
import { injectFlightTransport } from './transportInjection';
import type { ReconciliationContext, ReconciliationStep } from './types';

export type { ReconciliationContext, ReconciliationStep } from './types';

export interface ReconciliationReport {
  applied: string[];
  notes: string[];
  errors: Array<{ step: string; error: string }>;
}

export interface ReconciliationResult {
  itinerary: Itinerary;
  budgetSummary: BudgetSummary;
  report: ReconciliationReport;
}

export const RECONCILIATION_STEPS: ReadonlyArray<[string, ReconciliationStep]> = [
  ['dayCount', normalizeDayCount],
  ['flightRepair', repairSelectedFlight],
  ['hotelRepair', repairSelectedHotel],
  ['transportInjection', injectFlightTransport],
  ['restaurantPlaceholders', replaceRestaurantPlaceholders],
  ['dailyCostFloor', enforceDailyCostFloor],
];

export function reconcileItinerary(
  itinerary: Itinerary,
  context: ReconciliationContext,
  steps: ReadonlyArray<[string, ReconciliationStep]> = RECONCILIATION_STEPS,
): ReconciliationResult {
  const report: ReconciliationReport = { applied: [], notes: [], errors: [] };
  let current = itinerary;

  for (const [name, step] of steps) {
    const working = structuredClone(current);
    try {
      const notes = step(working, context);
      current = working;
      report.applied.push(name);
      report.notes.push(...notes);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[Reconciliation] ${name} failed:`, message);
      report.errors.push({ step: name, error: message });
    }
  }

  let budgetSummary: BudgetSummary;
  try {
    budgetSummary = summarizeBudget(context);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error('[Reconciliation] budgetSummary failed:', message);
    report.errors.push({ step: 'budgetSummary', error: message });
    budgetSummary = emptyBudgetSummary(context.request.budget);
  }

  if (report.notes.length > 0) {
    console.log(`[Reconciliation] ${report.notes.length} adjustment(s): ${report.notes.join('; ')}`);
  }
  return { itinerary: current, budgetSummary, report };
}

function emptyBudgetSummary(userBudget: number): BudgetSummary {
  return {
    userBudget,
    flightTotal: 0,
    hotelTotal: 0,
    hotelCurrency: '',
    hotelTotalReference: 0,
    totalCost: 0,
    diff: userBudget,
    isOver: false,
    overRate: 0,
  };
}
