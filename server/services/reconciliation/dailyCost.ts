import type { ItineraryDay } from '@shared/schema';
import type { ReconciliationStep } from './types';

/** Share of difference between the model's and the itemised cost worth reporting */
const DISCREPANCY_THRESHOLD = 0.2;

/** Transportation + lodging + attractions. Meals are not itemised costs here. */
export function itemizedCost(day: ItineraryDay): number {
  const attractions = day.attractions.reduce((sum, attraction) => sum + attraction.estimatedCost, 0);
  return day.transportation.cost + (day.accommodation?.estimatedCost ?? 0) + attractions;
}

/** dailyCost never falls below the day's itemised cost. */
export const enforceDailyCostFloor: ReconciliationStep = (itinerary) => {
  const notes: string[] = [];

  for (const day of itinerary.itinerary) {
    const modelCost = day.dailyCost;
    const computed = itemizedCost(day);

    if (computed > 0 && Math.abs(modelCost - computed) / computed > DISCREPANCY_THRESHOLD) {
      notes.push(`Day ${day.day}: model cost ${Math.trunc(modelCost)} vs itemised ${Math.trunc(computed)}`);
    }
    // Whole units; the itemised side rounds up so the floor still holds
    day.dailyCost = Math.max(Math.trunc(modelCost), Math.ceil(computed));
  }
  return notes;
};
