import type { Place } from '../providers/types';
import type { ReconciliationStep } from './types';

const PLACEHOLDER = /(Restaurant|레스토랑)\s*[A-D]\b/;

interface RestaurantCandidate {
  name: string;
  nearPlace: string;
}

function restaurantPool(places: Place[]): RestaurantCandidate[] {
  return places.flatMap((place) =>
    place.nearbyRestaurants.map((restaurant) => ({ name: restaurant.name, nearPlace: place.name })),
  );
}

export function isPlaceholderMeal(suggestion: string): boolean {
  return PLACEHOLDER.test(suggestion);
}

/** Swap "Restaurant A"-style names for real nearby restaurants, in order. */
export const replaceRestaurantPlaceholders: ReconciliationStep = (itinerary, { places }) => {
  const pool = restaurantPool(places);
  let next = 0;
  let replaced = 0;
  let unresolved = 0;

  for (const day of itinerary.itinerary) {
    for (const meal of day.meals) {
      if (!isPlaceholderMeal(meal.suggestion)) continue;
      const candidate = pool[next];
      if (!candidate) {
        unresolved++;
        continue;
      }
      next++;
      meal.suggestion = `${candidate.name} - recommended menu (near ${candidate.nearPlace})`;
      replaced++;
    }
  }

  const notes: string[] = [];
  if (replaced > 0) notes.push(`Replaced ${replaced} placeholder restaurant(s)`);
  if (unresolved > 0) notes.push(`${unresolved} placeholder restaurant(s) left without a real match`);
  return notes;
};
