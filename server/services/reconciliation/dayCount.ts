import type { ItineraryDay } from '@shared/schema';
import type { ReconciliationStep } from './types';

/** "2025-11-10" + 2 → "2025-11-12" */
export function addDays(isoDate: string, offset: number): string {
  const date = new Date(`${isoDate}T00:00:00Z`);
  date.setUTCDate(date.getUTCDate() + offset);
  return date.toISOString().slice(0, 10);
}

export function emptyDay(day: number, date: string): ItineraryDay {
  return {
    day,
    date,
    transportation: { type: '', details: '', cost: 0 },
    accommodation: null,
    attractions: [],
    meals: [],
    dailyCost: 0,
  };
}

/** Exactly `request.days` entries, numbered 1..n. */
export const normalizeDayCount: ReconciliationStep = (itinerary, { request }) => {
  const notes: string[] = [];
  const target = request.days;

  if (itinerary.itinerary.length > target) {
    notes.push(`Trimmed ${itinerary.itinerary.length - target} extra day(s)`);
    itinerary.itinerary = itinerary.itinerary.slice(0, target);
  }
  if (itinerary.itinerary.length < target) {
    notes.push(`Padded ${target - itinerary.itinerary.length} missing day(s)`);
    for (let i = itinerary.itinerary.length; i < target; i++) {
      itinerary.itinerary.push(emptyDay(i + 1, addDays(request.departureDate, i)));
    }
  }

  itinerary.itinerary.forEach((day, index) => {
    day.day = index + 1;
  });
  itinerary.days = target;
  return notes;
};
