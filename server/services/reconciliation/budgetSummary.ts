import type { BudgetSummary } from '@shared/schema';
import { getReferenceCurrency, toReferenceCurrency } from '../currency';
import { cheapest, type ReconciliationContext } from './types';

/**
 * Flight + hotel spend from the live offers, in the reference currency,
 * against the traveller's budget.
 */
export function summarizeBudget({ request, flights, hotels }: ReconciliationContext): BudgetSummary {
  const flight = cheapest(flights);
  const hotel = cheapest(hotels);

  const flightTotal = flight ? toReferenceCurrency(flight.price.total, flight.price.currency) : 0;
  const hotelCurrency = hotel?.price.currency || getReferenceCurrency();
  const hotelTotal = hotel ? Math.trunc(hotel.price.total || hotel.price.base) : 0;
  const hotelTotalReference = toReferenceCurrency(hotelTotal, hotelCurrency);

  const totalCost = flightTotal + hotelTotalReference;
  const userBudget = request.budget;
  const isOver = totalCost > userBudget;
  const overRate = isOver && userBudget > 0 ? Math.round(((totalCost - userBudget) / userBudget) * 1000) / 10 : 0;

  return {
    userBudget,
    flightTotal,
    hotelTotal,
    hotelCurrency,
    hotelTotalReference,
    totalCost,
    diff: userBudget - totalCost,
    isOver,
    overRate,
  };
}
