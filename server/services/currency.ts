/**
 * Currency conversion into the reference currency (KRW unless
 * REFERENCE_CURRENCY says otherwise) using the bundled rate table.
 */

import { getExchangeRates } from './referenceData';

export function getReferenceCurrency(): string {
  return (process.env.REFERENCE_CURRENCY || getExchangeRates().reference).toUpperCase();
}

function rateOf(currency: string): number | undefined {
  return getExchangeRates().toReference[currency.toUpperCase()];
}

/**
 * Convert an amount into the reference currency, truncated to a whole unit.
 * Unknown currencies are treated as already being in the reference currency.
 */
export function toReferenceCurrency(amount: number, currency: string | undefined): number {
  const reference = getReferenceCurrency();
  if (!currency || currency.toUpperCase() === reference) {
    return Math.trunc(amount);
  }

  const from = rateOf(currency);
  const to = rateOf(reference);
  if (from === undefined || to === undefined) {
    console.warn(`[Currency] No rate for ${currency} → ${reference}, using 1:1`);
    return Math.trunc(amount);
  }
  return Math.trunc((amount * from) / to);
}

export function formatAmount(amount: number): string {
  return Math.trunc(amount).toLocaleString('en-US');
}

/** "1,200 USD (≈ 1,656,000 KRW)", or "150,000 KRW" when already in the reference currency */
export function formatWithReference(amount: number, currency: string | undefined): string {
  const reference = getReferenceCurrency();
  if (!currency || currency.toUpperCase() === reference) {
    return `${formatAmount(amount)} ${reference}`;
  }
  const converted = toReferenceCurrency(amount, currency);
  return `${formatAmount(amount)} ${currency.toUpperCase()} (≈ ${formatAmount(converted)} ${reference})`;
}
