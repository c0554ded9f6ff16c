/**
 * Unit Tests for Currency Conversion
 *
 * Run with: npx vitest run server/services/currency.test.ts
 */

import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { formatAmount, formatWithReference, getReferenceCurrency, toReferenceCurrency } from './currency';

describe('currency', () => {
  beforeEach(() => {
    vi.stubEnv('REFERENCE_CURRENCY', '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should default the reference currency to the rate table', () => {
    expect(getReferenceCurrency()).toBe('KRW');
  });

  it('should convert into the reference currency and truncate', () => {
    expect(toReferenceCurrency(100, 'USD')).toBe(138000);
    expect(toReferenceCurrency(50, 'eur')).toBe(74000);
    expect(toReferenceCurrency(150000.9, 'KRW')).toBe(150000);
  });

  it('should treat a missing or unknown currency as the reference currency', () => {
    expect(toReferenceCurrency(12.9, undefined)).toBe(12);
    expect(toReferenceCurrency(12.9, 'XYZ')).toBe(12);
  });

  it('should honour REFERENCE_CURRENCY', () => {
    vi.stubEnv('REFERENCE_CURRENCY', 'usd');

    expect(getReferenceCurrency()).toBe('USD');
    expect(toReferenceCurrency(2760, 'KRW')).toBe(2);
  });

  it('should format amounts with thousands separators', () => {
    expect(formatAmount(1656000.7)).toBe('1,656,000');
  });

  it('should show the converted amount beside foreign prices', () => {
    expect(formatWithReference(1200, 'USD')).toBe('1,200 USD (≈ 1,656,000 KRW)');
    expect(formatWithReference(150000, 'KRW')).toBe('150,000 KRW');
  });
});
