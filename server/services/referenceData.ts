import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';

// ES Module compatibility for __dirname
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/**
 * Reference Data
 *
 * Static tables shipped under server/data: place name → IATA code,
 * local place name → English name, exchange rates into the reference
 * currency, and past trips used as drafting examples. Each file is read
 * once and validated on first use.
 */

// ============================================================================
// SCHEMAS
// ============================================================================

const cityCodesSchema = z.record(z.string().regex(/^[A-Z]{3}$/));

const exchangeRatesSchema = z.object({
  reference: z.string().length(3),
  asOf: z.string(),
  toReference: z.record(z.number().positive()),
});

export const tripExampleSchema = z.object({
  origin: z.string(),
  destination: z.string(),
  days: z.number().int().positive(),
  people: z.number().int().positive(),
  summary: z.string(),
});

export type ExchangeRateTable = z.infer<typeof exchangeRatesSchema>;
export type TripExample = z.infer<typeof tripExampleSchema>;

// ============================================================================
// LOADING
// ============================================================================

function loadDataFile<T>(fileName: string, schema: z.ZodType<T>): T {
  const filePath = path.join(__dirname, '..', 'data', fileName);
  const raw = fs.readFileSync(filePath, 'utf-8');
  const parsed = schema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error(`[ReferenceData] ${fileName} is malformed: ${parsed.error.message}`);
  }
  return parsed.data;
}

let cityCodes: Record<string, string> | null = null;
let cityNames: Record<string, string> | null = null;
let exchangeRates: ExchangeRateTable | null = null;
let tripExamples: TripExample[] | null = null;

export function getCityCodes(): Record<string, string> {
  if (!cityCodes) {
    cityCodes = loadDataFile('cityCodes.json', cityCodesSchema);
  }
  return cityCodes;
}

/** Local-language place names → the English names weather lookups expect */
export function getCityNames(): Record<string, string> {
  if (!cityNames) {
    cityNames = loadDataFile('cityNames.json', z.record(z.string()));
  }
  return cityNames;
}

export function getExchangeRates(): ExchangeRateTable {
  if (!exchangeRates) {
    exchangeRates = loadDataFile('exchangeRates.json', exchangeRatesSchema);
  }
  return exchangeRates;
}

export function getTripExamples(): TripExample[] {
  if (!tripExamples) {
    tripExamples = loadDataFile('tripExamples.json', z.array(tripExampleSchema));
  }
  return tripExamples;
}

/**
 * Look up a place in the static code table.
 * Tries the full input, then the first comma segment, case-insensitively.
 */
export function lookupCityCode(place: string): string | null {
  const table = getCityCodes();
  const full = place.trim().toLowerCase();
  const head = full.split(',')[0].trim();
  return table[full] ?? table[head] ?? null;
}
