/**
 * OpenWeather Integration
 * 5-day / 3-hour forecast folded into daily summaries, restricted to a trip window.
 */

import { z } from 'zod';
import { getCityNames } from '../referenceData';
import { fetchJson, errorMessage, type FetchFn } from './http';
import {
  ok,
  fail,
  type DailyForecast,
  type ProviderResult,
  type WeatherForecast,
  type WeatherReport,
} from './types';

const OPENWEATHER_BASE_URL = 'https://api.openweathermap.org/data/2.5';
const WEATHER_TIMEOUT_MS = 10000;
// 40 three-hour slots = the full 5-day horizon
const FORECAST_SLOTS = 40;
const DAY_MS = 24 * 60 * 60 * 1000;

const forecastResponseSchema = z.object({
  city: z.object({ name: z.string(), timezone: z.number().default(0) }),
  list: z.array(
    z.object({
      dt: z.number(),
      main: z.object({ temp: z.number() }),
      weather: z.array(z.object({ main: z.string(), description: z.string() })).min(1),
    }),
  ),
});

const round1 = (value: number): number => Math.round(value * 10) / 10;

function addDays(isoDate: string, days: number): string {
  return new Date(Date.parse(`${isoDate}T00:00:00Z`) + days * DAY_MS).toISOString().slice(0, 10);
}

/** Local-language names map to the English name OpenWeather expects */
export function toWeatherQuery(city: string): string {
  const names = getCityNames();
  const trimmed = city.split(',')[0].trim();
  return names[trimmed] ?? names[trimmed.toLowerCase()] ?? trimmed;
}

/**
 * Fold 3-hourly slots into per-day summaries keyed by the city's local date.
 * The first slot of each day supplies the description.
 */
export function foldForecast(raw: unknown): { city: string; daily: DailyForecast[] } {
  const response = forecastResponseSchema.parse(raw);
  const offsetMs = response.city.timezone * 1000;
  const byDate = new Map<string, { temps: number[]; main: string; description: string }>();

  for (const slot of response.list) {
    const date = new Date(slot.dt * 1000 + offsetMs).toISOString().slice(0, 10);
    const bucket = byDate.get(date);
    if (bucket) {
      bucket.temps.push(slot.main.temp);
    } else {
      byDate.set(date, {
        temps: [slot.main.temp],
        main: slot.weather[0].main,
        description: slot.weather[0].description,
      });
    }
  }

  const daily = Array.from(byDate.entries()).map(([date, bucket]) => ({
    date,
    tempAvg: round1(bucket.temps.reduce((sum, t) => sum + t, 0) / bucket.temps.length),
    tempMin: round1(Math.min(...bucket.temps)),
    tempMax: round1(Math.max(...bucket.temps)),
    description: bucket.description,
    main: bucket.main,
  }));

  return { city: response.city.name, daily };
}

/**
 * Restrict a forecast to [startDate, endDate]. When the trip starts after the
 * last forecast day, the leading forecast days are relabelled onto the trip dates.
 */
export function fitForecastToTrip(
  daily: DailyForecast[],
  startDate: string,
  endDate: string,
): { daily: DailyForecast[]; shifted: boolean } {
  if (daily.length === 0) return { daily: [], shifted: false };

  const lastForecastDate = daily.reduce((max, day) => (day.date > max ? day.date : max), daily[0].date);
  if (startDate <= lastForecastDate) {
    return { daily: daily.filter((day) => day.date >= startDate && day.date <= endDate), shifted: false };
  }

  const span = Math.round((Date.parse(endDate) - Date.parse(startDate)) / DAY_MS) + 1;
  return {
    daily: daily.slice(0, Math.max(0, span)).map((day, i) => ({ ...day, date: addDays(startDate, i) })),
    shifted: true,
  };
}

export class OpenWeatherForecast implements WeatherForecast {
  private readonly fetchImpl: FetchFn;
  private readonly lang: string;

  constructor(
    private readonly apiKey: string,
    options: { fetchImpl?: FetchFn; lang?: string } = {},
  ) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.lang = options.lang ?? 'en';
  }

  private async fetchDaily(city: string): Promise<{ city: string; daily: DailyForecast[] }> {
    const params = new URLSearchParams({
      q: toWeatherQuery(city),
      appid: this.apiKey,
      units: 'metric',
      lang: this.lang,
      cnt: String(FORECAST_SLOTS),
    });
    const raw = await fetchJson(`${OPENWEATHER_BASE_URL}/forecast?${params}`, {
      timeoutMs: WEATHER_TIMEOUT_MS,
      fetchImpl: this.fetchImpl,
    });
    return foldForecast(raw);
  }

  private report(city: string, daily: DailyForecast[], note?: string): WeatherReport {
    const first = daily[0];
    return {
      city,
      daily,
      ...(first ? { current: { temp: first.tempAvg, description: first.description } } : {}),
      ...(note ? { note } : {}),
    };
  }

  async forecast(city: string, days: number): Promise<ProviderResult<WeatherReport>> {
    try {
      const result = await this.fetchDaily(city);
      return ok(this.report(result.city, result.daily.slice(0, Math.max(1, days))));
    } catch (error) {
      console.error(`[Weather] Forecast failed for ${city}:`, errorMessage(error));
      return fail(`Weather forecast failed: ${errorMessage(error)}`);
    }
  }

  async forecastForDates(city: string, startDate: string, endDate: string): Promise<ProviderResult<WeatherReport>> {
    try {
      const result = await this.fetchDaily(city);
      const fitted = fitForecastToTrip(result.daily, startDate, endDate);
      const note = fitted.shifted ? 'Trip is beyond the forecast horizon; recent forecast shown for reference' : undefined;
      return ok(this.report(result.city, fitted.daily, note));
    } catch (error) {
      console.error(`[Weather] Forecast for ${startDate}..${endDate} failed:`, errorMessage(error));
      return fail(`Weather forecast failed: ${errorMessage(error)}`);
    }
  }
}
