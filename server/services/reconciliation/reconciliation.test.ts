/**
 * Unit Tests for Itinerary Reconciliation
 *
 * Run with: npx vitest run server/services/reconciliation/reconciliation.test.ts
 */

import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import type { Itinerary, SelectedFlight } from '@shared/schema';
import { RECONCILIATION_STEPS, reconcileItinerary, type ReconciliationStep } from './index';
import { summarizeBudget } from './budgetSummary';
import { enforceDailyCostFloor } from './dailyCost';
import { normalizeDayCount } from './dayCount';
import { repairSelectedFlight } from './flightRepair';
import { repairSelectedHotel, toSelectedHotel } from './hotelRepair';
import { isPlaceholderMeal, replaceRestaurantPlaceholders } from './restaurantPlaceholders';
import { injectFlightTransport, isAirTravel } from './transportInjection';
import { cheapest, type ReconciliationContext } from './types';
import {
  createDay,
  createFlightOffer,
  createHotelOffer,
  createItinerary,
  createPlace,
  createRestaurant,
  createTripRequest,
} from '../../testing/fixtures';

// ============================================================================
// TEST DATA
// ============================================================================

const createContext = (overrides: Partial<ReconciliationContext> = {}): ReconciliationContext => ({
  request: createTripRequest(),
  flights: [createFlightOffer()],
  hotels: [createHotelOffer()],
  places: [
    createPlace({ nearbyRestaurants: [createRestaurant('Asakusa Soba'), createRestaurant('Kaminari Tempura')] }),
  ],
  ...overrides,
});

const selectedFlight: SelectedFlight = {
  airline: 'KE',
  price: 500000,
  outbound: 'ICN 09:00 → NRT 11:20',
  inbound: 'NRT 18:00 → ICN 20:30',
  bookingUrl: 'https://flights.example.test/offer-1',
};

const FLIGHT_URL =
  'https://www.google.com/flights?q=flights%20from%20ICN%20to%20NRT%20on%202025-11-10%20return%20on%202025-11-12';

/** Runs one step on a copy, the way reconcileItinerary does */
const applyStep = (step: ReconciliationStep, itinerary: Itinerary, context = createContext()) => {
  const working = structuredClone(itinerary);
  const notes = step(working, context);
  return { itinerary: working, notes };
};

beforeEach(() => {
  vi.stubEnv('REFERENCE_CURRENCY', '');
});

afterEach(() => {
  vi.unstubAllEnvs();
});

// ============================================================================
// DAY COUNT
// ============================================================================

describe('normalizeDayCount', () => {
  it('should trim extra days', () => {
    const itinerary = createItinerary({
      itinerary: [1, 2, 3, 4, 5].map((n) => createDay(n)),
    });

    const { itinerary: result, notes } = applyStep(normalizeDayCount, itinerary);

    expect(result.itinerary.map((d) => d.day)).toEqual([1, 2, 3]);
    expect(notes).toEqual(['Trimmed 2 extra day(s)']);
  });

  it('should pad missing days and renumber', () => {
    const itinerary = createItinerary({ days: 1, itinerary: [createDay(4)] });

    const { itinerary: result, notes } = applyStep(normalizeDayCount, itinerary);

    expect(result.days).toBe(3);
    expect(result.itinerary.map((d) => [d.day, d.date])).toEqual([
      [1, '2025-11-13'],
      [2, '2025-11-11'],
      [3, '2025-11-12'],
    ]);
    expect(result.itinerary[2].accommodation).toBeNull();
    expect(notes).toEqual(['Padded 2 missing day(s)']);
  });
});

// ============================================================================
// FLIGHT
// ============================================================================

describe('repairSelectedFlight', () => {
  it('should rebuild a missing flight from the cheapest offer', () => {
    const context = createContext({
      flights: [createFlightOffer({ offerId: 'pricey', price: { total: 900000, currency: 'KRW', perPerson: 450000 } }), createFlightOffer()],
    });

    const { itinerary, notes } = applyStep(repairSelectedFlight, createItinerary(), context);

    expect(itinerary.selectedFlight).toEqual({
      airline: 'KE',
      price: 500000,
      outbound: 'ICN 09:00 → NRT 11:20',
      inbound: 'NRT 18:00 → ICN 20:30',
      bookingUrl: FLIGHT_URL,
    });
    expect(notes).toEqual(['Selected flight rebuilt from offer offer-1']);
  });

  it('should rebuild a flight that lacks a leg', () => {
    const { itinerary } = applyStep(
      repairSelectedFlight,
      createItinerary({ selectedFlight: { airline: 'JL', outbound: 'ICN 10:00 → HND 12:00' } }),
    );

    expect(itinerary.selectedFlight?.airline).toBe('KE');
  });

  it('should only add a booking link to a complete flight', () => {
    const { itinerary, notes } = applyStep(
      repairSelectedFlight,
      createItinerary({ selectedFlight: { airline: 'JL', price: 1, outbound: 'a', inbound: 'b' } }),
    );

    expect(itinerary.selectedFlight).toEqual({ airline: 'JL', price: 1, outbound: 'a', inbound: 'b', bookingUrl: FLIGHT_URL });
    expect(notes).toEqual([]);
  });

  it('should leave the itinerary alone without offers', () => {
    const { itinerary } = applyStep(repairSelectedFlight, createItinerary(), createContext({ flights: [] }));

    expect(itinerary.selectedFlight).toBeUndefined();
  });
});

describe('cheapest', () => {
  it('should keep the earlier offer on a tie', () => {
    const first = createFlightOffer({ offerId: 'first' });
    const second = createFlightOffer({ offerId: 'second' });

    expect(cheapest([first, second])).toBe(first);
    expect(cheapest([])).toBeUndefined();
  });
});

// ============================================================================
// HOTEL
// ============================================================================

describe('toSelectedHotel', () => {
  it('should describe the offer in the reference currency', () => {
    expect(toSelectedHotel(createHotelOffer(), createTripRequest())).toEqual({
      name: 'Hotel Sakura',
      address: '1-2-3 Shinjuku, Tokyo, JP',
      type: '4-star hotel',
      estimatedCost: 300000,
      perNightCost: 150000,
      currency: 'KRW',
      estimatedCostReference: 300000,
      perNightCostReference: 150000,
      priceDisplay: '300,000 KRW',
      perNightDisplay: '150,000 KRW',
      bookingUrl: 'https://www.google.com/search?q=Hotel%20Sakura%20Tokyo%20hotel%20booking&hl=ko&ibp=htl',
    });
  });

  it('should fall back to the base price and derive the nightly rate', () => {
    const offer = createHotelOffer({
      rating: null,
      cityCode: '',
      price: { total: 0, currency: 'USD', base: 200, taxTotal: 0, perNight: 0 },
    });

    const hotel = toSelectedHotel(offer, createTripRequest());

    expect(hotel.type).toBe('Hotel');
    expect(hotel.estimatedCost).toBe(200);
    expect(hotel.perNightCost).toBe(100);
    expect(hotel.estimatedCostReference).toBe(276000);
    expect(hotel.perNightCostReference).toBe(138000);
    expect(hotel.priceDisplay).toBe('200 USD (≈ 276,000 KRW)');
    expect(hotel.bookingUrl).toBe('https://www.google.com/search?q=Hotel%20Sakura%20Tokyo%20hotel%20booking&hl=ko&ibp=htl');
  });
});

describe('hotel booking link', () => {
  it('should search by the destination city name, not the provider city code', () => {
    const hotel = toSelectedHotel(
      createHotelOffer({ cityCode: 'OSA' }),
      createTripRequest({ destination: 'Osaka, Japan' }),
    );

    expect(hotel.bookingUrl).toBe('https://www.google.com/search?q=Hotel%20Sakura%20Osaka%20hotel%20booking&hl=ko&ibp=htl');
  });
});

describe('repairSelectedHotel', () => {
  it('should lodge every night but the last at the chosen hotel', () => {
    const { itinerary, notes } = applyStep(repairSelectedHotel, createItinerary());

    expect(itinerary.selectedHotel?.name).toBe('Hotel Sakura');
    expect(itinerary.itinerary.map((d) => d.accommodation?.name)).toEqual(['Hotel Sakura', 'Hotel Sakura', 'Model Hotel']);
    expect(itinerary.itinerary[0].accommodation?.estimatedCost).toBe(150000);
    expect(notes).toEqual(['Hotel set to Hotel Sakura for 2 night(s)']);
  });
});

// ============================================================================
// TRANSPORT
// ============================================================================

describe('isAirTravel', () => {
  it('should recognise flights in several languages', () => {
    expect(isAirTravel('Flight')).toBe(true);
    expect(isAirTravel('plane')).toBe(true);
    expect(isAirTravel('비행기')).toBe(true);
    expect(isAirTravel('airport bus')).toBe(false);
    expect(isAirTravel('subway')).toBe(false);
  });
});

describe('injectFlightTransport', () => {
  it('should put the flights on the first and last day', () => {
    const itinerary = createItinerary({
      selectedFlight,
      itinerary: [
        createDay(1, { transportation: { type: 'Flight', details: '', cost: 0 } }),
        createDay(2),
        createDay(3),
      ],
    });

    const { itinerary: result, notes } = applyStep(injectFlightTransport, itinerary);

    expect(result.itinerary[0].transportation).toEqual({
      type: 'Flight',
      details: 'Outbound: ICN 09:00 → NRT 11:20',
      cost: 500000,
      airline: 'KE',
      bookingUrl: 'https://flights.example.test/offer-1',
    });
    expect(result.itinerary[2].transportation).toEqual({
      type: 'flight',
      details: 'Inbound: NRT 18:00 → ICN 20:30',
      cost: 5000,
      airline: 'KE',
      bookingUrl: 'https://flights.example.test/offer-1',
    });
    expect(result.itinerary[2].accommodation).toBeNull();
    expect(notes).toEqual(['Day 1 transportation set to the outbound flight', 'Day 3 transportation set to the inbound flight']);
  });

  it('should not turn a ground day into a flight', () => {
    const { itinerary } = applyStep(injectFlightTransport, createItinerary({ selectedFlight }));

    expect(itinerary.itinerary[0].transportation.type).toBe('subway');
    expect(itinerary.itinerary[0].transportation.details).toBe('Metro');
  });

  it('should clear the last night even without a flight', () => {
    const { itinerary, notes } = applyStep(injectFlightTransport, createItinerary({ itinerary: [createDay(1)] }));

    expect(itinerary.itinerary[0].accommodation).toBeNull();
    expect(itinerary.itinerary[0].transportation.type).toBe('subway');
    expect(notes).toEqual([]);
  });
});

// ============================================================================
// RESTAURANTS
// ============================================================================

describe('isPlaceholderMeal', () => {
  it('should match lettered placeholder names only', () => {
    expect(isPlaceholderMeal('Restaurant A - sushi')).toBe(true);
    expect(isPlaceholderMeal('레스토랑 B')).toBe(true);
    expect(isPlaceholderMeal('RestaurantC')).toBe(true);
    expect(isPlaceholderMeal('Restaurant Azure')).toBe(false);
    expect(isPlaceholderMeal('Restaurant E')).toBe(false);
  });
});

describe('replaceRestaurantPlaceholders', () => {
  it('should fill placeholders in order from nearby restaurants', () => {
    const itinerary = createItinerary({
      itinerary: [
        createDay(1, {
          meals: [
            { type: 'lunch', suggestion: 'Restaurant A - sushi', estimatedCost: 20000 },
            { type: 'dinner', suggestion: '레스토랑 B', estimatedCost: 30000 },
          ],
        }),
        createDay(2, { meals: [{ type: 'lunch', suggestion: 'Restaurant C', estimatedCost: 10000 }] }),
        createDay(3),
      ],
    });

    const { itinerary: result, notes } = applyStep(replaceRestaurantPlaceholders, itinerary);

    expect(result.itinerary[0].meals.map((m) => m.suggestion)).toEqual([
      'Asakusa Soba - recommended menu (near Senso-ji)',
      'Kaminari Tempura - recommended menu (near Senso-ji)',
    ]);
    expect(result.itinerary[1].meals[0].suggestion).toBe('Restaurant C');
    expect(result.itinerary[2].meals[0].suggestion).toBe('Ramen Ichiran - ramen (near Senso-ji)');
    expect(notes).toEqual(['Replaced 2 placeholder restaurant(s)', '1 placeholder restaurant(s) left without a real match']);
  });
});

// ============================================================================
// DAILY COST
// ============================================================================

describe('enforceDailyCostFloor', () => {
  it('should raise a day below its itemised cost and report it', () => {
    const itinerary = createItinerary({ itinerary: [createDay(1, { dailyCost: 50000 }), createDay(2)] });

    const { itinerary: result, notes } = applyStep(enforceDailyCostFloor, itinerary);

    expect(result.itinerary.map((d) => d.dailyCost)).toEqual([125000, 140000]);
    expect(notes).toEqual(['Day 1: model cost 50000 vs itemised 125000']);
  });

  it('should keep a higher model cost but still report a large gap', () => {
    const itinerary = createItinerary({ itinerary: [createDay(1, { dailyCost: 200000.7 })] });

    const { itinerary: result, notes } = applyStep(enforceDailyCostFloor, itinerary);

    expect(result.itinerary[0].dailyCost).toBe(200000);
    expect(notes).toEqual(['Day 1: model cost 200000 vs itemised 125000']);
  });

  it('should round fractional line items up so the floor still holds', () => {
    const day = createDay(1, {
      transportation: { type: 'subway', details: 'Metro', cost: 10.5 },
      accommodation: null,
      attractions: [{ name: 'Senso-ji', description: 'Temple', estimatedCost: 20.25 }],
      dailyCost: 0,
    });

    const { itinerary: result, notes } = applyStep(enforceDailyCostFloor, createItinerary({ itinerary: [day] }));

    expect(result.itinerary[0].dailyCost).toBe(31);
    expect(notes).toEqual(['Day 1: model cost 0 vs itemised 30']);
  });
});

// ============================================================================
// BUDGET
// ============================================================================

describe('summarizeBudget', () => {
  it('should total the cheapest flight and hotel', () => {
    expect(summarizeBudget(createContext())).toEqual({
      userBudget: 2000000,
      flightTotal: 500000,
      hotelTotal: 300000,
      hotelCurrency: 'KRW',
      hotelTotalReference: 300000,
      totalCost: 800000,
      diff: 1200000,
      isOver: false,
      overRate: 0,
    });
  });

  it('should report how far over budget the trip is', () => {
    const summary = summarizeBudget(createContext({ request: createTripRequest({ budget: 700000 }) }));

    expect(summary.isOver).toBe(true);
    expect(summary.diff).toBe(-100000);
    expect(summary.overRate).toBe(14.3);
  });

  it('should convert a foreign hotel price', () => {
    const summary = summarizeBudget(
      createContext({
        flights: [],
        hotels: [createHotelOffer({ price: { total: 200, currency: 'USD', base: 180, taxTotal: 20, perNight: 100 } })],
      }),
    );

    expect(summary).toMatchObject({ flightTotal: 0, hotelTotal: 200, hotelCurrency: 'USD', hotelTotalReference: 276000 });
  });
});

// ============================================================================
// PIPELINE
// ============================================================================

describe('reconcileItinerary', () => {
  it('should repair a refined itinerary against live data', () => {
    const refined = createItinerary({
      itinerary: [
        createDay(1, {
          transportation: { type: 'flight', details: '', cost: 0 },
          meals: [{ type: 'lunch', suggestion: 'Restaurant A', estimatedCost: 15000 }],
        }),
        createDay(2),
        createDay(3),
        createDay(4),
      ],
    });

    const { itinerary, budgetSummary, report } = reconcileItinerary(refined, createContext());

    expect(report.applied).toEqual(RECONCILIATION_STEPS.map(([name]) => name));
    expect(report.errors).toEqual([]);
    expect(itinerary.itinerary).toHaveLength(3);
    expect(itinerary.selectedFlight?.bookingUrl).toBe(FLIGHT_URL);
    expect(itinerary.itinerary[0].transportation.details).toBe('Outbound: ICN 09:00 → NRT 11:20');
    expect(itinerary.itinerary[0].meals[0].suggestion).toBe('Asakusa Soba - recommended menu (near Senso-ji)');
    expect(itinerary.itinerary[0].dailyCost).toBe(670000);
    expect(itinerary.itinerary[2].accommodation).toBeNull();
    expect(budgetSummary.totalCost).toBe(800000);
  });

  it('should not modify the input itinerary', () => {
    const refined = createItinerary();
    const before = structuredClone(refined);

    reconcileItinerary(refined, createContext());

    expect(refined).toEqual(before);
  });

  it('should record a failing step and keep going', () => {
    const boom: ReconciliationStep = (itinerary) => {
      itinerary.destination = 'Changed';
      throw new Error('bad data');
    };

    const { itinerary, report } = reconcileItinerary(createItinerary({ itinerary: [createDay(1)] }), createContext(), [
      ['boom', boom],
      ['dayCount', normalizeDayCount],
    ]);

    expect(report.errors).toEqual([{ step: 'boom', error: 'bad data' }]);
    expect(report.applied).toEqual(['dayCount']);
    expect(itinerary.destination).toBe('Tokyo, Japan');
    expect(itinerary.itinerary).toHaveLength(3);
  });
});
