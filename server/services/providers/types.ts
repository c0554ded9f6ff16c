/**
 * Provider capability contracts.
 *
 * Each external data source is an optional dependency of the orchestrator.
 * Calls resolve to a ProviderResult and never reject.
 */

// ============================================================================
// RESULT ENVELOPE
// ============================================================================

export type ProviderResult<T> =
  | { success: true; data: T }
  | { success: false; error: string };

export function ok<T>(data: T): ProviderResult<T> {
  return { success: true, data };
}

export function fail<T>(error: string): ProviderResult<T> {
  return { success: false, error };
}

// ============================================================================
// FLIGHTS
// ============================================================================

export interface FlightSearchParams {
  origin: string;
  destination: string;
  departureDate: string;
  returnDate?: string;
  adults: number;
  maxResults: number;
  travelClass?: 'ECONOMY' | 'PREMIUM_ECONOMY' | 'BUSINESS' | 'FIRST';
  currency?: string;
  nonStop?: boolean;
}

export interface FlightLeg {
  departure: { airport: string; time: string };
  arrival: { airport: string; time: string };
  duration: string;
  stops: number;
  layovers: Array<{ airport: string; duration: string }>;
  carriers: string[];
}

export interface FlightOffer {
  offerId: string;
  price: { total: number; currency: string; perPerson: number };
  outbound: FlightLeg | null;
  inbound: FlightLeg | null;
  seatsAvailable?: number;
  validatingAirlineCodes: string[];
}

export interface FlightSearchData {
  flights: FlightOffer[];
  searchParams: {
    origin: string;
    destination: string;
    departure: string;
    return?: string;
    adults: number;
    travelClass: string;
  };
}

export interface FlightSearch {
  searchFlights(params: FlightSearchParams): Promise<ProviderResult<FlightSearchData>>;
}

// ============================================================================
// HOTELS
// ============================================================================

export interface HotelSearchParams {
  city: string;
  checkIn: string;
  checkOut: string;
  adults: number;
  maxResults: number;
  currency?: string;
}

export interface HotelOffer {
  hotelId: string;
  name: string;
  rating: number | null;
  address: string;
  cityCode: string;
  price: {
    total: number;
    currency: string;
    base: number;
    taxTotal: number;
    perNight: number;
  };
  roomType: string;
  boardType: string;
  offerId: string;
}

export interface HotelSearchData {
  hotels: HotelOffer[];
  searchParams: { cityCode: string; checkIn: string; checkOut: string; adults: number };
}

export interface HotelSearch {
  searchHotels(params: HotelSearchParams): Promise<ProviderResult<HotelSearchData>>;
}

// ============================================================================
// PLACES
// ============================================================================

export interface Restaurant {
  placeId: string;
  name: string;
  address: string;
  rating: number | null;
  priceLevel: string | null;
}

export interface Place {
  placeId: string;
  name: string;
  address: string;
  rating: number | null;
  location: { lat: number; lng: number } | null;
  photoUrl: string | null;
  nearbyRestaurants: Restaurant[];
}

export interface PlacesData {
  places: Place[];
}

export interface PlacesSearch {
  searchAttractions(destination: string, limit: number): Promise<ProviderResult<PlacesData>>;
  searchRestaurantsNearPlace(place: Place, radiusMeters: number): Promise<ProviderResult<Restaurant[]>>;
}

// ============================================================================
// WEATHER
// ============================================================================

export interface DailyForecast {
  date: string;
  tempAvg: number;
  tempMin: number;
  tempMax: number;
  description: string;
  main: string;
}

export interface WeatherReport {
  city: string;
  daily: DailyForecast[];
  current?: { temp: number; description: string };
  /** Set when the trip lies past the forecast horizon and dates were shifted */
  note?: string;
}

export interface WeatherForecast {
  /** Forecast restricted to the trip window */
  forecastForDates(city: string, startDate: string, endDate: string): Promise<ProviderResult<WeatherReport>>;
  /** Next `days` days from today */
  forecast(city: string, days: number): Promise<ProviderResult<WeatherReport>>;
}

// ============================================================================
// REVIEWS
// ============================================================================

export interface ReviewMatch {
  id: string;
  score: number;
  text: string;
  hotel: string | null;
  rating: number | null;
}

export interface ReviewSearch {
  searchReviews(query: string, topK: number): Promise<ProviderResult<ReviewMatch[]>>;
}

// ============================================================================
// REGISTRY
// ============================================================================

export interface ProviderRegistry {
  flights?: FlightSearch;
  hotels?: HotelSearch;
  places?: PlacesSearch;
  weather?: WeatherForecast;
  reviews?: ReviewSearch;
}
