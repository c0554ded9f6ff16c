import { z } from "zod";

// ============================================================================
// LIMITS
// ============================================================================

/** Longest departure→return span accepted from callers */
export const MAX_TRIP_SPAN_DAYS = 14;

/** Number of days the planner details day-by-day */
export const MAX_ITINERARY_DAYS = 5;

// ============================================================================
// TRIP REQUEST
// ============================================================================

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Date must be YYYY-MM-DD format");

export const TRAVEL_STYLES = [
  "family",
  "business",
  "backpacker",
  "cultural",
  "luxury",
  "adventure",
] as const;

export type TravelStyleId = (typeof TRAVEL_STYLES)[number];

export const planRequestSchema = z.object({
  origin: z.string().trim().min(1, "Origin is required"),
  destination: z.string().trim().min(1, "Destination is required"),
  departureDate: isoDate,
  returnDate: isoDate,
  people: z.coerce.number().int().min(1).max(9).default(2),
  budget: z.coerce.number().int().positive("Budget must be positive").default(2000000),
  travelStyle: z.string().trim().optional(),
  preferences: z.record(z.string()).default({}),
});

export type PlanRequestInput = z.input<typeof planRequestSchema>;
export type PlanRequest = z.infer<typeof planRequestSchema>;

export interface TripRequest {
  origin: string;
  destination: string;
  departureDate: string;
  returnDate: string;
  /** Full departure→return span, inclusive */
  tripDays: number;
  /** Detailed itinerary days (tripDays clamped to MAX_ITINERARY_DAYS) */
  days: number;
  people: number;
  budget: number;
  preferences: Record<string, string>;
  travelStyle?: string;
}

// ============================================================================
// STYLE ANALYSIS
// ============================================================================

export interface StyleScore {
  score: number;
  matchedKeywords: string[];
}

export interface StyleAnalysis {
  primaryStyle: TravelStyleId;
  styleName: string;
  confidence: number;
  matchedKeywords: string[];
  characteristics: string[];
  allScores: Record<TravelStyleId, StyleScore>;
  /** Set when no keyword matched and party size / budget decided the style */
  fallbackReason?: "party_size" | "high_budget" | "low_budget" | "default";
}

// ============================================================================
// ITINERARY (model output, lenient parsing)
// ============================================================================

const text = (fallback = "") => z.coerce.string().catch(fallback);
const amount = z.coerce.number().catch(0);

export const transportationSchema = z.object({
  type: text(),
  details: text(),
  cost: amount,
  airline: z.string().optional().catch(undefined),
  flightNumber: z.string().optional().catch(undefined),
  bookingUrl: z.string().optional().catch(undefined),
});

export const accommodationSchema = z.object({
  name: text(),
  address: text(),
  type: text(),
  estimatedCost: amount,
  bookingUrl: z.string().optional().catch(undefined),
});

const NOT_APPLICABLE = new Set(["", "n/a", "na", "none", "-"]);

/** `null`, a missing value, or a `{ name: "N/A" }` stub all mean "no lodging this day" */
const dayAccommodationSchema = z.preprocess((value) => {
  if (value === undefined || value === null) return null;
  if (typeof value === "object" && "name" in value) {
    const name = String(value.name ?? "").trim().toLowerCase();
    if (NOT_APPLICABLE.has(name)) return null;
  }
  return value;
}, accommodationSchema.nullable().catch(null));

export const attractionSchema = z.object({
  name: text(),
  description: text(),
  estimatedCost: amount,
  reason: z.string().optional().catch(undefined),
  photoUrl: z.string().optional().catch(undefined),
});

export const mealSchema = z.object({
  type: text(),
  suggestion: text(),
  estimatedCost: amount,
  photoUrl: z.string().optional().catch(undefined),
});

export const itineraryDaySchema = z.object({
  day: z.coerce.number().int().catch(0),
  date: text(),
  transportation: transportationSchema.catch({ type: "", details: "", cost: 0 }),
  accommodation: dayAccommodationSchema,
  attractions: z.array(attractionSchema).catch([]),
  meals: z.array(mealSchema).catch([]),
  dailyCost: amount,
});

export const selectedFlightSchema = z.object({
  airline: text(),
  price: amount,
  outbound: text(),
  inbound: text(),
  bookingUrl: z.string().optional().catch(undefined),
});

export const selectedHotelSchema = z.object({
  name: text(),
  address: text(),
  type: text(),
  estimatedCost: amount,
  perNightCost: amount,
  currency: text("KRW"),
  estimatedCostReference: amount,
  perNightCostReference: amount,
  priceDisplay: text(),
  perNightDisplay: text(),
  bookingUrl: text("#"),
});

export const budgetBreakdownSchema = z.object({
  flightTotal: amount,
  hotelTotal: amount,
  foodTotal: amount,
  attractionsTotal: amount,
  transportationTotal: amount,
  total: amount,
});

export const itinerarySchema = z.object({
  destination: text(),
  days: z.coerce.number().int().catch(0),
  people: z.coerce.number().int().catch(0),
  estimatedCost: amount,
  selectedFlight: selectedFlightSchema.partial().optional().catch(undefined),
  selectedHotel: selectedHotelSchema.partial().optional().catch(undefined),
  itinerary: z.array(itineraryDaySchema),
  budgetBreakdown: budgetBreakdownSchema.partial().catch({}),
});

export type Transportation = z.infer<typeof transportationSchema>;
export type Accommodation = z.infer<typeof accommodationSchema>;
export type Attraction = z.infer<typeof attractionSchema>;
export type Meal = z.infer<typeof mealSchema>;
export type ItineraryDay = z.infer<typeof itineraryDaySchema>;
export type SelectedFlight = z.infer<typeof selectedFlightSchema>;
export type SelectedHotel = z.infer<typeof selectedHotelSchema>;
export type BudgetBreakdown = z.infer<typeof budgetBreakdownSchema>;
export type Itinerary = z.infer<typeof itinerarySchema>;

// ============================================================================
// HOTEL ANALYSIS (reviewer output)
// ============================================================================

const score = z.coerce.number().min(0).max(5).catch(0);

export const hotelAssessmentSchema = z.object({
  hotel: text("Unknown"),
  overallScore: score,
  sentiment: z
    .object({ location: score, room: score, service: score, value: score })
    .catch({ location: 0, room: 0, service: 0, value: 0 }),
  strengths: z.array(z.coerce.string()).catch([]),
  weaknesses: z.array(z.coerce.string()).catch([]),
  suitableFor: text(),
});

export const hotelRecommendationSchema = z.object({
  rank: z.coerce.number().int().catch(0),
  hotel: text("Unknown"),
  reason: text(),
});

export const hotelAnalysisResponseSchema = z.object({
  analysis: z.array(hotelAssessmentSchema).catch([]),
  recommendations: z.array(hotelRecommendationSchema).catch([]),
});

export type HotelAssessment = z.infer<typeof hotelAssessmentSchema>;
export type HotelRecommendation = z.infer<typeof hotelRecommendationSchema>;

export interface HotelAnalysis {
  analysis: HotelAssessment[];
  recommendations: HotelRecommendation[];
  topPick: string;
  totalReviewsAnalyzed: number;
}

export const EMPTY_HOTEL_ANALYSIS: HotelAnalysis = {
  analysis: [],
  recommendations: [],
  topPick: "N/A",
  totalReviewsAnalyzed: 0,
};

// ============================================================================
// COLLABORATION LOG
// ============================================================================

export type CommandStatus = "pending" | "completed" | "completed_with_warning" | "failed";

export interface CommandRecord {
  id: number;
  from: string;
  to: string;
  command: string;
  params: Record<string, unknown>;
  status: CommandStatus;
  timestamp: string;
  completedAt?: string;
  result?: string;
}

export interface CollaborationLog {
  startedAt: string;
  endedAt?: string;
  commands: CommandRecord[];
}

// ============================================================================
// BUDGET SUMMARY
// ============================================================================

export interface BudgetSummary {
  userBudget: number;
  flightTotal: number;
  hotelTotal: number;
  hotelCurrency: string;
  hotelTotalReference: number;
  totalCost: number;
  diff: number;
  isOver: boolean;
  overRate: number;
}
