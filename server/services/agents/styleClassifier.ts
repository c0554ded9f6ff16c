/**
 * Style Classifier
 *
 * Keyword scoring over the request's values (never its field names), with a
 * party-size / budget fallback when nothing matches. A travelStyle hint that
 * names a catalogue style counts as a match for it. Deterministic.
 */

import { TRAVEL_STYLES, type StyleAnalysis, type StyleScore, type TravelStyleId } from '@shared/schema';

// ============================================================================
// CATALOGUE
// ============================================================================

export interface TravelStyleProfile {
  id: TravelStyleId;
  name: string;
  keywords: string[];
  characteristics: string[];
  recommendations: {
    accommodations: string[];
    activities: string[];
    dining: string[];
    transportation: string[];
  };
}

export const STYLE_CATALOGUE: Record<TravelStyleId, TravelStyleProfile> = {
  family: {
    id: 'family',
    name: 'Family trip',
    keywords: ['family', 'kids', 'children', '가족', '아이', '어린이'],
    characteristics: ['Safe surroundings', 'Family-friendly facilities', 'Educational value', 'Full amenities'],
    recommendations: {
      accommodations: ['family room', 'connecting rooms', 'resort with kids club'],
      activities: ['theme parks', 'museums', 'nature centers', 'beaches'],
      dining: ['family restaurants', 'kid-friendly menu', 'buffet style'],
      transportation: ['comfortable seating', 'easy transfers', 'short travel times'],
    },
  },
  business: {
    id: 'business',
    name: 'Business',
    keywords: ['business', 'corporate', 'meeting', 'conference', '비즈니스', '업무', '회의'],
    characteristics: ['Efficiency', 'High-quality service', 'Business facilities', 'Accessibility'],
    recommendations: {
      accommodations: ['business hotel', 'conference facilities', 'wifi', '24h service'],
      activities: ['city center', 'business district', 'networking venues'],
      dining: ['fine dining', 'business lunch', 'hotel restaurants'],
      transportation: ['airport proximity', 'taxi availability', 'punctual service'],
    },
  },
  backpacker: {
    id: 'backpacker',
    name: 'Backpacking',
    keywords: ['backpacker', 'budget', 'hostel', 'cheap', '백패커', '배낭여행', '저렴'],
    characteristics: ['Low cost', 'Local culture', 'Flexible schedule', 'Social activities'],
    recommendations: {
      accommodations: ['hostel', 'guesthouse', 'shared room', 'budget hotel'],
      activities: ['free walking tours', 'local markets', 'hiking', 'street food'],
      dining: ['street food', 'local cuisine', 'budget restaurants', 'cooking facilities'],
      transportation: ['public transport', 'walking', 'budget airlines', 'train'],
    },
  },
  cultural: {
    id: 'cultural',
    name: 'Cultural exploration',
    keywords: ['culture', 'history', 'museum', 'heritage', '문화', '역사', '박물관', '유산'],
    characteristics: ['Educational value', 'Historical significance', 'Cultural immersion', 'In-depth visits'],
    recommendations: {
      accommodations: ['boutique hotel', 'historic area', 'cultural district'],
      activities: ['museums', 'historical sites', 'cultural performances', 'art galleries'],
      dining: ['traditional cuisine', 'cultural restaurants', 'local specialties'],
      transportation: ['guided tours', 'cultural tour buses', 'walking tours'],
    },
  },
  luxury: {
    id: 'luxury',
    name: 'Luxury',
    keywords: ['luxury', 'premium', 'high-end', 'exclusive', '럭셔리', '프리미엄', '고급'],
    characteristics: ['Top-tier service', 'Exclusive experiences', 'Premium quality', 'Personalised service'],
    recommendations: {
      accommodations: ['5-star hotel', 'luxury resort', 'private villa', 'suite'],
      activities: ['private tours', 'exclusive experiences', 'premium attractions'],
      dining: ['michelin restaurants', 'fine dining', "chef's table", 'wine tasting'],
      transportation: ['business class', 'private transfer', 'luxury car'],
    },
  },
  adventure: {
    id: 'adventure',
    name: 'Adventure',
    keywords: ['adventure', 'outdoor', 'extreme', 'hiking', '모험', '아웃도어', '등산', '익스트림'],
    characteristics: ['Active', 'Challenging', 'Close to nature', 'Hands-on'],
    recommendations: {
      accommodations: ['mountain lodge', 'camping', 'eco-lodge', 'adventure hostel'],
      activities: ['hiking', 'rock climbing', 'water sports', 'wildlife watching'],
      dining: ['local food', 'outdoor dining', 'energy food', 'local specialties'],
      transportation: ['4WD vehicle', 'hiking', 'adventure tours', 'local transport'],
    },
  },
};

const FAMILY_PARTY_SIZE = 3;
const LUXURY_BUDGET = 3000000;
const BACKPACKER_BUDGET = 1000000;

// ============================================================================
// CLASSIFICATION
// ============================================================================

/**
 * Flatten every value under the request (recursively) into one lower-cased
 * string. Nested object keys count as text; top-level field names do not.
 */
function collectText(value: unknown, includeKeys: boolean): string[] {
  if (value === null || value === undefined) return [];
  if (Array.isArray(value)) return value.flatMap((item) => collectText(item, true));
  if (typeof value === 'object') {
    return Object.entries(value).flatMap(([key, nested]) => [
      ...(includeKeys ? [key] : []),
      ...collectText(nested, true),
    ]);
  }
  return [String(value)];
}

function toNumber(value: unknown, fallback: number): number {
  const n = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(n) ? n : fallback;
}

export function classifyTravelStyle(request: Record<string, unknown>): StyleAnalysis {
  const text = collectText(request, false).join(' ').toLowerCase();
  const hint = typeof request.travelStyle === 'string' ? request.travelStyle.trim().toLowerCase() : '';

  const scoreOf = (id: TravelStyleId): StyleScore => {
    const matchedKeywords = STYLE_CATALOGUE[id].keywords.filter((keyword) => text.includes(keyword));
    if (hint === id && !matchedKeywords.includes(id)) matchedKeywords.push(id);
    return { score: matchedKeywords.length, matchedKeywords };
  };
  const allScores: Record<TravelStyleId, StyleScore> = {
    family: scoreOf('family'),
    business: scoreOf('business'),
    backpacker: scoreOf('backpacker'),
    cultural: scoreOf('cultural'),
    luxury: scoreOf('luxury'),
    adventure: scoreOf('adventure'),
  };

  // First style in declaration order wins ties
  let primary: TravelStyleId = TRAVEL_STYLES[0];
  for (const id of TRAVEL_STYLES) {
    if (allScores[id].score > allScores[primary].score) primary = id;
  }

  if (allScores[primary].score > 0) {
    return buildAnalysis(primary, allScores);
  }

  const people = toNumber(request.people, 1);
  const budget = toNumber(request.budget, 0);

  if (people >= FAMILY_PARTY_SIZE) return buildAnalysis('family', allScores, 'party_size');
  if (budget >= LUXURY_BUDGET) return buildAnalysis('luxury', allScores, 'high_budget');
  if (budget <= BACKPACKER_BUDGET) return buildAnalysis('backpacker', allScores, 'low_budget');
  return buildAnalysis('cultural', allScores, 'default');
}

function buildAnalysis(
  styleId: TravelStyleId,
  allScores: Record<TravelStyleId, StyleScore>,
  fallbackReason?: StyleAnalysis['fallbackReason'],
): StyleAnalysis {
  const profile = STYLE_CATALOGUE[styleId];
  return {
    primaryStyle: styleId,
    styleName: profile.name,
    confidence: allScores[styleId].score,
    matchedKeywords: allScores[styleId].matchedKeywords,
    characteristics: profile.characteristics,
    allScores,
    ...(fallbackReason ? { fallbackReason } : {}),
  };
}
