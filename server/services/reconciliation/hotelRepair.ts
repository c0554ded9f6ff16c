import type { SelectedHotel, TripRequest } from '@shared/schema';
import type { HotelOffer } from '../providers/types';
import { formatWithReference, getReferenceCurrency, toReferenceCurrency } from '../currency';
import { nightsBetween } from '../providers/hotelApi';
import { cleanseLocation } from '../orchestrator/collaborationOrchestrator';
import { cheapest, type ReconciliationStep } from './types';

export function hotelBookingUrl(hotelName: string, city: string): string {
  const query = `${hotelName} ${city} hotel booking`;
  return `https://www.google.com/search?q=${encodeURIComponent(query)}&hl=ko&ibp=htl`;
}

/** Total falls back to the pre-tax base; per-night to total / nights. */
export function toSelectedHotel(offer: HotelOffer, request: TripRequest): SelectedHotel {
  const currency = offer.price.currency || getReferenceCurrency();
  const total = offer.price.total || offer.price.base;
  const nights = Math.max(nightsBetween(request.departureDate, request.returnDate), 1);
  const perNight = offer.price.perNight || total / nights;

  return {
    name: offer.name || 'Recommended hotel',
    address: offer.address || 'Address unavailable',
    type: offer.rating !== null ? `${offer.rating}-star hotel` : 'Hotel',
    estimatedCost: total,
    perNightCost: perNight,
    currency,
    estimatedCostReference: toReferenceCurrency(total, currency),
    perNightCostReference: toReferenceCurrency(perNight, currency),
    priceDisplay: formatWithReference(total, currency),
    perNightDisplay: formatWithReference(perNight, currency),
    bookingUrl: hotelBookingUrl(offer.name, cleanseLocation(request.destination)),
  };
}

/**
 * Overwrite selectedHotel with the cheapest live offer and lodge every night
 * (all days but the last) there at the per-night reference cost.
 */
export const repairSelectedHotel: ReconciliationStep = (itinerary, { request, hotels }) => {
  const offer = cheapest(hotels);
  if (!offer) return [];

  const hotel = toSelectedHotel(offer, request);
  itinerary.selectedHotel = hotel;

  const nights = itinerary.itinerary.slice(0, -1);
  for (const day of nights) {
    day.accommodation = {
      name: hotel.name,
      address: hotel.address,
      type: hotel.type,
      estimatedCost: hotel.perNightCostReference,
      bookingUrl: hotel.bookingUrl,
    };
  }
  return [`Hotel set to ${hotel.name} for ${nights.length} night(s)`];
};
