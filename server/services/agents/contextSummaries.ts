/**
 * Plain-text summaries of provider data for model instructions.
 */

import type {
  FlightLeg,
  FlightOffer,
  HotelOffer,
  Place,
  WeatherReport,
} from '../providers/types';
import { formatAmount } from '../currency';

function stopsLabel(stops: number): string {
  return stops === 0 ? 'direct' : `${stops} stop${stops > 1 ? 's' : ''}`;
}

/** "ICN 2025-11-10T09:00 → NRT 2025-11-10T11:20 (2h 20m, direct)" */
function describeLeg(leg: FlightLeg): string {
  return `${leg.departure.airport} ${leg.departure.time.slice(0, 16)} → ${leg.arrival.airport} ${leg.arrival.time.slice(0, 16)} (${leg.duration}, ${stopsLabel(leg.stops)})`;
}

export function summarizeFlights(flights: FlightOffer[], limit = 3): string {
  return flights
    .slice(0, limit)
    .map((flight, i) => {
      const airlines = flight.validatingAirlineCodes.join(', ') || 'Unknown airline';
      const lines = [`${i + 1}. ${airlines}`, `   Price: ${flight.price.currency} ${formatAmount(flight.price.total)}`];
      if (flight.outbound) lines.push(`   Outbound: ${describeLeg(flight.outbound)}`);
      if (flight.inbound) lines.push(`   Inbound: ${describeLeg(flight.inbound)}`);
      return lines.join('\n');
    })
    .join('\n');
}

export function summarizeHotels(hotels: HotelOffer[], limit = 3): string {
  return hotels
    .slice(0, limit)
    .map((hotel, i) => {
      const lines = [
        `${i + 1}. ${hotel.name}`,
        `   Address: ${hotel.address}`,
        `   Per night: ${hotel.price.currency} ${formatAmount(hotel.price.perNight)}`,
        `   Total: ${hotel.price.currency} ${formatAmount(hotel.price.total)}`,
      ];
      if (hotel.rating !== null) lines.push(`   Rating: ${hotel.rating}-star`);
      if (hotel.boardType !== 'N/A') lines.push(`   Board: ${hotel.boardType}`);
      return lines.join('\n');
    })
    .join('\n');
}

export function summarizePlaces(places: Place[], limit = 5, restaurantsPerPlace = 3): string {
  return places
    .slice(0, limit)
    .map((place) => {
      const lines = [`- ${place.name} (rating: ${place.rating ?? 'N/A'})`, `  Address: ${place.address}`];
      const restaurants = place.nearbyRestaurants.slice(0, restaurantsPerPlace);
      if (restaurants.length > 0) {
        lines.push('  Nearby restaurants:');
        for (const restaurant of restaurants) {
          lines.push(`  - ${restaurant.name} (rating: ${restaurant.rating ?? 'N/A'}, price: ${restaurant.priceLevel ?? 'N/A'})`);
        }
      }
      return lines.join('\n');
    })
    .join('\n');
}

export function summarizeWeather(weather: WeatherReport): string {
  if (weather.daily.length > 0) {
    const lines = weather.daily.map(
      (day) => `- ${day.date}: ${day.tempMin}~${day.tempMax}°C, ${day.description}`,
    );
    if (weather.note) lines.push(`(${weather.note})`);
    return lines.join('\n');
  }
  if (weather.current) {
    return `Current: ${weather.current.temp}°C, ${weather.current.description}`;
  }
  return 'No forecast available';
}
