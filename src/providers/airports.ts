import { z } from 'zod';
import airportTable from '../data/airports.json';

const AirportsSchema = z.record(z.object({ airport: z.string().length(3), city: z.string().length(3) }));

export type AirportCodes = z.infer<typeof AirportsSchema>[string];

const airports = AirportsSchema.parse(airportTable);

/**
 * IATA codes for a city name. A bare three-letter code is passed through as
 * both the airport and the city code.
 */
export function lookupAirport(place: string): AirportCodes | undefined {
  const trimmed = place.trim();
  if (/^[A-Z]{3}$/.test(trimmed)) return { airport: trimmed, city: trimmed };
  return airports[trimmed.toLowerCase()];
}
