import { z } from 'zod';
import { fetchJSON } from '../util/fetch.js';
import { classifyFailure } from './errors.js';
import type { AdapterOutcome, DailyWeather, FetchOptions, GatherRequest, ProviderAdapter } from './types.js';

const GEOCODE_URL = 'https://geocoding-api.open-meteo.com/v1/search';
const FORECAST_URL = 'https://api.open-meteo.com/v1/forecast';

const GeocodeSchema = z.object({
  results: z
    .array(z.object({ name: z.string(), latitude: z.number(), longitude: z.number() }))
    .optional(),
});

const ForecastSchema = z.object({
  daily: z.object({
    time: z.array(z.string()),
    weathercode: z.array(z.number().nullable()),
    temperature_2m_max: z.array(z.number().nullable()),
    temperature_2m_min: z.array(z.number().nullable()),
    precipitation_sum: z.array(z.number().nullable()),
  }),
});

/** WMO weather interpretation codes, grouped. */
export function weatherCodeToText(code: number | null): string {
  if (code === null) return 'Unknown';
  if (code === 0) return 'Clear sky';
  if (code <= 2) return 'Partly cloudy';
  if (code === 3) return 'Overcast';
  if (code <= 48) return 'Fog';
  if (code <= 57) return 'Drizzle';
  if (code <= 67) return 'Rain';
  if (code <= 77) return 'Snow';
  if (code <= 82) return 'Rain showers';
  if (code <= 86) return 'Snow showers';
  return 'Thunderstorm';
}

/** Open-Meteo geocoding plus daily forecast. Needs no credentials. */
export class OpenMeteoWeatherAdapter implements ProviderAdapter<'weather'> {
  readonly source = 'weather' as const;
  readonly configured = true;

  async fetch(req: GatherRequest, opts: FetchOptions): Promise<AdapterOutcome<'weather'>> {
    try {
      const geoUrl = `${GEOCODE_URL}?name=${encodeURIComponent(req.destination)}&count=1&language=en&format=json`;
      const geo = GeocodeSchema.parse(
        await fetchJSON(geoUrl, { timeoutMs: opts.timeoutMs, signal: opts.signal, target: 'open-meteo:geocode' }),
      );
      const place = geo.results?.[0];
      if (!place) {
        return { ok: false, failure: { kind: 'not_found', message: 'destination_not_geocoded' } };
      }

      const params = new URLSearchParams({
        latitude: String(place.latitude),
        longitude: String(place.longitude),
        daily: 'weathercode,temperature_2m_max,temperature_2m_min,precipitation_sum',
        start_date: req.startDate,
        end_date: req.endDate,
        timezone: 'auto',
      });
      const forecast = ForecastSchema.parse(
        await fetchJSON(`${FORECAST_URL}?${params.toString()}`, {
          timeoutMs: opts.timeoutMs,
          signal: opts.signal,
          target: 'open-meteo:forecast',
        }),
      );

      const { daily } = forecast;
      const days: DailyWeather[] = daily.time.map((date, i) => ({
        date,
        highC: daily.temperature_2m_max[i] ?? 0,
        lowC: daily.temperature_2m_min[i] ?? 0,
        precipitationMm: daily.precipitation_sum[i] ?? 0,
        condition: weatherCodeToText(daily.weathercode[i] ?? null),
        estimated: false,
      }));
      return { ok: true, payload: { source: 'weather', days } };
    } catch (err) {
      return { ok: false, failure: classifyFailure(err) };
    }
  }
}
