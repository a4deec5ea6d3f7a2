import { createHash } from 'node:crypto';
import { z } from 'zod';
import climateTable from '../data/climate.json';
import { datesBetween, diffDays, monthOf } from './dates.js';
import { lookupAirport } from '../providers/airports.js';
import { imageQueries } from '../providers/images.js';
import type {
  GatherRequest,
  HotelOffer,
  HotelTier,
  PayloadBySource,
  ProviderFailure,
  SourceName,
  SourceResult,
} from '../providers/types.js';

const MonthlySchema = z.array(z.number()).length(12);
const NormalsSchema = z.object({ highC: MonthlySchema, lowC: MonthlySchema, precipMm: MonthlySchema });
const ClimateSchema = z.object({ default: NormalsSchema, cities: z.record(NormalsSchema) });
type Normals = z.infer<typeof NormalsSchema>;

const climate = ClimateSchema.parse(climateTable);

/** How much a synthesized payload of each kind should be trusted. */
export const FALLBACK_CONFIDENCE: Record<SourceName, number> = {
  weather: 0.5,
  flights: 0.6,
  hotels: 0.65,
  transit: 0.55,
  images: 0.3,
};

// Rough USD conversion so heuristic prices land in the trip's currency.
const USD_RATE: Record<string, number> = { USD: 1, THB: 35, EUR: 0.92, GBP: 0.79, JPY: 150, SGD: 1.35 };

const HOTEL_TIERS: Array<{ tier: HotelTier; usdPerNight: number; rating: number }> = [
  { tier: 'budget', usdPerNight: 30, rating: 3.2 },
  { tier: 'mid-range', usdPerNight: 80, rating: 4.0 },
  { tier: 'upscale', usdPerNight: 200, rating: 4.6 },
];

type Rng = () => number;

/** mulberry32 */
function createRng(seed: number): Rng {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function seedFor(source: SourceName, req: GatherRequest): number {
  const key = [source, req.destination.toLowerCase(), req.startDate, req.endDate, req.interests.join(',')].join('|');
  return createHash('sha256').update(key).digest().readUInt32BE(0);
}

const round1 = (n: number) => Math.round(n * 10) / 10;

function toCurrency(usd: number, currency: string): number {
  return Math.round(usd * (USD_RATE[currency.toUpperCase()] ?? 1));
}

function normalsFor(destination: string): Normals {
  return climate.cities[destination.trim().toLowerCase()] ?? climate.default;
}

function conditionFor(highC: number, precipMm: number): string {
  if (precipMm >= 8) return 'Rain showers likely';
  if (precipMm >= 3) return 'Scattered showers';
  if (highC >= 30) return 'Hot and mostly sunny';
  if (highC <= 5) return 'Cold';
  return 'Mild, partly cloudy';
}

type Builder<S extends SourceName> = (req: GatherRequest, rng: Rng) => PayloadBySource[S];

const builders: { [S in SourceName]: Builder<S> } = {
  weather(req, rng) {
    const normals = normalsFor(req.destination);
    const days = datesBetween(req.startDate, req.endDate).map((date) => {
      const m = monthOf(date) - 1;
      const swing = (rng() - 0.5) * 3;
      const highC = round1((normals.highC[m] ?? 25) + swing);
      const lowC = round1((normals.lowC[m] ?? 15) + swing);
      const precipitationMm = round1((normals.precipMm[m] ?? 2) * (0.6 + rng() * 0.8));
      return { date, highC, lowC, precipitationMm, condition: conditionFor(highC, precipitationMm), estimated: true };
    });
    return { source: 'weather', days };
  },

  flights(req, rng) {
    const travelers = Math.max(1, req.travelers);
    const origin = req.origin ? lookupAirport(req.origin)?.airport ?? req.origin.toUpperCase() : 'UNKNOWN';
    const destination = lookupAirport(req.destination)?.airport ?? req.destination.toUpperCase();
    // A third of the per-traveler budget, or a generic regional fare.
    const rate = USD_RATE[req.currency.toUpperCase()] ?? 1;
    const baseUsd = req.budget
      ? Math.min(Math.max((req.budget / rate / travelers) * 0.33, 60), 1500)
      : 120 + rng() * 380;
    const offers = [1, 1.25, 1.6].map((multiplier, i) => ({
      carrier: 'Estimated carrier',
      origin,
      destination,
      departureDate: req.startDate,
      returnDate: req.endDate,
      price: toCurrency(baseUsd * multiplier * travelers, req.currency),
      currency: req.currency,
      stops: i === 0 ? 1 : 0,
      durationHours: round1(1.5 + rng() * 6 + (i === 0 ? 2 : 0)),
      estimated: true,
    }));
    return { source: 'flights', offers };
  },

  hotels(req, rng) {
    const nights = Math.max(1, diffDays(req.startDate, req.endDate));
    const offers: HotelOffer[] = HOTEL_TIERS.map(({ tier, usdPerNight, rating }) => {
      const pricePerNight = toCurrency(usdPerNight * (0.85 + rng() * 0.3), req.currency);
      return {
        name: `${req.destination} ${tier} stay`,
        tier,
        pricePerNight,
        total: pricePerNight * nights,
        currency: req.currency,
        rating,
        estimated: true,
      };
    });
    return { source: 'hotels', offers };
  },

  transit(req) {
    const legs = req.places.slice(1).map((to, i) => ({
      from: req.places[i] ?? req.destination,
      to,
      durationMinutes: 30,
      distanceMeters: 5000,
      mode: 'estimated',
      summary: 'Estimated local transfer',
      estimated: true,
    }));
    return { source: 'transit', legs };
  },

  images(req) {
    return {
      source: 'images',
      images: imageQueries(req).map((query) => ({ query, url: null, title: query, estimated: true })),
    };
  },
};

const emptyPayloads: { [S in SourceName]: () => PayloadBySource[S] } = {
  weather: () => ({ source: 'weather', days: [] }),
  flights: () => ({ source: 'flights', offers: [] }),
  hotels: () => ({ source: 'hotels', offers: [] }),
  transit: () => ({ source: 'transit', legs: [] }),
  images: () => ({ source: 'images', images: [] }),
};

/**
 * Produces a labelled stand-in for a provider that failed. Pure: the same
 * source, request and failure always yield the same result, and it never
 * throws.
 */
export class FallbackSynthesizer {
  synthesize<S extends SourceName>(
    source: S,
    request: GatherRequest,
    failure: ProviderFailure,
    latencyMs = 0,
  ): SourceResult<S> {
    const build: Builder<S> = builders[source];
    let payload: PayloadBySource[S];
    try {
      payload = build(request, createRng(seedFor(source, request)));
    } catch {
      // Unparseable dates: an empty but still labelled payload.
      payload = emptyPayloads[source]();
    }
    return {
      source,
      outcome: 'fallback',
      payload,
      synthesized: true,
      reason: failure.kind,
      message: failure.message,
      confidence: FALLBACK_CONFIDENCE[source],
      latencyMs,
    };
  }
}
