import type Amadeus from 'amadeus';
import { z } from 'zod';
import { diffDays } from '../core/dates.js';
import { lookupAirport } from './airports.js';
import { classifyFailure } from './errors.js';
import type { AdapterOutcome, FetchOptions, GatherRequest, HotelOffer, HotelTier, ProviderAdapter } from './types.js';

const HotelListSchema = z.array(z.object({ hotelId: z.string() }));

const HotelOffersSchema = z.array(
  z.object({
    hotel: z.object({ name: z.string(), rating: z.string().optional() }),
    offers: z.array(z.object({ price: z.object({ total: z.string(), currency: z.string() }) })).min(1),
  }),
);

/** Splits offers sorted by nightly price into thirds. */
export function tierFor(index: number, count: number): HotelTier {
  if (count < 3) return 'unknown';
  const third = count / 3;
  if (index < third) return 'budget';
  if (index < 2 * third) return 'mid-range';
  return 'upscale';
}

/** Amadeus hotel list by city code, then offers for up to 20 of those hotels. */
export class AmadeusHotelsAdapter implements ProviderAdapter<'hotels'> {
  readonly source = 'hotels' as const;

  constructor(
    private readonly client: () => Amadeus,
    readonly configured: boolean,
  ) {}

  async fetch(req: GatherRequest, opts: FetchOptions): Promise<AdapterOutcome<'hotels'>> {
    const codes = lookupAirport(req.destination);
    if (!codes) return { ok: false, failure: { kind: 'not_found', message: 'no_city_code' } };

    try {
      const amadeus = this.client();
      const list = await amadeus.referenceData.locations.hotels.byCity.get({ cityCode: codes.city });
      const ids = HotelListSchema.parse(list.data).slice(0, 20).map((h) => h.hotelId);
      if (!ids.length) return { ok: false, failure: { kind: 'not_found', message: 'no_hotels' } };
      if (opts.signal.aborted) return { ok: false, failure: { kind: 'cancelled', message: 'aborted' } };

      const response = await amadeus.shopping.hotelOffersSearch.get({
        hotelIds: ids.join(','),
        checkInDate: req.startDate,
        checkOutDate: req.endDate,
        adults: Math.max(1, req.travelers),
        currency: req.currency,
      });
      const nights = Math.max(1, diffDays(req.startDate, req.endDate));
      const priced = HotelOffersSchema.parse(response.data)
        .map(({ hotel, offers }) => {
          const total = Number(offers[0]?.price.total ?? 0);
          return {
            name: hotel.name,
            total,
            pricePerNight: Math.round(total / nights),
            currency: offers[0]?.price.currency ?? req.currency,
            rating: hotel.rating ? Number(hotel.rating) : undefined,
          };
        })
        .sort((a, b) => a.pricePerNight - b.pricePerNight);

      const offers: HotelOffer[] = priced.map((h, i) => ({
        name: h.name,
        tier: tierFor(i, priced.length),
        pricePerNight: h.pricePerNight,
        total: h.total,
        currency: h.currency,
        ...(h.rating !== undefined ? { rating: h.rating } : {}),
        estimated: false,
      }));
      if (!offers.length) return { ok: false, failure: { kind: 'not_found', message: 'no_offers' } };
      return { ok: true, payload: { source: 'hotels', offers } };
    } catch (err) {
      return { ok: false, failure: classifyFailure(err) };
    }
  }
}
