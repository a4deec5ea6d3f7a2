import type Amadeus from 'amadeus';
import { z } from 'zod';
import { lookupAirport } from './airports.js';
import { classifyFailure } from './errors.js';
import type { AdapterOutcome, FetchOptions, FlightOffer, GatherRequest, ProviderAdapter } from './types.js';

const FlightOffersSchema = z.array(
  z.object({
    validatingAirlineCodes: z.array(z.string()).optional(),
    price: z.object({ grandTotal: z.string(), currency: z.string() }),
    itineraries: z
      .array(
        z.object({
          duration: z.string().optional(),
          segments: z
            .array(
              z.object({
                carrierCode: z.string(),
                departure: z.object({ iataCode: z.string() }),
                arrival: z.object({ iataCode: z.string() }),
              }),
            )
            .min(1),
        }),
      )
      .min(1),
  }),
);

/** `PT2H35M` to hours. */
export function isoDurationHours(value: string | undefined): number {
  const m = /^PT(?:(\d+)H)?(?:(\d+)M)?$/.exec(value ?? '');
  if (!m) return 0;
  const hours = Number(m[1] ?? 0) + Number(m[2] ?? 0) / 60;
  return Math.round(hours * 10) / 10;
}

export class AmadeusFlightsAdapter implements ProviderAdapter<'flights'> {
  readonly source = 'flights' as const;

  constructor(
    private readonly client: () => Amadeus,
    readonly configured: boolean,
    private readonly defaultOrigin: string,
  ) {}

  async fetch(req: GatherRequest, opts: FetchOptions): Promise<AdapterOutcome<'flights'>> {
    const origin = lookupAirport(req.origin ?? this.defaultOrigin);
    const destination = lookupAirport(req.destination);
    if (!origin || !destination) {
      return { ok: false, failure: { kind: 'not_found', message: 'no_airport_code' } };
    }
    if (opts.signal.aborted) {
      return { ok: false, failure: { kind: 'cancelled', message: 'aborted' } };
    }

    try {
      const response = await this.client().shopping.flightOffersSearch.get({
        originLocationCode: origin.airport,
        destinationLocationCode: destination.airport,
        departureDate: req.startDate,
        returnDate: req.endDate,
        adults: Math.max(1, req.travelers),
        currencyCode: req.currency,
        max: 5,
      });
      const offers: FlightOffer[] = FlightOffersSchema.parse(response.data).map((offer) => {
        const outbound = offer.itineraries[0];
        const segments = outbound?.segments ?? [];
        return {
          carrier: offer.validatingAirlineCodes?.[0] ?? segments[0]?.carrierCode ?? 'unknown',
          origin: segments[0]?.departure.iataCode ?? origin.airport,
          destination: segments[segments.length - 1]?.arrival.iataCode ?? destination.airport,
          departureDate: req.startDate,
          returnDate: req.endDate,
          price: Number(offer.price.grandTotal),
          currency: offer.price.currency,
          stops: Math.max(0, segments.length - 1),
          durationHours: isoDurationHours(outbound?.duration),
          estimated: false,
        };
      });
      if (!offers.length) return { ok: false, failure: { kind: 'not_found', message: 'no_offers' } };
      return { ok: true, payload: { source: 'flights', offers } };
    } catch (err) {
      return { ok: false, failure: classifyFailure(err) };
    }
  }
}
