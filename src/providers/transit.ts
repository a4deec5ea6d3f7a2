import { z } from 'zod';
import { fetchJSON } from '../util/fetch.js';
import { classifyFailure } from './errors.js';
import type {
  AdapterOutcome,
  FailureKind,
  FetchOptions,
  GatherRequest,
  ProviderAdapter,
  TransitLeg,
} from './types.js';

const DIRECTIONS_URL = 'https://maps.googleapis.com/maps/api/directions/json';

const DirectionsSchema = z.object({
  status: z.string(),
  error_message: z.string().optional(),
  routes: z.array(
    z.object({
      summary: z.string().optional(),
      legs: z.array(
        z.object({
          duration: z.object({ value: z.number() }),
          distance: z.object({ value: z.number() }),
        }),
      ),
    }),
  ),
});

const STATUS_KINDS: Record<string, FailureKind> = {
  REQUEST_DENIED: 'auth_error',
  OVER_QUERY_LIMIT: 'rate_limit',
  OVER_DAILY_LIMIT: 'rate_limit',
  INVALID_REQUEST: 'invalid_response',
  UNKNOWN_ERROR: 'server_error',
};

/** Google Directions in transit mode between consecutive places of interest. */
export class GoogleTransitAdapter implements ProviderAdapter<'transit'> {
  readonly source = 'transit' as const;
  readonly configured: boolean;

  constructor(private readonly apiKey: string | undefined) {
    this.configured = Boolean(apiKey);
  }

  async fetch(req: GatherRequest, opts: FetchOptions): Promise<AdapterOutcome<'transit'>> {
    const legs: TransitLeg[] = [];
    try {
      for (let i = 1; i < req.places.length; i++) {
        const from = req.places[i - 1] ?? req.destination;
        const to = req.places[i] ?? req.destination;
        const params = new URLSearchParams({
          origin: `${from}, ${req.destination}`,
          destination: `${to}, ${req.destination}`,
          mode: 'transit',
          key: this.apiKey ?? '',
        });
        const body = DirectionsSchema.parse(
          await fetchJSON(`${DIRECTIONS_URL}?${params.toString()}`, {
            timeoutMs: opts.timeoutMs,
            signal: opts.signal,
            target: 'google:directions',
          }),
        );
        const failureKind = STATUS_KINDS[body.status];
        if (failureKind) {
          return { ok: false, failure: { kind: failureKind, message: body.error_message ?? body.status } };
        }
        const route = body.routes[0];
        const leg = route?.legs[0];
        if (!route || !leg) continue;
        legs.push({
          from,
          to,
          durationMinutes: Math.round(leg.duration.value / 60),
          distanceMeters: leg.distance.value,
          mode: 'transit',
          summary: route.summary ?? '',
          estimated: false,
        });
      }
      return { ok: true, payload: { source: 'transit', legs } };
    } catch (err) {
      return { ok: false, failure: classifyFailure(err) };
    }
  }
}
