export const SOURCE_NAMES = ['weather', 'flights', 'hotels', 'transit', 'images'] as const;

export type SourceName = (typeof SOURCE_NAMES)[number];

/** What one itinerary needs from the providers. Dates are ISO `YYYY-MM-DD`. */
export interface GatherRequest {
  destination: string;
  origin?: string;
  startDate: string;
  endDate: string;
  interests: string[];
  budget?: number;
  currency: string;
  travelers: number;
  /** Places of interest for transit legs and image lookups; may be empty. */
  places: string[];
}

export interface DailyWeather {
  date: string;
  highC: number;
  lowC: number;
  precipitationMm: number;
  condition: string;
  estimated: boolean;
}

export interface FlightOffer {
  carrier: string;
  origin: string;
  destination: string;
  departureDate: string;
  returnDate?: string;
  price: number;
  currency: string;
  stops: number;
  durationHours: number;
  estimated: boolean;
}

export type HotelTier = 'budget' | 'mid-range' | 'upscale' | 'unknown';

export interface HotelOffer {
  name: string;
  tier: HotelTier;
  pricePerNight: number;
  total: number;
  currency: string;
  rating?: number;
  estimated: boolean;
}

export interface TransitLeg {
  from: string;
  to: string;
  durationMinutes: number;
  distanceMeters: number;
  mode: string;
  summary: string;
  estimated: boolean;
}

export interface ImageRef {
  query: string;
  url: string | null;
  title: string;
  estimated: boolean;
}

export interface WeatherPayload {
  source: 'weather';
  days: DailyWeather[];
}

export interface FlightsPayload {
  source: 'flights';
  offers: FlightOffer[];
}

export interface HotelsPayload {
  source: 'hotels';
  offers: HotelOffer[];
}

export interface TransitPayload {
  source: 'transit';
  legs: TransitLeg[];
}

export interface ImagesPayload {
  source: 'images';
  images: ImageRef[];
}

export interface PayloadBySource {
  weather: WeatherPayload;
  flights: FlightsPayload;
  hotels: HotelsPayload;
  transit: TransitPayload;
  images: ImagesPayload;
}

export type ProviderPayload = PayloadBySource[SourceName];

export type FailureKind =
  | 'timeout'
  | 'rate_limit'
  | 'auth_error'
  | 'not_found'
  | 'server_error'
  | 'network_error'
  | 'invalid_response'
  | 'circuit_open'
  | 'cancelled'
  | 'unknown_error';

export interface ProviderFailure {
  kind: FailureKind;
  message: string;
  status?: number;
}

export type AdapterOutcome<S extends SourceName> =
  | { ok: true; payload: PayloadBySource[S] }
  | { ok: false; failure: ProviderFailure };

export interface FetchOptions {
  timeoutMs: number;
  signal: AbortSignal;
}

/**
 * Uniform contract every provider variant implements. Adapters translate
 * their own faults into a `ProviderFailure` instead of throwing.
 */
export interface ProviderAdapter<S extends SourceName = SourceName> {
  readonly source: S;
  /** False when credentials are absent; the coordinator records `missing` without calling. */
  readonly configured: boolean;
  fetch(request: GatherRequest, opts: FetchOptions): Promise<AdapterOutcome<S>>;
}

export type AdapterSet = { [S in SourceName]?: ProviderAdapter<S> };

export type SourceOutcome = 'ok' | 'fallback' | 'error' | 'missing';

interface ResultBase<S extends SourceName> {
  source: S;
  latencyMs: number;
}

/**
 * One per provider per gather. `fallback` payloads come from the synthesizer
 * and are always flagged `synthesized` with the failure that caused them.
 */
export type SourceResult<S extends SourceName = SourceName> =
  | (ResultBase<S> & { outcome: 'ok'; payload: PayloadBySource[S]; synthesized: false })
  | (ResultBase<S> & {
      outcome: 'fallback';
      payload: PayloadBySource[S];
      synthesized: true;
      reason: FailureKind;
      message: string;
      confidence: number;
    })
  | (ResultBase<S> & { outcome: 'error'; synthesized: false; reason: FailureKind; message: string })
  | (ResultBase<S> & { outcome: 'missing'; synthesized: false; reason: 'unconfigured' });

export type GatherResults = { [S in SourceName]?: SourceResult<S> };
