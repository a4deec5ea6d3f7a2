import type pino from 'pino';
import { CompositionFailureError } from './errors.js';
import { payloadOf } from './gather.js';
import { weatherOn, type CompositionRequest, type DayDraft, type DaySlot, type PlanComposer } from './composer.js';
import { datesBetween } from './dates.js';
import {
  SOURCE_NAMES,
  type GatherResults,
  type SourceResult,
} from '../providers/types.js';
import type {
  Activity,
  BookingAnnotations,
  DayPlan,
  SourceFlag,
  WeatherAnnotation,
} from '../schemas/itinerary.js';
import type { SourceStatus } from '../schemas/task.js';
import type { TripRequest } from '../schemas/slots.js';

export type ComposedBy = DayPlan['composedBy'];

export interface ComposePolicy {
  primary: PlanComposer;
  template: PlanComposer;
  /** Use the template when the primary composer fails. */
  fallbackPlan: boolean;
  log: pino.Logger;
}

export interface ComposedDays {
  drafts: DayDraft[];
  composedBy: ComposedBy;
}

export function daySlotsFor(trip: TripRequest): DaySlot[] {
  return datesBetween(trip.startDate, trip.endDate).map((date, i) => ({ dayNumber: i + 1, date }));
}

/**
 * Runs the primary composer and, when allowed, the template composer after a
 * composition failure. Without a fallback the failure fails the task.
 */
export async function composeDays(
  policy: ComposePolicy,
  request: CompositionRequest,
  signal?: AbortSignal,
): Promise<ComposedDays> {
  if (policy.primary.kind === 'template') {
    return { drafts: await policy.primary.compose(request, signal), composedBy: 'template' };
  }
  try {
    return { drafts: await policy.primary.compose(request, signal), composedBy: policy.primary.kind };
  } catch (err) {
    if (!policy.fallbackPlan) {
      throw err instanceof CompositionFailureError ? err : new CompositionFailureError('Plan composition failed', err);
    }
    policy.log.warn({ err }, 'compose:template_fallback');
    return { drafts: await policy.template.compose(request, signal), composedBy: 'template' };
  }
}

const hasSynthesized = (results: GatherResults) =>
  SOURCE_NAMES.some((s) => results[s]?.synthesized === true);

export function weatherAnnotation(results: GatherResults, date: string): WeatherAnnotation | null {
  const w = weatherOn(results, date);
  if (!w) return null;
  return {
    highC: w.highC,
    lowC: w.lowC,
    precipitationMm: w.precipitationMm,
    condition: w.condition,
    estimated: w.estimated,
  };
}

/** Average leg time times the hops between a day's activities. */
export function transitMinutesFor(results: GatherResults, activityCount: number): number | null {
  const legs = payloadOf(results, 'transit')?.legs ?? [];
  if (!legs.length) return null;
  const avg = legs.reduce((sum, leg) => sum + leg.durationMinutes, 0) / legs.length;
  return Math.round(avg * Math.max(0, activityCount - 1));
}

export function imageUrlAt(results: GatherResults, index: number): string | null {
  const images = payloadOf(results, 'images')?.images ?? [];
  if (!images.length) return null;
  return images[index % images.length]?.url ?? null;
}

export const activityId = (dayNumber: number, index: number, revision?: number) =>
  `day-${dayNumber}-act-${index + 1}${revision ? `-v${revision}` : ''}`;

export interface BuildDayOptions {
  composedBy: ComposedBy;
  /** Appended to activity ids minted by a replan. */
  revision?: number;
  /** Used when weather was not gathered for this build. */
  inheritedWeather?: WeatherAnnotation | null;
}

export function buildDayPlan(
  draft: DayDraft,
  slot: DaySlot,
  results: GatherResults,
  opts: BuildDayOptions,
): DayPlan {
  const estimated = opts.composedBy === 'template' || hasSynthesized(results);
  const activities: Activity[] = draft.activities.map((a, i) => ({
    ...a,
    id: activityId(slot.dayNumber, i, opts.revision),
    imageUrl: imageUrlAt(results, slot.dayNumber - 1 + i),
    estimated,
  }));
  const weather = results.weather ? weatherAnnotation(results, slot.date) : (opts.inheritedWeather ?? null);
  return {
    id: `day-${slot.dayNumber}`,
    dayNumber: slot.dayNumber,
    date: slot.date,
    title: draft.title,
    summary: draft.summary,
    activities,
    weather,
    transitMinutes: transitMinutesFor(results, activities.length),
    estimated: estimated || weather?.estimated === true,
    composedBy: opts.composedBy,
  };
}

export function sourceFlag(result: SourceResult): SourceFlag {
  switch (result.outcome) {
    case 'ok':
      return { source: result.source, outcome: 'ok', synthesized: false };
    case 'fallback':
      return {
        source: result.source,
        outcome: 'fallback',
        synthesized: true,
        reason: result.reason,
        confidence: result.confidence,
      };
    case 'error':
    case 'missing':
      return { source: result.source, outcome: result.outcome, synthesized: false, reason: result.reason };
  }
}

/** Flags in source order; sources absent from `results` come from `inherited`. */
export function sourceFlags(results: GatherResults, inherited: readonly SourceFlag[] = []): SourceFlag[] {
  const flags: SourceFlag[] = [];
  for (const source of SOURCE_NAMES) {
    const result: SourceResult | undefined = results[source];
    const flag = result ? sourceFlag(result) : inherited.find((f) => f.source === source);
    if (flag) flags.push(flag);
  }
  return flags;
}

export function statusFromFlag(flag: SourceFlag): SourceStatus {
  switch (flag.outcome) {
    case 'ok':
      return { name: flag.source, status: 'active' };
    case 'missing':
      return { name: flag.source, status: 'missing' };
    default:
      return { name: flag.source, status: 'degraded', ...(flag.reason ? { reason: flag.reason } : {}) };
  }
}

export function sourceStatuses(results: GatherResults, inherited: readonly SourceFlag[] = []): SourceStatus[] {
  return sourceFlags(results, inherited).map(statusFromFlag);
}

export function bookingAnnotations(results: GatherResults): BookingAnnotations {
  const flights = payloadOf(results, 'flights')?.offers ?? [];
  const hotels = payloadOf(results, 'hotels')?.offers ?? [];
  const cheapest = [...flights].sort((a, b) => a.price - b.price)[0];
  const hotel = hotels.find((h) => h.tier === 'mid-range') ?? hotels[0];
  return {
    flight: cheapest
      ? { carrier: cheapest.carrier, price: cheapest.price, currency: cheapest.currency, estimated: cheapest.estimated }
      : null,
    hotel: hotel
      ? {
          name: hotel.name,
          tier: hotel.tier,
          pricePerNight: hotel.pricePerNight,
          total: hotel.total,
          currency: hotel.currency,
          estimated: hotel.estimated,
        }
      : null,
  };
}

