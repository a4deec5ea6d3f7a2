import type { PlannerConfig } from '../config/planner.js';
import type { GatherRequest } from '../providers/types.js';
import { slotList, slotNumber, slotString, type SlotMap, type TripRequest } from '../schemas/slots.js';
import { addDays, diffDays, isIsoDate } from './dates.js';
import { InvalidRequestError } from './errors.js';

const COUPLE_TYPES = new Set(['couple']);

/**
 * Resolves the slots a generation needs. Throws InvalidRequestError naming
 * the missing slots when destination or dates cannot be resolved.
 */
export function buildTripRequest(slots: SlotMap, cfg: PlannerConfig): TripRequest {
  const destination = slotString(slots, 'destination');
  const startDate = slotString(slots, 'start_date');
  let endDate = slotString(slots, 'end_date');
  let durationDays = slotNumber(slots, 'duration_days');

  if (startDate && !endDate && durationDays && durationDays >= 1) {
    endDate = addDays(startDate, Math.round(durationDays) - 1);
  }

  const missing: string[] = [];
  if (!destination) missing.push('destination');
  if (!startDate) missing.push('start_date');
  if (!endDate && !durationDays) missing.push('duration_days');
  if (!destination || !startDate || !endDate || missing.length) {
    throw new InvalidRequestError(`Missing required trip details: ${missing.join(', ')}`, missing);
  }
  if (!isIsoDate(startDate) || !isIsoDate(endDate)) {
    throw new InvalidRequestError('Trip dates must be valid YYYY-MM-DD dates');
  }

  durationDays = diffDays(startDate, endDate) + 1;
  if (durationDays < 1) throw new InvalidRequestError('Trip end date is before its start date');
  if (durationDays > cfg.maxTripDays) {
    throw new InvalidRequestError(`Trips are limited to ${cfg.maxTripDays} days`);
  }

  const travelerType = slotString(slots, 'traveler_type');
  const budget = slotNumber(slots, 'budget');
  const origin = slotString(slots, 'origin');
  return {
    destination,
    ...(origin ? { origin } : {}),
    startDate,
    endDate,
    durationDays,
    ...(budget && budget > 0 ? { budget } : {}),
    currency: (slotString(slots, 'currency') ?? cfg.defaultCurrency).toUpperCase(),
    ...(travelerType ? { travelerType } : {}),
    travelers: Math.max(1, Math.round(slotNumber(slots, 'travelers') ?? (travelerType && COUPLE_TYPES.has(travelerType) ? 2 : 1))),
    interests: slotList(slots, 'interests'),
  };
}

/** Places used for transit legs: the centre, then one stop per interest. */
export function placesFor(trip: TripRequest): string[] {
  return [`${trip.destination} city centre`, ...trip.interests.slice(0, 3).map((i) => `${trip.destination} ${i}`)];
}

export function gatherRequestFor(trip: TripRequest, places: string[] = placesFor(trip)): GatherRequest {
  return {
    destination: trip.destination,
    ...(trip.origin ? { origin: trip.origin } : {}),
    startDate: trip.startDate,
    endDate: trip.endDate,
    interests: trip.interests,
    ...(trip.budget ? { budget: trip.budget } : {}),
    currency: trip.currency,
    travelers: trip.travelers,
    places,
  };
}
