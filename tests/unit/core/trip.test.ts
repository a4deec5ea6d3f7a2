import { addDays, datesBetween, diffDays, isIsoDate, nextWeekStart, upcomingSaturday } from '../../../src/core/dates.js';
import { InvalidRequestError } from '../../../src/core/errors.js';
import { buildTripRequest, gatherRequestFor, placesFor } from '../../../src/core/trip.js';
import { slotsFromValues } from '../../../src/core/planner.js';
import { FIXED_NOW, testConfig } from '../../helpers/fakes.js';

const at = FIXED_NOW.toISOString();

describe('buildTripRequest', () => {
  const cfg = testConfig();

  it('derives the end date from the duration', () => {
    const trip = buildTripRequest(
      slotsFromValues({ destination: 'Phuket', start_date: '2025-03-17', duration_days: 3, budget: 20000 }, at),
      cfg,
    );
    expect(trip).toEqual({
      destination: 'Phuket',
      startDate: '2025-03-17',
      endDate: '2025-03-19',
      durationDays: 3,
      budget: 20000,
      currency: 'THB',
      travelers: 1,
      interests: [],
    });
  });

  it('counts two travelers for a couple and splits listed interests', () => {
    const trip = buildTripRequest(
      slotsFromValues(
        { destination: 'Krabi', start_date: '2025-04-01', end_date: '2025-04-02', traveler_type: 'couple', interests: 'food, beaches', currency: 'usd' },
        at,
      ),
      cfg,
    );
    expect(trip).toMatchObject({ travelers: 2, interests: ['food', 'beaches'], currency: 'USD', durationDays: 2 });
  });

  it('names every missing slot', () => {
    expect.assertions(2);
    try {
      buildTripRequest(slotsFromValues({ budget: 5000 }, at), cfg);
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidRequestError);
      if (err instanceof InvalidRequestError) {
        expect(err.missing).toEqual(['destination', 'start_date', 'duration_days']);
      }
    }
  });

  it('rejects reversed dates and trips over the day limit', () => {
    expect(() =>
      buildTripRequest(slotsFromValues({ destination: 'Phuket', start_date: '2025-03-17', end_date: '2025-03-10' }, at), cfg),
    ).toThrow('Trip end date is before its start date');
    expect(() =>
      buildTripRequest(
        slotsFromValues({ destination: 'Phuket', start_date: '2025-03-17', duration_days: cfg.maxTripDays + 1 }, at),
        cfg,
      ),
    ).toThrow(`Trips are limited to ${cfg.maxTripDays} days`);
  });
});

describe('placesFor and gatherRequestFor', () => {
  it('starts at the centre and adds one stop per interest, up to three', () => {
    const trip = buildTripRequest(
      slotsFromValues(
        { destination: 'Phuket', start_date: '2025-03-17', duration_days: 2, interests: ['beaches', 'food', 'temples', 'markets'] },
        at,
      ),
      testConfig(),
    );
    expect(placesFor(trip)).toEqual(['Phuket city centre', 'Phuket beaches', 'Phuket food', 'Phuket temples']);
    expect(gatherRequestFor(trip)).toMatchObject({
      destination: 'Phuket',
      startDate: '2025-03-17',
      endDate: '2025-03-18',
      travelers: 1,
    });
  });
});

describe('dates', () => {
  it('does calendar arithmetic in UTC', () => {
    expect(addDays('2025-02-27', 2)).toBe('2025-03-01');
    expect(diffDays('2025-03-17', '2025-03-10')).toBe(-7);
    expect(datesBetween('2025-12-31', '2026-01-02')).toEqual(['2025-12-31', '2026-01-01', '2026-01-02']);
  });

  it('rejects impossible dates', () => {
    expect(isIsoDate('2025-02-30')).toBe(false);
    expect(isIsoDate('2025-02-28')).toBe(true);
  });

  it('finds next week and the coming weekend', () => {
    expect(nextWeekStart(FIXED_NOW)).toBe('2025-03-17');
    expect(nextWeekStart(new Date('2025-03-16T12:00:00Z'))).toBe('2025-03-17');
    expect(upcomingSaturday(FIXED_NOW)).toBe('2025-03-15');
  });
});
