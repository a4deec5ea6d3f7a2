import {
  activityId,
  bookingAnnotations,
  buildDayPlan,
  composeDays,
  imageUrlAt,
  sourceFlags,
  sourceStatuses,
  transitMinutesFor,
} from '../../../src/core/assemble.js';
import { TemplateComposer, type CompositionRequest, type DayDraft, type PlanComposer } from '../../../src/core/composer.js';
import { CompositionFailureError } from '../../../src/core/errors.js';
import { FallbackSynthesizer } from '../../../src/core/fallback.js';
import type { GatherRequest, GatherResults } from '../../../src/providers/types.js';
import type { SourceFlag } from '../../../src/schemas/itinerary.js';
import { livePayloads, silentLogger } from '../../helpers/fakes.js';

const gatherRequest: GatherRequest = {
  destination: 'Phuket',
  startDate: '2025-03-17',
  endDate: '2025-03-18',
  interests: [],
  currency: 'THB',
  travelers: 2,
  places: ['Phuket city centre', 'Phuket beaches', 'Phuket old town'],
};

function liveResults(): GatherResults {
  return {
    weather: { source: 'weather', outcome: 'ok', payload: livePayloads.weather(gatherRequest), synthesized: false, latencyMs: 5 },
    flights: { source: 'flights', outcome: 'ok', payload: livePayloads.flights(gatherRequest), synthesized: false, latencyMs: 5 },
    hotels: { source: 'hotels', outcome: 'ok', payload: livePayloads.hotels(gatherRequest), synthesized: false, latencyMs: 5 },
    transit: { source: 'transit', outcome: 'ok', payload: livePayloads.transit(gatherRequest), synthesized: false, latencyMs: 5 },
    images: { source: 'images', outcome: 'ok', payload: livePayloads.images(gatherRequest), synthesized: false, latencyMs: 5 },
  };
}

const draft: DayDraft = {
  dayNumber: 2,
  title: 'Beaches',
  summary: '',
  activities: [
    { title: 'Swim', description: '', category: 'nature' },
    { title: 'Lunch', description: '', category: 'dining' },
    { title: 'Museum', description: '', category: 'culture' },
  ],
};

describe('assembly helpers', () => {
  it('numbers activity ids and suffixes replan revisions', () => {
    expect(activityId(2, 0)).toBe('day-2-act-1');
    expect(activityId(2, 2, 3)).toBe('day-2-act-3-v3');
  });

  it('estimates transit time from the average leg', () => {
    expect(transitMinutesFor(liveResults(), 3)).toBe(40);
    expect(transitMinutesFor({}, 3)).toBeNull();
  });

  it('cycles through gathered images', () => {
    const results = liveResults();
    expect(imageUrlAt(results, 0)).toBe('https://img.test/1.jpg');
    expect(imageUrlAt(results, 3)).toBe('https://img.test/2.jpg');
    expect(imageUrlAt({}, 0)).toBeNull();
  });

  it('picks the cheapest flight and the mid-range hotel', () => {
    expect(bookingAnnotations(liveResults())).toEqual({
      flight: { carrier: 'FD', price: 2100, currency: 'THB', estimated: false },
      hotel: { name: 'Palm Court', tier: 'mid-range', pricePerNight: 2500, total: 5000, currency: 'THB', estimated: false },
    });
    expect(bookingAnnotations({})).toEqual({ flight: null, hotel: null });
  });
});

describe('buildDayPlan', () => {
  it('attaches ids, images, weather and transit from live data', () => {
    const day = buildDayPlan(draft, { dayNumber: 2, date: '2025-03-18' }, liveResults(), { composedBy: 'llm' });
    expect(day).toMatchObject({
      id: 'day-2',
      dayNumber: 2,
      date: '2025-03-18',
      weather: { highC: 32, lowC: 25, precipitationMm: 1, condition: 'Clear sky', estimated: false },
      transitMinutes: 40,
      estimated: false,
      composedBy: 'llm',
    });
    expect(day.activities.map((a) => [a.id, a.imageUrl, a.estimated])).toEqual([
      ['day-2-act-1', 'https://img.test/2.jpg', false],
      ['day-2-act-2', 'https://img.test/1.jpg', false],
      ['day-2-act-3', 'https://img.test/2.jpg', false],
    ]);
  });

  it('marks the day estimated when any source was synthesized', () => {
    const results = liveResults();
    results.weather = new FallbackSynthesizer().synthesize('weather', gatherRequest, {
      kind: 'timeout',
      message: 'provider call timed out',
    });
    const day = buildDayPlan(draft, { dayNumber: 2, date: '2025-03-18' }, results, { composedBy: 'llm' });
    expect(day.estimated).toBe(true);
    expect(day.weather?.estimated).toBe(true);
    expect(day.activities.every((a) => a.estimated)).toBe(true);
  });

  it('keeps the inherited weather when weather was not re-gathered', () => {
    const { transit, images } = liveResults();
    const inheritedWeather = { highC: 30, lowC: 24, precipitationMm: 0, condition: 'Overcast', estimated: false };
    const day = buildDayPlan(
      draft,
      { dayNumber: 2, date: '2025-03-18' },
      { transit, images },
      { composedBy: 'template', revision: 2, inheritedWeather },
    );
    expect(day.weather).toEqual(inheritedWeather);
    expect(day.activities[0]?.id).toBe('day-2-act-1-v2');
    expect(day.estimated).toBe(true);
  });
});

describe('source flags', () => {
  it('fills sources that were not re-gathered from the parent flags', () => {
    const { transit } = liveResults();
    const inherited: SourceFlag[] = [
      { source: 'weather', outcome: 'fallback', synthesized: true, reason: 'timeout', confidence: 0.5 },
      { source: 'flights', outcome: 'missing', synthesized: false, reason: 'unconfigured' },
    ];
    expect(sourceStatuses({ transit }, inherited)).toEqual([
      { name: 'weather', status: 'degraded', reason: 'timeout' },
      { name: 'flights', status: 'missing' },
      { name: 'transit', status: 'active' },
    ]);
    expect(sourceFlags({ transit }, inherited).map((f) => f.source)).toEqual(['weather', 'flights', 'transit']);
  });
});

describe('composeDays', () => {
  const compositionRequest: CompositionRequest = {
    trip: {
      destination: 'Phuket',
      startDate: '2025-03-17',
      endDate: '2025-03-17',
      durationDays: 1,
      currency: 'THB',
      travelers: 2,
      interests: [],
    },
    gathered: {},
    days: [{ dayNumber: 1, date: '2025-03-17' }],
  };
  const failing: PlanComposer = {
    kind: 'llm',
    compose: async () => {
      throw new Error('model offline');
    },
  };

  it('uses the template after a primary failure when fallback plans are on', async () => {
    const composed = await composeDays(
      { primary: failing, template: new TemplateComposer(), fallbackPlan: true, log: silentLogger() },
      compositionRequest,
    );
    expect(composed.composedBy).toBe('template');
    expect(composed.drafts).toHaveLength(1);
  });

  it('fails the composition when fallback plans are off', async () => {
    const result = composeDays(
      { primary: failing, template: new TemplateComposer(), fallbackPlan: false, log: silentLogger() },
      compositionRequest,
    );
    await expect(result).rejects.toBeInstanceOf(CompositionFailureError);
  });
});
