import { FALLBACK_CONFIDENCE, FallbackSynthesizer } from '../../../src/core/fallback.js';
import type { GatherRequest, ProviderFailure } from '../../../src/providers/types.js';

const request: GatherRequest = {
  destination: 'Phuket',
  startDate: '2025-03-17',
  endDate: '2025-03-19',
  interests: ['beaches', 'food'],
  budget: 20000,
  currency: 'THB',
  travelers: 2,
  places: ['Phuket city centre', 'Phuket beaches', 'Phuket food'],
};

const timeout: ProviderFailure = { kind: 'timeout', message: 'provider call timed out' };

describe('FallbackSynthesizer', () => {
  const synth = new FallbackSynthesizer();

  it('returns identical payloads for identical inputs', () => {
    expect(synth.synthesize('weather', request, timeout)).toEqual(synth.synthesize('weather', request, timeout));
    expect(synth.synthesize('hotels', request, timeout)).toEqual(synth.synthesize('hotels', request, timeout));
  });

  it('labels every result and payload item as synthesized', () => {
    const result = synth.synthesize('weather', request, timeout, 120);
    expect(result).toMatchObject({
      source: 'weather',
      outcome: 'fallback',
      synthesized: true,
      reason: 'timeout',
      message: 'provider call timed out',
      confidence: FALLBACK_CONFIDENCE.weather,
      latencyMs: 120,
    });
    if (result.outcome !== 'fallback') throw new Error('expected a fallback');
    expect(result.payload.days.map((d) => d.date)).toEqual(['2025-03-17', '2025-03-18', '2025-03-19']);
    expect(result.payload.days.every((d) => d.estimated)).toBe(true);
  });

  it('keeps synthesized temperatures near the monthly normals', () => {
    const result = synth.synthesize('weather', request, timeout);
    if (result.outcome !== 'fallback') throw new Error('expected a fallback');
    for (const day of result.payload.days) {
      expect(day.highC).toBeGreaterThanOrEqual(31.5);
      expect(day.highC).toBeLessThanOrEqual(34.5);
    }
  });

  it('prices flights from a third of the per-traveler budget', () => {
    const result = synth.synthesize('flights', request, { kind: 'auth_error', message: 'HTTP_401' });
    if (result.outcome !== 'fallback') throw new Error('expected a fallback');
    expect(result.payload.offers.map((o) => o.price)).toEqual([6600, 8250, 10560]);
    expect(result.payload.offers.every((o) => o.carrier === 'Estimated carrier' && o.estimated)).toBe(true);
    expect(result.payload.offers[0]?.destination).toBe('HKT');
  });

  it('offers three hotel tiers totalled over the nights', () => {
    const result = synth.synthesize('hotels', request, timeout);
    if (result.outcome !== 'fallback') throw new Error('expected a fallback');
    expect(result.payload.offers.map((o) => o.tier)).toEqual(['budget', 'mid-range', 'upscale']);
    for (const offer of result.payload.offers) {
      expect(offer.total).toBe(offer.pricePerNight * 2);
      expect(offer.currency).toBe('THB');
    }
  });

  it('estimates one transit leg per place pair', () => {
    const result = synth.synthesize('transit', request, timeout);
    if (result.outcome !== 'fallback') throw new Error('expected a fallback');
    expect(result.payload.legs).toEqual([
      { from: 'Phuket city centre', to: 'Phuket beaches', durationMinutes: 30, distanceMeters: 5000, mode: 'estimated', summary: 'Estimated local transfer', estimated: true },
      { from: 'Phuket beaches', to: 'Phuket food', durationMinutes: 30, distanceMeters: 5000, mode: 'estimated', summary: 'Estimated local transfer', estimated: true },
    ]);
  });

  it('returns image queries without urls', () => {
    const result = synth.synthesize('images', request, { kind: 'circuit_open', message: 'circuit breaker open' });
    if (result.outcome !== 'fallback') throw new Error('expected a fallback');
    expect(result.payload.images.map((i) => [i.query, i.url])).toEqual([
      ['Phuket', null],
      ['Phuket beaches', null],
      ['Phuket food', null],
    ]);
    expect(result.confidence).toBe(0.3);
  });

  it('never throws on unusable dates', () => {
    const result = synth.synthesize('weather', { ...request, startDate: 'soon', endDate: 'later' }, timeout);
    expect(result).toMatchObject({ outcome: 'fallback', synthesized: true, payload: { source: 'weather', days: [] } });
  });
});
