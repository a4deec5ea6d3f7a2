import { getLimiter, getLimiterStats, scheduleWithLimit } from '../../../src/util/limiter.js';

describe('per-host limiter', () => {
  it('reuses one limiter per host', () => {
    expect(getLimiter('api.open-meteo.com')).toBe(getLimiter('api.open-meteo.com'));
    expect(getLimiter('api.open-meteo.com')).not.toBe(getLimiter('maps.googleapis.com'));
  });

  it('runs scheduled work and returns its result', async () => {
    const work = jest.fn(async () => 'result');
    await expect(scheduleWithLimit('limiter-test.local', work)).resolves.toBe('result');
    expect(work).toHaveBeenCalledTimes(1);
  });

  it('reports counts for known hosts only', async () => {
    await scheduleWithLimit('stats-test.local', async () => undefined);
    expect(getLimiterStats('stats-test.local')).toEqual({ queued: 0, running: 0 });
    expect(getLimiterStats('never-used.local')).toBeNull();
  });
});
