import { InvalidRequestError } from '../../../src/core/errors.js';
import type { PlanComposer } from '../../../src/core/composer.js';
import type { Engine } from '../../../src/core/engine.js';
import { collectSnapshots, fakeAdapters, settle, testConfig, testEngine } from '../../helpers/fakes.js';

const PHUKET = {
  destination: 'Phuket',
  start_date: '2025-03-17',
  duration_days: 3,
  budget: 20000,
  interests: ['beaches'],
};

const failingComposer: PlanComposer = {
  kind: 'llm',
  compose: async () => {
    throw new Error('model unavailable');
  },
};

async function versionOf(engine: Engine, taskId: string) {
  const snapshot = await settle(engine, taskId);
  if (!snapshot.resultVersionId) throw new Error(`task ended ${snapshot.status}`);
  return engine.versions.load(snapshot.resultVersionId);
}

async function waitFor(condition: () => boolean): Promise<void> {
  while (!condition()) await new Promise((r) => setTimeout(r, 2));
}

describe('ItineraryPlanner', () => {
  it('generates a day-by-day itinerary from live provider data', async () => {
    const engine = testEngine();
    const task = await engine.planner.start({ slots: PHUKET });
    const version = await versionOf(engine, task.taskId);

    expect(version).toMatchObject({ version: 1, parentVersionId: null });
    expect(version.days.map((d) => [d.id, d.date, d.title])).toEqual([
      ['day-1', '2025-03-17', 'Arrival and beaches in Phuket'],
      ['day-2', '2025-03-18', 'Beaches in Phuket'],
      ['day-3', '2025-03-19', 'Final day: beaches in Phuket'],
    ]);
    const [day1] = version.days;
    expect(day1?.activities.map((a) => [a.id, a.title, a.imageUrl])).toEqual([
      ['day-1-act-1', 'Morning swim and beach walk', 'https://img.test/1.jpg'],
      ['day-1-act-2', 'Lunch at a local favourite', 'https://img.test/2.jpg'],
      ['day-1-act-3', 'Landmark and viewpoint visit', 'https://img.test/1.jpg'],
    ]);
    expect(day1?.activities[1]?.estimatedCost).toBe(533);
    expect(day1?.weather).toEqual({ highC: 32, lowC: 25, precipitationMm: 1, condition: 'Clear sky', estimated: false });
    expect(day1?.transitMinutes).toBe(40);
    expect(day1?.composedBy).toBe('template');
    expect(version.bookings.flight).toEqual({ carrier: 'FD', price: 2100, currency: 'THB', estimated: false });
    expect(version.bookings.hotel?.name).toBe('Palm Court');
    expect(version.sources.every((f) => f.outcome === 'ok')).toBe(true);
  });

  it('reports monotonic progress that ends at 100', async () => {
    const engine = testEngine();
    const task = await engine.planner.start({ slots: PHUKET });
    const snapshots = await collectSnapshots(engine, task.taskId);

    const progress = snapshots.map((s) => s.progress);
    expect([...progress].sort((a, b) => a - b)).toEqual(progress);
    expect(snapshots.slice(0, -1).every((s) => s.progress < 100)).toBe(true);
    expect(snapshots[snapshots.length - 1]).toMatchObject({ status: 'completed', progress: 100 });
    const seqs = snapshots.map((s) => s.seq);
    expect(new Set(seqs).size).toBe(seqs.length);
  });

  it('completes with labelled estimates when a provider times out', async () => {
    const fakes = fakeAdapters();
    fakes.weather.behaviour = { kind: 'hang' };
    const cfg = testConfig();
    const engine = testEngine({ fakes, cfg: { ...cfg, providerTimeoutsMs: { ...cfg.providerTimeoutsMs, weather: 50 } } });

    const task = await engine.planner.start({ slots: PHUKET });
    const version = await versionOf(engine, task.taskId);
    const snapshot = await engine.planner.poll(task.taskId);

    expect(snapshot.status).toBe('completed');
    expect(snapshot.sources).toContainEqual({ name: 'weather', status: 'degraded', reason: 'timeout' });
    expect(snapshot.sources).toContainEqual({ name: 'flights', status: 'active' });
    expect(version.sources.find((f) => f.source === 'weather')).toMatchObject({
      outcome: 'fallback',
      synthesized: true,
      reason: 'timeout',
    });
    expect(version.days.every((d) => d.weather?.estimated === true && d.estimated)).toBe(true);
  });

  it('rejects a start without destination or dates before creating a task', async () => {
    const engine = testEngine();
    const launch = jest.spyOn(engine.runner, 'launch');
    await expect(engine.planner.start({ slots: { destination: 'Phuket' } })).rejects.toBeInstanceOf(InvalidRequestError);
    expect(launch).not.toHaveBeenCalled();
  });

  it('reads slots from the conversation and links the version back to it', async () => {
    const engine = testEngine();
    const ctx = await engine.contexts.getOrCreate('conv-plan');
    await engine.contexts.applyTurn(ctx.key, { id: 't1', text: 'Phuket' }, {
      destination: { value: 'Phuket', confidence: 0.9, explicit: true },
      start_date: { value: '2025-03-17', confidence: 0.9, explicit: true },
      duration_days: { value: 2, confidence: 0.9, explicit: true },
    });

    const task = await engine.planner.start({ conversationKey: ctx.key });
    const version = await versionOf(engine, task.taskId);
    const linked = await engine.contexts.get(ctx.key);

    expect(version.days).toHaveLength(2);
    expect(version.conversationKey).toBe('conv-plan');
    expect(linked).toMatchObject({
      itineraryId: version.itineraryId,
      latestVersionId: version.id,
      activeTaskId: task.taskId,
    });
  });

  it('falls back to the template plan when the composer fails', async () => {
    const engine = testEngine({ composer: failingComposer });
    const task = await engine.planner.start({ slots: PHUKET });
    const version = await versionOf(engine, task.taskId);
    expect(version.days.every((d) => d.composedBy === 'template' && d.estimated)).toBe(true);
  });

  it('fails the task when the composer fails and fallback plans are off', async () => {
    const engine = testEngine({ composer: failingComposer, cfg: testConfig({ composeFallbackPlan: false }) });
    const task = await engine.planner.start({ slots: PHUKET });
    expect(await settle(engine, task.taskId)).toMatchObject({
      status: 'failed',
      error: { code: 'CompositionFailure', message: 'Plan composition failed', retryable: true },
    });
  });

  it('stops dispatching provider calls once cancelled mid-gather', async () => {
    const fakes = fakeAdapters();
    fakes.weather.behaviour = { kind: 'ok', delayMs: 30 };
    const engine = testEngine({ fakes, cfg: testConfig({ gatherMaxConcurrency: 1 }) });

    const task = await engine.planner.start({ slots: PHUKET });
    await waitFor(() => fakes.weather.calls.length === 1);
    await engine.planner.cancel(task.taskId);
    const final = await settle(engine, task.taskId);

    expect(final).toMatchObject({ status: 'cancelled', error: { code: 'Cancelled', retryable: false } });
    expect(final.resultVersionId).toBeUndefined();
    expect(fakes.flights.calls).toHaveLength(0);
    expect(fakes.images.calls).toHaveLength(0);
  });
});
