import type pino from 'pino';
import type { ContextStore } from './context_store.js';
import type { DataGatheringCoordinator } from './gather.js';
import type { VersionRepository } from './versions.js';
import { AmbiguousModificationError } from './errors.js';
import { CancellationObserved, type JobResult, type RunContext, type TaskRunner } from './runner.js';
import {
  buildDayPlan,
  composeDays,
  sourceFlags,
  statusFromFlag,
  sourceStatuses,
  bookingAnnotations,
  transitMinutesFor,
  imageUrlAt,
  type ComposePolicy,
} from './assemble.js';
import { gatherRequestFor } from './trip.js';
import type { ActivityDraft, DaySlot } from './composer.js';
import type { GatherResults, SourceName } from '../providers/types.js';
import type { Activity, DayPlan, ItineraryVersion } from '../schemas/itinerary.js';
import type { TaskSnapshot } from '../schemas/task.js';

export type ReplanScope =
  | { kind: 'trip' }
  | { kind: 'days'; days: number[] }
  | { kind: 'activity'; dayNumber: number; activityId: string };

/** Sources re-fetched for each scope; everything else is inherited from the parent. */
export const SCOPE_SOURCES: Record<ReplanScope['kind'], readonly SourceName[]> = {
  trip: ['weather', 'flights', 'hotels', 'transit', 'images'],
  days: ['weather', 'transit', 'images'],
  activity: ['transit', 'images'],
};

const WHOLE_TRIP = /\b(whole|entire|every day|all days|all the days|everything|full trip|start over|from scratch)\b/i;
const ORDINALS: Record<string, number> = {
  first: 1,
  second: 2,
  third: 3,
  fourth: 4,
  fifth: 5,
  sixth: 6,
  seventh: 7,
};

function dayNumbersIn(text: string, parent: ItineraryVersion): number[] {
  const found = new Set<number>();
  for (const m of text.matchAll(/\bday\s+(\d{1,2})\b/gi)) found.add(Number(m[1]));
  for (const m of text.matchAll(/\b(first|second|third|fourth|fifth|sixth|seventh|last)\s+day\b/gi)) {
    const word = (m[1] ?? '').toLowerCase();
    found.add(word === 'last' ? parent.days.length : (ORDINALS[word] ?? 0));
  }
  return [...found].sort((a, b) => a - b);
}

function candidatesOf(parent: ItineraryVersion) {
  return {
    days: parent.days.map((d) => d.dayNumber),
    activityIds: parent.days.flatMap((d) => d.activities.map((a) => a.id)),
  };
}

/**
 * Maps a modification onto the parent's day and activity ids. Throws
 * AmbiguousModificationError when the text names nothing that exists.
 */
export function resolveScope(parent: ItineraryVersion, modification: string): ReplanScope {
  const text = modification.trim();
  const candidates = candidatesOf(parent);
  const ambiguous = (message: string) => new AmbiguousModificationError(message, candidates);

  const byId = parent.days.flatMap((d) =>
    d.activities.filter((a) => new RegExp(`\\b${a.id}\\b`).test(text)).map((a) => ({ day: d, activity: a })),
  );
  const days = dayNumbersIn(text, parent);
  if (days.some((n) => !candidates.days.includes(n))) {
    throw ambiguous(`The itinerary has days ${candidates.days.join(', ')} only`);
  }

  const lower = text.toLowerCase();
  const inScope = (d: DayPlan) => !days.length || days.includes(d.dayNumber);
  const byTitle = parent.days
    .filter(inScope)
    .flatMap((d) => d.activities.filter((a) => lower.includes(a.title.toLowerCase())).map((a) => ({ day: d, activity: a })));

  const hit = byId.length ? byId : byTitle;
  if (hit.length === 1 && hit[0]) {
    return { kind: 'activity', dayNumber: hit[0].day.dayNumber, activityId: hit[0].activity.id };
  }
  if (hit.length > 1 && !days.length) {
    throw new AmbiguousModificationError('The change matches more than one activity', {
      days: [...new Set(hit.map((h) => h.day.dayNumber))],
      activityIds: hit.map((h) => h.activity.id),
    });
  }
  if (days.length) return { kind: 'days', days };
  if (WHOLE_TRIP.test(text)) return { kind: 'trip' };
  throw ambiguous('Say which day or activity to change');
}

export interface ReplanDeps {
  contexts: ContextStore;
  runner: TaskRunner;
  gatherer: DataGatheringCoordinator;
  compose: ComposePolicy;
  versions: VersionRepository;
  log: pino.Logger;
}

export interface ReplanOptions {
  requestId?: string;
  /** Defaults to the parent version's conversation. */
  conversationKey?: string;
}

/**
 * Produces a child version touching only the resolved scope. Untouched days
 * are the parent's own objects; only the scope's sources are re-gathered.
 */
export class ReplanCoordinator {
  constructor(private readonly deps: ReplanDeps) {}

  async replan(versionId: string, modification: string, opts: ReplanOptions = {}): Promise<TaskSnapshot> {
    const parent = await this.deps.versions.load(versionId);
    const scope = resolveScope(parent, modification);
    const conversationKey = opts.conversationKey ?? parent.conversationKey;

    const task = await this.deps.runner.launch({
      kind: 'replan',
      ...(conversationKey ? { conversationKey } : {}),
      ...(opts.requestId ? { requestId: opts.requestId } : {}),
      job: (ctx) => this.run(ctx, parent, scope, modification, conversationKey),
    });
    if (conversationKey) await this.deps.contexts.setActiveTask(conversationKey, task.taskId);
    return task;
  }

  private async run(
    ctx: RunContext,
    parent: ItineraryVersion,
    scope: ReplanScope,
    modification: string,
    conversationKey?: string,
  ): Promise<JobResult> {
    const log = this.deps.log.child({ taskId: ctx.taskId, parentVersionId: parent.id });
    const affected = affectedDays(parent, scope);

    await ctx.advance('intent_extraction', 0, 'Reading the requested change');
    await ctx.checkpoint();
    await ctx.advance('intent_extraction', 1, describeScope(scope));

    await ctx.checkpoint();
    await ctx.advance('data_gathering', 0, 'Refreshing affected data');
    const request = gatherRequestFor(parent.trip);
    const dates = affected.map((d) => d.date).sort();
    const first = dates[0];
    const last = dates[dates.length - 1];
    const narrowed = scope.kind !== 'trip' && first && last ? { ...request, startDate: first, endDate: last } : request;
    const seen: GatherResults = {};
    const gathered = await this.deps.gatherer.gather(narrowed, {
      taskId: ctx.taskId,
      sources: SCOPE_SOURCES[scope.kind],
      isCancelled: ctx.isCancelled,
      onProgress: async (fraction, result) => {
        Object.assign(seen, { [result.source]: result });
        await ctx.advance('data_gathering', fraction, `Received ${result.source}`, sourceStatuses(seen, parent.sources));
      },
    });
    if (gathered.cancelled) throw new CancellationObserved();
    const results = gathered.results;
    const flags = sourceFlags(results, parent.sources);

    await ctx.checkpoint();
    await ctx.advance('plan_composition', 0, 'Recomposing', flags.map(statusFromFlag));
    const slots: DaySlot[] = affected.map((d) => ({ dayNumber: d.dayNumber, date: d.date }));
    const avoid = affected.flatMap((d) => d.activities.map((a) => a.title));
    const composed = await composeDays(
      this.deps.compose,
      { trip: parent.trip, gathered: results, days: slots, instruction: modification, avoid, variant: parent.version },
      ctx.signal,
    );
    await ctx.checkpoint();
    await ctx.advance('plan_composition', 1, 'Changes composed');

    await ctx.advance('finalization', 0, 'Saving the new version');
    const revision = parent.version + 1;
    const replaced = new Map<number, DayPlan>();
    affected.forEach((day, i) => {
      const draft = composed.drafts[i];
      if (!draft) throw new Error(`No draft for day ${day.dayNumber}`);
      const rebuilt =
        scope.kind === 'activity'
          ? swapActivity(day, scope.activityId, draft.activities, results, revision, composed.composedBy === 'template')
          : buildDayPlan(draft, day, results, { composedBy: composed.composedBy, revision, inheritedWeather: day.weather });
      replaced.set(day.dayNumber, rebuilt);
    });

    const version = await this.deps.versions.create({
      itineraryId: parent.itineraryId,
      parentVersionId: parent.id,
      ...(conversationKey ? { conversationKey } : {}),
      trip: parent.trip,
      days: parent.days.map((d) => replaced.get(d.dayNumber) ?? d),
      bookings: scope.kind === 'trip' ? bookingAnnotations(results) : parent.bookings,
      sources: flags,
      modification,
    });
    if (conversationKey) await this.deps.contexts.linkVersion(conversationKey, version.itineraryId, version.id);

    log.info({ versionId: version.id, scope: scope.kind, days: [...replaced.keys()] }, 'replan:done');
    return { versionId: version.id, sources: flags.map(statusFromFlag) };
  }
}

function affectedDays(parent: ItineraryVersion, scope: ReplanScope): readonly DayPlan[] {
  switch (scope.kind) {
    case 'trip':
      return parent.days;
    case 'days':
      return parent.days.filter((d) => scope.days.includes(d.dayNumber));
    case 'activity':
      return parent.days.filter((d) => d.dayNumber === scope.dayNumber);
  }
}

function describeScope(scope: ReplanScope): string {
  switch (scope.kind) {
    case 'trip':
      return 'Replanning the whole trip';
    case 'days':
      return `Replanning day ${scope.days.join(', ')}`;
    case 'activity':
      return `Swapping ${scope.activityId}`;
  }
}

/** Replaces one activity, keeping its time slot; the rest of the day is untouched. */
function swapActivity(
  day: DayPlan,
  activityId: string,
  drafted: ActivityDraft[],
  results: GatherResults,
  revision: number,
  templated: boolean,
): DayPlan {
  const index = day.activities.findIndex((a) => a.id === activityId);
  const original = day.activities[index];
  const taken = new Set(day.activities.map((a) => a.title));
  const sameSlot = drafted[index];
  const pick = sameSlot && !taken.has(sameSlot.title) ? sameSlot : drafted.find((a) => !taken.has(a.title));
  if (!original || !pick) return day;

  const estimated = templated || Object.values(results).some((r) => r?.synthesized === true);
  const replacement: Activity = {
    ...pick,
    id: `${original.id.replace(/-v\d+$/, '')}-v${revision}`,
    ...(original.startTime ? { startTime: original.startTime } : {}),
    ...(original.endTime ? { endTime: original.endTime } : {}),
    imageUrl: imageUrlAt(results, day.dayNumber - 1 + index),
    estimated,
  };
  const activities = day.activities.map((a, i) => (i === index ? replacement : a));
  return {
    ...day,
    activities,
    transitMinutes: results.transit ? transitMinutesFor(results, activities.length) : day.transitMinutes,
    estimated: day.estimated || estimated,
  };
}
