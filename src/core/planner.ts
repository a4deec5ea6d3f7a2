import type pino from 'pino';
import type { PlannerConfig } from '../config/planner.js';
import type { GatherResults } from '../providers/types.js';
import {
  SLOT_NAMES,
  type SlotMap,
  type SlotName,
  type SlotValue,
  type TripRequest,
} from '../schemas/slots.js';
import type { TaskSnapshot } from '../schemas/task.js';
import {
  bookingAnnotations,
  buildDayPlan,
  composeDays,
  daySlotsFor,
  sourceFlags,
  sourceStatuses,
  type ComposePolicy,
} from './assemble.js';
import type { ContextStore } from './context_store.js';
import type { DataGatheringCoordinator } from './gather.js';
import { CancellationObserved, type JobResult, type RunContext, type TaskRunner } from './runner.js';
import { buildTripRequest, gatherRequestFor } from './trip.js';
import type { VersionRepository } from './versions.js';

export interface PlannerDeps {
  cfg: PlannerConfig;
  contexts: ContextStore;
  runner: TaskRunner;
  gatherer: DataGatheringCoordinator;
  compose: ComposePolicy;
  versions: VersionRepository;
  log: pino.Logger;
  now?: () => Date;
}

export interface StartRequest {
  /** Slots are read from this conversation, then `slots` is laid over them. */
  conversationKey?: string;
  /** Deduplicates retried starts. */
  requestId?: string;
  slots?: Partial<Record<SlotName, SlotValue>>;
}

/** Explicit values supplied with a request, treated as confident and explicit. */
export function slotsFromValues(values: Partial<Record<SlotName, SlotValue>>, at: string): SlotMap {
  const slots: SlotMap = {};
  for (const name of SLOT_NAMES) {
    const value = values[name];
    if (value === undefined) continue;
    slots[name] = { value, turnIndex: -1, confidence: 1, explicit: true, updatedAt: at };
  }
  return slots;
}

/**
 * Starts generation tasks: validates the slots up front, then runs intent
 * extraction, data gathering, plan composition and finalization on the
 * task runner.
 */
export class ItineraryPlanner {
  constructor(private readonly deps: PlannerDeps) {}

  /** Throws InvalidRequestError before any task exists when required slots are missing. */
  async start(request: StartRequest): Promise<TaskSnapshot> {
    const { contexts, runner, cfg } = this.deps;
    const contextSlots = request.conversationKey ? await contexts.getSlots(request.conversationKey) : {};
    const slots: SlotMap = {
      ...contextSlots,
      ...slotsFromValues(request.slots ?? {}, (this.deps.now?.() ?? new Date()).toISOString()),
    };
    const trip = buildTripRequest(slots, cfg);

    const task = await runner.launch({
      kind: 'generate',
      ...(request.conversationKey ? { conversationKey: request.conversationKey } : {}),
      ...(request.requestId ? { requestId: request.requestId } : {}),
      job: (ctx) => this.generate(ctx, trip, request.conversationKey),
    });
    if (request.conversationKey) await contexts.setActiveTask(request.conversationKey, task.taskId);
    return task;
  }

  cancel(taskId: string): Promise<TaskSnapshot> {
    return this.deps.runner.cancel(taskId);
  }

  poll(taskId: string): Promise<TaskSnapshot> {
    return this.deps.runner.poll(taskId);
  }

  private async generate(ctx: RunContext, trip: TripRequest, conversationKey?: string): Promise<JobResult> {
    const { gatherer, versions, contexts, compose } = this.deps;
    const log = this.deps.log.child({ taskId: ctx.taskId });

    await ctx.advance('intent_extraction', 0, 'Reading trip details');
    await ctx.checkpoint();
    await ctx.advance('intent_extraction', 1, `Planning ${trip.durationDays} days in ${trip.destination}`);

    await ctx.checkpoint();
    await ctx.advance('data_gathering', 0, 'Gathering travel data');
    const seen: GatherResults = {};
    const gathered = await gatherer.gather(gatherRequestFor(trip), {
      taskId: ctx.taskId,
      isCancelled: ctx.isCancelled,
      onProgress: async (fraction, result) => {
        Object.assign(seen, { [result.source]: result });
        await ctx.advance('data_gathering', fraction, `Received ${result.source}`, sourceStatuses(seen));
      },
    });
    if (gathered.cancelled) throw new CancellationObserved();
    const sources = sourceStatuses(gathered.results);

    await ctx.checkpoint();
    await ctx.advance('plan_composition', 0, 'Composing the plan', sources);
    const slots = daySlotsFor(trip);
    const composed = await composeDays(compose, { trip, gathered: gathered.results, days: slots }, ctx.signal);
    await ctx.checkpoint();
    await ctx.advance('plan_composition', 1, 'Plan composed');

    await ctx.advance('finalization', 0, 'Finalizing itinerary');
    const days = slots.map((slot, i) => {
      const draft = composed.drafts[i];
      if (!draft) throw new Error(`No draft for day ${slot.dayNumber}`);
      return buildDayPlan(draft, slot, gathered.results, { composedBy: composed.composedBy });
    });
    const version = await versions.create({
      parentVersionId: null,
      ...(conversationKey ? { conversationKey } : {}),
      trip,
      days,
      bookings: bookingAnnotations(gathered.results),
      sources: sourceFlags(gathered.results),
    });
    if (conversationKey) await contexts.linkVersion(conversationKey, version.itineraryId, version.id);

    log.info(
      { versionId: version.id, degraded: gathered.degraded, composedBy: composed.composedBy },
      'planner:generated',
    );
    return { versionId: version.id, sources };
  }
}
