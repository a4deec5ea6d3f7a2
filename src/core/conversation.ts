import type pino from 'pino';
import type { PlannerConfig } from '../config/planner.js';
import {
  slotValues,
  type ConversationContext,
  type SlotName,
  type SlotValue,
  type Turn,
  type TurnIntent,
} from '../schemas/slots.js';
import type { TaskSnapshot } from '../schemas/task.js';
import type { ContextStore } from './context_store.js';
import { AmbiguousModificationError, InvalidRequestError, type ModificationCandidates } from './errors.js';
import type { ItineraryPlanner } from './planner.js';
import type { ReplanCoordinator } from './replan.js';
import type { SlotExtractor } from './slot_parser.js';
import type { ProgressPublisher } from './progress.js';
import { buildTripRequest } from './trip.js';

export interface TurnRequest {
  conversationKey?: string;
  /** Client-assigned; a retried turn with the same id changes nothing. */
  turnId: string;
  text: string;
}

export type TurnAction = 'clarify' | 'generate' | 'replan' | 'acknowledge';

export interface TurnReply {
  conversationKey: string;
  turnId: string;
  duplicate: boolean;
  action: TurnAction;
  reply: string;
  slots: Partial<Record<SlotName, SlotValue>>;
  missing?: string[];
  candidates?: ModificationCandidates;
  task?: TaskSnapshot;
}

const QUESTIONS: Record<string, string> = {
  destination: 'Where would you like to go?',
  start_date: 'When does the trip start?',
  duration_days: 'How many days will you be travelling?',
};

/** Slots whose change makes a new itinerary rather than an edit of the current one. */
const TRIP_SLOTS: readonly SlotName[] = ['destination', 'start_date', 'end_date', 'duration_days'];

export interface ConversationDeps {
  cfg: PlannerConfig;
  contexts: ContextStore;
  extractor: SlotExtractor;
  planner: ItineraryPlanner;
  replanner: ReplanCoordinator;
  progress: ProgressPublisher;
  log: pino.Logger;
  now?: () => Date;
}

/**
 * One user turn end to end: extract, merge into the conversation, then ask
 * for what is missing, start a generation, or replan the current version.
 */
export class ConversationService {
  private readonly now: () => Date;

  constructor(private readonly deps: ConversationDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async handleTurn(turn: TurnRequest): Promise<TurnReply> {
    const { contexts, extractor } = this.deps;
    const key = turn.conversationKey ?? contexts.newKey();
    const current = await contexts.getOrCreate(key);

    const known = current.turns.find((t) => t.id === turn.turnId);
    if (known) return this.replayed(key, turn, known, current);

    const extraction = await extractor.extract(turn.text, { now: this.now(), current: current.slots });
    const applied = await contexts.applyTurn(
      key,
      { id: turn.turnId, text: turn.text, intent: extraction.intent },
      extraction.slots,
    );
    if (applied.duplicate) {
      const raced = applied.context.turns.find((t) => t.id === turn.turnId);
      if (raced) return this.replayed(key, turn, raced, applied.context);
    }
    return this.decide(key, turn, extraction.intent.kind, applied.applied, applied.context, false);
  }

  /** Chooses and performs the reply for a recorded turn, then marks the turn settled. */
  private async decide(
    key: string,
    turn: TurnRequest,
    intent: TurnIntent['kind'],
    changed: readonly SlotName[],
    context: ConversationContext,
    duplicate: boolean,
  ): Promise<TurnReply> {
    const reply = await this.choose(key, turn, intent, changed, context, duplicate);
    await this.deps.contexts.settleTurn(key, turn.turnId);
    return reply;
  }

  private async choose(
    key: string,
    turn: TurnRequest,
    intent: TurnIntent['kind'],
    changed: readonly SlotName[],
    context: ConversationContext,
    duplicate: boolean,
  ): Promise<TurnReply> {
    const { log } = this.deps;
    const base = { conversationKey: key, turnId: turn.turnId, duplicate, slots: slotValues(context.slots) };
    const tripChanged = changed.some((s) => TRIP_SLOTS.includes(s));
    const latestVersionId = context.latestVersionId;
    const requestId = `${key}:${turn.turnId}`;

    if (latestVersionId && intent === 'modify' && !tripChanged) {
      try {
        const task = await this.deps.replanner.replan(latestVersionId, turn.text, { conversationKey: key, requestId });
        return { ...base, action: 'replan', reply: 'Updating your itinerary.', task };
      } catch (err) {
        if (!(err instanceof AmbiguousModificationError)) throw err;
        log.info({ key, turnId: turn.turnId }, 'conversation:ambiguous_modification');
        return {
          ...base,
          action: 'clarify',
          reply: `${err.message}. Which day or activity should change?`,
          candidates: err.candidates,
        };
      }
    }

    try {
      buildTripRequest(context.slots, this.deps.cfg);
    } catch (err) {
      if (!(err instanceof InvalidRequestError)) throw err;
      const first = err.missing[0];
      return {
        ...base,
        action: 'clarify',
        reply: (first && QUESTIONS[first]) ?? err.message,
        missing: err.missing,
      };
    }

    const asksToPlan = intent === 'plan' || intent === 'modify' || tripChanged;
    if (!asksToPlan && latestVersionId) {
      return { ...base, action: 'acknowledge', reply: 'Noted. Tell me what to change in your itinerary.' };
    }

    const task = await this.deps.planner.start({ conversationKey: key, requestId });
    log.info({ key, turnId: turn.turnId, taskId: task.taskId }, 'conversation:generate');
    return { ...base, action: 'generate', reply: 'Planning your trip.', task };
  }

  /**
   * A turn id seen before. When its reply never completed (the task launch
   * failed after the turn was recorded) the decision runs again under the
   * same request id; otherwise the current task state is returned.
   */
  private async replayed(
    key: string,
    turn: TurnRequest,
    recorded: Turn,
    context: ConversationContext,
  ): Promise<TurnReply> {
    if (context.pendingTurnId === recorded.id) {
      this.deps.log.info({ key, turnId: recorded.id }, 'conversation:resume_turn');
      return this.decide(key, turn, recorded.intent?.kind ?? 'other', recorded.applied ?? [], context, true);
    }
    const activeTaskId = context.activeTaskId;
    const task = activeTaskId ? await this.deps.progress.poll(activeTaskId) : undefined;
    return {
      conversationKey: key,
      turnId: turn.turnId,
      duplicate: true,
      action: 'acknowledge',
      reply: 'Already received.',
      slots: slotValues(context.slots),
      ...(task ? { task } : {}),
    };
  }
}
