import { randomUUID } from 'node:crypto';
import type pino from 'pino';
import type { PlannerStorage } from './storage.js';
import { KeyedSerializer } from './keyed_queue.js';
import { addDays, diffDays, isIsoDate } from './dates.js';
import { incTurn } from '../util/metrics.js';
import type {
  ConversationContext,
  ExtractedSlots,
  SlotEntry,
  SlotMap,
  SlotName,
  Turn,
  TurnIntent,
} from '../schemas/slots.js';
import { SLOT_NAMES, slotNumber, slotString } from '../schemas/slots.js';

export interface TurnInput {
  /** Client-assigned deduplication id. */
  id: string;
  role?: Turn['role'];
  text: string;
  intent?: TurnIntent;
  timestamp?: string;
}

export interface AppliedTurn {
  context: ConversationContext;
  /** True when the turn id was already known and nothing changed. */
  duplicate: boolean;
  applied: SlotName[];
  /** Extractions refused by the lock rule. */
  kept: SlotName[];
}

export interface ContextStoreOptions {
  storage: PlannerStorage;
  log: pino.Logger;
  /** Slots at or above this confidence only change on an explicit extraction. */
  lockConfidence: number;
  now?: () => Date;
}

const DATE_SLOTS: ReadonlySet<SlotName> = new Set(['start_date', 'end_date']);

/**
 * Per-conversation slot state and turn history. Read-modify-write of one
 * conversation key is serialized; different keys run in parallel.
 */
export class ContextStore {
  private readonly storage: PlannerStorage;
  private readonly log: pino.Logger;
  private readonly lockConfidence: number;
  private readonly now: () => Date;
  private readonly serializer = new KeyedSerializer();

  constructor(opts: ContextStoreOptions) {
    this.storage = opts.storage;
    this.log = opts.log;
    this.lockConfidence = opts.lockConfidence;
    this.now = opts.now ?? (() => new Date());
  }

  newKey(): string {
    return `conv_${randomUUID()}`;
  }

  async getOrCreate(key?: string): Promise<ConversationContext> {
    const resolved = key ?? this.newKey();
    return this.serializer.run(resolved, () => this.loadOrCreate(resolved));
  }

  async get(key: string): Promise<ConversationContext | undefined> {
    return this.storage.loadContext(key);
  }

  async getSlots(key: string): Promise<SlotMap> {
    const ctx = await this.storage.loadContext(key);
    return ctx?.slots ?? {};
  }

  async applyTurn(key: string, turn: TurnInput, extracted: ExtractedSlots): Promise<AppliedTurn> {
    return this.serializer.run(key, async () => {
      const ctx = await this.loadOrCreate(key);
      if (ctx.turns.some((t) => t.id === turn.id)) {
        incTurn('duplicate');
        this.log.debug({ key, turnId: turn.id }, 'context:duplicate_turn');
        return { context: ctx, duplicate: true, applied: [], kept: [] };
      }

      const timestamp = turn.timestamp ?? this.now().toISOString();
      const turnIndex = ctx.turns.length;
      const { slots, applied, kept } = this.merge(ctx.slots, extracted, turnIndex, timestamp);

      const next: ConversationContext = {
        ...ctx,
        turns: [
          ...ctx.turns,
          {
            id: turn.id,
            index: turnIndex,
            role: turn.role ?? 'user',
            text: turn.text,
            ...(turn.intent ? { intent: turn.intent } : {}),
            applied,
            timestamp,
          },
        ],
        slots,
        pendingTurnId: turn.id,
        updatedAt: timestamp,
      };
      await this.storage.saveContext(next);
      incTurn('applied');
      this.log.info({ key, turnId: turn.id, turnIndex, applied, kept }, 'context:apply_turn');
      return { context: next, duplicate: false, applied, kept };
    });
  }

  /** Records the itinerary produced for this conversation. */
  async linkVersion(key: string, itineraryId: string, versionId: string): Promise<ConversationContext> {
    return this.update(key, (ctx) => ({ ...ctx, itineraryId, latestVersionId: versionId }));
  }

  async setActiveTask(key: string, taskId: string | undefined): Promise<ConversationContext> {
    return this.update(key, (ctx) => {
      const { activeTaskId: _previous, ...rest } = ctx;
      return taskId ? { ...rest, activeTaskId: taskId } : rest;
    });
  }

  /** Marks the turn's reply as delivered; a retry of it is then a plain replay. */
  async settleTurn(key: string, turnId: string): Promise<ConversationContext> {
    return this.update(key, (ctx) => {
      if (ctx.pendingTurnId !== turnId) return ctx;
      const { pendingTurnId: _settled, ...rest } = ctx;
      return rest;
    });
  }

  private async update(
    key: string,
    fn: (ctx: ConversationContext) => ConversationContext,
  ): Promise<ConversationContext> {
    return this.serializer.run(key, async () => {
      const ctx = await this.loadOrCreate(key);
      const next = { ...fn(ctx), updatedAt: this.now().toISOString() };
      await this.storage.saveContext(next);
      return next;
    });
  }

  private async loadOrCreate(key: string): Promise<ConversationContext> {
    const existing = await this.storage.loadContext(key);
    if (existing) return existing;
    const at = this.now().toISOString();
    const created: ConversationContext = { key, turns: [], slots: {}, createdAt: at, updatedAt: at };
    await this.storage.saveContext(created);
    this.log.info({ key }, 'context:created');
    return created;
  }

  private merge(
    current: SlotMap,
    extracted: ExtractedSlots,
    turnIndex: number,
    updatedAt: string,
  ): { slots: SlotMap; applied: SlotName[]; kept: SlotName[] } {
    const slots: SlotMap = { ...current };
    const applied: SlotName[] = [];
    const kept: SlotName[] = [];

    for (const name of SLOT_NAMES) {
      const incoming = extracted[name];
      if (!incoming) continue;
      if (DATE_SLOTS.has(name) && !(typeof incoming.value === 'string' && isIsoDate(incoming.value))) {
        continue;
      }
      const existing = current[name];
      if (existing && existing.confidence >= this.lockConfidence && !incoming.explicit) {
        kept.push(name);
        continue;
      }
      slots[name] = { ...incoming, turnIndex, updatedAt };
      applied.push(name);
    }

    deriveDates(slots, applied, turnIndex, updatedAt);
    return { slots, applied, kept };
  }
}

/**
 * Keeps start, end and duration consistent after a merge: a changed start or
 * duration moves the end date; a changed end date recomputes the duration.
 */
function deriveDates(slots: SlotMap, changed: SlotName[], turnIndex: number, updatedAt: string): void {
  const start = slotString(slots, 'start_date');
  const end = slotString(slots, 'end_date');
  const duration = slotNumber(slots, 'duration_days');
  const touched = (name: SlotName) => changed.includes(name);

  const derived = (value: string | number, from: Array<SlotEntry | undefined>): SlotEntry => ({
    value,
    turnIndex,
    confidence: Math.min(...from.map((e) => e?.confidence ?? 0)),
    explicit: false,
    updatedAt,
  });

  if (start && duration && duration >= 1 && (touched('start_date') || touched('duration_days')) && !touched('end_date')) {
    slots.end_date = derived(addDays(start, duration - 1), [slots.start_date, slots.duration_days]);
    return;
  }
  if (start && end && (touched('start_date') || touched('end_date'))) {
    const days = diffDays(start, end) + 1;
    if (days >= 1) slots.duration_days = derived(days, [slots.start_date, slots.end_date]);
  }
}
