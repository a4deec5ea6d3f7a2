import { z } from 'zod';

export const SLOT_NAMES = [
  'destination',
  'origin',
  'start_date',
  'end_date',
  'duration_days',
  'budget',
  'currency',
  'traveler_type',
  'travelers',
  'interests',
] as const;

export const SlotNameSchema = z.enum(SLOT_NAMES);
export type SlotName = z.infer<typeof SlotNameSchema>;

export const SlotValueSchema = z.union([z.string(), z.number(), z.array(z.string())]);
export type SlotValue = z.infer<typeof SlotValueSchema>;

export const SlotEntrySchema = z.object({
  value: SlotValueSchema,
  /** Index of the turn that last set this slot. */
  turnIndex: z.number().int().min(-1),
  confidence: z.number().min(0).max(1),
  explicit: z.boolean(),
  updatedAt: z.string(),
});
export type SlotEntry = z.infer<typeof SlotEntrySchema>;

export const SlotMapSchema = z.record(SlotNameSchema, SlotEntrySchema);
export type SlotMap = z.infer<typeof SlotMapSchema>;

export const ExtractedSlotSchema = z.object({
  value: SlotValueSchema,
  confidence: z.number().min(0).max(1),
  /** The turn names this slot outright, so it may replace a locked value. */
  explicit: z.boolean(),
});
export type ExtractedSlot = z.infer<typeof ExtractedSlotSchema>;

export const ExtractedSlotsSchema = z.record(SlotNameSchema, ExtractedSlotSchema);
export type ExtractedSlots = z.infer<typeof ExtractedSlotsSchema>;

export const TurnIntentSchema = z.object({
  kind: z.enum(['plan', 'modify', 'inform', 'other']),
  slots: z.array(SlotNameSchema),
});
export type TurnIntent = z.infer<typeof TurnIntentSchema>;

export const TurnSchema = z.object({
  /** Client-assigned deduplication id. */
  id: z.string().min(1).max(128),
  index: z.number().int().min(0),
  role: z.enum(['user', 'assistant', 'system']),
  text: z.string(),
  intent: TurnIntentSchema.optional(),
  /** Slots this turn changed. */
  applied: z.array(SlotNameSchema).optional(),
  timestamp: z.string(),
});
export type Turn = z.infer<typeof TurnSchema>;

export const ConversationContextSchema = z.object({
  key: z.string().min(1),
  turns: z.array(TurnSchema),
  slots: SlotMapSchema,
  itineraryId: z.string().optional(),
  latestVersionId: z.string().optional(),
  activeTaskId: z.string().optional(),
  /** Turn recorded but whose reply (clarify, task launch) has not completed yet. */
  pendingTurnId: z.string().optional(),
  createdAt: z.string(),
  updatedAt: z.string(),
});
export type ConversationContext = z.infer<typeof ConversationContextSchema>;

export const TripRequestSchema = z.object({
  destination: z.string().min(1),
  origin: z.string().optional(),
  startDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  endDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  durationDays: z.number().int().min(1),
  budget: z.number().positive().optional(),
  currency: z.string().length(3),
  travelerType: z.string().optional(),
  travelers: z.number().int().min(1),
  interests: z.array(z.string()),
});
export type TripRequest = z.infer<typeof TripRequestSchema>;

export function slotString(slots: SlotMap, name: SlotName): string | undefined {
  const v = slots[name]?.value;
  return typeof v === 'string' && v.trim() ? v : undefined;
}

export function slotNumber(slots: SlotMap, name: SlotName): number | undefined {
  const v = slots[name]?.value;
  if (typeof v === 'number' && Number.isFinite(v)) return v;
  if (typeof v === 'string' && v.trim() && Number.isFinite(Number(v))) return Number(v);
  return undefined;
}

export function slotList(slots: SlotMap, name: SlotName): string[] {
  const v = slots[name]?.value;
  if (Array.isArray(v)) return v;
  if (typeof v === 'string' && v.trim()) return v.split(',').map((s) => s.trim()).filter(Boolean);
  return [];
}

/** Plain `{ name: value }` view of a slot map, used by API responses and logs. */
export function slotValues(slots: SlotMap): Partial<Record<SlotName, SlotValue>> {
  const out: Partial<Record<SlotName, SlotValue>> = {};
  for (const name of SLOT_NAMES) {
    const entry = slots[name];
    if (entry) out[name] = entry.value;
  }
  return out;
}
