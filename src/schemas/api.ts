import { z } from 'zod';

export const TurnBodySchema = z.object({
  conversationKey: z.string().min(1).max(128).optional(),
  turnId: z.string().min(1).max(128),
  text: z.string().min(1).max(4000),
});
export type TurnBody = z.infer<typeof TurnBodySchema>;

/** Explicit trip details; values use the same slot names as conversation turns. */
export const StartBodySchema = z.object({
  requestId: z.string().min(1).max(128).optional(),
  conversationKey: z.string().min(1).max(128).optional(),
  slots: z
    .object({
      destination: z.string().min(1),
      origin: z.string().min(1),
      start_date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
      end_date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
      duration_days: z.number().int().min(1),
      budget: z.number().positive(),
      currency: z.string().length(3),
      traveler_type: z.string().min(1),
      travelers: z.number().int().min(1),
      interests: z.array(z.string().min(1)),
    })
    .partial()
    .default({}),
});
export type StartBody = z.infer<typeof StartBodySchema>;

export const ReplanBodySchema = z.object({
  requestId: z.string().min(1).max(128).optional(),
  modification: z.string().min(1).max(2000),
});
export type ReplanBody = z.infer<typeof ReplanBodySchema>;
