import { z } from 'zod';
import { ERROR_CODES } from '../core/errors.js';
import { SOURCE_NAMES } from '../providers/types.js';

export const TASK_STATUSES = ['pending', 'running', 'completed', 'failed', 'cancelled'] as const;
export const TaskStatusSchema = z.enum(TASK_STATUSES);
export type TaskStatus = z.infer<typeof TaskStatusSchema>;

export const TASK_STEPS = ['intent_extraction', 'data_gathering', 'plan_composition', 'finalization'] as const;
export const TaskStepSchema = z.enum(TASK_STEPS);
export type TaskStep = z.infer<typeof TaskStepSchema>;

export const SourceStatusSchema = z.object({
  name: z.enum(SOURCE_NAMES),
  status: z.enum(['active', 'degraded', 'missing']),
  reason: z.string().optional(),
});
export type SourceStatus = z.infer<typeof SourceStatusSchema>;

export const TaskErrorSchema = z.object({
  code: z.enum(ERROR_CODES),
  message: z.string(),
  retryable: z.boolean(),
});

export const TaskSnapshotSchema = z.object({
  taskId: z.string().min(1),
  kind: z.enum(['generate', 'replan']),
  status: TaskStatusSchema,
  step: TaskStepSchema.nullable(),
  progress: z.number().int().min(0).max(100),
  message: z.string(),
  sources: z.array(SourceStatusSchema),
  error: TaskErrorSchema.optional(),
  resultVersionId: z.string().optional(),
  conversationKey: z.string().optional(),
  cancelRequested: z.boolean(),
  /** Bumped on every published transition; subscribers see it strictly increase. */
  seq: z.number().int().min(0),
  createdAt: z.string(),
  updatedAt: z.string(),
});
export type TaskSnapshot = z.infer<typeof TaskSnapshotSchema>;

export function isTerminal(status: TaskStatus): boolean {
  return status === 'completed' || status === 'failed' || status === 'cancelled';
}
