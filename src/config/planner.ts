import { z } from 'zod';
import type { SourceName } from '../providers/types.js';

const TimeoutsSchema = z.object({
  weather: z.coerce.number().int().min(50).default(8000),
  flights: z.coerce.number().int().min(50).default(15000),
  hotels: z.coerce.number().int().min(50).default(12000),
  transit: z.coerce.number().int().min(50).default(8000),
  images: z.coerce.number().int().min(50).default(4000),
}) satisfies z.ZodType<Record<SourceName, number>, z.ZodTypeDef, unknown>;

const boolFromEnv = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0'])])
  .transform((v) => v === true || v === 'true' || v === '1');

export const PlannerConfigSchema = z.object({
  providerTimeoutsMs: TimeoutsSchema.default({}),
  gatherMaxConcurrency: z.coerce.number().int().min(1).default(3),
  taskCeilingMs: z.coerce.number().int().min(100).default(120000),
  workerPoolSize: z.coerce.number().int().min(1).default(4),
  contextLockConfidence: z.coerce.number().min(0).max(1).default(0.7),
  composeFallbackPlan: boolFromEnv.default(true),
  maxTripDays: z.coerce.number().int().min(1).max(60).default(14),
  defaultOrigin: z.string().min(3).default('BKK'),
  defaultCurrency: z.string().length(3).default('THB'),
});

export type PlannerConfig = z.infer<typeof PlannerConfigSchema>;

export function loadPlannerConfig(env: NodeJS.ProcessEnv = process.env): PlannerConfig {
  return PlannerConfigSchema.parse({
    providerTimeoutsMs: {
      weather: env.WEATHER_TIMEOUT_MS || undefined,
      flights: env.FLIGHTS_TIMEOUT_MS || undefined,
      hotels: env.HOTELS_TIMEOUT_MS || undefined,
      transit: env.TRANSIT_TIMEOUT_MS || undefined,
      images: env.IMAGES_TIMEOUT_MS || undefined,
    },
    gatherMaxConcurrency: env.GATHER_MAX_CONCURRENCY || undefined,
    taskCeilingMs: env.TASK_CEILING_MS || undefined,
    workerPoolSize: env.WORKER_POOL_SIZE || undefined,
    contextLockConfidence: env.CONTEXT_LOCK_CONFIDENCE || undefined,
    composeFallbackPlan: env.COMPOSE_FALLBACK_PLAN || undefined,
    maxTripDays: env.MAX_TRIP_DAYS || undefined,
    defaultOrigin: env.DEFAULT_ORIGIN || undefined,
    defaultCurrency: env.DEFAULT_CURRENCY || undefined,
  });
}
