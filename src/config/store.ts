import { z } from 'zod';

const StoreConfigSchema = z.object({
  kind: z.enum(['memory', 'redis']).default('memory'),
  /** Lifetime of task snapshots; contexts and itinerary versions are kept. */
  ttlSec: z.coerce.number().min(60).default(86400),
  timeoutMs: z.coerce.number().min(100).default(2000),
  redisUrl: z.string().optional(),
  keyPrefix: z.string().default('planner'),
});

export type StoreConfig = z.infer<typeof StoreConfigSchema>;

export function loadStoreConfig(): StoreConfig {
  return StoreConfigSchema.parse({
    kind: process.env.PLANNER_STORE || 'memory',
    ttlSec: process.env.STORE_TTL_SEC || 86400,
    timeoutMs: process.env.STORE_TIMEOUT_MS || 2000,
    redisUrl: process.env.REDIS_URL,
    keyPrefix: process.env.STORE_KEY_PREFIX || 'planner',
  });
}
