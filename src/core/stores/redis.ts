import { createClient } from 'redis';
import type { z } from 'zod';
import type { PlannerStorage } from '../storage.js';
import type { StoreConfig } from '../../config/store.js';
import { ConversationContextSchema } from '../../schemas/slots.js';
import { TaskSnapshotSchema } from '../../schemas/task.js';
import { ItineraryVersionSchema } from '../../schemas/itinerary.js';

export type RedisClient = ReturnType<typeof createClient>;

export function createRedisStore(cfg: StoreConfig, injectedClient?: RedisClient): PlannerStorage {
  let client: RedisClient | undefined = injectedClient;
  let connecting: Promise<RedisClient> | undefined;

  async function getClient(): Promise<RedisClient> {
    if (client) return client;
    if (!connecting) {
      const fresh = createClient({ url: cfg.redisUrl });
      connecting = fresh.connect().then(() => {
        client = fresh;
        return fresh;
      });
      connecting.catch(() => {
        connecting = undefined;
      });
    }
    return connecting;
  }

  async function withTimeout<T>(operation: () => Promise<T>): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new Error(`redis operation exceeded ${cfg.timeoutMs}ms`)),
        cfg.timeoutMs,
      );
    });
    try {
      return await Promise.race([operation(), deadline]);
    } finally {
      clearTimeout(timer);
    }
  }

  const key = (...parts: string[]) => [cfg.keyPrefix, ...parts].join(':');

  async function readJson<S extends z.ZodTypeAny>(
    redisKey: string,
    schema: S,
  ): Promise<z.infer<S> | undefined> {
    return withTimeout(async () => {
      const redis = await getClient();
      const value = await redis.get(redisKey);
      if (!value) return undefined;
      const raw: unknown = JSON.parse(value);
      return schema.parse(raw);
    });
  }

  /** `ttlSec` set only for task snapshots; contexts and versions never expire. */
  async function writeJson(redisKey: string, value: unknown, ttlSec?: number): Promise<void> {
    return withTimeout(async () => {
      const redis = await getClient();
      const payload = JSON.stringify(value);
      if (ttlSec) await redis.set(redisKey, payload, { EX: ttlSec });
      else await redis.set(redisKey, payload);
    });
  }

  return {
    loadContext: (conversationKey) =>
      readJson(key('ctx', conversationKey), ConversationContextSchema),

    saveContext: (ctx) => writeJson(key('ctx', ctx.key), ctx),

    loadTask: (taskId) => readJson(key('task', taskId), TaskSnapshotSchema),

    saveTask: (snapshot) => writeJson(key('task', snapshot.taskId), snapshot, cfg.ttlSec),

    loadVersion: (versionId) => readJson(key('version', versionId), ItineraryVersionSchema),

    async saveVersion(version) {
      await writeJson(key('version', version.id), version);
      await withTimeout(async () => {
        const redis = await getClient();
        const latestKey = key('itinerary', version.itineraryId, 'latest');
        const currentId = await redis.get(latestKey);
        if (currentId) {
          const current = await readJson(key('version', currentId), ItineraryVersionSchema);
          if (current && current.version >= version.version) return;
        }
        await redis.set(latestKey, version.id);
      });
    },

    async latestVersion(itineraryId) {
      const id = await withTimeout(async () => {
        const redis = await getClient();
        return redis.get(key('itinerary', itineraryId, 'latest'));
      });
      return id ? readJson(key('version', id), ItineraryVersionSchema) : undefined;
    },

    async healthCheck() {
      return withTimeout(async () => {
        const redis = await getClient();
        return (await redis.ping()) === 'PONG';
      });
    },

    async close() {
      if (client?.isOpen) await client.quit();
    },
  };
}
