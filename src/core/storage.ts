import type pino from 'pino';
import type { StoreConfig } from '../config/store.js';
import type { ConversationContext } from '../schemas/slots.js';
import type { TaskSnapshot } from '../schemas/task.js';
import type { ItineraryVersion } from '../schemas/itinerary.js';
import { StorageUnavailableError } from './errors.js';
import { createInMemoryStore } from './stores/inmemory.js';
import { createRedisStore } from './stores/redis.js';

/** Persistence collaborator for contexts, task snapshots and itinerary versions. */
export interface PlannerStorage {
  loadContext(key: string): Promise<ConversationContext | undefined>;
  saveContext(ctx: ConversationContext): Promise<void>;
  loadTask(taskId: string): Promise<TaskSnapshot | undefined>;
  saveTask(snapshot: TaskSnapshot): Promise<void>;
  loadVersion(versionId: string): Promise<ItineraryVersion | undefined>;
  saveVersion(version: ItineraryVersion): Promise<void>;
  latestVersion(itineraryId: string): Promise<ItineraryVersion | undefined>;
  healthCheck(): Promise<boolean>;
  close(): Promise<void>;
}

export function createStorage(cfg: StoreConfig, log: pino.Logger): PlannerStorage {
  const backend = cfg.kind === 'redis' ? createRedisStore(cfg) : createInMemoryStore(cfg);
  log.info({ store: cfg.kind, ttlSec: cfg.ttlSec }, 'storage:init');
  return guardStorage(backend, log);
}

/**
 * Wraps a backend so every fault reaches the core as StorageUnavailableError.
 */
export function guardStorage(backend: PlannerStorage, log: pino.Logger): PlannerStorage {
  async function guarded<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof StorageUnavailableError) throw err;
      log.error({ operation, err }, 'storage:unavailable');
      throw new StorageUnavailableError(operation, err);
    }
  }

  return {
    loadContext: (key) => guarded('loadContext', () => backend.loadContext(key)),
    saveContext: (ctx) => guarded('saveContext', () => backend.saveContext(ctx)),
    loadTask: (taskId) => guarded('loadTask', () => backend.loadTask(taskId)),
    saveTask: (snapshot) => guarded('saveTask', () => backend.saveTask(snapshot)),
    loadVersion: (versionId) => guarded('loadVersion', () => backend.loadVersion(versionId)),
    saveVersion: (version) => guarded('saveVersion', () => backend.saveVersion(version)),
    latestVersion: (itineraryId) => guarded('latestVersion', () => backend.latestVersion(itineraryId)),
    async healthCheck() {
      try {
        return await backend.healthCheck();
      } catch {
        return false;
      }
    },
    close: () => backend.close(),
  };
}
