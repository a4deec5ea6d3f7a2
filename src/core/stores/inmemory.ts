import type { PlannerStorage } from '../storage.js';
import type { StoreConfig } from '../../config/store.js';
import type { ConversationContext } from '../../schemas/slots.js';
import type { TaskSnapshot } from '../../schemas/task.js';
import type { ItineraryVersion } from '../../schemas/itinerary.js';

interface Entry<T> {
  value: T;
  expiresAt: number;
}

class TtlMap<T> {
  private readonly entries = new Map<string, Entry<T>>();

  constructor(private readonly ttlMs: number) {}

  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= Date.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: string, value: T): void {
    this.entries.set(key, { value, expiresAt: Date.now() + this.ttlMs });
  }

  sweep(now: number): void {
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) this.entries.delete(key);
    }
  }
}

/**
 * Process-local store. Contexts and snapshots are cloned on the way in and
 * out; versions are frozen and handed out as-is so unchanged days keep their
 * identity across versions. Only task snapshots expire.
 */
export function createInMemoryStore(cfg: StoreConfig): PlannerStorage {
  const contexts = new Map<string, ConversationContext>();
  const tasks = new TtlMap<TaskSnapshot>(cfg.ttlSec * 1000);
  const versions = new Map<string, ItineraryVersion>();
  const latest = new Map<string, string>();

  const sweepInterval = setInterval(() => tasks.sweep(Date.now()), 60_000);
  sweepInterval.unref();

  return {
    async loadContext(key) {
      const ctx = contexts.get(key);
      return ctx ? structuredClone(ctx) : undefined;
    },

    async saveContext(ctx) {
      contexts.set(ctx.key, structuredClone(ctx));
    },

    async loadTask(taskId) {
      const snapshot = tasks.get(taskId);
      return snapshot ? structuredClone(snapshot) : undefined;
    },

    async saveTask(snapshot) {
      tasks.set(snapshot.taskId, structuredClone(snapshot));
    },

    async loadVersion(versionId) {
      return versions.get(versionId);
    },

    async saveVersion(version) {
      versions.set(version.id, version);
      const currentId = latest.get(version.itineraryId);
      const current = currentId ? versions.get(currentId) : undefined;
      if (!current || current.version < version.version) {
        latest.set(version.itineraryId, version.id);
      }
    },

    async latestVersion(itineraryId) {
      const id = latest.get(itineraryId);
      return id ? versions.get(id) : undefined;
    },

    async healthCheck() {
      return true;
    },

    async close() {
      clearInterval(sweepInterval);
    },
  };
}
