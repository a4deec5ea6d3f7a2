import { randomUUID } from 'node:crypto';
import type pino from 'pino';
import type { PlannerStorage } from './storage.js';
import { KeyedSerializer } from './keyed_queue.js';
import { UnknownVersionError } from './errors.js';
import type { ItineraryVersion } from '../schemas/itinerary.js';

export type NewVersion = Omit<ItineraryVersion, 'id' | 'itineraryId' | 'version' | 'createdAt'> & {
  /** Omitted for the first version of a new itinerary. */
  itineraryId?: string;
};

/** Freezes a value and everything reachable from it; already-frozen parts are skipped. */
export function deepFreeze<T>(value: T): T {
  if (typeof value !== 'object' || value === null || Object.isFrozen(value)) return value;
  Object.freeze(value);
  for (const key of Object.keys(value)) {
    deepFreeze(Reflect.get(value, key));
  }
  return value;
}

/**
 * Immutable itinerary versions. Version numbers per itinerary are assigned
 * under a per-itinerary lock so they strictly increase.
 */
export class VersionRepository {
  private readonly serializer = new KeyedSerializer();

  constructor(
    private readonly storage: PlannerStorage,
    private readonly log: pino.Logger,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async create(input: NewVersion): Promise<ItineraryVersion> {
    const itineraryId = input.itineraryId ?? `itin_${randomUUID()}`;
    return this.serializer.run(itineraryId, async () => {
      const latest = await this.storage.latestVersion(itineraryId);
      const version: ItineraryVersion = deepFreeze({
        ...input,
        id: `ver_${randomUUID()}`,
        itineraryId,
        version: (latest?.version ?? 0) + 1,
        createdAt: this.now().toISOString(),
      });
      await this.storage.saveVersion(version);
      this.log.info(
        { itineraryId, versionId: version.id, version: version.version, parentVersionId: version.parentVersionId },
        'version:created',
      );
      return version;
    });
  }

  async load(versionId: string): Promise<ItineraryVersion> {
    const version = await this.storage.loadVersion(versionId);
    if (!version) throw new UnknownVersionError(versionId);
    return deepFreeze(version);
  }

  async latest(itineraryId: string): Promise<ItineraryVersion | undefined> {
    return this.storage.latestVersion(itineraryId);
  }
}
