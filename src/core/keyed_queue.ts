import Bottleneck from 'bottleneck';

/**
 * Runs jobs one at a time per key while different keys proceed in parallel.
 * Backed by a Bottleneck group with `maxConcurrent: 1` per key; idle limiters
 * are dropped by the group after `idleMs`.
 */
export class KeyedSerializer {
  private readonly group: Bottleneck.Group;

  constructor(idleMs = 5 * 60_000) {
    this.group = new Bottleneck.Group({ maxConcurrent: 1, timeout: idleMs });
  }

  run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    return this.group.key(key).schedule(fn);
  }
}
