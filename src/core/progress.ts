import type pino from 'pino';
import type { PlannerStorage } from './storage.js';
import { UnknownTaskError } from './errors.js';
import { isTerminal, type TaskSnapshot } from '../schemas/task.js';

const MAX_CACHED_SNAPSHOTS = 10_000;

/**
 * One subscriber's ordered stream of snapshots. Ends after the terminal
 * snapshot, or when the consumer stops iterating.
 */
export class Subscription implements AsyncIterableIterator<TaskSnapshot> {
  private readonly queue: TaskSnapshot[] = [];
  private readonly waiters: Array<(result: IteratorResult<TaskSnapshot, undefined>) => void> = [];
  private lastSeq = -1;
  private ended = false;

  constructor(private readonly detach: (sub: Subscription) => void) {}

  get closed(): boolean {
    return this.ended;
  }

  /** Delivers a snapshot; anything not newer than the last one is dropped. */
  push(snapshot: TaskSnapshot): void {
    if (this.ended || snapshot.seq <= this.lastSeq) return;
    this.lastSeq = snapshot.seq;
    const waiter = this.waiters.shift();
    if (waiter) waiter({ value: snapshot, done: false });
    else this.queue.push(snapshot);
    if (isTerminal(snapshot.status)) this.end();
  }

  end(): void {
    if (this.ended) return;
    this.ended = true;
    this.detach(this);
    for (const waiter of this.waiters.splice(0)) waiter({ value: undefined, done: true });
  }

  next(): Promise<IteratorResult<TaskSnapshot, undefined>> {
    const queued = this.queue.shift();
    if (queued) return Promise.resolve({ value: queued, done: false });
    if (this.ended) return Promise.resolve({ value: undefined, done: true });
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  async return(): Promise<IteratorResult<TaskSnapshot, undefined>> {
    this.queue.length = 0;
    this.end();
    return { value: undefined, done: true };
  }

  [Symbol.asyncIterator](): Subscription {
    return this;
  }
}

/**
 * Per-task fan-out of state-machine snapshots. Keeps the latest snapshot in
 * memory and in storage so `poll` works with no subscribers and after a
 * restart. Only the task state machine publishes.
 */
export class ProgressPublisher {
  private readonly latest = new Map<string, TaskSnapshot>();
  private readonly channels = new Map<string, Set<Subscription>>();

  constructor(
    private readonly storage: PlannerStorage,
    private readonly log: pino.Logger,
  ) {}

  /**
   * Stores the snapshot, then makes it visible to `poll` and subscribers. A
   * storage fault rejects before anyone has seen the snapshot.
   */
  async publish(snapshot: TaskSnapshot): Promise<void> {
    const current = this.latest.get(snapshot.taskId);
    if (current && current.seq >= snapshot.seq) return;
    await this.storage.saveTask(snapshot);

    const landed = this.latest.get(snapshot.taskId);
    if (landed && landed.seq >= snapshot.seq) return;
    this.remember(snapshot);

    const subscribers = this.channels.get(snapshot.taskId);
    if (subscribers) {
      for (const sub of [...subscribers]) sub.push(snapshot);
    }
    if (isTerminal(snapshot.status)) this.channels.delete(snapshot.taskId);

    this.log.debug(
      { taskId: snapshot.taskId, status: snapshot.status, step: snapshot.step, progress: snapshot.progress, seq: snapshot.seq },
      'progress:publish',
    );
  }

  /** Latest snapshot from memory, else from storage. */
  async poll(taskId: string): Promise<TaskSnapshot> {
    const cached = this.latest.get(taskId);
    if (cached) return cached;
    const stored = await this.storage.loadTask(taskId);
    if (!stored) throw new UnknownTaskError(taskId);
    // A publish may have landed while storage was read.
    const raced = this.latest.get(taskId);
    if (raced && raced.seq >= stored.seq) return raced;
    this.remember(stored);
    return stored;
  }

  /** Current snapshot first, then every later one; closes after the terminal snapshot. */
  async subscribe(taskId: string): Promise<Subscription> {
    const current = await this.poll(taskId);
    const sub = new Subscription((s) => this.channels.get(taskId)?.delete(s));
    sub.push(current);
    if (sub.closed) return sub;

    let subscribers = this.channels.get(taskId);
    if (!subscribers) {
      subscribers = new Set();
      this.channels.set(taskId, subscribers);
    }
    subscribers.add(sub);
    // Anything published between the poll and registration.
    const latest = this.latest.get(taskId);
    if (latest) sub.push(latest);
    return sub;
  }

  subscriberCount(taskId: string): number {
    return this.channels.get(taskId)?.size ?? 0;
  }

  private remember(snapshot: TaskSnapshot): void {
    this.latest.delete(snapshot.taskId);
    this.latest.set(snapshot.taskId, snapshot);
    if (this.latest.size > MAX_CACHED_SNAPSHOTS) {
      const oldest = this.latest.keys().next();
      if (!oldest.done) this.latest.delete(oldest.value);
    }
  }
}
