import Bottleneck from 'bottleneck';
import type pino from 'pino';
import type { PlannerConfig } from '../config/planner.js';
import { TaskTimeoutError, toTaskError } from './errors.js';
import type { Subscription, ProgressPublisher } from './progress.js';
import { progressFor, type TaskStateMachine } from './task_machine.js';
import { isTerminal, type SourceStatus, type TaskSnapshot, type TaskStep } from '../schemas/task.js';

/** Thrown at a checkpoint once cancellation was requested. */
export class CancellationObserved extends Error {
  constructor() {
    super('cancellation observed');
    this.name = 'CancellationObserved';
  }
}

/** What a task body sees while it runs. */
export interface RunContext {
  taskId: string;
  /** Aborted when the task hits its ceiling. */
  signal: AbortSignal;
  /** Throws CancellationObserved when cancellation was requested. */
  checkpoint(): Promise<void>;
  isCancelled(): Promise<boolean>;
  advance(step: TaskStep, fraction: number, message: string, sources?: SourceStatus[]): Promise<void>;
}

export interface JobResult {
  versionId: string;
  sources: SourceStatus[];
}

/** Task body; resolves with the version it produced. */
export type TaskJob = (ctx: RunContext) => Promise<JobResult>;

export interface LaunchInput {
  kind: TaskSnapshot['kind'];
  conversationKey?: string;
  /** Repeated request ids return the task created the first time. */
  requestId?: string;
  job: TaskJob;
}

const MAX_REMEMBERED_REQUESTS = 10_000;

type Settled = { kind: 'done'; result: JobResult } | { kind: 'error'; err: unknown } | { kind: 'timeout' };

/**
 * Runs task bodies on a bounded worker pool under the task ceiling, turning
 * their outcome into exactly one terminal transition.
 */
export class TaskRunner {
  private readonly pool: Bottleneck;
  private readonly byRequestId = new Map<string, Promise<TaskSnapshot>>();
  private readonly inflight = new Map<string, Promise<void>>();

  constructor(
    private readonly tasks: TaskStateMachine,
    private readonly publisher: ProgressPublisher,
    private readonly cfg: Pick<PlannerConfig, 'taskCeilingMs' | 'workerPoolSize'>,
    private readonly log: pino.Logger,
  ) {
    this.pool = new Bottleneck({ maxConcurrent: cfg.workerPoolSize });
  }

  async launch(input: LaunchInput): Promise<TaskSnapshot> {
    const { requestId } = input;
    if (!requestId) return this.start(input);

    const known = this.byRequestId.get(requestId);
    if (known) return this.tasks.get((await known).taskId);

    const created = this.start(input);
    this.rememberRequest(requestId, created);
    try {
      return await created;
    } catch (err) {
      // A failed creation leaves the request id free for a retry.
      if (this.byRequestId.get(requestId) === created) this.byRequestId.delete(requestId);
      throw err;
    }
  }

  cancel(taskId: string): Promise<TaskSnapshot> {
    return this.tasks.cancel(taskId);
  }

  poll(taskId: string): Promise<TaskSnapshot> {
    return this.publisher.poll(taskId);
  }

  subscribe(taskId: string): Promise<Subscription> {
    return this.publisher.subscribe(taskId);
  }

  /** Resolves once every launched task has settled. */
  async drain(): Promise<void> {
    while (this.inflight.size) {
      await Promise.all([...this.inflight.values()]);
    }
  }

  async close(): Promise<void> {
    await this.drain();
    await this.pool.stop({ dropWaitingJobs: false });
  }

  private async start(input: LaunchInput): Promise<TaskSnapshot> {
    const created = await this.tasks.create({
      kind: input.kind,
      ...(input.conversationKey ? { conversationKey: input.conversationKey } : {}),
    });
    const { taskId } = created;
    const done = this.pool.schedule(() => this.execute(taskId, input.job)).then(
      () => undefined,
      (err: unknown) => {
        this.log.error({ taskId, err }, 'task:run_failed');
      },
    );
    this.inflight.set(
      taskId,
      done.then(() => {
        this.inflight.delete(taskId);
      }),
    );
    return created;
  }

  private rememberRequest(requestId: string, created: Promise<TaskSnapshot>): void {
    this.byRequestId.delete(requestId);
    this.byRequestId.set(requestId, created);
    if (this.byRequestId.size > MAX_REMEMBERED_REQUESTS) {
      const oldest = this.byRequestId.keys().next();
      if (!oldest.done) this.byRequestId.delete(oldest.value);
    }
  }

  private async execute(taskId: string, job: TaskJob): Promise<void> {
    let timer: NodeJS.Timeout | undefined;
    try {
      const current = await this.tasks.get(taskId);
      if (isTerminal(current.status)) return;

      const controller = new AbortController();
      const ctx = this.contextFor(taskId, controller.signal);
      const ceiling = new Promise<Settled>((resolve) => {
        timer = setTimeout(() => resolve({ kind: 'timeout' }), this.cfg.taskCeilingMs);
      });
      const work = job(ctx).then(
        (result): Settled => ({ kind: 'done', result }),
        (err: unknown): Settled => ({ kind: 'error', err }),
      );

      const settled = await Promise.race([work, ceiling]);
      if (settled.kind === 'done') {
        await this.tasks.complete(taskId, settled.result.versionId, settled.result.sources);
      } else if (settled.kind === 'timeout') {
        controller.abort();
        this.log.warn({ taskId, ceilingMs: this.cfg.taskCeilingMs }, 'task:ceiling_exceeded');
        await this.tasks.fail(taskId, new TaskTimeoutError(this.cfg.taskCeilingMs).toTaskError());
      } else if (settled.kind === 'error') {
        if (settled.err instanceof CancellationObserved) {
          await this.tasks.markCancelled(taskId);
        } else {
          this.log.error({ taskId, err: settled.err }, 'task:failed');
          await this.tasks.fail(taskId, toTaskError(settled.err));
        }
      }
    } catch (err) {
      // Storage refused the read or the terminal transition; the task stays where it was.
      this.log.error({ taskId, err }, 'task:terminal_transition_failed');
    } finally {
      clearTimeout(timer);
    }
  }

  private contextFor(taskId: string, signal: AbortSignal): RunContext {
    const isCancelled = () => this.tasks.isCancelRequested(taskId);
    return {
      taskId,
      signal,
      isCancelled,
      checkpoint: async () => {
        if (signal.aborted || (await isCancelled())) throw new CancellationObserved();
      },
      advance: async (step, fraction, message, sources) => {
        await this.tasks.advance(taskId, {
          step,
          progress: progressFor(step, fraction),
          message,
          ...(sources ? { sources } : {}),
        });
      },
    };
  }
}
