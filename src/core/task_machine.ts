import { randomUUID } from 'node:crypto';
import type pino from 'pino';
import { KeyedSerializer } from './keyed_queue.js';
import type { ProgressPublisher } from './progress.js';
import type { TaskError } from './errors.js';
import { incTaskFinished, incTaskStarted } from '../util/metrics.js';
import {
  isTerminal,
  TASK_STEPS,
  type SourceStatus,
  type TaskSnapshot,
  type TaskStep,
} from '../schemas/task.js';

/** Progress band each step occupies. */
export const STEP_RANGES: Record<TaskStep, readonly [number, number]> = {
  intent_extraction: [5, 15],
  data_gathering: [15, 60],
  plan_composition: [60, 90],
  finalization: [90, 100],
};

/**
 * Progress for a fraction of the way through a step. Running tasks top out
 * at 99; only completion reports 100.
 */
export function progressFor(step: TaskStep, fraction = 0): number {
  const [lo, hi] = STEP_RANGES[step];
  const f = Math.min(1, Math.max(0, fraction));
  return Math.min(99, Math.floor(lo + (hi - lo) * f));
}

const stepIndex = (step: TaskStep | null) => (step === null ? -1 : TASK_STEPS.indexOf(step));

export interface CreateTaskInput {
  kind: TaskSnapshot['kind'];
  conversationKey?: string;
  message?: string;
}

export interface AdvanceInput {
  step: TaskStep;
  progress: number;
  message: string;
  sources?: SourceStatus[];
}

/**
 * Owns every task's lifecycle. Writes for one task id are serialized;
 * terminal snapshots never change; progress and step never move backwards.
 */
export class TaskStateMachine {
  private readonly serializer = new KeyedSerializer();
  private readonly now: () => Date;

  constructor(
    private readonly publisher: ProgressPublisher,
    private readonly log: pino.Logger,
    now?: () => Date,
  ) {
    this.now = now ?? (() => new Date());
  }

  async create(input: CreateTaskInput): Promise<TaskSnapshot> {
    const at = this.now().toISOString();
    const snapshot: TaskSnapshot = {
      taskId: `task_${randomUUID()}`,
      kind: input.kind,
      status: 'pending',
      step: null,
      progress: 0,
      message: input.message ?? 'Queued',
      sources: [],
      ...(input.conversationKey ? { conversationKey: input.conversationKey } : {}),
      cancelRequested: false,
      seq: 0,
      createdAt: at,
      updatedAt: at,
    };
    await this.publisher.publish(snapshot);
    incTaskStarted(input.kind);
    this.log.info({ taskId: snapshot.taskId, kind: input.kind }, 'task:created');
    return snapshot;
  }

  get(taskId: string): Promise<TaskSnapshot> {
    return this.publisher.poll(taskId);
  }

  async advance(taskId: string, input: AdvanceInput): Promise<TaskSnapshot> {
    return this.transition(taskId, (current) => {
      if (stepIndex(input.step) < stepIndex(current.step)) return undefined;
      return {
        status: 'running',
        step: input.step,
        progress: Math.max(current.progress, Math.min(99, Math.round(input.progress))),
        message: input.message,
        ...(input.sources ? { sources: input.sources } : {}),
      };
    });
  }

  async complete(taskId: string, versionId: string, sources?: SourceStatus[]): Promise<TaskSnapshot> {
    return this.transition(taskId, () => ({
      status: 'completed',
      step: 'finalization',
      progress: 100,
      message: 'Itinerary ready',
      resultVersionId: versionId,
      ...(sources ? { sources } : {}),
    }));
  }

  async fail(taskId: string, error: TaskError): Promise<TaskSnapshot> {
    return this.transition(taskId, () => ({ status: 'failed', message: error.message, error }));
  }

  /**
   * Pending tasks are cancelled at once. Running tasks are flagged and stop at
   * their next checkpoint. Terminal tasks are left alone.
   */
  async cancel(taskId: string): Promise<TaskSnapshot> {
    return this.transition(taskId, (current) => {
      if (current.status === 'pending') return cancelledPatch('Cancelled before start');
      if (current.cancelRequested) return undefined;
      return { cancelRequested: true, message: 'Cancellation requested' };
    });
  }

  /** Called by the runner once it observes a requested cancellation. */
  async markCancelled(taskId: string): Promise<TaskSnapshot> {
    return this.transition(taskId, () => cancelledPatch('Cancelled'));
  }

  async isCancelRequested(taskId: string): Promise<boolean> {
    const snapshot = await this.publisher.poll(taskId);
    return snapshot.cancelRequested || snapshot.status === 'cancelled';
  }

  private async transition(
    taskId: string,
    patch: (current: TaskSnapshot) => Partial<TaskSnapshot> | undefined,
  ): Promise<TaskSnapshot> {
    return this.serializer.run(taskId, async () => {
      const current = await this.publisher.poll(taskId);
      if (isTerminal(current.status)) {
        this.log.debug({ taskId, status: current.status }, 'task:ignored_after_terminal');
        return current;
      }
      const changes = patch(current);
      if (!changes) return current;

      const next: TaskSnapshot = {
        ...current,
        ...changes,
        taskId,
        seq: current.seq + 1,
        updatedAt: this.now().toISOString(),
      };
      await this.publisher.publish(next);

      if (isTerminal(next.status)) {
        incTaskFinished(next.status, next.error?.code);
        this.log.info({ taskId, status: next.status, code: next.error?.code }, 'task:finished');
      } else {
        this.log.debug({ taskId, step: next.step, progress: next.progress }, 'task:advance');
      }
      return next;
    });
  }
}

function cancelledPatch(message: string): Partial<TaskSnapshot> {
  return {
    status: 'cancelled',
    message,
    cancelRequested: true,
    error: { code: 'Cancelled', message, retryable: false },
  };
}
