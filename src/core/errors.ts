export const ERROR_CODES = [
  'InvalidRequest',
  'AmbiguousModification',
  'ProviderDegraded',
  'CompositionFailure',
  'StorageUnavailable',
  'Cancelled',
  'UnknownTask',
  'UnknownVersion',
  'TaskTimeout',
] as const;

export type ErrorCode = (typeof ERROR_CODES)[number];

export interface TaskError {
  code: ErrorCode;
  message: string;
  retryable: boolean;
}

export class PlannerError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly retryable: boolean,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'PlannerError';
  }

  toTaskError(): TaskError {
    return { code: this.code, message: this.message, retryable: this.retryable };
  }
}

export class InvalidRequestError extends PlannerError {
  constructor(message: string, public readonly missing: string[] = []) {
    super(message, 'InvalidRequest', false, missing.length ? { missing } : undefined);
    this.name = 'InvalidRequestError';
  }
}

export interface ModificationCandidates {
  days: number[];
  activityIds: string[];
}

/** Replan scope could not be mapped onto the parent version; the user must clarify. */
export class AmbiguousModificationError extends PlannerError {
  constructor(message: string, public readonly candidates: ModificationCandidates) {
    super(message, 'AmbiguousModification', false, { candidates });
    this.name = 'AmbiguousModificationError';
  }
}

export class CompositionFailureError extends PlannerError {
  constructor(message: string, cause?: unknown) {
    super(message, 'CompositionFailure', true, cause instanceof Error ? { cause: cause.message } : undefined);
    this.name = 'CompositionFailureError';
  }
}

export class StorageUnavailableError extends PlannerError {
  constructor(operation: string, cause?: unknown) {
    super(
      `Storage unavailable during ${operation}`,
      'StorageUnavailable',
      true,
      cause instanceof Error ? { operation, cause: cause.message } : { operation },
    );
    this.name = 'StorageUnavailableError';
  }
}

export class UnknownTaskError extends PlannerError {
  constructor(public readonly taskId: string) {
    super(`Unknown task ${taskId}`, 'UnknownTask', false);
    this.name = 'UnknownTaskError';
  }
}

export class UnknownVersionError extends PlannerError {
  constructor(public readonly versionId: string) {
    super(`Unknown itinerary version ${versionId}`, 'UnknownVersion', false);
    this.name = 'UnknownVersionError';
  }
}

export class TaskTimeoutError extends PlannerError {
  constructor(ceilingMs: number) {
    super(`Task exceeded its ${ceilingMs}ms ceiling`, 'TaskTimeout', true);
    this.name = 'TaskTimeoutError';
  }
}

/**
 * Maps anything thrown inside a task run to the shape stored on a failed
 * snapshot. Unclassified errors count as transient composition failures.
 */
export function toTaskError(err: unknown): TaskError {
  if (err instanceof PlannerError) return err.toTaskError();
  const message = err instanceof Error ? err.message : String(err);
  return { code: 'CompositionFailure', message, retryable: true };
}

export function httpStatusFor(err: PlannerError): number {
  switch (err.code) {
    case 'InvalidRequest':
      return 400;
    case 'AmbiguousModification':
      return 422;
    case 'UnknownTask':
    case 'UnknownVersion':
      return 404;
    case 'StorageUnavailable':
      return 503;
    default:
      return 500;
  }
}
