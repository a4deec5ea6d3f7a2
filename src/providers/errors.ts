import { BrokenCircuitError, TaskCancelledError } from 'cockatiel';
import { ZodError } from 'zod';
import { ExternalFetchError } from '../util/fetch.js';
import type { FailureKind, ProviderFailure } from './types.js';

function numberProp(obj: unknown, key: string): number | undefined {
  if (typeof obj !== 'object' || obj === null) return undefined;
  const value: unknown = Reflect.get(obj, key);
  return typeof value === 'number' ? value : undefined;
}

/** HTTP status carried by an SDK error (`err.response.statusCode` or `.status`). */
function responseStatus(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null || !('response' in err)) return undefined;
  return numberProp(err.response, 'statusCode') ?? numberProp(err.response, 'status');
}

export function kindForStatus(status: number): FailureKind {
  if (status === 401 || status === 403) return 'auth_error';
  if (status === 404) return 'not_found';
  if (status === 429) return 'rate_limit';
  if (status >= 500) return 'server_error';
  return 'invalid_response';
}

/**
 * Maps anything an adapter or a resilience policy threw onto a typed
 * provider failure.
 */
export function classifyFailure(err: unknown): ProviderFailure {
  if (err instanceof ProviderFailureError) return err.failure;
  if (err instanceof BrokenCircuitError) {
    return { kind: 'circuit_open', message: 'circuit breaker open' };
  }
  if (err instanceof TaskCancelledError) {
    return { kind: 'timeout', message: err.message || 'provider call timed out' };
  }
  if (err instanceof ExternalFetchError) {
    switch (err.kind) {
      case 'timeout':
        return { kind: 'timeout', message: err.message };
      case 'aborted':
        return { kind: 'cancelled', message: err.message };
      case 'http':
        return {
          kind: err.status ? kindForStatus(err.status) : 'server_error',
          message: err.message,
          ...(err.status ? { status: err.status } : {}),
        };
      case 'network':
        return {
          kind: err.message === 'json_parse_error' ? 'invalid_response' : 'network_error',
          message: err.message,
        };
    }
  }
  if (err instanceof ZodError) {
    return { kind: 'invalid_response', message: err.issues[0]?.message ?? 'unexpected response shape' };
  }

  const status = responseStatus(err);
  if (status !== undefined) {
    return { kind: kindForStatus(status), message: `HTTP_${status}`, status };
  }
  if (err instanceof Error) {
    if (err.name === 'AbortError') return { kind: 'timeout', message: 'request aborted' };
    return { kind: 'network_error', message: err.message };
  }
  return { kind: 'unknown_error', message: String(err) };
}

/**
 * Carries an adapter's `{ ok: false }` outcome through a cockatiel policy so
 * the circuit breaker counts it as a failure.
 */
export class ProviderFailureError extends Error {
  constructor(public readonly failure: ProviderFailure) {
    super(failure.message);
    this.name = 'ProviderFailureError';
  }
}
