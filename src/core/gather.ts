import Bottleneck from 'bottleneck';
import {
  circuitBreaker,
  ConsecutiveBreaker,
  handleAll,
  timeout,
  TimeoutStrategy,
  type CircuitBreakerPolicy,
} from 'cockatiel';
import type pino from 'pino';
import type { ProviderBreakerConfig } from '../config/resilience.js';
import { classifyFailure, ProviderFailureError } from '../providers/errors.js';
import {
  SOURCE_NAMES,
  type AdapterSet,
  type GatherRequest,
  type GatherResults,
  type PayloadBySource,
  type ProviderAdapter,
  type SourceName,
  type SourceResult,
} from '../providers/types.js';
import { observeProvider } from '../util/metrics.js';
import type { FallbackSynthesizer } from './fallback.js';

export interface GatherOptions {
  /** Restricts the batch to these sources; defaults to every source. */
  sources?: readonly SourceName[];
  /** Checked before each dispatch. Calls already in flight are never aborted. */
  isCancelled?: () => boolean | Promise<boolean>;
  /** Fraction of sources resolved so far, reported after each one resolves. */
  onProgress?: (fraction: number, result: SourceResult) => void | Promise<void>;
  taskId?: string;
}

export interface GatherOutcome {
  results: GatherResults;
  degraded: boolean;
  /** A cancellation was observed during the batch; callers discard the results. */
  cancelled: boolean;
}

export interface GatherCoordinatorOptions {
  adapters: AdapterSet;
  synthesizer: FallbackSynthesizer;
  timeoutsMs: Record<SourceName, number>;
  maxConcurrency: number;
  breaker: ProviderBreakerConfig;
  log: pino.Logger;
}

/**
 * Issues one call per provider, concurrently up to a cap, each under its own
 * timeout and circuit breaker. Failures become labelled fallback results, so
 * `gather` resolves only once every source has an entry and never rejects.
 */
export class DataGatheringCoordinator {
  private readonly breakers = new Map<SourceName, CircuitBreakerPolicy>();

  constructor(private readonly opts: GatherCoordinatorOptions) {}

  async gather(request: GatherRequest, options: GatherOptions = {}): Promise<GatherOutcome> {
    const sources = options.sources ?? SOURCE_NAMES;
    const log = this.opts.log.child({ taskId: options.taskId });
    const limiter = new Bottleneck({ maxConcurrent: this.opts.maxConcurrency });
    const results: GatherResults = {};
    let cancelled = false;
    let resolved = 0;

    const checkCancelled = async () => {
      if (!cancelled && options.isCancelled) cancelled = await options.isCancelled();
      return cancelled;
    };

    const report = async (source: SourceName) => {
      resolved += 1;
      const result = results[source];
      if (!options.onProgress || !result) return;
      try {
        await options.onProgress(resolved / sources.length, result);
      } catch (err) {
        log.warn({ source, err }, 'gather:progress_report_failed');
      }
    };

    await Promise.all(
      sources.map((source) =>
        limiter.schedule(async () => {
          await this.resolveSource(source, request, results, checkCancelled, log);
          await report(source);
        }),
      ),
    );
    await checkCancelled();

    const degraded = sources.some((s) => results[s]?.outcome !== 'ok');
    log.info(
      {
        degraded,
        cancelled,
        outcomes: Object.fromEntries(sources.map((s) => [s, results[s]?.outcome ?? 'missing'])),
      },
      'gather:done',
    );
    return { results, degraded, cancelled };
  }

  private async resolveSource<S extends SourceName>(
    source: S,
    request: GatherRequest,
    results: GatherResults,
    checkCancelled: () => Promise<boolean>,
    log: pino.Logger,
  ): Promise<void> {
    const adapter: ProviderAdapter<S> | undefined = this.opts.adapters[source];

    let result: SourceResult<S>;
    if (!adapter || !adapter.configured) {
      result = { source, outcome: 'missing', synthesized: false, reason: 'unconfigured', latencyMs: 0 };
    } else if (await checkCancelled()) {
      result = {
        source,
        outcome: 'error',
        synthesized: false,
        reason: 'cancelled',
        message: 'not dispatched: task cancelled',
        latencyMs: 0,
      };
    } else {
      const started = Date.now();
      const timeoutMs = this.opts.timeoutsMs[source];
      try {
        const payload = await this.breakerFor(source).execute(() =>
          timeout(timeoutMs, TimeoutStrategy.Aggressive).execute(async ({ signal }) => {
            const outcome = await adapter.fetch(request, { timeoutMs, signal });
            if (!outcome.ok) throw new ProviderFailureError(outcome.failure);
            return outcome.payload;
          }),
        );
        result = { source, outcome: 'ok', payload, synthesized: false, latencyMs: Date.now() - started };
      } catch (err) {
        const failure = classifyFailure(err);
        log.warn({ source, kind: failure.kind, reason: failure.message }, 'gather:provider_failed');
        result = this.opts.synthesizer.synthesize(source, request, failure, Date.now() - started);
      }
    }

    Object.assign(results, { [source]: result });
    observeProvider(source, result.outcome, result.latencyMs);
  }

  private breakerFor(source: SourceName): CircuitBreakerPolicy {
    let breaker = this.breakers.get(source);
    if (!breaker) {
      breaker = circuitBreaker(handleAll, {
        halfOpenAfter: this.opts.breaker.halfOpenAfterMs,
        breaker: new ConsecutiveBreaker(this.opts.breaker.threshold),
      });
      breaker.onBreak(() => this.opts.log.warn({ source }, 'gather:circuit_open'));
      breaker.onReset(() => this.opts.log.info({ source }, 'gather:circuit_closed'));
      this.breakers.set(source, breaker);
    }
    return breaker;
  }
}

/** Payload of a source that produced one, live or synthesized. */
export function payloadOf<S extends SourceName>(
  results: GatherResults,
  source: S,
): PayloadBySource[S] | undefined {
  const result: SourceResult<S> | undefined = results[source];
  if (!result) return undefined;
  return result.outcome === 'ok' || result.outcome === 'fallback' ? result.payload : undefined;
}
