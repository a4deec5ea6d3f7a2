import { fetch as undiciFetch } from 'undici';
import { observeExternal } from './metrics.js';
import { createLogger } from './logging.js';
import { scheduleWithLimit } from './limiter.js';

const log = createLogger();

type FetchImpl = (url: string, init: { signal: AbortSignal; headers?: Record<string, string> }) => Promise<{
  ok: boolean;
  status: number;
  text(): Promise<string>;
}>;

// Global fetch under test so nock can intercept
function getFetch(): FetchImpl {
  return process.env.NODE_ENV === 'test' ? globalThis.fetch : undiciFetch;
}

const ALLOWLIST = new Set<string>([
  'api.open-meteo.com',
  'geocoding-api.open-meteo.com',
  'maps.googleapis.com',
  'www.googleapis.com',
]);

export class ExternalFetchError extends Error {
  kind: 'timeout' | 'http' | 'network' | 'aborted';
  status?: number;
  constructor(kind: 'timeout' | 'http' | 'network' | 'aborted', message: string, status?: number) {
    super(message);
    this.name = 'ExternalFetchError';
    this.kind = kind;
    this.status = status;
  }
}

/**
 * Fetches JSON in a single attempt with a timeout. An outer signal (task
 * cancellation or a policy timeout) aborts the request as well.
 */
export async function fetchJSON(
  url: string,
  opts: { timeoutMs?: number; target?: string; headers?: Record<string, string>; signal?: AbortSignal } = {},
): Promise<unknown> {
  const timeoutMs = opts.timeoutMs ?? 4000;
  const target = opts.target ?? 'unknown';

  let host: string;
  try {
    host = new URL(url).hostname;
  } catch {
    throw new ExternalFetchError('network', 'invalid_url');
  }
  if (!ALLOWLIST.has(host)) {
    throw new ExternalFetchError('network', 'host_not_allowed');
  }
  if (opts.signal?.aborted) {
    throw new ExternalFetchError('aborted', 'aborted');
  }

  return scheduleWithLimit(host, async () => {
    const ac = new AbortController();
    const timer = setTimeout(() => ac.abort(), timeoutMs);
    const onOuterAbort = () => ac.abort();
    opts.signal?.addEventListener('abort', onOuterAbort, { once: true });

    try {
      const res = await getFetch()(url, { signal: ac.signal, headers: opts.headers });
      if (!res.ok) {
        observeExternal(target, res.status >= 500 ? '5xx' : '4xx');
        log.debug({ target, status: res.status }, 'fetch:http_error');
        throw new ExternalFetchError('http', `HTTP_${res.status}`, res.status);
      }
      const text = await res.text();
      try {
        const parsed: unknown = JSON.parse(text);
        observeExternal(target, 'ok');
        return parsed;
      } catch {
        observeExternal(target, 'invalid_json');
        throw new ExternalFetchError('network', 'json_parse_error');
      }
    } catch (err: unknown) {
      if (err instanceof ExternalFetchError) throw err;
      if (err instanceof Error && err.name === 'AbortError') {
        const kind = opts.signal?.aborted ? 'aborted' : 'timeout';
        observeExternal(target, kind);
        throw new ExternalFetchError(kind, kind);
      }
      observeExternal(target, 'network');
      log.debug({ target, err }, 'fetch:network_error');
      throw new ExternalFetchError('network', 'network_error');
    } finally {
      clearTimeout(timer);
      opts.signal?.removeEventListener('abort', onOuterAbort);
    }
  });
}
