/**
 * Redaction utilities for logs. Replaces dates, month names, destinations and
 * money amounts in strings. Redaction is disabled when LOG_LEVEL=debug to aid
 * local debugging.
 */

const SENSITIVE_KEYS = new Set(['destination', 'origin', 'start_date', 'end_date', 'budget', 'text']);

function scrubString(input: string): string {
  let out = input;
  // Date ranges first so they collapse into one token
  out = out.replace(
    /\b\d{4}-\d{2}-\d{2}\s*(?:\.\.|to|-)\s*\d{4}-\d{2}-\d{2}\b/g,
    '[REDACTED_DATES]',
  );
  out = out.replace(/\b\d{4}-\d{2}-\d{2}(?:T[\d:.]+Z?)?\b/g, '[REDACTED_DATE]');
  out = out.replace(
    /\b(Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec)[a-z]*\b/g,
    '[REDACTED_MONTH]',
  );
  out = out.replace(/\b(budget)\s*:?\s*[$€£฿]?\s*\d[\d,.]*k?\b/gi, '$1 [REDACTED_AMOUNT]');
  out = out.replace(/[$€£฿]\s*\d[\d,.]*/g, '[REDACTED_AMOUNT]');
  out = out.replace(/\b(in|to|from)\s+[A-Z][A-Za-z\- ]+/g, '$1 [REDACTED_CITY]');
  return out;
}

function scrubDeep(value: unknown, seen = new WeakSet<object>()): unknown {
  if (typeof value === 'string') return scrubString(value);
  if (typeof value !== 'object' || value === null) return value;
  if (seen.has(value)) return value;
  seen.add(value);
  if (Array.isArray(value)) {
    return value.map((v) => scrubDeep(v, seen));
  }
  if (value instanceof Error) {
    return { name: value.name, message: scrubString(value.message) };
  }
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(value)) {
    if (SENSITIVE_KEYS.has(k) && v !== null && v !== undefined && typeof v !== 'object') {
      out[k] = '[REDACTED]';
      continue;
    }
    out[k] = scrubDeep(v, seen);
  }
  return out;
}

/**
 * Scrub PII-like patterns from a log argument.
 */
export function scrubPII(arg: unknown, enabled: boolean): unknown {
  if (!enabled) return arg;
  return scrubDeep(arg);
}

export function scrubMessage(msg: string, enabled: boolean): string {
  return enabled ? scrubString(msg) : msg;
}
