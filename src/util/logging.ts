import pino from 'pino';
import { scrubMessage, scrubPII } from './redact.js';

/**
 * Creates a pino logger with PII redaction unless LOG_LEVEL=debug.
 */
export function createLogger(bindings?: Record<string, string>): pino.Logger {
  const level = process.env.LOG_LEVEL ?? 'info';
  const redactEnabled = level !== 'debug';

  const log = pino({
    level,
    ...(bindings ? { base: { ...bindings } } : {}),
    hooks: {
      logMethod(args, method) {
        const scrubbed = args.map((a: unknown) =>
          typeof a === 'string' ? scrubMessage(a, redactEnabled) : scrubPII(a, redactEnabled),
        );
        Reflect.apply(method, this, scrubbed);
      },
    },
  });
  return log;
}
