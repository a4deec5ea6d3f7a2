import express, { type ErrorRequestHandler, type Express, type Response } from 'express';
import type pino from 'pino';
import { ZodError } from 'zod';
import type { Engine } from '../core/engine.js';
import {
  AmbiguousModificationError,
  httpStatusFor,
  InvalidRequestError,
  PlannerError,
} from '../core/errors.js';
import { RateLimiter, type RateLimiterConfig } from '../core/rate-limiter.js';
import { router } from './routes.js';

function onFinish(res: Response, cb: () => void) {
  let done = false;
  const once = () => {
    if (done) return;
    done = true;
    cb();
  };
  res.on('finish', once);
  res.on('close', once);
}

export function errorBody(err: PlannerError): Record<string, unknown> {
  const body: Record<string, unknown> = { error: err.code, message: err.message, retryable: err.retryable };
  if (err instanceof AmbiguousModificationError) {
    body.clarificationNeeded = true;
    body.candidates = err.candidates;
  }
  if (err instanceof InvalidRequestError && err.missing.length) body.missing = err.missing;
  return body;
}

export function createApp(engine: Engine, log: pino.Logger, limiterConfig: RateLimiterConfig): Express {
  const app = express();
  const limiter = new RateLimiter(limiterConfig);

  app.use(express.json({ limit: '512kb' }));

  app.use((req, res, next) => {
    res.header('Access-Control-Allow-Origin', '*');
    res.header('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.header('Access-Control-Allow-Headers', 'Content-Type, Authorization');
    if (req.method === 'OPTIONS') {
      res.sendStatus(200);
    } else {
      next();
    }
  });

  app.use((req, res, next) => {
    if (req.path === '/healthz' || req.path === '/metrics') return next();
    const acquired = limiter.acquire();
    if (!acquired.ok) {
      log.warn({ method: req.method, path: req.path, reason: acquired.reason }, 'http:rate_limited');
      res.setHeader('Retry-After', String(Math.ceil(acquired.retryAfterMs / 1000)));
      return res.status(429).json({
        error: 'RateLimited',
        message: 'Too many requests. Please try again later.',
        retryable: true,
      });
    }
    onFinish(res, () => limiter.release());
    return next();
  });

  app.use((req, res, next) => {
    const start = Date.now();
    log.debug({ method: req.method, path: req.path }, 'req:start');
    onFinish(res, () => {
      log.debug({ method: req.method, path: req.path, status: res.statusCode, ms: Date.now() - start }, 'req:done');
    });
    next();
  });

  app.use('/', router(engine, log));

  const onError: ErrorRequestHandler = (err: unknown, req, res, next) => {
    if (res.headersSent) return next(err);
    if (err instanceof ZodError) {
      return res.status(400).json({
        error: 'InvalidRequest',
        message: 'Request body failed validation',
        retryable: false,
        details: err.flatten(),
      });
    }
    if (err instanceof PlannerError) {
      const status = httpStatusFor(err);
      if (status >= 500) log.error({ err, path: req.path }, 'http:error');
      return res.status(status).json(errorBody(err));
    }
    log.error({ err, path: req.path }, 'http:unhandled');
    return res.status(500).json({ error: 'InternalError', message: 'Internal error', retryable: true });
  };
  app.use(onError);

  return app;
}
