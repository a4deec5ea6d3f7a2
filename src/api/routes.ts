import type { NextFunction, Request, RequestHandler, Response, Router } from 'express';
import express from 'express';
import type pino from 'pino';
import type { Engine } from '../core/engine.js';
import { ReplanBodySchema, StartBodySchema, TurnBodySchema } from '../schemas/api.js';
import { getPrometheusText, metricsContentType } from '../util/metrics.js';

type AsyncHandler = (req: Request, res: Response) => Promise<unknown>;

/** Express 4 does not route rejected handlers to the error middleware by itself. */
const handle =
  (fn: AsyncHandler): RequestHandler =>
  (req: Request, res: Response, next: NextFunction) => {
    fn(req, res).catch(next);
  };

export const router = (engine: Engine, log: pino.Logger): Router => {
  const r = express.Router();

  r.post(
    '/conversations/turns',
    handle(async (req, res) => {
      const body = TurnBodySchema.parse(req.body);
      const reply = await engine.conversations.handleTurn(body);
      res.status(reply.task && !reply.duplicate ? 202 : 200).json(reply);
    }),
  );

  r.post(
    '/itineraries',
    handle(async (req, res) => {
      const body = StartBodySchema.parse(req.body);
      const task = await engine.planner.start({
        slots: body.slots,
        ...(body.requestId ? { requestId: body.requestId } : {}),
        ...(body.conversationKey ? { conversationKey: body.conversationKey } : {}),
      });
      res.status(202).json({ taskId: task.taskId, task });
    }),
  );

  r.get(
    '/tasks/:taskId',
    handle(async (req, res) => {
      res.json(await engine.progress.poll(req.params.taskId ?? ''));
    }),
  );

  r.post(
    '/tasks/:taskId/cancel',
    handle(async (req, res) => {
      res.status(202).json(await engine.planner.cancel(req.params.taskId ?? ''));
    }),
  );

  r.get(
    '/tasks/:taskId/events',
    handle(async (req, res) => {
      const taskId = req.params.taskId ?? '';
      const sub = await engine.progress.subscribe(taskId);
      res.writeHead(200, {
        'Content-Type': 'text/event-stream',
        'Cache-Control': 'no-cache',
        Connection: 'keep-alive',
      });
      req.on('close', () => sub.end());
      for await (const snapshot of sub) {
        res.write(`event: snapshot\nid: ${snapshot.seq}\ndata: ${JSON.stringify(snapshot)}\n\n`);
      }
      log.debug({ taskId }, 'sse:closed');
      res.end();
    }),
  );

  r.get(
    '/versions/:versionId',
    handle(async (req, res) => {
      res.json(await engine.versions.load(req.params.versionId ?? ''));
    }),
  );

  r.post(
    '/versions/:versionId/replan',
    handle(async (req, res) => {
      const body = ReplanBodySchema.parse(req.body);
      const task = await engine.replanner.replan(req.params.versionId ?? '', body.modification, {
        ...(body.requestId ? { requestId: body.requestId } : {}),
      });
      res.status(202).json({ taskId: task.taskId, task });
    }),
  );

  r.get('/healthz', handle(async (_req, res) => {
    const storeOk = await engine.storage.healthCheck();
    res.status(storeOk ? 200 : 503).json({ ok: storeOk, store: storeOk ? 'ok' : 'degraded' });
  }));

  r.get('/metrics', handle(async (_req, res) => {
    res.setHeader('Content-Type', metricsContentType());
    res.status(200).send(await getPrometheusText());
  }));

  return r;
};
