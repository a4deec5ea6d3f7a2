import 'dotenv/config';
import { loadRateLimiterConfig } from '../config/resilience.js';
import { createEngine } from '../core/engine.js';
import { preloadPrompts } from '../core/prompts.js';
import { createLogger } from '../util/logging.js';
import { createApp } from './app.js';

const log = createLogger();
const engine = createEngine({ log });
const app = createApp(engine, log, loadRateLimiterConfig());
const port = Number(process.env.PORT ?? 3000);

async function main(): Promise<void> {
  await preloadPrompts();
  const server = app.listen(port, () => log.info({ port, workers: engine.cfg.workerPoolSize }, 'http:listening'));

  const shutdown = (signal: string) => {
    log.info({ signal }, 'http:shutdown');
    server.close();
    engine
      .close()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        log.error({ err }, 'http:shutdown_failed');
        process.exit(1);
      });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
  log.fatal({ err }, 'http:start_failed');
  process.exit(1);
});
