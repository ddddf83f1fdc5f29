import 'dotenv/config';
import { buildApp } from './app.js';
import { loadConfig } from './lib/config.js';
import { createLogger } from './lib/logger.js';
import { startRuntime } from './runtime.js';

const config = loadConfig();
const logger = createLogger(config.logLevel);

process.on('unhandledRejection', (reason) => {
  logger.error({ err: reason }, 'unhandledRejection');
});

process.on('uncaughtException', (err) => {
  logger.fatal({ err }, 'uncaughtException');
  process.exit(1);
});

const runtime = await startRuntime(config, logger);
const app = await buildApp({
  pipeline: runtime.pipeline,
  hasGroundTruth: runtime.hasGroundTruth,
  logLevel: config.logLevel,
  corsOrigins: config.corsOrigins,
  slowRequestMs: config.slowRequestMs,
});

app.addHook('onClose', async () => {
  await runtime.close();
});

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err }, 'shutdown.failed');
        process.exit(1);
      }
    );
  });
}

await app.listen({ port: config.port, host: config.host });
