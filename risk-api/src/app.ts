import Fastify, { type FastifyError } from 'fastify';
import helmet from '@fastify/helmet';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import crypto from 'node:crypto';

import './types.js';
import type { HybridRiskPipeline } from './domains/risk/pipeline.js';
import { MissingRequiredFieldError, RiskEngineError } from './lib/errors.js';
import { riskRoutes } from './routes/risk.js';

export type BuildAppOptions = {
  pipeline: HybridRiskPipeline;
  hasGroundTruth?: boolean;
  logLevel?: string;
  corsOrigins?: string[];
  slowRequestMs?: number;
};

export async function buildApp(options: BuildAppOptions) {
  const app = Fastify({
    logger: { level: options.logLevel ?? process.env.LOG_LEVEL ?? 'info' },
    bodyLimit: 64 * 1024,
    requestIdHeader: 'x-request-id',
    genReqId: () => crypto.randomBytes(16).toString('hex'),
  });

  const slowRequestMs = options.slowRequestMs ?? 500;
  const allowedOrigins = options.corsOrigins ?? [];

  await app.register(helmet, { contentSecurityPolicy: false });
  await app.register(cors, {
    origin: (origin, cb) => {
      if (!origin) return cb(null, false);
      return cb(null, allowedOrigins.includes(origin));
    },
    methods: ['GET', 'POST'],
    allowedHeaders: ['Content-Type', 'X-Request-Id'],
  });
  await app.register(rateLimit, { max: 120, timeWindow: '1 minute' });

  app.addHook('onRequest', async (req, reply) => {
    req.requestStart = Date.now();
    reply.header('X-Request-Id', req.id);
  });

  app.addHook('onResponse', async (req, reply) => {
    const durationMs = req.requestStart ? Date.now() - req.requestStart : undefined;
    const logPayload = {
      method: req.method,
      path: req.routeOptions?.url ?? req.url,
      statusCode: reply.statusCode,
      durationMs,
      correlationId: req.id,
    };

    if (durationMs != null && durationMs >= slowRequestMs) {
      req.log.warn(logPayload, 'request.slow');
    } else {
      req.log.info(logPayload, 'request.complete');
    }
  });

  app.setErrorHandler((err: FastifyError, req, reply) => {
    if (err instanceof MissingRequiredFieldError) {
      return reply.code(err.statusCode).send({ error: err.code, field: err.field });
    }
    if (err instanceof RiskEngineError && err.statusCode < 500) {
      return reply.code(err.statusCode).send({ error: err.code, message: err.message });
    }

    const statusCode = err.statusCode && Number.isInteger(err.statusCode) ? err.statusCode : 500;
    if (statusCode >= 500) {
      req.log.error({ err, correlationId: req.id }, 'request.failed');
      return reply.code(statusCode).send({ error: 'internal_error' });
    }
    return reply.code(statusCode).send({ error: err.code || 'bad_request' });
  });

  app.get('/health', async () => ({
    ok: true,
    stage: options.pipeline.currentStage,
    mlEnabled: options.pipeline.mlEnabled,
    modelSource: options.pipeline.modelSource,
  }));

  await app.register(riskRoutes, {
    pipeline: options.pipeline,
    hasGroundTruth: options.hasGroundTruth,
  });

  return app;
}
