import type { FastifyInstance } from 'fastify';
import type { HybridRiskPipeline } from '../domains/risk/pipeline.js';
import { buildResultsCsv, toExportRow } from '../domains/risk/export.js';
import { describeRules } from '../domains/risk/rules.js';
import { paginate } from '../lib/pagination.js';
import { StudentIndexParamSchema, StudentInputSchema } from '../lib/schemas.js';

const DASHBOARD_AT_RISK_LIMIT = 10;

type RiskRouteOptions = {
  pipeline: HybridRiskPipeline;
  hasGroundTruth?: boolean;
};

export async function riskRoutes(app: FastifyInstance, opts: RiskRouteOptions) {
  const { pipeline } = opts;
  const exportOptions = () => ({
    includeGroundTruth: Boolean(opts.hasGroundTruth),
    includeProbability: pipeline.mlEnabled,
  });

  app.post('/api/risk/evaluate', async (req, reply) => {
    const parsed = StudentInputSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return reply.code(400).send({ error: 'invalid_request', details: parsed.error.flatten() });
    }

    const result = pipeline.analyzeSingle(parsed.data);
    return reply.send({
      ...toExportRow(result, {
        includeGroundTruth: result.student.G3 !== null,
        includeProbability: result.probability.available,
      }),
      ml_available: result.probability.available,
      triggered_rules: result.triggeredRules,
    });
  });

  app.get('/api/risk/dashboard', async () => {
    const atRisk = pipeline.getAtRisk().slice(0, DASHBOARD_AT_RISK_LIMIT);
    return {
      stats: pipeline.getSummaryStatistics(),
      atRisk: atRisk.map((result) => toExportRow(result, exportOptions())),
    };
  });

  app.get('/api/risk/students/:index', async (req, reply) => {
    const parsed = StudentIndexParamSchema.safeParse(req.params);
    if (!parsed.success) {
      return reply.code(400).send({ error: 'invalid_request', details: parsed.error.flatten() });
    }

    const result = pipeline.analyzeStudent(parsed.data.index);
    if (!result) {
      return reply.code(404).send({ error: 'student_not_found' });
    }
    return reply.send({
      student: toExportRow(result, exportOptions()),
      triggeredRules: result.triggeredRules,
    });
  });

  app.get<{ Querystring: { page?: string; pageSize?: string } }>('/api/risk/at-risk', async (req) => {
    const rows = pipeline.getAtRisk().map((result) => toExportRow(result, exportOptions()));
    return paginate(rows, req.query ?? {}, { pageSize: 50, maxPageSize: 200 });
  });

  app.get('/api/risk/summary', async () => pipeline.getSummaryStatistics());

  app.get('/api/risk/rules', async () => ({ components: describeRules() }));

  app.get('/api/risk/export.csv', async (_req, reply) => {
    const csv = buildResultsCsv(pipeline.analyzeAll(), exportOptions());
    return reply
      .header('Content-Type', 'text/csv; charset=utf-8')
      .header('Content-Disposition', 'attachment; filename="hybrid_risk_results.csv"')
      .send(csv);
  });
}
