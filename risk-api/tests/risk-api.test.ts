import type { FastifyInstance } from 'fastify';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { buildApp } from '../src/app.js';
import { HybridRiskPipeline } from '../src/domains/risk/pipeline.js';
import { MemoryModelStore, constantModel, highRiskStudent, ruleOnlyCohort } from './helpers/factories.js';

function asStrings(record: Record<string, string | number>) {
  return Object.fromEntries(Object.entries(record).map(([key, value]) => [key, String(value)]));
}

describe('risk api', () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    const pipeline = new HybridRiskPipeline();
    await pipeline.run(ruleOnlyCohort());
    app = await buildApp({ pipeline, logLevel: 'silent' });
  });

  afterAll(async () => {
    await app.close();
  });

  it('reports pipeline health', async () => {
    const res = await app.inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(200);
    expect(res.headers['x-request-id']).toBeTruthy();
    expect(res.json()).toEqual({ ok: true, stage: 'done', mlEnabled: false, modelSource: 'absent' });
  });

  it('evaluates a single student from form values', async () => {
    const { G1: _first, G3: _final, ...student } = highRiskStudent();
    const res = await app.inject({ method: 'POST', url: '/api/risk/evaluate', payload: asStrings(student) });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body).toMatchObject({
      G1: null,
      G2: 5,
      APS: 4,
      ARS: 3,
      FSR: 3,
      LRS: 5,
      Total_Risk_Score: 15,
      Risk_Level: 'High Risk',
      FinalRiskLevel: 'High Risk',
      ml_available: false,
    });
    expect(body.triggered_rules).toHaveLength(7);
    expect(body).not.toHaveProperty('ML_Risk_Probability');
  });

  it('names the missing required field', async () => {
    const res = await app.inject({ method: 'POST', url: '/api/risk/evaluate', payload: { absences: '3' } });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: 'missing_required_field', field: 'G2' });
  });

  it('rejects out-of-range input', async () => {
    const res = await app.inject({ method: 'POST', url: '/api/risk/evaluate', payload: { G2: '25', absences: 1 } });

    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe('invalid_request');
  });

  it('pages through at-risk students in priority order', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/risk/at-risk?pageSize=2' });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.total).toBe(4);
    expect(body.page).toBe(1);
    expect(body.pageSize).toBe(2);
    expect(body.items.map((item: { Index: number }) => item.Index)).toEqual([2, 4]);

    const second = await app.inject({ method: 'GET', url: '/api/risk/at-risk?page=2&pageSize=2' });
    expect(second.json().items.map((item: { Index: number }) => item.Index)).toEqual([1, 3]);
  });

  it('returns one analysed student', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/risk/students/4' });

    expect(res.statusCode).toBe(200);
    expect(res.json().student.Total_Risk_Score).toBe(9);
    expect(res.json().triggeredRules).toEqual([
      'aps.failing_grade',
      'ars.chronic_absence',
      'fsr.low_parent_education',
      'lrs.going_out',
    ]);
  });

  it('answers 404 for an unknown student and 400 for a bad index', async () => {
    const missing = await app.inject({ method: 'GET', url: '/api/risk/students/42' });
    expect(missing.statusCode).toBe(404);
    expect(missing.json()).toEqual({ error: 'student_not_found' });

    const invalid = await app.inject({ method: 'GET', url: '/api/risk/students/abc' });
    expect(invalid.statusCode).toBe(400);
    expect(invalid.json().error).toBe('invalid_request');
  });

  it('serves the dashboard and summary', async () => {
    const dashboard = await app.inject({ method: 'GET', url: '/api/risk/dashboard' });
    expect(dashboard.json().stats.totalStudents).toBe(5);
    expect(dashboard.json().atRisk).toHaveLength(4);

    const summary = await app.inject({ method: 'GET', url: '/api/risk/summary' });
    expect(summary.json()).toMatchObject({ high: 2, moderate: 2, low: 1, lowPct: 20 });
  });

  it('lists the rule catalogue', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/risk/rules' });

    expect(res.json().components.map((c: { component: string }) => c.component)).toEqual(['APS', 'ARS', 'FSR', 'LRS']);
  });

  it('exports results as csv', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/risk/export.csv' });

    expect(res.statusCode).toBe(200);
    expect(res.headers['content-type']).toBe('text/csv; charset=utf-8');
    const lines = res.body.split('\n');
    expect(lines[0]).toBe(
      'Index,G1,G2,Absences,Study_Time,Failures,Family_Support,APS,ARS,FSR,LRS,Total_Risk_Score,Risk_Level,FinalRiskLevel,Recommendations'
    );
    expect(lines).toHaveLength(6);
  });
});

describe('risk api before the pipeline has run', () => {
  it('answers 409 for dataset queries', async () => {
    const app = await buildApp({ pipeline: new HybridRiskPipeline(), logLevel: 'silent' });

    const res = await app.inject({ method: 'GET', url: '/api/risk/summary' });

    expect(res.statusCode).toBe(409);
    expect(res.json().error).toBe('pipeline_not_ready');
    await app.close();
  });
});

describe('risk api when every prediction fails', () => {
  it('reports the classifier as inactive and exports no probability column', async () => {
    const pipeline = new HybridRiskPipeline({
      store: new MemoryModelStore({ ...constantModel(0.5), intercept: Number.NaN }),
    });
    await pipeline.run(ruleOnlyCohort());
    const app = await buildApp({ pipeline, logLevel: 'silent' });

    const health = await app.inject({ method: 'GET', url: '/health' });
    expect(health.json()).toEqual({ ok: true, stage: 'done', mlEnabled: false, modelSource: 'loaded' });

    const csv = await app.inject({ method: 'GET', url: '/api/risk/export.csv' });
    expect(csv.body.split('\n')[0]).toBe(
      'Index,G1,G2,Absences,Study_Time,Failures,Family_Support,APS,ARS,FSR,LRS,Total_Risk_Score,Risk_Level,FinalRiskLevel,Recommendations'
    );
    await app.close();
  });
});
