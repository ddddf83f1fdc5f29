import 'dotenv/config';
import fs from 'node:fs/promises';
import { buildResultsCsv } from '../src/domains/risk/export.js';
import { tierLabel } from '../src/domains/risk/reconciliation.js';
import { MAX_RISK_SCORE } from '../src/domains/risk/rules.js';
import { loadConfig } from '../src/lib/config.js';
import { createLogger } from '../src/lib/logger.js';
import { startRuntime } from '../src/runtime.js';

const TOP_AT_RISK = 10;

function argValue(flag: string) {
  const index = process.argv.indexOf(flag);
  return index >= 0 ? process.argv[index + 1] : undefined;
}

async function run() {
  const config = loadConfig();
  const datasetPath = argValue('--dataset') ?? config.datasetPath;
  const resultsPath = argValue('--out') ?? config.resultsPath;
  const logger = createLogger(process.env.LOG_LEVEL ?? 'warn');

  const runtime = await startRuntime({ ...config, datasetPath }, logger, {
    trainNewModel: process.argv.includes('--retrain') || config.trainNewModel,
  });

  try {
    const { pipeline } = runtime;
    const csv = buildResultsCsv(pipeline.analyzeAll(), {
      includeGroundTruth: runtime.hasGroundTruth,
      includeProbability: pipeline.mlEnabled,
    });
    await fs.writeFile(resultsPath, `${csv}\n`, 'utf8');
    console.log(`[analyze] results written to ${resultsPath}`);

    const atRisk = pipeline.getAtRisk();
    console.log(`[analyze] top ${Math.min(TOP_AT_RISK, atRisk.length)} at-risk students (of ${atRisk.length})`);
    atRisk.slice(0, TOP_AT_RISK).forEach((result, position) => {
      console.log(`\n${position + 1}. Student (row ${result.index})`);
      console.log(`   Final risk: ${tierLabel(result.finalTier)}`);
      console.log(`   Rule score: ${result.totalRiskScore}/${MAX_RISK_SCORE}`);
      if (result.probability.available) {
        console.log(`   ML probability: ${(result.probability.value * 100).toFixed(1)}%`);
      }
      console.log(`   G2: ${result.student.G2}  absences: ${result.student.absences}`);
      for (const recommendation of result.recommendations) {
        console.log(`      - ${recommendation}`);
      }
    });

    const stats = pipeline.getSummaryStatistics();
    console.log('\n[analyze] summary');
    console.log(`  Total students: ${stats.totalStudents}`);
    console.log(`  High risk: ${stats.high} (${stats.highPct}%)`);
    console.log(`  Moderate risk: ${stats.moderate} (${stats.moderatePct}%)`);
    console.log(`  Low risk: ${stats.low} (${stats.lowPct}%)`);
    console.log(`  Skipped records: ${stats.skippedRecords}`);
    console.log(`  Failed predictions: ${stats.predictionsFailed}`);
    console.log(`  ML model: ${stats.mlEnabled ? `enabled (${stats.modelSource})` : 'disabled'}`);
  } finally {
    await runtime.close();
  }
}

run().catch((err) => {
  console.error('[analyze] failed', err);
  process.exitCode = 1;
});
