import type { AnalysisResult, ExportRow } from './contracts.js';
import { tierLabel } from './reconciliation.js';

export const RECOMMENDATION_SEPARATOR = ' | ';

type ExportOptions = {
  includeGroundTruth?: boolean;
  includeProbability?: boolean;
};

export function toExportRow(result: AnalysisResult, options: ExportOptions = {}): ExportRow {
  const row: ExportRow = {
    G1: result.student.G1,
    G2: result.student.G2,
    Absences: result.student.absences,
    Study_Time: result.student.studytime,
    Failures: result.student.failures,
    Family_Support: result.student.famsup,
    APS: result.breakdown.APS,
    ARS: result.breakdown.ARS,
    FSR: result.breakdown.FSR,
    LRS: result.breakdown.LRS,
    Total_Risk_Score: result.totalRiskScore,
    Risk_Level: tierLabel(result.ruleTier),
    FinalRiskLevel: tierLabel(result.finalTier),
    Recommendations: result.recommendations.join(RECOMMENDATION_SEPARATOR),
  };

  if (result.index !== null) row.Index = result.index;
  if (options.includeGroundTruth) row.G3 = result.student.G3;
  if (options.includeProbability && result.probability.available) {
    row.ML_Risk_Probability = Number(result.probability.value.toFixed(4));
  }
  return row;
}

const CSV_COLUMNS: Array<keyof ExportRow> = [
  'Index', 'G1', 'G2', 'G3', 'Absences', 'Study_Time', 'Failures', 'Family_Support',
  'APS', 'ARS', 'FSR', 'LRS', 'Total_Risk_Score', 'Risk_Level', 'FinalRiskLevel',
  'ML_Risk_Probability', 'Recommendations',
];

function csvCell(value: string | number | null | undefined) {
  const text = String(value ?? '');
  return /[",\n]/.test(text) ? `"${text.replaceAll('"', '""')}"` : text;
}

export function buildResultsCsv(results: readonly AnalysisResult[], options: ExportOptions = {}) {
  const rows = results.map((result) => toExportRow(result, options));
  const columns = CSV_COLUMNS.filter((column) => {
    if (column === 'G3') return Boolean(options.includeGroundTruth);
    if (column === 'ML_Risk_Probability') return Boolean(options.includeProbability);
    if (column === 'Index') return rows.some((row) => row.Index !== undefined);
    return true;
  });

  const lines = rows.map((row) => columns.map((column) => csvCell(row[column])).join(','));
  return [columns.join(','), ...lines].join('\n');
}
