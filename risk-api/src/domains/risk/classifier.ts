import type { BaseLogger } from '../../lib/logger.js';
import {
  CLASSIFIER_FEATURES,
  GROUND_TRUTH_FIELD,
  type ClassifierFeature,
  type ClassifierModel,
  type FailureProbability,
  type StudentRecord,
  type TrainingOutcome,
} from './contracts.js';
import { readNumber } from './features.js';

// Final grades below this count as a failed course.
export const PASSING_GRADE = 10;

const TRAINING_ITERATIONS = 1000;
const LEARNING_RATE = 0.5;
const L2_PENALTY = 1;

type TrainOptions = {
  logger?: BaseLogger;
  now?: () => Date;
};

export function median(values: readonly number[]) {
  if (values.length === 0) {
    throw new Error('median of an empty column');
  }
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

function sigmoid(z: number) {
  return 1 / (1 + Math.exp(-z));
}

function columnValues(records: readonly StudentRecord[], field: string) {
  const values: number[] = [];
  for (const record of records) {
    const value = readNumber(record, field);
    if (value !== null) values.push(value);
  }
  return values;
}

function computeMedians(records: readonly StudentRecord[]): Record<ClassifierFeature, number> {
  const columnMedian = (feature: ClassifierFeature) => median(columnValues(records, feature));
  return {
    failures: columnMedian('failures'),
    absences: columnMedian('absences'),
    studytime: columnMedian('studytime'),
    G1: columnMedian('G1'),
    G2: columnMedian('G2'),
  };
}

// Missing values take the training-time median.
export function buildFeatureVector(record: StudentRecord, medians: Record<ClassifierFeature, number>) {
  return CLASSIFIER_FEATURES.map((feature) => readNumber(record, feature) ?? medians[feature]);
}

function columnStats(rows: number[][], column: number) {
  const mean = rows.reduce((sum, row) => sum + row[column], 0) / rows.length;
  const variance = rows.reduce((sum, row) => sum + (row[column] - mean) ** 2, 0) / rows.length;
  const scale = Math.sqrt(variance);
  return { mean, scale: scale > 0 ? scale : 1 };
}

function fit(rows: number[][], labels: number[]) {
  const positives = labels.reduce((sum, label) => sum + label, 0);
  if (positives === 0 || positives === labels.length) {
    throw new Error('training labels contain a single class');
  }

  const width = CLASSIFIER_FEATURES.length;
  const stats = Array.from({ length: width }, (_, column) => columnStats(rows, column));
  const standardized = rows.map((row) => row.map((value, column) => (value - stats[column].mean) / stats[column].scale));

  const weights = new Array<number>(width).fill(0);
  let intercept = 0;
  const n = rows.length;

  for (let iteration = 0; iteration < TRAINING_ITERATIONS; iteration++) {
    const gradient = new Array<number>(width).fill(0);
    let interceptGradient = 0;

    for (let i = 0; i < n; i++) {
      const z = standardized[i].reduce((sum, value, column) => sum + value * weights[column], intercept);
      const error = sigmoid(z) - labels[i];
      for (let column = 0; column < width; column++) {
        gradient[column] += error * standardized[i][column];
      }
      interceptGradient += error;
    }

    for (let column = 0; column < width; column++) {
      weights[column] -= (LEARNING_RATE * (gradient[column] + L2_PENALTY * weights[column])) / n;
    }
    intercept -= (LEARNING_RATE * interceptGradient) / n;
  }

  if (!weights.every(Number.isFinite) || !Number.isFinite(intercept)) {
    throw new Error('logistic regression diverged');
  }

  return {
    weights,
    intercept,
    means: stats.map((s) => s.mean),
    scales: stats.map((s) => s.scale),
    positives,
  };
}

export function predictProbability(model: ClassifierModel, record: StudentRecord) {
  const vector = buildFeatureVector(record, model.medians);
  const z = vector.reduce(
    (sum, value, column) => sum + ((value - model.means[column]) / model.scales[column]) * model.weights[column],
    model.intercept
  );
  const probability = sigmoid(z);
  if (!Number.isFinite(probability)) {
    throw new Error('classifier produced a non-finite probability');
  }
  return probability;
}

export function train(records: readonly StudentRecord[], options: TrainOptions = {}): TrainingOutcome {
  const { logger, now = () => new Date() } = options;

  if (columnValues(records, GROUND_TRUTH_FIELD).length === 0) {
    logger?.warn({ field: GROUND_TRUTH_FIELD }, 'classifier.training_skipped.missing_ground_truth');
    return { status: 'skipped', reason: 'missing_ground_truth', missingColumns: [GROUND_TRUTH_FIELD] };
  }

  const missingColumns = CLASSIFIER_FEATURES.filter((feature) => columnValues(records, feature).length === 0);
  if (missingColumns.length > 0) {
    logger?.warn({ missingColumns }, 'classifier.training_skipped.missing_features');
    return { status: 'skipped', reason: 'missing_feature_columns', missingColumns };
  }

  const labelled = records.filter((record) => readNumber(record, GROUND_TRUTH_FIELD) !== null);

  try {
    const medians = computeMedians(records);
    const rows = labelled.map((record) => buildFeatureVector(record, medians));
    const labels = labelled.map((record) => ((readNumber(record, GROUND_TRUTH_FIELD) ?? PASSING_GRADE) < PASSING_GRADE ? 1 : 0));
    const fitted = fit(rows, labels);

    const model: ClassifierModel = {
      version: 1,
      algorithm: 'logistic_regression',
      features: ['failures', 'absences', 'studytime', 'G1', 'G2'],
      weights: fitted.weights,
      intercept: fitted.intercept,
      means: fitted.means,
      scales: fitted.scales,
      medians,
      trainedAt: now().toISOString(),
      trainingRows: rows.length,
      positiveRows: fitted.positives,
      accuracy: 0,
    };

    const correct = labelled.filter((record, i) => (predictProbability(model, record) >= 0.5 ? 1 : 0) === labels[i]).length;
    model.accuracy = correct / labelled.length;

    logger?.info({
      accuracy: Number(model.accuracy.toFixed(4)),
      features: model.features,
      atRisk: model.positiveRows,
      notAtRisk: model.trainingRows - model.positiveRows,
    }, 'classifier.trained');

    return { status: 'trained', model };
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    logger?.error({ err: error }, 'classifier.training_failed');
    return { status: 'failed', error };
  }
}

export function scoreProbability(
  model: ClassifierModel | null,
  record: StudentRecord,
  logger?: BaseLogger
): FailureProbability {
  if (!model) return { available: false, value: 0 };
  try {
    return { available: true, value: predictProbability(model, record) };
  } catch (err) {
    logger?.error({ err }, 'classifier.prediction_failed');
    return { available: false, value: 0 };
  }
}
