import type { z } from 'zod';
import type { ClassifierModelSchema } from '../../lib/schemas.js';

export const RISK_TIERS = ['Low', 'Moderate', 'High'] as const;
export type RiskTier = (typeof RISK_TIERS)[number];

export const CLASSIFIER_FEATURES = ['failures', 'absences', 'studytime', 'G1', 'G2'] as const;
export type ClassifierFeature = (typeof CLASSIFIER_FEATURES)[number];

export const GROUND_TRUTH_FIELD = 'G3';

export type RowLike = {
  get(field: string): unknown;
};

export type StudentRecord = Readonly<Record<string, unknown>> | RowLike;

export type NormalizedFeatures = {
  G1: number | null;
  G2: number;
  G3: number | null;
  absences: number;
  studytime: number;
  failures: number;
  famsup: string;
  Medu: number;
  Fedu: number;
  Dalc: number;
  Walc: number;
  goout: number;
};

export type RiskComponent = 'APS' | 'ARS' | 'FSR' | 'LRS';

export type RiskBreakdown = Record<RiskComponent, number>;

export type RuleScore = {
  breakdown: RiskBreakdown;
  total: number;
  tier: RiskTier;
  triggeredRules: string[];
};

export type ClassifierModel = z.infer<typeof ClassifierModelSchema>;

export type TrainingSkipReason = 'missing_ground_truth' | 'missing_feature_columns';

export type TrainingOutcome =
  | { status: 'trained'; model: ClassifierModel }
  | { status: 'skipped'; reason: TrainingSkipReason; missingColumns: string[] }
  | { status: 'failed'; error: Error };

export type FailureProbability =
  | { available: true; value: number }
  | { available: false; value: 0 };

export type ModelSource = 'trained' | 'loaded' | 'absent';

export type AnalysisResult = {
  index: number | null;
  student: NormalizedFeatures;
  breakdown: RiskBreakdown;
  totalRiskScore: number;
  ruleTier: RiskTier;
  probability: FailureProbability;
  finalTier: RiskTier;
  recommendations: string[];
  triggeredRules: string[];
};

export type SummaryStatistics = {
  totalStudents: number;
  high: number;
  moderate: number;
  low: number;
  highPct: number;
  moderatePct: number;
  lowPct: number;
  mlEnabled: boolean;
  modelSource: ModelSource;
  escalatedByModel: number;
  predictionsFailed: number;
  skippedRecords: number;
};

export type ExportRow = {
  Index?: number;
  G1: number | null;
  G2: number;
  G3?: number | null;
  Absences: number;
  Study_Time: number;
  Failures: number;
  Family_Support: string;
  APS: number;
  ARS: number;
  FSR: number;
  LRS: number;
  Total_Risk_Score: number;
  Risk_Level: string;
  FinalRiskLevel: string;
  ML_Risk_Probability?: number;
  Recommendations: string;
};
