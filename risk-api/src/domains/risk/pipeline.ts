import { MissingRequiredFieldError, PipelineStateError } from '../../lib/errors.js';
import { silentLogger, type BaseLogger } from '../../lib/logger.js';
import type { ModelHandle, ModelStore } from '../../lib/model-store.js';
import { scoreProbability, train } from './classifier.js';
import type {
  AnalysisResult,
  ClassifierModel,
  FailureProbability,
  ModelSource,
  NormalizedFeatures,
  RiskTier,
  RuleScore,
  StudentRecord,
  SummaryStatistics,
} from './contracts.js';
import { extract } from './features.js';
import { HIGH_PROBABILITY, MODERATE_PROBABILITY, reconcile, tierRank } from './reconciliation.js';
import { synthesize } from './recommendations.js';
import { scoreRules } from './rules.js';

export const PIPELINE_STAGES = [
  'idle',
  'data_loaded',
  'model_ready',
  'rules_applied',
  'ml_applied',
  'reconciled',
  'recommendations_ready',
  'done',
] as const;
export type PipelineStage = (typeof PIPELINE_STAGES)[number];

type PipelineRow = {
  index: number;
  source: StudentRecord;
  features: NormalizedFeatures;
  rules?: RuleScore;
  probability?: FailureProbability;
  finalTier?: RiskTier;
  recommendations?: string[];
};

export type RejectedRecord = {
  index: number;
  field: string;
};

export type PipelineOptions = {
  store?: ModelStore | null;
  modelHandle?: ModelHandle;
  logger?: BaseLogger;
  now?: () => Date;
};

export type RunOptions = {
  trainNewModel?: boolean;
};

function evaluate(features: NormalizedFeatures, probability: FailureProbability) {
  const rules = scoreRules(features);
  const finalTier = reconcile(rules.total, probability.value);
  const recommendations = synthesize(features, finalTier, probability.available ? probability.value : null);
  return { rules, finalTier, recommendations };
}

function percentage(count: number, total: number) {
  return total > 0 ? Math.round((count / total) * 1000) / 10 : 0;
}

function distribution(tiers: RiskTier[]) {
  const counts: Record<RiskTier, number> = { High: 0, Moderate: 0, Low: 0 };
  for (const tier of tiers) counts[tier] += 1;
  return counts;
}

export class HybridRiskPipeline {
  private stage: PipelineStage = 'idle';
  private records: StudentRecord[] = [];
  private rows: PipelineRow[] = [];
  private rejected: RejectedRecord[] = [];
  private model: ClassifierModel | null = null;
  private source: ModelSource = 'absent';
  private escalated = 0;
  private failedPredictions = 0;

  private readonly store: ModelStore | null;
  private readonly modelHandle: ModelHandle | null;
  private readonly logger: BaseLogger;
  private readonly now: () => Date;

  constructor(options: PipelineOptions = {}) {
    this.store = options.store ?? null;
    this.modelHandle = options.modelHandle ?? this.store?.defaultHandle ?? null;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  get currentStage() {
    return this.stage;
  }

  get modelSource() {
    return this.source;
  }

  get classifier() {
    return this.model;
  }

  // False once every scored row came back without a probability.
  get mlEnabled() {
    if (this.model === null) return false;
    return this.rows.length === 0 || this.failedPredictions < this.rows.length;
  }

  get rejectedRecords(): readonly RejectedRecord[] {
    return this.rejected;
  }

  private requireStage(minimum: PipelineStage) {
    if (PIPELINE_STAGES.indexOf(this.stage) < PIPELINE_STAGES.indexOf(minimum)) {
      throw new PipelineStateError(`Pipeline is at stage "${this.stage}", "${minimum}" is required`);
    }
  }

  private requireRows(stage: PipelineStage) {
    this.requireStage(stage);
    return this.rows;
  }

  loadData(records: readonly StudentRecord[]) {
    const rows: PipelineRow[] = [];
    const rejected: RejectedRecord[] = [];

    records.forEach((source, index) => {
      try {
        rows.push({ index, source, features: extract(source) });
      } catch (err) {
        if (!(err instanceof MissingRequiredFieldError)) throw err;
        rejected.push({ index, field: err.field });
      }
    });

    this.records = [...records];
    this.rows = rows;
    this.rejected = rejected;
    this.escalated = 0;
    this.failedPredictions = 0;
    this.stage = 'data_loaded';

    if (rejected.length > 0) {
      this.logger.warn({ rejected: rejected.length, sample: rejected.slice(0, 5) }, 'pipeline.records_rejected');
    }
    this.logger.info({ records: records.length, scored: rows.length }, 'pipeline.data_loaded');
  }

  async prepareModel(options: RunOptions = {}): Promise<ModelSource> {
    this.requireStage('data_loaded');

    if (options.trainNewModel) {
      await this.trainAndPersist();
    } else {
      const loaded = await this.loadPersisted();
      if (loaded) {
        this.model = loaded;
        this.source = 'loaded';
      } else {
        this.logger.info('pipeline.no_persisted_model');
        await this.trainAndPersist();
      }
    }

    this.stage = 'model_ready';
    this.logger.info({ modelSource: this.source }, 'pipeline.model_ready');
    return this.source;
  }

  private async loadPersisted() {
    if (!this.store || !this.modelHandle) return null;
    try {
      const model = await this.store.load(this.modelHandle);
      if (model) {
        this.logger.info({ handle: this.modelHandle, trainedAt: model.trainedAt }, 'pipeline.model_loaded');
      }
      return model;
    } catch (err) {
      this.logger.warn({ err, handle: this.modelHandle }, 'pipeline.model_load_failed');
      return null;
    }
  }

  private async trainAndPersist() {
    const outcome = train(this.records, { logger: this.logger, now: this.now });
    if (outcome.status !== 'trained') {
      this.model = null;
      this.source = 'absent';
      return;
    }

    this.model = outcome.model;
    this.source = 'trained';
    if (!this.store) return;

    try {
      const handle = await this.store.save(outcome.model);
      this.logger.info({ handle }, 'pipeline.model_saved');
    } catch (err) {
      this.logger.warn({ err }, 'pipeline.model_save_failed');
    }
  }

  applyRules() {
    for (const row of this.requireRows('model_ready')) {
      row.rules = scoreRules(row.features);
    }
    this.stage = 'rules_applied';
    this.logger.info(
      { distribution: distribution(this.rows.map((row) => row.rules?.tier ?? 'Low')) },
      'pipeline.rules_applied'
    );
  }

  applyPredictions() {
    let failed = 0;
    for (const row of this.requireRows('rules_applied')) {
      row.probability = scoreProbability(this.model, row.source, this.logger);
      if (this.model && !row.probability.available) failed += 1;
    }
    this.failedPredictions = failed;
    this.stage = 'ml_applied';

    if (failed > 0) {
      this.logger.warn({ failed, scored: this.rows.length }, 'pipeline.predictions_failed');
    }
    if (this.mlEnabled) {
      const probabilities = this.rows.map((row) => row.probability?.value ?? 0);
      this.logger.info({
        high: probabilities.filter((p) => p > HIGH_PROBABILITY).length,
        moderate: probabilities.filter((p) => p > MODERATE_PROBABILITY && p <= HIGH_PROBABILITY).length,
        low: probabilities.filter((p) => p <= MODERATE_PROBABILITY).length,
      }, 'pipeline.ml_applied');
    } else {
      this.logger.warn('pipeline.ml_unavailable');
    }
  }

  reconcile() {
    let escalated = 0;
    for (const row of this.requireRows('ml_applied')) {
      const rules = this.rowRules(row);
      row.finalTier = reconcile(rules.total, row.probability?.value ?? 0);
      if (tierRank(row.finalTier) > tierRank(rules.tier)) escalated += 1;
    }
    this.escalated = escalated;
    this.stage = 'reconciled';
    this.logger.info({
      distribution: distribution(this.rows.map((row) => row.finalTier ?? 'Low')),
      escalatedByModel: escalated,
    }, 'pipeline.reconciled');
  }

  generateRecommendations() {
    for (const row of this.requireRows('reconciled')) {
      if (!row.finalTier) {
        throw new PipelineStateError(`Row ${row.index} has not been reconciled`);
      }
      const probability = row.probability;
      row.recommendations = synthesize(row.features, row.finalTier, probability?.available ? probability.value : null);
    }
    this.stage = 'recommendations_ready';
  }

  async run(records: readonly StudentRecord[], options: RunOptions = {}) {
    this.loadData(records);
    await this.prepareModel(options);
    this.applyRules();
    this.applyPredictions();
    this.reconcile();
    this.generateRecommendations();
    this.stage = 'done';
    this.logger.info({ students: this.rows.length, mlEnabled: this.mlEnabled }, 'pipeline.done');
    return this.analyzeAll();
  }

  analyzeSingle(record: StudentRecord): AnalysisResult {
    const student = extract(record);
    const probability = scoreProbability(this.model, record, this.logger);
    const { rules, finalTier, recommendations } = evaluate(student, probability);
    return {
      index: null,
      student,
      breakdown: rules.breakdown,
      totalRiskScore: rules.total,
      ruleTier: rules.tier,
      probability,
      finalTier,
      recommendations,
      triggeredRules: rules.triggeredRules,
    };
  }

  private rowRules(row: PipelineRow) {
    if (!row.rules) {
      throw new PipelineStateError(`Row ${row.index} has not been scored`);
    }
    return row.rules;
  }

  private toResult(row: PipelineRow): AnalysisResult {
    const rules = this.rowRules(row);
    if (!row.probability || !row.finalTier || !row.recommendations) {
      throw new PipelineStateError(`Row ${row.index} has not been fully analysed`);
    }
    return {
      index: row.index,
      student: { ...row.features },
      breakdown: { ...rules.breakdown },
      totalRiskScore: rules.total,
      ruleTier: rules.tier,
      probability: { ...row.probability },
      finalTier: row.finalTier,
      recommendations: [...row.recommendations],
      triggeredRules: [...rules.triggeredRules],
    };
  }

  analyzeAll(): AnalysisResult[] {
    return this.requireRows('recommendations_ready').map((row) => this.toResult(row));
  }

  analyzeStudent(index: number): AnalysisResult | null {
    const row = this.requireRows('recommendations_ready').find((candidate) => candidate.index === index);
    return row ? this.toResult(row) : null;
  }

  getAtRisk(): AnalysisResult[] {
    return this.analyzeAll()
      .filter((result) => result.finalTier !== 'Low')
      .sort((a, b) =>
        tierRank(b.finalTier) - tierRank(a.finalTier) || b.totalRiskScore - a.totalRiskScore
      );
  }

  getSummaryStatistics(): SummaryStatistics {
    const counts = distribution(this.analyzeAll().map((result) => result.finalTier));
    const total = this.rows.length;
    return {
      totalStudents: total,
      high: counts.High,
      moderate: counts.Moderate,
      low: counts.Low,
      highPct: percentage(counts.High, total),
      moderatePct: percentage(counts.Moderate, total),
      lowPct: percentage(counts.Low, total),
      mlEnabled: this.mlEnabled,
      modelSource: this.source,
      escalatedByModel: this.escalated,
      predictionsFailed: this.failedPredictions,
      skippedRecords: this.rejected.length,
    };
  }
}
