/**
 * Soil Health Engine
 * End-to-end entry point: normalize → classify → score + recommend → record.
 * Every check runs before the single append, so a rejected reading leaves
 * no trace in the field's history.
 */

import {
  EngineConfig,
  GrowthStage,
  HealthScoreRecord,
  IngestResult,
  RawSensorSample
} from '../types';
import { DEFAULT_VALUES } from '../shared/config/constants';
import { Logger } from '../shared/utils/logger';
import { isSoilHealthError } from '../shared/utils/errors';
import { ReadingNormalizer } from './reading-normalizer';
import { NutrientRangeTable } from './nutrient-range-table';
import { DeficiencyClassifier } from './deficiency-classifier';
import { HealthScorer, ScoreContribution } from './health-scorer';
import { RecommendationEngine } from './recommendation-engine';
import { HistoryTracker } from './history-tracker';
import { GrowthStageRegistry, stageIndex } from './growth-stage-registry';

export interface SoilHealthEngineOptions {
  logger?: Logger;
  /** Records handed to the recommendation engine for trend awareness */
  historyWindow?: number;
  /** Records kept per field */
  historyRetention?: number;
}

export interface IngestOptions {
  /** Advance the field to this stage before scoring */
  stage?: GrowthStage;
}

export class SoilHealthEngine {
  private readonly logger: Logger;
  private readonly normalizer: ReadingNormalizer;
  private readonly classifier: DeficiencyClassifier;
  private readonly scorer: HealthScorer;
  private readonly recommender: RecommendationEngine;
  private readonly history: HistoryTracker;
  private readonly stages: GrowthStageRegistry;
  private readonly historyWindow: number;

  /**
   * Builds every component from the rule tables; configuration problems
   * surface here and the engine is never constructed
   */
  constructor(config: EngineConfig, options: SoilHealthEngineOptions = {}) {
    this.logger = options.logger ?? new Logger({ component: 'SoilHealthEngine' });
    this.historyWindow = options.historyWindow ?? DEFAULT_VALUES.HISTORY_WINDOW;

    try {
      const rangeTable = new NutrientRangeTable(config.ranges);
      rangeTable.assertComplete();

      this.normalizer = new ReadingNormalizer();
      this.classifier = new DeficiencyClassifier(rangeTable);
      this.scorer = new HealthScorer(config.weights);
      this.recommender = new RecommendationEngine(config.fertilizers, config.dosage);
      this.history = new HistoryTracker(options.historyRetention ?? DEFAULT_VALUES.HISTORY_RETENTION);
      this.stages = new GrowthStageRegistry();
    } catch (error) {
      this.logger.error('Soil health engine configuration rejected', error, { crop: config.crop });
      throw error;
    }

    this.logger.debug('Soil health engine ready', {
      crop: config.crop,
      ranges: config.ranges.length,
      fertilizers: config.fertilizers.length
    });
  }

  /**
   * Score one reading, produce its recommendation and append it to the field's history.
   * Throws a validation SoilHealthError for a rejected reading.
   */
  ingest(sample: RawSensorSample, options: IngestOptions = {}): IngestResult {
    return this.commit(this.evaluate(sample, options));
  }

  /**
   * Everything ingest does except the append; leaves no state behind
   */
  evaluate(sample: RawSensorSample, options: IngestOptions = {}): IngestResult {
    try {
      const reading = this.normalizer.normalize(sample);
      const { fieldId, timestamp } = reading;

      this.history.assertAppendable(fieldId, timestamp);
      if (options.stage) {
        this.stages.assertCanAdvance(fieldId, options.stage);
      }
      const stage = options.stage ?? this.stages.getStage(fieldId);

      const deficiencies = this.classifier.classify(reading, stage);
      const score = this.scorer.score(deficiencies);
      const record: HealthScoreRecord = {
        fieldId,
        timestamp,
        score,
        contributingDeficiencies: deficiencies,
        stage
      };

      const recommendation = this.recommender.recommend({
        fieldId,
        timestamp,
        stage,
        deficiencies,
        history: [...this.history.recent(fieldId, this.historyWindow - 1), record]
      });

      return { record, recommendation };
    } catch (error) {
      if (isSoilHealthError(error) && error.category === 'validation') {
        this.logger.warn('Soil reading rejected', {
          code: error.code,
          reason: error.message,
          fieldId: typeof sample.fieldId === 'string' ? sample.fieldId : undefined
        });
      } else {
        this.logger.error('Soil reading processing failed', error);
      }
      throw error;
    }
  }

  /**
   * Append an evaluated reading; re-checks ordering in case the field moved on since evaluation
   */
  commit(result: IngestResult): IngestResult {
    const { recommendation } = result;
    const { fieldId, stage, score } = result.record;

    this.stages.assertCanAdvance(fieldId, stage);
    const record = this.history.record(result.record);
    this.stages.advance(fieldId, stage);

    this.logger.info('Soil reading scored', {
      fieldId,
      stage,
      score,
      rationale: recommendation.rationale
    });
    this.logger.audit('recommendation_issued', fieldId, {
      action: recommendation.action,
      fertilizerType: recommendation.fertilizerType,
      quantity: recommendation.quantity,
      unit: recommendation.unit,
      warnings: recommendation.warnings.map(warning => warning.code)
    });

    return { record, recommendation };
  }

  getHistory(fieldId: string, n: number): HealthScoreRecord[] {
    return this.history.recent(fieldId, n);
  }

  getTrend(fieldId: string): number | undefined {
    return this.history.trend(fieldId);
  }

  getScoreDelta(fieldId: string, n: number): number | undefined {
    return this.history.delta(fieldId, n);
  }

  explainScore(record: HealthScoreRecord): ScoreContribution[] {
    return this.scorer.contributions(record.contributingDeficiencies);
  }

  getStage(fieldId: string): GrowthStage {
    return this.stages.getStage(fieldId);
  }

  setStage(fieldId: string, stage: GrowthStage): GrowthStage {
    const next = this.stages.advance(fieldId, stage);
    this.logger.info('Growth stage updated', { fieldId, stage: next });
    return next;
  }

  /**
   * Throws StageRegressionError when the field is already past `stage`
   */
  assertStageChange(fieldId: string, stage: GrowthStage): void {
    this.stages.assertCanAdvance(fieldId, stage);
  }

  /**
   * Replace a field's history with the persisted records and adopt the latest known stage
   */
  restoreField(fieldId: string, records: readonly HealthScoreRecord[], stage?: GrowthStage): void {
    this.history.discard(fieldId);
    this.history.hydrate(fieldId, records);
    this.restoreStage(fieldId, stage);
  }

  /**
   * Adopt a stage recorded elsewhere; an older one never moves the field back
   */
  restoreStage(fieldId: string, stage?: GrowthStage): void {
    const known = [this.stages.getStage(fieldId), stage, this.history.last(fieldId)?.stage]
      .filter((candidate): candidate is GrowthStage => candidate !== undefined);
    const latest = known.reduce((a, b) => (stageIndex(b) > stageIndex(a) ? b : a));
    this.stages.advance(fieldId, latest);
  }

  isFieldLoaded(fieldId: string): boolean {
    return this.history.isHydrated(fieldId);
  }
}
