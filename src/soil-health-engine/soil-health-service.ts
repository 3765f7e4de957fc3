/**
 * Soil Health Service
 * Wraps the engine with DynamoDB persistence and EventBridge notifications.
 * Work for one field is chained so sync → evaluate → persist → commit never
 * interleaves within a process; different fields proceed independently.
 * Other functions write the same table, so every operation first checks the
 * field's head item and reloads when it has moved, and every append is
 * conditioned on the head the evaluation saw.
 */

import { EventBridge } from 'aws-sdk';
import {
  GrowthStage,
  HealthScoreRecord,
  IngestResult,
  RawSensorSample
} from '../types';
import { DEFAULT_VALUES, EVENT_TYPES } from '../shared/config/constants';
import { Logger } from '../shared/utils/logger';
import { MissingFieldError } from '../shared/utils/errors';
import { ConditionalWriteError } from '../shared/utils/dynamodb-helper';
import { SoilHealthEngine, IngestOptions } from './soil-health-engine';
import { HistoryRepository } from './history-repository';

export interface EventPublisher {
  putEvents(params: EventBridge.PutEventsRequest): { promise(): Promise<EventBridge.PutEventsResponse> };
}

export interface SoilHealthServiceOptions {
  eventBusName: string;
  historyWindow: number;
}

export interface AssessmentSummary extends IngestResult {
  recordId: string;
  trend?: number;
}

export class SoilHealthService {
  private readonly fieldQueues = new Map<string, Promise<unknown>>();
  // Head sequence each field's in-memory history reflects
  private readonly syncedSequences = new Map<string, number>();

  constructor(
    private readonly engine: SoilHealthEngine,
    private readonly repository: HistoryRepository,
    private readonly eventBridge: EventPublisher,
    private readonly options: SoilHealthServiceOptions,
    private readonly logger: Logger
  ) {}

  /**
   * Score a reading, persist it and notify downstream consumers
   */
  async ingest(sample: RawSensorSample, options: IngestOptions = {}): Promise<AssessmentSummary> {
    const fieldId = typeof sample.fieldId === 'string' ? sample.fieldId.trim() : '';
    if (fieldId.length === 0) {
      this.logger.warn('Soil reading rejected', { code: 'MISSING_FIELD', reason: 'fieldId is missing' });
      throw new MissingFieldError('fieldId');
    }

    return this.withFieldLock(fieldId, async () => {
      for (let attempt = 1; ; attempt++) {
        const sequence = await this.syncField(fieldId);
        const evaluated = this.engine.evaluate(sample, options);

        let recordId: string;
        try {
          recordId = await this.repository.saveAssessment(evaluated.record, evaluated.recommendation, sequence, options.stage);
        } catch (error) {
          if (error instanceof ConditionalWriteError && attempt < DEFAULT_VALUES.WRITE_ATTEMPTS) {
            this.logger.warn('Field changed by another writer, reloading', { fieldId, attempt });
            continue;
          }
          throw error;
        }

        const committed = this.engine.commit(evaluated);
        this.syncedSequences.set(fieldId, sequence + 1);
        const trend = this.engine.getTrend(fieldId);
        await this.publishAssessment(committed, recordId, trend);

        return { ...committed, recordId, trend };
      }
    });
  }

  async getHistory(fieldId: string, n: number): Promise<HealthScoreRecord[]> {
    return this.withFieldLock(fieldId, async () => {
      await this.syncField(fieldId);
      return this.engine.getHistory(fieldId, n);
    });
  }

  async getTrend(fieldId: string): Promise<number | undefined> {
    return this.withFieldLock(fieldId, async () => {
      await this.syncField(fieldId);
      return this.engine.getTrend(fieldId);
    });
  }

  async setStage(fieldId: string, stage: GrowthStage): Promise<GrowthStage> {
    return this.withFieldLock(fieldId, async () => {
      await this.syncField(fieldId);
      this.engine.assertStageChange(fieldId, stage);

      try {
        await this.repository.saveStage(fieldId, stage);
      } catch (error) {
        if (error instanceof ConditionalWriteError) {
          // Another writer moved the stage on; surface it as a regression
          this.engine.restoreStage(fieldId, await this.repository.loadStage(fieldId));
          this.engine.assertStageChange(fieldId, stage);
        }
        throw error;
      }

      return this.engine.setStage(fieldId, stage);
    });
  }

  /**
   * Bring the field's in-memory history and stage up to date with the table.
   * Returns the head sequence the engine now reflects.
   */
  private async syncField(fieldId: string): Promise<number> {
    const [head, stage] = await Promise.all([
      this.repository.loadHead(fieldId),
      this.repository.loadStage(fieldId)
    ]);

    if (this.engine.isFieldLoaded(fieldId) && this.syncedSequences.get(fieldId) === head.sequence) {
      this.engine.restoreStage(fieldId, stage);
      return head.sequence;
    }

    const records = head.sequence === 0
      ? []
      : await this.repository.loadRecentScores(fieldId, this.options.historyWindow);
    this.engine.restoreField(fieldId, records, stage);
    this.syncedSequences.set(fieldId, head.sequence);
    this.logger.debug('Field history restored', { fieldId, records: records.length, sequence: head.sequence, stage });

    return head.sequence;
  }

  private withFieldLock<T>(fieldId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.fieldQueues.get(fieldId) ?? Promise.resolve();
    const run = previous.then(task, task);
    const settled = run.then(() => undefined, () => undefined);
    this.fieldQueues.set(fieldId, settled);
    void settled.then(() => {
      if (this.fieldQueues.get(fieldId) === settled) {
        this.fieldQueues.delete(fieldId);
      }
    });
    return run;
  }

  private async publishAssessment(result: IngestResult, recordId: string, trend?: number): Promise<void> {
    const { record, recommendation } = result;
    try {
      const eventDetail = {
        recordId,
        fieldId: record.fieldId,
        timestamp: record.timestamp.toISOString(),
        stage: record.stage,
        score: record.score,
        trend,
        recommendation: {
          action: recommendation.action,
          fertilizerType: recommendation.fertilizerType,
          quantity: recommendation.quantity,
          unit: recommendation.unit,
          rationale: recommendation.rationale,
          warnings: recommendation.warnings
        }
      };

      const result = await this.eventBridge.putEvents({
        Entries: [
          {
            Source: EVENT_TYPES.SOURCE,
            DetailType: EVENT_TYPES.SOIL_HEALTH_ASSESSED,
            Detail: JSON.stringify(eventDetail),
            EventBusName: this.options.eventBusName,
          },
        ],
      }).promise();

      if (result.FailedEntryCount) {
        const [entry] = result.Entries ?? [];
        this.logger.error('Soil health event rejected by the bus', undefined, {
          fieldId: record.fieldId,
          recordId,
          errorCode: entry?.ErrorCode,
          errorMessage: entry?.ErrorMessage
        });
        return;
      }

      this.logger.info('Soil health event published', { fieldId: record.fieldId, recordId });
    } catch (error) {
      // The assessment is already stored; consumers can replay from history
      this.logger.error('Failed to publish soil health event', error, { fieldId: record.fieldId, recordId });
    }
  }
}
