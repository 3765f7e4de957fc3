/**
 * DynamoDB persistence for field history, recommendations and growth stages.
 * The table is the source of truth shared by every function; a per-field head
 * item carries a sequence number so each process can tell when its in-memory
 * copy is stale, and every append is conditioned on it.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  DeficiencyResult,
  DeficiencyStatus,
  GrowthStage,
  HealthScoreRecord,
  Recommendation
} from '../types';
import { ConditionalPut, DynamoDBHelper, DynamoItem } from '../shared/utils/dynamodb-helper';
import { toGrowthStage, toSoilParameter } from '../shared/config/engine-config';
import { Logger } from '../shared/utils/logger';
import { stageIndex } from './growth-stage-registry';

export const ITEM_PREFIX = {
  SCORE: 'SCORE#',
  RECOMMENDATION: 'RECOMMENDATION#'
} as const;

export const HEAD_RECORD_KEY = 'HEAD';

export interface FieldHead {
  /** Number of assessments ever appended for the field */
  sequence: number;
  lastRecordId?: string;
  lastTimestamp?: string;
}

export interface HistoryRepositoryOptions {
  historyTableName: string;
  fieldStagesTableName: string;
}

function toDeficiencyStatus(value: unknown): DeficiencyStatus | undefined {
  return Object.values(DeficiencyStatus).find(status => status === value);
}

function parseDeficiency(raw: unknown): DeficiencyResult | undefined {
  if (typeof raw !== 'object' || raw === null) {
    return undefined;
  }
  const entry: Record<string, unknown> = { ...raw };
  const parameter = toSoilParameter(entry.parameter);
  const status = toDeficiencyStatus(entry.status);
  const { severity, value } = entry;
  if (!parameter || !status || typeof severity !== 'number' || typeof value !== 'number') {
    return undefined;
  }
  return { parameter, status, severity, value };
}

/**
 * Rebuild a HealthScoreRecord from its stored item; malformed items yield undefined
 */
export function parseScoreItem(item: DynamoItem): HealthScoreRecord | undefined {
  const { fieldId, timestamp, score, deficiencies } = item;
  const stage = toGrowthStage(item.stage);
  if (typeof fieldId !== 'string' || typeof timestamp !== 'string' || typeof score !== 'number' || !stage) {
    return undefined;
  }

  const rawDeficiencies: unknown[] = Array.isArray(deficiencies) ? deficiencies : [];
  const parsed = rawDeficiencies.map(parseDeficiency);
  const contributingDeficiencies = parsed.filter((entry): entry is DeficiencyResult => entry !== undefined);
  if (contributingDeficiencies.length !== parsed.length) {
    return undefined;
  }

  const date = new Date(timestamp);
  if (isNaN(date.getTime())) {
    return undefined;
  }

  return { fieldId, timestamp: date, score, stage, contributingDeficiencies };
}

export function toScoreItem(record: HealthScoreRecord, recordId: string): DynamoItem {
  const iso = record.timestamp.toISOString();
  return {
    fieldId: record.fieldId,
    recordKey: `${ITEM_PREFIX.SCORE}${iso}#${recordId}`,
    itemType: 'score',
    recordId,
    timestamp: iso,
    score: record.score,
    stage: record.stage,
    deficiencies: record.contributingDeficiencies.map(result => ({ ...result }))
  };
}

export function toRecommendationItem(recommendation: Recommendation, recordId: string): DynamoItem {
  const iso = recommendation.timestamp.toISOString();
  return {
    fieldId: recommendation.fieldId,
    recordKey: `${ITEM_PREFIX.RECOMMENDATION}${iso}#${recordId}`,
    itemType: 'recommendation',
    recordId,
    timestamp: iso,
    stage: recommendation.stage,
    action: recommendation.action,
    fertilizerType: recommendation.fertilizerType,
    quantity: recommendation.quantity,
    unit: recommendation.unit,
    rationale: [...recommendation.rationale],
    warnings: recommendation.warnings.map(warning => ({ ...warning }))
  };
}

export class HistoryRepository {
  private readonly dbHelper: DynamoDBHelper;
  private readonly logger: Logger;
  private readonly options: HistoryRepositoryOptions;

  constructor(dbHelper: DynamoDBHelper, options: HistoryRepositoryOptions, logger: Logger) {
    this.dbHelper = dbHelper;
    this.options = options;
    this.logger = logger;
  }

  /**
   * Store a scored reading, its recommendation and (optionally) the field's stage in one transaction.
   * Throws ConditionalWriteError when another writer moved the head past `expectedSequence`
   * or the stored stage past `stage`.
   */
  async saveAssessment(
    record: HealthScoreRecord,
    recommendation: Recommendation,
    expectedSequence: number,
    stage?: GrowthStage
  ): Promise<string> {
    const recordId = uuidv4();
    const { historyTableName } = this.options;

    const puts: ConditionalPut[] = [
      { tableName: historyTableName, item: toScoreItem(record, recordId) },
      { tableName: historyTableName, item: toRecommendationItem(recommendation, recordId) },
      {
        tableName: historyTableName,
        item: {
          fieldId: record.fieldId,
          recordKey: HEAD_RECORD_KEY,
          itemType: 'head',
          headSequence: expectedSequence + 1,
          lastRecordId: recordId,
          lastTimestamp: record.timestamp.toISOString()
        },
        condition: expectedSequence === 0
          ? { expression: 'attribute_not_exists(fieldId)' }
          : { expression: 'headSequence = :expectedSequence', values: { ':expectedSequence': expectedSequence } }
      }
    ];
    if (stage) {
      puts.push(this.stagePut(record.fieldId, stage));
    }

    await this.dbHelper.transactWriteItems(puts);
    return recordId;
  }

  async loadHead(fieldId: string): Promise<FieldHead> {
    const item = await this.dbHelper.getItem(this.options.historyTableName, { fieldId, recordKey: HEAD_RECORD_KEY });
    if (!item || typeof item.headSequence !== 'number') {
      return { sequence: 0 };
    }
    return {
      sequence: item.headSequence,
      lastRecordId: typeof item.lastRecordId === 'string' ? item.lastRecordId : undefined,
      lastTimestamp: typeof item.lastTimestamp === 'string' ? item.lastTimestamp : undefined
    };
  }

  /**
   * Newest `limit` score records for a field, returned oldest first
   */
  async loadRecentScores(fieldId: string, limit: number): Promise<HealthScoreRecord[]> {
    const items = await this.dbHelper.queryItems(
      this.options.historyTableName,
      'fieldId = :fieldId AND begins_with(recordKey, :prefix)',
      { ':fieldId': fieldId, ':prefix': ITEM_PREFIX.SCORE },
      limit,
      false
    );

    const records: HealthScoreRecord[] = [];
    for (const item of items) {
      const record = parseScoreItem(item);
      if (record) {
        records.push(record);
      } else {
        this.logger.warn('Skipping malformed history item', { fieldId, recordKey: item.recordKey });
      }
    }

    return records.reverse();
  }

  async loadStage(fieldId: string): Promise<GrowthStage | undefined> {
    const item = await this.dbHelper.getItem(this.options.fieldStagesTableName, { fieldId });
    return item ? toGrowthStage(item.stage) : undefined;
  }

  /**
   * Throws ConditionalWriteError when the stored stage is already further along
   */
  async saveStage(fieldId: string, stage: GrowthStage): Promise<void> {
    const { tableName, item, condition } = this.stagePut(fieldId, stage);
    await this.dbHelper.putItem(tableName, item, condition);
  }

  private stagePut(fieldId: string, stage: GrowthStage): ConditionalPut {
    const index = stageIndex(stage);
    return {
      tableName: this.options.fieldStagesTableName,
      item: {
        fieldId,
        stage,
        stageIndex: index,
        updatedAt: new Date().toISOString()
      },
      condition: {
        expression: 'attribute_not_exists(fieldId) OR stageIndex <= :stageIndex',
        values: { ':stageIndex': index }
      }
    };
  }
}
