/**
 * History Tracker
 * Append-only, per-field series of HealthScoreRecords. Insertion order is
 * chronological order; trend queries are pure functions of what is stored.
 */

import { HealthScoreRecord } from '../types';
import { DEFAULT_VALUES } from '../shared/config/constants';
import { OutOfOrderReadingError, ConfigurationError } from '../shared/utils/errors';

/**
 * Least-squares slope of score against record index (points per reading)
 */
export function scoreSlope(records: readonly HealthScoreRecord[]): number | undefined {
  const n = records.length;
  if (n < 2) {
    return undefined;
  }

  const meanX = (n - 1) / 2;
  const meanY = records.reduce((sum, record) => sum + record.score, 0) / n;

  let numerator = 0;
  let denominator = 0;
  records.forEach((record, index) => {
    numerator += (index - meanX) * (record.score - meanY);
    denominator += (index - meanX) ** 2;
  });

  return numerator / denominator;
}

function freezeRecord(record: HealthScoreRecord): HealthScoreRecord {
  return Object.freeze({
    ...record,
    timestamp: new Date(record.timestamp.getTime()),
    contributingDeficiencies: Object.freeze(record.contributingDeficiencies.map(result => Object.freeze({ ...result })))
  });
}

export class HistoryTracker {
  private readonly histories = new Map<string, HealthScoreRecord[]>();

  /**
   * @param retention most records kept per field; the oldest are dropped first
   */
  constructor(private readonly retention: number = DEFAULT_VALUES.HISTORY_RETENTION) {
    if (!Number.isInteger(retention) || retention < 2) {
      throw new ConfigurationError(['history retention must be an integer of at least 2']);
    }
  }

  /**
   * Throws OutOfOrderReadingError when the timestamp is earlier than the field's last record
   */
  assertAppendable(fieldId: string, timestamp: Date): void {
    const last = this.last(fieldId);
    if (last && timestamp.getTime() < last.timestamp.getTime()) {
      throw new OutOfOrderReadingError(fieldId, timestamp, last.timestamp);
    }
  }

  record(record: HealthScoreRecord): HealthScoreRecord {
    this.assertAppendable(record.fieldId, record.timestamp);

    const stored = freezeRecord(record);
    const history = this.histories.get(record.fieldId) ?? [];
    history.push(stored);
    if (history.length > this.retention) {
      history.splice(0, history.length - this.retention);
    }
    this.histories.set(record.fieldId, history);

    return stored;
  }

  /**
   * Seed an untouched field with previously persisted records
   */
  hydrate(fieldId: string, records: readonly HealthScoreRecord[]): void {
    if (this.histories.has(fieldId)) {
      return;
    }
    const ordered = [...records].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
    const history = ordered.slice(-this.retention).map(record => freezeRecord({ ...record, fieldId }));
    this.histories.set(fieldId, history);
  }

  /**
   * Forget a field's in-memory records so it can be hydrated from storage again
   */
  discard(fieldId: string): void {
    this.histories.delete(fieldId);
  }

  isHydrated(fieldId: string): boolean {
    return this.histories.has(fieldId);
  }

  /**
   * Last n records, oldest first; shorter histories return what exists
   */
  recent(fieldId: string, n: number): HealthScoreRecord[] {
    const history = this.histories.get(fieldId) ?? [];
    if (n <= 0) {
      return [];
    }
    return history.slice(-Math.floor(n));
  }

  last(fieldId: string): HealthScoreRecord | undefined {
    const history = this.histories.get(fieldId);
    return history ? history[history.length - 1] : undefined;
  }

  /**
   * Signed slope over the stored records (or the last `window` of them);
   * undefined when fewer than two records exist
   */
  trend(fieldId: string, window?: number): number | undefined {
    const records = window === undefined ? this.histories.get(fieldId) ?? [] : this.recent(fieldId, window);
    return scoreSlope(records);
  }

  /**
   * Newest minus oldest score across the last n records
   */
  delta(fieldId: string, n: number): number | undefined {
    const records = this.recent(fieldId, n);
    if (records.length < 2) {
      return undefined;
    }
    return Math.round((records[records.length - 1].score - records[0].score) * 100) / 100;
  }

  size(fieldId: string): number {
    return this.histories.get(fieldId)?.length ?? 0;
  }

  fields(): string[] {
    return [...this.histories.keys()];
  }
}
