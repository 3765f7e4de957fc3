/**
 * ThingSpeak Feed Collection Lambda Function
 * Pulls the latest soil probe sample from a ThingSpeak channel and feeds it to the engine.
 * Scheduled via EventBridge.
 */

import { Handler, ScheduledEvent } from 'aws-lambda';
import axios, { AxiosInstance } from 'axios';
import { createLambdaLogger, Logger } from '../shared/utils/logger';
import { getEnvironment, EnvironmentConfig } from '../shared/config/environment';
import { GrowthStage, HealthScoreRecord, RawSensorSample } from '../types';
import { isSoilHealthError } from '../shared/utils/errors';
import { AssessmentSummary } from '../soil-health-engine/soil-health-service';
import { getSoilHealthService } from '../soil-health-engine';

export type FeedField = 'field1' | 'field2' | 'field3' | 'field4' | 'field5' | 'field6' | 'field7' | 'field8';

export type MappedValue = 'temperature' | 'moisture' | 'nitrogen' | 'phosphorus' | 'potassium' | 'ph' | 'humidity';

export type FeedFieldMapping = Record<MappedValue, FeedField>;

export interface ThingSpeakFeedEntry {
  created_at: string;
  entry_id: number;
  field1?: string | null;
  field2?: string | null;
  field3?: string | null;
  field4?: string | null;
  field5?: string | null;
  field6?: string | null;
  field7?: string | null;
  field8?: string | null;
}

export interface ThingSpeakFeedResponse {
  channel: {
    id: number;
    name?: string;
    last_entry_id?: number;
  };
  feeds: ThingSpeakFeedEntry[];
}

/**
 * Probe wiring used by the field kits: temperature, moisture, N, P, K, pH, humidity on fields 1-7
 */
export const DEFAULT_FIELD_MAPPING: FeedFieldMapping = {
  temperature: 'field1',
  moisture: 'field2',
  nitrogen: 'field3',
  phosphorus: 'field4',
  potassium: 'field5',
  ph: 'field6',
  humidity: 'field7'
};

export interface ThingSpeakSettings {
  apiUrl: string;
  channelId: string;
  readApiKey?: string;
  timeout: number;
  maxRetries: number;
  retryDelayMs?: number;
  mapping?: FeedFieldMapping;
}

export interface SampleSink {
  ingest(sample: RawSensorSample, options?: { stage?: GrowthStage }): Promise<AssessmentSummary>;
  getHistory(fieldId: string, n: number): Promise<HealthScoreRecord[]>;
}

export interface ThingSpeakCollectionEvent extends ScheduledEvent {
  fieldId?: string;
  stage?: GrowthStage;
}

/**
 * Map a feed entry onto a raw sample; values stay strings for the normalizer to parse
 */
export function mapFeedEntry(entry: ThingSpeakFeedEntry, fieldId: string, mapping: FeedFieldMapping = DEFAULT_FIELD_MAPPING): RawSensorSample {
  return {
    fieldId,
    timestamp: entry.created_at,
    temperature: entry[mapping.temperature],
    moisture: entry[mapping.moisture],
    nitrogen: entry[mapping.nitrogen],
    phosphorus: entry[mapping.phosphorus],
    potassium: entry[mapping.potassium],
    ph: entry[mapping.ph],
    humidity: entry[mapping.humidity]
  };
}

export class ThingSpeakCollectionService {
  private logger: Logger;
  private http: AxiosInstance;
  private settings: ThingSpeakSettings;

  constructor(logger: Logger, settings: ThingSpeakSettings, http: AxiosInstance = axios.create()) {
    this.logger = logger;
    this.settings = settings;
    this.http = http;
  }

  /**
   * Latest entry of the channel as a raw sample, or null when the channel is empty
   */
  async fetchLatestSample(fieldId: string): Promise<RawSensorSample | null> {
    const latest = await this.fetchLatestEntry();
    return latest ? mapFeedEntry(latest, fieldId, this.settings.mapping) : null;
  }

  /**
   * Fetch the latest entry and hand it to the sink unless the field already has it.
   * Rejected readings are logged, not rethrown.
   */
  async collect(fieldId: string, sink: SampleSink, stage?: GrowthStage): Promise<AssessmentSummary | null> {
    const latest = await this.fetchLatestEntry();
    if (!latest) {
      return null;
    }

    const [lastRecord] = await sink.getHistory(fieldId, 1);
    if (lastRecord && Date.parse(latest.created_at) <= lastRecord.timestamp.getTime()) {
      this.logger.info('No new ThingSpeak entry since the last reading', {
        fieldId,
        entryId: latest.entry_id,
        lastReadingAt: lastRecord.timestamp.toISOString()
      });
      return null;
    }

    try {
      const summary = await sink.ingest(mapFeedEntry(latest, fieldId, this.settings.mapping), { stage });
      this.logger.info('ThingSpeak sample ingested', {
        fieldId,
        entryId: latest.entry_id,
        score: summary.record.score,
        fertilizerType: summary.recommendation.fertilizerType
      });
      return summary;
    } catch (error) {
      if (isSoilHealthError(error) && error.category === 'validation') {
        this.logger.warn('ThingSpeak sample rejected', { fieldId, code: error.code, reason: error.message });
        return null;
      }
      throw error;
    }
  }

  private async fetchLatestEntry(): Promise<ThingSpeakFeedEntry | undefined> {
    const startTime = Date.now();
    const feed = await this.makeFeedApiCall();
    this.logger.performance('fetchLatestEntry', Date.now() - startTime, { channelId: this.settings.channelId });

    const latest = feed.feeds[feed.feeds.length - 1];
    if (!latest) {
      this.logger.warn('ThingSpeak channel has no entries', { channelId: this.settings.channelId });
      return undefined;
    }

    this.logger.debug('ThingSpeak entry received', { entryId: latest.entry_id, createdAt: latest.created_at });
    return latest;
  }

  private buildFeedUrl(): string {
    const { apiUrl, channelId } = this.settings;
    return `${apiUrl}/channels/${encodeURIComponent(channelId)}/feeds.json`;
  }

  /**
   * Make API call to ThingSpeak with retry logic and error handling
   */
  private async makeFeedApiCall(): Promise<ThingSpeakFeedResponse> {
    const { maxRetries, timeout, readApiKey } = this.settings;
    const baseDelay = this.settings.retryDelayMs ?? 1000;
    const url = this.buildFeedUrl();
    let lastError: unknown;

    for (let attempt = 1; attempt <= maxRetries; attempt++) {
      try {
        this.logger.debug('Making ThingSpeak API call', { url, attempt });

        const response = await this.http.get<ThingSpeakFeedResponse>(url, {
          timeout,
          params: { results: 1, ...(readApiKey ? { api_key: readApiKey } : {}) },
          headers: { Accept: 'application/json' },
        });

        if (response.status === 200 && Array.isArray(response.data?.feeds)) {
          return response.data;
        }

        throw new Error(`ThingSpeak returned status ${response.status}`);
      } catch (error) {
        lastError = error;
        this.logger.warn('ThingSpeak API call failed', {
          attempt,
          maxRetries,
          error: error instanceof Error ? error.message : String(error)
        });

        if (attempt < maxRetries) {
          // Exponential backoff
          await this.sleep(Math.min(baseDelay * Math.pow(2, attempt - 1), 10000));
        }
      }
    }

    const reason = lastError instanceof Error ? lastError.message : String(lastError);
    throw new Error(`ThingSpeak API call failed after ${maxRetries} attempts: ${reason}`);
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }
}

export function thingSpeakSettingsFromEnvironment(config: EnvironmentConfig): ThingSpeakSettings {
  if (!config.thingSpeakChannelId) {
    throw new Error('Required environment variable THINGSPEAK_CHANNEL_ID is not set');
  }
  return {
    apiUrl: config.thingSpeakApiUrl,
    channelId: config.thingSpeakChannelId,
    readApiKey: config.thingSpeakReadApiKey,
    timeout: config.defaultTimeout,
    maxRetries: config.maxRetries
  };
}

/**
 * Lambda handler function
 */
export const handler: Handler<ThingSpeakCollectionEvent, void> = async (event, context) => {
  const logger = createLambdaLogger('thingspeak-collection', context.awsRequestId);

  try {
    const config = getEnvironment();
    const fieldId = event.fieldId ?? config.thingSpeakFieldId;
    if (!fieldId) {
      throw new Error('No field configured for the ThingSpeak channel (THINGSPEAK_FIELD_ID)');
    }

    logger.info('ThingSpeak collection started', { fieldId });
    const collector = new ThingSpeakCollectionService(logger, thingSpeakSettingsFromEnvironment(config));
    await collector.collect(fieldId, getSoilHealthService(), event.stage);
    logger.info('ThingSpeak collection completed', { fieldId });
  } catch (error) {
    logger.error('ThingSpeak collection failed', error);
    throw error;
  }
};
