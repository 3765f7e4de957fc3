import axios, { AxiosInstance, InternalAxiosRequestConfig } from 'axios';
import {
  DEFAULT_FIELD_MAPPING,
  SampleSink,
  ThingSpeakCollectionService,
  ThingSpeakFeedEntry,
  ThingSpeakFeedResponse,
  mapFeedEntry
} from '../src/data-ingestion/thingspeak-collection';
import { SoilHealthEngine } from '../src/soil-health-engine/soil-health-engine';
import { loadEngineConfig } from '../src/shared/config/engine-config';
import { GrowthStage, HealthScoreRecord, RawSensorSample } from '../src/types';
import { testLogger } from './fixtures';

const ENTRY: ThingSpeakFeedEntry = {
  created_at: '2024-07-01T06:00:00Z',
  entry_id: 412,
  field1: '25.4',
  field2: '58',
  field3: '210',
  field4: '28',
  field5: '230',
  field6: '6.1',
  field7: '78'
};

function feed(entries: ThingSpeakFeedEntry[]): ThingSpeakFeedResponse {
  return { channel: { id: 1234567, name: 'pepper-plot' }, feeds: entries };
}

/**
 * axios instance whose adapter answers from a queue instead of the network
 */
function stubClient(responses: Array<ThingSpeakFeedResponse | Error>, seen: InternalAxiosRequestConfig[] = []): AxiosInstance {
  return axios.create({
    adapter: async (config: InternalAxiosRequestConfig) => {
      seen.push(config);
      const next = responses.shift();
      if (!next || next instanceof Error) {
        throw next ?? new Error('no stubbed response left');
      }
      return { data: next, status: 200, statusText: 'OK', headers: {}, config };
    }
  });
}

class RecordingSink implements SampleSink {
  readonly samples: RawSensorSample[] = [];
  private readonly engine = new SoilHealthEngine(loadEngineConfig(), { logger: testLogger() });

  async ingest(sample: RawSensorSample, options?: { stage?: GrowthStage }) {
    this.samples.push(sample);
    return { ...this.engine.ingest(sample, options), recordId: `record-${this.samples.length}` };
  }

  async getHistory(fieldId: string, n: number): Promise<HealthScoreRecord[]> {
    return this.engine.getHistory(fieldId, n);
  }
}

const settings = {
  apiUrl: 'https://thingspeak.test',
  channelId: '1234567',
  readApiKey: 'test-read-key',
  timeout: 5000,
  maxRetries: 2,
  retryDelayMs: 0
};

describe('mapFeedEntry', () => {
  it('maps the default probe wiring onto soil parameters', () => {
    expect(mapFeedEntry(ENTRY, 'plot-7')).toEqual({
      fieldId: 'plot-7',
      timestamp: '2024-07-01T06:00:00Z',
      temperature: '25.4',
      moisture: '58',
      nitrogen: '210',
      phosphorus: '28',
      potassium: '230',
      ph: '6.1',
      humidity: '78'
    });
  });

  it('follows a custom mapping', () => {
    const mapping = { ...DEFAULT_FIELD_MAPPING, humidity: 'field8' as const };
    expect(mapFeedEntry({ ...ENTRY, field8: '64' }, 'plot-7', mapping).humidity).toBe('64');
  });
});

describe('ThingSpeakCollectionService', () => {
  it('requests the latest entry of the channel', async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const collector = new ThingSpeakCollectionService(testLogger(), settings, stubClient([feed([ENTRY])], seen));

    const sample = await collector.fetchLatestSample('plot-7');

    expect(sample?.nitrogen).toBe('210');
    expect(seen).toHaveLength(1);
    expect(seen[0].url).toBe('https://thingspeak.test/channels/1234567/feeds.json');
    expect(seen[0].params).toEqual({ results: 1, api_key: 'test-read-key' });
  });

  it('retries a failed call', async () => {
    const collector = new ThingSpeakCollectionService(
      testLogger(),
      settings,
      stubClient([new Error('socket hang up'), feed([ENTRY])])
    );

    await expect(collector.fetchLatestSample('plot-7')).resolves.toMatchObject({ fieldId: 'plot-7' });
  });

  it('gives up after the configured number of attempts', async () => {
    const collector = new ThingSpeakCollectionService(
      testLogger(),
      settings,
      stubClient([new Error('socket hang up'), new Error('socket hang up'), feed([ENTRY])])
    );

    await expect(collector.fetchLatestSample('plot-7')).rejects.toThrow('ThingSpeak API call failed after 2 attempts');
  });

  it('skips an empty channel', async () => {
    const sink = new RecordingSink();
    const collector = new ThingSpeakCollectionService(testLogger(), settings, stubClient([feed([])]));

    await expect(collector.collect('plot-7', sink)).resolves.toBeNull();
    expect(sink.samples).toEqual([]);
  });

  it('scores the latest entry', async () => {
    const sink = new RecordingSink();
    const older = { ...ENTRY, entry_id: 411, created_at: '2024-06-30T06:00:00Z', field3: '90' };
    const collector = new ThingSpeakCollectionService(testLogger(), settings, stubClient([feed([older, ENTRY])]));

    const summary = await collector.collect('plot-7', sink, GrowthStage.PRE_PLANTING);

    expect(summary?.record.score).toBe(100);
    expect(sink.samples[0].timestamp).toBe('2024-07-01T06:00:00Z');
  });

  it('does not ingest the same entry twice', async () => {
    const sink = new RecordingSink();
    const collector = new ThingSpeakCollectionService(
      testLogger(),
      settings,
      stubClient([feed([ENTRY]), feed([ENTRY]), feed([ENTRY])])
    );

    await expect(collector.collect('plot-7', sink)).resolves.toMatchObject({ recordId: 'record-1' });
    await expect(collector.collect('plot-7', sink)).resolves.toBeNull();
    await expect(collector.collect('plot-7', sink)).resolves.toBeNull();

    expect(sink.samples).toHaveLength(1);
    await expect(sink.getHistory('plot-7', 10)).resolves.toHaveLength(1);
  });

  it('ingests a newer entry on the next poll', async () => {
    const sink = new RecordingSink();
    const newer = { ...ENTRY, entry_id: 413, created_at: '2024-07-01T06:15:00Z' };
    const collector = new ThingSpeakCollectionService(testLogger(), settings, stubClient([feed([ENTRY]), feed([ENTRY, newer])]));

    await collector.collect('plot-7', sink);
    const summary = await collector.collect('plot-7', sink);

    expect(summary?.record.timestamp.toISOString()).toBe('2024-07-01T06:15:00.000Z');
    expect(sink.samples).toHaveLength(2);
  });

  it('logs and drops a sample the engine rejects', async () => {
    const sink = new RecordingSink();
    const collector = new ThingSpeakCollectionService(
      testLogger(),
      settings,
      stubClient([feed([{ ...ENTRY, field3: null }])])
    );

    await expect(collector.collect('plot-7', sink)).resolves.toBeNull();
  });
});
