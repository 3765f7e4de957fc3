import { Logger, LogLevel } from '../src/shared/utils/logger';
import { RawSensorSample } from '../src/types';

/**
 * Within the optimal band at every growth stage of the bundled table
 */
export const OPTIMAL_VALUES = {
  nitrogen: 200,
  phosphorus: 30,
  potassium: 220,
  ph: 6.0,
  moisture: 60,
  temperature: 25
};

export function sample(overrides: Partial<RawSensorSample> = {}): RawSensorSample {
  return {
    fieldId: 'field-1',
    timestamp: '2024-06-01T06:00:00.000Z',
    ...OPTIMAL_VALUES,
    ...overrides
  };
}

export function testLogger(): Logger {
  return new Logger({ component: 'test' }, LogLevel.ERROR);
}
