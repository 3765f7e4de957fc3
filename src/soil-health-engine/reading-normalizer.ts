/**
 * Reading Normalizer
 * Validates a raw sensor sample and canonicalizes it into a SensorReading.
 *
 * Per-parameter canonicalisation:
 * - nitrogen, phosphorus, potassium: mg/kg, numeric strings parsed as decimals
 * - ph: unitless, numeric strings parsed as decimals
 * - moisture, humidity: percent, numeric strings parsed as decimals
 * - temperature: °C; samples flagged `temperatureUnit: 'F'` are converted with (F - 32) × 5/9
 * - timestamp: Date, ISO-8601 string or epoch milliseconds
 * Values are never clamped; anything outside its physical range is rejected.
 */

import { RawSensorSample, SensorReading, SoilParameter, NumericBounds } from '../types';
import { PHYSICAL_BOUNDS, HUMIDITY_BOUNDS, PARAMETER_ORDER } from '../shared/config/constants';
import { InvalidReadingError, MissingFieldError } from '../shared/utils/errors';

type ScoredValues = Record<SoilParameter, number>;

function isBlank(value: unknown): boolean {
  return value === undefined || value === null || (typeof value === 'string' && value.trim().length === 0);
}

export function fahrenheitToCelsius(value: number): number {
  return ((value - 32) * 5) / 9;
}

export class ReadingNormalizer {
  /**
   * Validate and canonicalize a raw sample.
   * Throws MissingFieldError or InvalidReadingError naming the offending field.
   */
  normalize(sample: RawSensorSample): SensorReading {
    const fieldId = this.parseFieldId(sample.fieldId);
    const timestamp = this.parseTimestamp(sample.timestamp);

    const values: ScoredValues = {
      [SoilParameter.NITROGEN]: 0,
      [SoilParameter.PHOSPHORUS]: 0,
      [SoilParameter.POTASSIUM]: 0,
      [SoilParameter.PH]: 0,
      [SoilParameter.MOISTURE]: 0,
      [SoilParameter.TEMPERATURE]: 0
    };

    for (const parameter of PARAMETER_ORDER) {
      let value = this.parseNumber(parameter, sample[parameter]);
      if (parameter === SoilParameter.TEMPERATURE && sample.temperatureUnit === 'F') {
        value = fahrenheitToCelsius(value);
      }
      this.checkBounds(parameter, value, PHYSICAL_BOUNDS[parameter]);
      values[parameter] = value;
    }

    const reading: SensorReading = { fieldId, timestamp, ...values };

    if (!isBlank(sample.humidity)) {
      const humidity = this.parseNumber('humidity', sample.humidity);
      this.checkBounds('humidity', humidity, HUMIDITY_BOUNDS);
      reading.humidity = humidity;
    }

    return reading;
  }

  private parseFieldId(fieldId: RawSensorSample['fieldId']): string {
    if (typeof fieldId !== 'string' || fieldId.trim().length === 0) {
      throw new MissingFieldError('fieldId');
    }
    return fieldId.trim();
  }

  private parseTimestamp(timestamp: RawSensorSample['timestamp']): Date {
    if (isBlank(timestamp)) {
      throw new MissingFieldError('timestamp');
    }

    const date = timestamp instanceof Date
      ? new Date(timestamp.getTime())
      : typeof timestamp === 'number' || typeof timestamp === 'string'
        ? new Date(timestamp)
        : undefined;

    if (!date || isNaN(date.getTime())) {
      throw new InvalidReadingError('timestamp', `cannot interpret ${String(timestamp)} as a point in time`);
    }
    return date;
  }

  private parseNumber(parameter: string, raw: number | string | null | undefined): number {
    if (raw === undefined || raw === null || (typeof raw === 'string' && raw.trim().length === 0)) {
      throw new MissingFieldError(parameter);
    }

    const value = typeof raw === 'number' ? raw : Number(raw.trim());
    if (!Number.isFinite(value)) {
      throw new InvalidReadingError(parameter, `${String(raw)} is not a finite number`);
    }
    return value;
  }

  private checkBounds(parameter: string, value: number, bounds: NumericBounds): void {
    if (value < bounds.min || value > bounds.max) {
      throw new InvalidReadingError(
        parameter,
        `${value} is outside the physical range [${bounds.min}, ${bounds.max}]`
      );
    }
  }
}
