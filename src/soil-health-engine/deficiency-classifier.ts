/**
 * Deficiency Classifier
 * Compares a normalized reading with the stage's optimal bands and
 * produces one DeficiencyResult per parameter in fixed order
 */

import {
  SensorReading,
  NutrientRange,
  DeficiencyResult,
  DeficiencyStatus,
  GrowthStage
} from '../types';
import { PARAMETER_ORDER, SOIL_CONSTANTS } from '../shared/config/constants';
import { NutrientRangeTable } from './nutrient-range-table';

function clip(value: number): number {
  return Math.min(SOIL_CONSTANTS.MAX_SEVERITY, Math.max(SOIL_CONSTANTS.MIN_SEVERITY, value));
}

/**
 * Status and severity of a single value against its range.
 * Severity is 0 on the optimal boundary and reaches 1 at the critical boundary.
 */
export function classifyValue(
  value: number,
  range: Pick<NutrientRange, 'minOptimal' | 'maxOptimal' | 'criticalLow' | 'criticalHigh'>
): { status: DeficiencyStatus; severity: number } {
  if (value < range.minOptimal) {
    return {
      status: DeficiencyStatus.DEFICIENT,
      severity: clip((range.minOptimal - value) / (range.minOptimal - range.criticalLow))
    };
  }

  if (value > range.maxOptimal) {
    return {
      status: DeficiencyStatus.EXCESS,
      severity: clip((value - range.maxOptimal) / (range.criticalHigh - range.maxOptimal))
    };
  }

  return { status: DeficiencyStatus.OPTIMAL, severity: 0 };
}

export class DeficiencyClassifier {
  constructor(private readonly rangeTable: NutrientRangeTable) {}

  /**
   * Classify all six parameters in the order N, P, K, pH, moisture, temperature
   */
  classify(reading: SensorReading, stage: GrowthStage): DeficiencyResult[] {
    return PARAMETER_ORDER.map(parameter => {
      const range = this.rangeTable.lookup(parameter, stage);
      const value = reading[parameter];
      const { status, severity } = classifyValue(value, range);
      return { parameter, status, severity, value };
    });
  }
}
