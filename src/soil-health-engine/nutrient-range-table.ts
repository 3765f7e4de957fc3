/**
 * Nutrient Range Table
 * Immutable (parameter, stage) → NutrientRange lookup built from configuration
 */

import { NutrientRange, SoilParameter, GrowthStage } from '../types';
import { PARAMETER_ORDER } from '../shared/config/constants';
import { MissingRangeError, ConfigurationError } from '../shared/utils/errors';

function rangeKey(parameter: SoilParameter, stage: GrowthStage): string {
  return `${parameter}#${stage}`;
}

export class NutrientRangeTable {
  private readonly ranges: ReadonlyMap<string, Readonly<NutrientRange>>;

  constructor(rows: NutrientRange[]) {
    const ranges = new Map<string, Readonly<NutrientRange>>();
    for (const row of rows) {
      const key = rangeKey(row.parameter, row.stage);
      if (ranges.has(key)) {
        throw new ConfigurationError([`duplicate range for ${row.parameter} at stage ${row.stage}`]);
      }
      ranges.set(key, Object.freeze({ ...row }));
    }
    this.ranges = ranges;
  }

  /**
   * Resolve the range for a parameter at a stage; a gap is a configuration error
   */
  lookup(parameter: SoilParameter, stage: GrowthStage): Readonly<NutrientRange> {
    const range = this.ranges.get(rangeKey(parameter, stage));
    if (!range) {
      throw new MissingRangeError(parameter, stage);
    }
    return range;
  }

  /**
   * Fail fast unless every scored parameter resolves at every stage
   */
  assertComplete(): void {
    for (const stage of Object.values(GrowthStage)) {
      for (const parameter of PARAMETER_ORDER) {
        this.lookup(parameter, stage);
      }
    }
  }

  get size(): number {
    return this.ranges.size;
  }
}
