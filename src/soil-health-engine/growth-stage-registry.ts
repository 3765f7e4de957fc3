/**
 * Growth stage per field, supplied by an operator or a scheduler.
 * Stages only move forward; nothing here infers a stage from readings.
 */

import { GrowthStage } from '../types';
import { StageRegressionError } from '../shared/utils/errors';

export const STAGE_SEQUENCE: readonly GrowthStage[] = [
  GrowthStage.PRE_PLANTING,
  GrowthStage.VEGETATIVE,
  GrowthStage.FLOWERING,
  GrowthStage.MATURITY
];

export function stageIndex(stage: GrowthStage): number {
  return STAGE_SEQUENCE.indexOf(stage);
}

export function isPostPlanting(stage: GrowthStage): boolean {
  return stage !== GrowthStage.PRE_PLANTING;
}

export class GrowthStageRegistry {
  private readonly stages = new Map<string, GrowthStage>();

  getStage(fieldId: string): GrowthStage {
    return this.stages.get(fieldId) ?? GrowthStage.PRE_PLANTING;
  }

  /**
   * Move a field to the given stage; staying put is allowed, going back is not
   */
  advance(fieldId: string, stage: GrowthStage): GrowthStage {
    this.assertCanAdvance(fieldId, stage);
    this.stages.set(fieldId, stage);
    return stage;
  }

  /**
   * Check an advance without applying it
   */
  assertCanAdvance(fieldId: string, stage: GrowthStage): void {
    const current = this.getStage(fieldId);
    if (stageIndex(stage) < stageIndex(current)) {
      throw new StageRegressionError(fieldId, current, stage);
    }
  }
}
