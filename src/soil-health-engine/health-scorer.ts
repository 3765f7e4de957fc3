/**
 * Health Scorer
 * Aggregates per-parameter severities into a 0-100 composite score
 */

import { DeficiencyResult, ParameterWeights, SoilParameter } from '../types';
import { SOIL_CONSTANTS } from '../shared/config/constants';
import { validateWeights, equalWeights } from '../shared/config/engine-config';
import { ConfigurationError } from '../shared/utils/errors';

export interface ScoreContribution {
  parameter: SoilParameter;
  weight: number;
  severity: number;
  pointsLost: number;
}

function roundScore(value: number): number {
  return Math.round(value * 100) / 100;
}

export class HealthScorer {
  private readonly weights: Readonly<ParameterWeights>;

  /**
   * Weights are checked once here; a bad vector stops the engine from starting
   */
  constructor(weights: ParameterWeights = equalWeights()) {
    const errors = validateWeights(weights);
    if (errors.length > 0) {
      throw new ConfigurationError(errors);
    }
    this.weights = Object.freeze({ ...weights });
  }

  /**
   * score = 100 × (1 − Σ weight × severity), clamped to [0, 100]
   */
  score(results: readonly DeficiencyResult[]): number {
    const weightedSeverity = results.reduce(
      (sum, result) => sum + this.weights[result.parameter] * result.severity,
      0
    );
    const raw = SOIL_CONSTANTS.MAX_SCORE * (1 - weightedSeverity);
    return roundScore(Math.min(SOIL_CONSTANTS.MAX_SCORE, Math.max(SOIL_CONSTANTS.MIN_SCORE, raw)));
  }

  /**
   * Points each parameter takes off a perfect score, largest first
   */
  contributions(results: readonly DeficiencyResult[]): ScoreContribution[] {
    return results
      .map(result => ({
        parameter: result.parameter,
        weight: this.weights[result.parameter],
        severity: result.severity,
        pointsLost: roundScore(SOIL_CONSTANTS.MAX_SCORE * this.weights[result.parameter] * result.severity)
      }))
      .filter(contribution => contribution.pointsLost > 0)
      .sort((a, b) => b.pointsLost - a.pointsLost);
  }
}
