/**
 * Fertilizer Recommendation Engine
 * Maps the classifier's deficiencies, the growth stage and recent history
 * to one fertilizer type and dose, driven entirely by the fertilizer table
 */

import {
  DeficiencyResult,
  DeficiencyStatus,
  DosageSettings,
  DoseBounds,
  FertilizerEntry,
  GrowthStage,
  HealthScoreRecord,
  OverDoseClampedWarning,
  Recommendation,
  RecommendationAction,
  SoilParameter
} from '../types';
import { PARAMETER_ORDER, SOIL_CONSTANTS } from '../shared/config/constants';
import { validateFertilizerCoverage } from '../shared/config/engine-config';
import { ConfigurationError } from '../shared/utils/errors';
import { isPostPlanting } from './growth-stage-registry';

export interface RecommendationRequest {
  fieldId: string;
  timestamp: Date;
  stage: GrowthStage;
  deficiencies: readonly DeficiencyResult[];
  /** Chronological, newest last; may already include the record being scored */
  history?: readonly HealthScoreRecord[];
}

export interface FertilizerSelection {
  fertilizer: FertilizerEntry;
  covered: DeficiencyResult[];
}

const PRIORITY = new Map<SoilParameter, number>(
  PARAMETER_ORDER.map((parameter, index) => [parameter, index])
);

function priorityOf(parameter: SoilParameter): number {
  return PRIORITY.get(parameter) ?? PARAMETER_ORDER.length;
}

/**
 * Deficient parameters, most severe first; equal severities follow N > P > K > pH > moisture > temperature
 */
export function orderDeficiencies(deficiencies: readonly DeficiencyResult[]): DeficiencyResult[] {
  return deficiencies
    .filter(result => result.status === DeficiencyStatus.DEFICIENT)
    .sort((a, b) => b.severity - a.severity || priorityOf(a.parameter) - priorityOf(b.parameter));
}

/**
 * True when the last two consecutive records are both post-planting and the score fell between them
 */
export function detectDepletion(history: readonly HealthScoreRecord[] = []): boolean {
  if (history.length < 2) {
    return false;
  }

  const previous = history[history.length - 2];
  const latest = history[history.length - 1];
  return isPostPlanting(previous.stage) && isPostPlanting(latest.stage) && latest.score < previous.score;
}

// Capped and raised doses must stay on the application grid
function offStepBounds(label: string, bounds: DoseBounds, step: number): string[] {
  const onStep = (value: number) => Math.abs(value / step - Math.round(value / step)) < 1e-9;
  const errors: string[] = [];
  if (!onStep(bounds.minEffective)) errors.push(`${label}.minEffective must be a multiple of the application step ${step}`);
  if (!onStep(bounds.maxSafe)) errors.push(`${label}.maxSafe must be a multiple of the application step ${step}`);
  return errors;
}

export class RecommendationEngine {
  private readonly fertilizers: readonly FertilizerEntry[];
  private readonly dosage: Readonly<DosageSettings>;

  constructor(fertilizers: FertilizerEntry[], dosage: DosageSettings) {
    const errors = validateFertilizerCoverage(fertilizers);
    if (dosage.applicationStep <= 0) errors.push('dosage.applicationStep must be positive');
    if (dosage.maxSafe < dosage.minEffective) errors.push('dosage.maxSafe must not be below minEffective');
    if (dosage.applicationStep > 0) {
      errors.push(...offStepBounds('dosage', dosage, dosage.applicationStep));
      for (const entry of fertilizers) {
        if (entry.doseBounds) {
          errors.push(...offStepBounds(`${entry.type} doseBounds`, entry.doseBounds, dosage.applicationStep));
        }
      }
    }
    if (errors.length > 0) {
      throw new ConfigurationError(errors);
    }

    this.fertilizers = fertilizers.map(entry => Object.freeze({ ...entry }));
    this.dosage = Object.freeze({ ...dosage });
  }

  recommend(request: RecommendationRequest): Recommendation {
    const ordered = orderDeficiencies(request.deficiencies);

    if (ordered.length === 0) {
      return {
        fieldId: request.fieldId,
        timestamp: request.timestamp,
        stage: request.stage,
        action: RecommendationAction.MAINTAIN,
        fertilizerType: SOIL_CONSTANTS.MAINTAIN_REGIMEN,
        quantity: 0,
        unit: this.dosage.unit,
        rationale: [],
        warnings: []
      };
    }

    const { fertilizer, covered } = this.selectFertilizer(ordered, request.stage);
    const severity = Math.max(...covered.map(result => result.severity));
    const { quantity, warning } = this.computeDose(fertilizer, severity);

    const rationale: string[] = covered.map(result => result.parameter);
    if (detectDepletion(request.history)) {
      rationale.push(SOIL_CONSTANTS.DEPLETION_FLAG);
    }

    return {
      fieldId: request.fieldId,
      timestamp: request.timestamp,
      stage: request.stage,
      action: RecommendationAction.APPLY,
      fertilizerType: fertilizer.type,
      quantity,
      unit: this.dosage.unit,
      rationale,
      warnings: warning ? [warning] : []
    };
  }

  /**
   * Prefer a compound covering the largest top-severity prefix of the
   * deficiencies; otherwise the narrowest amendment for the worst one
   */
  selectFertilizer(ordered: readonly DeficiencyResult[], stage: GrowthStage): FertilizerSelection {
    const applicable = this.fertilizers.filter(entry => entry.stages.includes(stage));

    for (let size = ordered.length; size >= 2; size--) {
      const subset = ordered.slice(0, size).map(result => result.parameter);
      const compound = this.narrowest(
        applicable.filter(entry =>
          entry.corrects.length >= 2 && subset.every(parameter => entry.corrects.includes(parameter))
        )
      );
      if (compound) {
        return {
          fertilizer: compound,
          covered: ordered.filter(result => compound.corrects.includes(result.parameter))
        };
      }
    }

    const worst = ordered[0];
    const amendment = this.narrowest(applicable.filter(entry => entry.corrects.includes(worst.parameter)));
    if (!amendment) {
      throw new ConfigurationError([`no fertilizer corrects ${worst.parameter} at stage ${stage}`]);
    }

    return {
      fertilizer: amendment,
      covered: ordered.filter(result => amendment.corrects.includes(result.parameter))
    };
  }

  /**
   * severity × dose per unit, rounded to the application step, kept within the dose bounds
   */
  computeDose(fertilizer: FertilizerEntry, severity: number): { quantity: number; warning?: OverDoseClampedWarning } {
    const bounds: DoseBounds = fertilizer.doseBounds ?? this.dosage;
    const step = this.dosage.applicationStep;
    const rounded = Math.round((severity * fertilizer.dosePerSeverityUnit) / step) * step;

    if (rounded > bounds.maxSafe) {
      return {
        quantity: bounds.maxSafe,
        warning: {
          code: 'OverDoseClampedWarning',
          fertilizerType: fertilizer.type,
          requestedQuantity: rounded,
          appliedQuantity: bounds.maxSafe,
          unit: this.dosage.unit,
          message: `${fertilizer.type} dose of ${rounded} ${this.dosage.unit} exceeds the maximum safe dose; capped at ${bounds.maxSafe} ${this.dosage.unit}`
        }
      };
    }

    return { quantity: Math.max(bounds.minEffective, rounded) };
  }

  // Fewest corrected parameters wins; table order breaks ties
  private narrowest(candidates: readonly FertilizerEntry[]): FertilizerEntry | undefined {
    return candidates.reduce<FertilizerEntry | undefined>(
      (best, entry) => (!best || entry.corrects.length < best.corrects.length ? entry : best),
      undefined
    );
  }
}
