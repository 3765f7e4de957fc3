/**
 * Engine rule tables: nutrient ranges, scoring weights, fertilizer table, dose bounds
 * Parsed from JSON and validated once; any problem is fatal
 */

import blackPepperConfig from '../../../config/black-pepper.json';
import {
  EngineConfig,
  NutrientRange,
  ParameterWeights,
  FertilizerEntry,
  DosageSettings,
  DoseBounds,
  SoilParameter,
  GrowthStage
} from '../../types';
import { ConfigurationError } from '../utils/errors';
import { PARAMETER_ORDER, SOIL_CONSTANTS } from './constants';

type JsonObject = Record<string, unknown>;

function isRecord(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

export function toSoilParameter(value: unknown): SoilParameter | undefined {
  return Object.values(SoilParameter).find(parameter => parameter === value);
}

export function toGrowthStage(value: unknown): GrowthStage | undefined {
  return Object.values(GrowthStage).find(stage => stage === value);
}

/**
 * Equal weighting across the six scored parameters
 */
export function equalWeights(): ParameterWeights {
  const share = 1 / PARAMETER_ORDER.length;
  return {
    [SoilParameter.NITROGEN]: share,
    [SoilParameter.PHOSPHORUS]: share,
    [SoilParameter.POTASSIUM]: share,
    [SoilParameter.PH]: share,
    [SoilParameter.MOISTURE]: share,
    [SoilParameter.TEMPERATURE]: share
  };
}

/**
 * Check that a weight vector covers every parameter, is non-negative and sums to 1
 */
export function validateWeights(weights: Partial<Record<SoilParameter, number>>): string[] {
  const errors: string[] = [];
  let total = 0;

  for (const parameter of PARAMETER_ORDER) {
    const weight = weights[parameter];
    if (!isFiniteNumber(weight)) {
      errors.push(`weights.${parameter} must be a number`);
    } else if (weight < 0) {
      errors.push(`weights.${parameter} must not be negative`);
    } else {
      total += weight;
    }
  }

  if (errors.length === 0 && Math.abs(total - 1) > SOIL_CONSTANTS.WEIGHT_TOLERANCE) {
    errors.push(`weights must sum to 1 (got ${total})`);
  }

  return errors;
}

function parseWeights(raw: unknown, errors: string[]): ParameterWeights {
  const weights = equalWeights();
  if (!isRecord(raw)) {
    errors.push('weights must be an object');
    return weights;
  }

  const parsed: Partial<ParameterWeights> = {};
  for (const parameter of PARAMETER_ORDER) {
    const value = raw[parameter];
    if (isFiniteNumber(value)) {
      parsed[parameter] = value;
      weights[parameter] = value;
    }
  }
  for (const key of Object.keys(raw)) {
    if (!toSoilParameter(key)) {
      errors.push(`weights.${key} is not a scored parameter`);
    }
  }

  errors.push(...validateWeights(parsed));
  return weights;
}

function parseRange(raw: unknown, index: number, errors: string[]): NutrientRange | undefined {
  const label = `ranges[${index}]`;
  if (!isRecord(raw)) {
    errors.push(`${label} must be an object`);
    return undefined;
  }

  const parameter = toSoilParameter(raw.parameter);
  const stage = toGrowthStage(raw.stage);
  const { minOptimal, maxOptimal, criticalLow, criticalHigh } = raw;
  const before = errors.length;

  if (!parameter) errors.push(`${label}.parameter is unknown: ${String(raw.parameter)}`);
  if (!stage) errors.push(`${label}.stage is unknown: ${String(raw.stage)}`);
  if (!isFiniteNumber(minOptimal) || !isFiniteNumber(maxOptimal) ||
      !isFiniteNumber(criticalLow) || !isFiniteNumber(criticalHigh)) {
    errors.push(`${label} bounds must all be numbers`);
    return undefined;
  }

  if (!(criticalLow < minOptimal)) errors.push(`${label}: criticalLow must be below minOptimal`);
  if (!(minOptimal <= maxOptimal)) errors.push(`${label}: minOptimal must not exceed maxOptimal`);
  if (!(maxOptimal < criticalHigh)) errors.push(`${label}: criticalHigh must be above maxOptimal`);

  if (errors.length > before || !parameter || !stage) {
    return undefined;
  }

  return { parameter, stage, minOptimal, maxOptimal, criticalLow, criticalHigh };
}

function parseDoseBounds(raw: JsonObject, label: string, errors: string[]): DoseBounds | undefined {
  const { minEffective, maxSafe } = raw;
  if (!isFiniteNumber(minEffective) || !isFiniteNumber(maxSafe)) {
    errors.push(`${label} minEffective and maxSafe must be numbers`);
    return undefined;
  }
  if (minEffective <= 0) errors.push(`${label}.minEffective must be positive`);
  if (maxSafe < minEffective) errors.push(`${label}.maxSafe must not be below minEffective`);
  return { minEffective, maxSafe };
}

function parseFertilizer(raw: unknown, index: number, errors: string[]): FertilizerEntry | undefined {
  const label = `fertilizers[${index}]`;
  if (!isRecord(raw)) {
    errors.push(`${label} must be an object`);
    return undefined;
  }

  const before = errors.length;
  const type = raw.type;
  if (typeof type !== 'string' || type.trim().length === 0) {
    errors.push(`${label}.type must be a non-empty string`);
  }

  const corrects: SoilParameter[] = [];
  if (!Array.isArray(raw.corrects) || raw.corrects.length === 0) {
    errors.push(`${label}.corrects must be a non-empty array`);
  } else {
    for (const value of raw.corrects) {
      const parameter = toSoilParameter(value);
      if (!parameter) {
        errors.push(`${label}.corrects contains unknown parameter ${String(value)}`);
      } else if (!corrects.includes(parameter)) {
        corrects.push(parameter);
      }
    }
  }

  const stages: GrowthStage[] = [];
  if (!Array.isArray(raw.stages) || raw.stages.length === 0) {
    errors.push(`${label}.stages must be a non-empty array`);
  } else {
    for (const value of raw.stages) {
      const stage = toGrowthStage(value);
      if (!stage) {
        errors.push(`${label}.stages contains unknown stage ${String(value)}`);
      } else if (!stages.includes(stage)) {
        stages.push(stage);
      }
    }
  }

  const dosePerSeverityUnit = raw.dosePerSeverityUnit;
  if (!isFiniteNumber(dosePerSeverityUnit) || dosePerSeverityUnit <= 0) {
    errors.push(`${label}.dosePerSeverityUnit must be a positive number`);
  }

  let doseBounds: DoseBounds | undefined;
  if (isRecord(raw.doseBounds)) {
    doseBounds = parseDoseBounds(raw.doseBounds, `${label}.doseBounds`, errors);
  } else if (raw.doseBounds !== undefined) {
    errors.push(`${label}.doseBounds must be an object`);
  }

  if (errors.length > before || typeof type !== 'string' || !isFiniteNumber(dosePerSeverityUnit)) {
    return undefined;
  }

  return doseBounds
    ? { type, corrects, stages, dosePerSeverityUnit, doseBounds }
    : { type, corrects, stages, dosePerSeverityUnit };
}

function parseDosage(raw: unknown, errors: string[]): DosageSettings {
  const fallback: DosageSettings = { unit: 'kg/ha', applicationStep: 1, minEffective: 1, maxSafe: 1 };
  if (!isRecord(raw)) {
    errors.push('dosage must be an object');
    return fallback;
  }

  const bounds = parseDoseBounds(raw, 'dosage', errors);
  const { unit, applicationStep } = raw;
  if (typeof unit !== 'string' || unit.trim().length === 0) {
    errors.push('dosage.unit must be a non-empty string');
  }
  if (!isFiniteNumber(applicationStep) || applicationStep <= 0) {
    errors.push('dosage.applicationStep must be a positive number');
  }

  if (!bounds || typeof unit !== 'string' || !isFiniteNumber(applicationStep)) {
    return fallback;
  }
  return { unit, applicationStep, ...bounds };
}

/**
 * Every (parameter, stage) must be correctable by at least one applicable fertilizer
 */
export function validateFertilizerCoverage(fertilizers: FertilizerEntry[]): string[] {
  const errors: string[] = [];
  for (const stage of Object.values(GrowthStage)) {
    for (const parameter of PARAMETER_ORDER) {
      const covered = fertilizers.some(f => f.stages.includes(stage) && f.corrects.includes(parameter));
      if (!covered) {
        errors.push(`no fertilizer corrects ${parameter} at stage ${stage}`);
      }
    }
  }
  return errors;
}

function checkDuplicateRanges(ranges: NutrientRange[], errors: string[]): void {
  const seen = new Set<string>();
  for (const range of ranges) {
    const key = `${range.parameter}#${range.stage}`;
    if (seen.has(key)) {
      errors.push(`duplicate range for ${range.parameter} at stage ${range.stage}`);
    }
    seen.add(key);
  }
}

/**
 * Parse and validate an engine configuration document.
 * Throws ConfigurationError listing every problem found.
 */
export function parseEngineConfig(raw: unknown): EngineConfig {
  const errors: string[] = [];

  if (!isRecord(raw)) {
    throw new ConfigurationError(['engine configuration must be an object']);
  }

  const crop = typeof raw.crop === 'string' && raw.crop.length > 0 ? raw.crop : 'unspecified';
  const weights = parseWeights(raw.weights ?? equalWeights(), errors);
  const dosage = parseDosage(raw.dosage, errors);

  const ranges: NutrientRange[] = [];
  if (!Array.isArray(raw.ranges)) {
    errors.push('ranges must be an array');
  } else {
    raw.ranges.forEach((entry, index) => {
      const range = parseRange(entry, index, errors);
      if (range) ranges.push(range);
    });
    checkDuplicateRanges(ranges, errors);
  }

  const fertilizers: FertilizerEntry[] = [];
  if (!Array.isArray(raw.fertilizers)) {
    errors.push('fertilizers must be an array');
  } else {
    raw.fertilizers.forEach((entry, index) => {
      const fertilizer = parseFertilizer(entry, index, errors);
      if (fertilizer) fertilizers.push(fertilizer);
    });
    errors.push(...validateFertilizerCoverage(fertilizers));
  }

  if (errors.length > 0) {
    throw new ConfigurationError(errors);
  }

  return { crop, ranges, weights, fertilizers, dosage };
}

export interface EngineConfigOverrides {
  weights?: ParameterWeights;
  dosage?: Partial<DosageSettings>;
}

/**
 * Load the bundled black pepper rule tables, optionally overriding
 * the scoring weights or dose bounds for a deployment
 */
export function loadEngineConfig(overrides: EngineConfigOverrides = {}): EngineConfig {
  const base = parseEngineConfig(blackPepperConfig);
  return parseEngineConfig({
    ...base,
    weights: overrides.weights ?? base.weights,
    dosage: { ...base.dosage, ...overrides.dosage }
  });
}
