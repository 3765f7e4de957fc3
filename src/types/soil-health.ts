/**
 * Soil health data models
 * Readings, classification results, score records and recommendations
 */

import {
  SoilParameter,
  GrowthStage,
  DeficiencyStatus,
  RecommendationAction,
  TemperatureUnit
} from './core';

/**
 * Sample as delivered by a sensor node or cloud feed, before validation.
 * Numeric values may arrive as strings (cloud feeds) and may be absent.
 */
export interface RawSensorSample {
  fieldId?: string | null;
  timestamp?: Date | string | number | null;
  nitrogen?: number | string | null;
  phosphorus?: number | string | null;
  potassium?: number | string | null;
  ph?: number | string | null;
  moisture?: number | string | null;
  temperature?: number | string | null;
  humidity?: number | string | null;
  temperatureUnit?: TemperatureUnit;
}

export interface SensorReading {
  fieldId: string;
  timestamp: Date;
  nitrogen: number; // mg/kg
  phosphorus: number; // mg/kg
  potassium: number; // mg/kg
  ph: number;
  moisture: number; // % volumetric
  temperature: number; // °C
  humidity?: number; // % relative, carried through but never scored
}

export interface NutrientRange {
  parameter: SoilParameter;
  stage: GrowthStage;
  minOptimal: number;
  maxOptimal: number;
  criticalLow: number;
  criticalHigh: number;
}

export interface DeficiencyResult {
  parameter: SoilParameter;
  status: DeficiencyStatus;
  severity: number; // 0-1 scale
  value: number;
}

export interface HealthScoreRecord {
  readonly fieldId: string;
  readonly timestamp: Date;
  readonly score: number; // 0-100 scale
  readonly contributingDeficiencies: readonly DeficiencyResult[];
  readonly stage: GrowthStage;
}

export interface OverDoseClampedWarning {
  code: 'OverDoseClampedWarning';
  fertilizerType: string;
  requestedQuantity: number;
  appliedQuantity: number;
  unit: string;
  message: string;
}

export interface Recommendation {
  fieldId: string;
  timestamp: Date;
  stage: GrowthStage;
  action: RecommendationAction;
  fertilizerType: string;
  quantity: number;
  unit: string;
  rationale: string[];
  warnings: OverDoseClampedWarning[];
}

export interface IngestResult {
  record: HealthScoreRecord;
  recommendation: Recommendation;
}

export type ParameterWeights = Record<SoilParameter, number>;

export interface DoseBounds {
  minEffective: number;
  maxSafe: number;
}

export interface FertilizerEntry {
  type: string;
  corrects: SoilParameter[];
  stages: GrowthStage[];
  dosePerSeverityUnit: number;
  doseBounds?: DoseBounds;
}

export interface DosageSettings extends DoseBounds {
  unit: string;
  applicationStep: number;
}

export interface EngineConfig {
  crop: string;
  ranges: NutrientRange[];
  weights: ParameterWeights;
  fertilizers: FertilizerEntry[];
  dosage: DosageSettings;
}
