/**
 * Core enumerations for the soil health engine
 * Shared by the engine, its collaborators and the rule tables in config/
 */

export enum SoilParameter {
  NITROGEN = 'nitrogen',
  PHOSPHORUS = 'phosphorus',
  POTASSIUM = 'potassium',
  PH = 'ph',
  MOISTURE = 'moisture',
  TEMPERATURE = 'temperature'
}

export enum GrowthStage {
  PRE_PLANTING = 'pre_planting',
  VEGETATIVE = 'vegetative',
  FLOWERING = 'flowering',
  MATURITY = 'maturity'
}

export enum DeficiencyStatus {
  DEFICIENT = 'deficient',
  OPTIMAL = 'optimal',
  EXCESS = 'excess'
}

export enum RecommendationAction {
  APPLY = 'apply',
  MAINTAIN = 'maintain'
}

export type TemperatureUnit = 'C' | 'F';

// Validation result type
export interface ValidationResult {
  isValid: boolean;
  errors: string[];
  warnings: string[];
}

export interface NumericBounds {
  min: number;
  max: number;
}
