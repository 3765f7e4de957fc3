/**
 * Application constants and configuration
 */

import { SoilParameter, NumericBounds } from '../../types';

// Table names
export const TABLE_NAMES = {
  SOIL_HEALTH_HISTORY: 'SoilHealth-History',
  FIELD_STAGES: 'SoilHealth-FieldStages'
} as const;

// Default values
export const DEFAULT_VALUES = {
  LOG_LEVEL: 'INFO',
  AWS_REGION: 'ap-south-1',
  EVENT_BUS_NAME: 'soil-health-events',
  THINGSPEAK_API_URL: 'https://api.thingspeak.com',
  HISTORY_WINDOW: 30,
  HISTORY_RETENTION: 365,
  // Attempts at appending a reading when another function writes the same field
  WRITE_ATTEMPTS: 3
} as const;

// Event source and detail types published on EventBridge
export const EVENT_TYPES = {
  SOURCE: 'soil-health.engine',
  SOIL_HEALTH_ASSESSED: 'Soil Health Assessed'
} as const;

/**
 * Fixed processing order; also the tie-break priority for equal severities
 */
export const PARAMETER_ORDER: readonly SoilParameter[] = [
  SoilParameter.NITROGEN,
  SoilParameter.PHOSPHORUS,
  SoilParameter.POTASSIUM,
  SoilParameter.PH,
  SoilParameter.MOISTURE,
  SoilParameter.TEMPERATURE
];

/**
 * Physical plausibility of a 7-in-1 RS485 soil probe
 */
export const PHYSICAL_BOUNDS: Record<SoilParameter, NumericBounds> = {
  [SoilParameter.NITROGEN]: { min: 0, max: 2000 },
  [SoilParameter.PHOSPHORUS]: { min: 0, max: 2000 },
  [SoilParameter.POTASSIUM]: { min: 0, max: 2000 },
  [SoilParameter.PH]: { min: 0, max: 14 },
  [SoilParameter.MOISTURE]: { min: 0, max: 100 },
  [SoilParameter.TEMPERATURE]: { min: -40, max: 80 }
};

export const HUMIDITY_BOUNDS: NumericBounds = { min: 0, max: 100 };

export const SOIL_CONSTANTS = {
  MAX_SEVERITY: 1.0,
  MIN_SEVERITY: 0.0,
  MAX_SCORE: 100,
  MIN_SCORE: 0,
  WEIGHT_TOLERANCE: 1e-6,
  MAINTAIN_REGIMEN: 'Maintain current regimen',
  DEPLETION_FLAG: 'post-growth nutrient depletion'
} as const;
