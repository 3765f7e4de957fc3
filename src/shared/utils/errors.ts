/**
 * Error taxonomy for the soil health engine
 * Validation errors reject a single reading; configuration errors are fatal
 */

import { GrowthStage, SoilParameter } from '../../types';

export type ErrorCategory = 'validation' | 'configuration';

export abstract class SoilHealthError extends Error {
  abstract readonly category: ErrorCategory;
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidReadingError extends SoilHealthError {
  readonly category = 'validation';
  readonly code = 'INVALID_READING';

  constructor(public readonly parameter: string, detail: string) {
    super(`Invalid reading for ${parameter}: ${detail}`);
  }
}

export class MissingFieldError extends SoilHealthError {
  readonly category = 'validation';
  readonly code = 'MISSING_FIELD';

  constructor(public readonly parameter: string) {
    super(`Required field ${parameter} is missing`);
  }
}

export class OutOfOrderReadingError extends SoilHealthError {
  readonly category = 'validation';
  readonly code = 'OUT_OF_ORDER_READING';

  constructor(
    public readonly fieldId: string,
    public readonly timestamp: Date,
    public readonly lastTimestamp: Date
  ) {
    super(
      `Reading for field ${fieldId} at ${timestamp.toISOString()} is earlier than the last recorded reading at ${lastTimestamp.toISOString()}`
    );
  }
}

export class StageRegressionError extends SoilHealthError {
  readonly category = 'validation';
  readonly code = 'STAGE_REGRESSION';

  constructor(
    public readonly fieldId: string,
    public readonly currentStage: GrowthStage,
    public readonly requestedStage: GrowthStage
  ) {
    super(`Field ${fieldId} cannot move from ${currentStage} back to ${requestedStage}`);
  }
}

export class MissingRangeError extends SoilHealthError {
  readonly category = 'configuration';
  readonly code = 'MISSING_RANGE';

  constructor(
    public readonly parameter: SoilParameter,
    public readonly stage: GrowthStage
  ) {
    super(`No nutrient range configured for ${parameter} at stage ${stage}`);
  }
}

export class ConfigurationError extends SoilHealthError {
  readonly category = 'configuration';
  readonly code = 'INVALID_CONFIGURATION';

  constructor(public readonly problems: string[]) {
    super(`Engine configuration errors:\n${problems.join('\n')}`);
  }
}

export function isSoilHealthError(error: unknown): error is SoilHealthError {
  return error instanceof SoilHealthError;
}
