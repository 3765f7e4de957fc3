/**
 * Validation utilities for API requests
 * Sensor values themselves are checked by the reading normalizer
 */

import { ValidationResult, GrowthStage } from '../../types';

/**
 * Custom validation error class
 */
export class ValidationError extends Error {
  constructor(message: string, public readonly errors: string[] = [message]) {
    super(message);
    this.name = 'ValidationError';
  }
}

const FIELD_ID_PATTERN = /^[A-Za-z0-9_.:-]+$/;

/**
 * Validator class that provides static validation methods
 */
export class Validator {
  /**
   * Validate field ID
   */
  static validateFieldId(fieldId: unknown): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (!fieldId || typeof fieldId !== 'string') {
      errors.push('Field ID is required and must be a string');
    } else if (fieldId.length > 64) {
      errors.push('Field ID must be at most 64 characters');
    } else if (!FIELD_ID_PATTERN.test(fieldId)) {
      errors.push('Field ID may only contain letters, digits and _ . : -');
    }

    return {
      isValid: errors.length === 0,
      errors,
      warnings
    };
  }

  /**
   * Validate growth stage
   */
  static validateGrowthStage(stage: unknown): ValidationResult {
    const errors: string[] = [];

    if (!stage) {
      errors.push('Growth stage is required');
    } else if (!Object.values(GrowthStage).some(candidate => candidate === stage)) {
      errors.push(`Invalid growth stage: ${String(stage)}`);
    }

    return {
      isValid: errors.length === 0,
      errors,
      warnings: []
    };
  }

  /**
   * Validate a history page size given as a query string value
   */
  static validateHistoryLimit(limit: string | undefined, max: number): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (limit !== undefined) {
      const value = Number(limit);
      if (!Number.isInteger(value) || value < 1) {
        errors.push('limit must be a positive integer');
      } else if (value > max) {
        warnings.push(`limit capped at ${max}`);
      }
    }

    return {
      isValid: errors.length === 0,
      errors,
      warnings
    };
  }

  /**
   * Throw error if validation fails
   */
  static throwIfInvalid(result: ValidationResult): void {
    if (!result.isValid) {
      throw new ValidationError(result.errors.join('; '), result.errors);
    }
  }
}
