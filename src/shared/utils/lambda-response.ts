/**
 * Lambda response utilities for consistent API responses
 */

import { APIGatewayProxyResult } from 'aws-lambda';
import { ValidationError } from './validation';
import {
  InvalidReadingError,
  isSoilHealthError,
  MissingFieldError,
  OutOfOrderReadingError,
  SoilHealthError,
  StageRegressionError
} from './errors';
import { Logger } from './logger';

export class LambdaResponse {
  private static defaultHeaders = {
    'Content-Type': 'application/json',
    'Access-Control-Allow-Origin': '*',
    'Access-Control-Allow-Headers': 'Content-Type,X-Amz-Date,Authorization,X-Api-Key,X-Amz-Security-Token',
    'Access-Control-Allow-Methods': 'GET,POST,PUT,OPTIONS',
  };

  /**
   * Create a successful response
   */
  static success(data: unknown, statusCode: number = 200): APIGatewayProxyResult {
    return {
      statusCode,
      headers: this.defaultHeaders,
      body: JSON.stringify({
        success: true,
        data,
        timestamp: new Date().toISOString(),
      }),
    };
  }

  /**
   * Create an error response
   */
  static error(message: string, statusCode: number = 500, details?: unknown): APIGatewayProxyResult {
    return {
      statusCode,
      headers: this.defaultHeaders,
      body: JSON.stringify({
        success: false,
        error: {
          message,
          details,
        },
        timestamp: new Date().toISOString(),
      }),
    };
  }

  /**
   * Create a validation error response
   */
  static validationError(errors: string[]): APIGatewayProxyResult {
    return this.error('Validation failed', 400, { validationErrors: errors });
  }

  /**
   * Create a conflict response
   */
  static conflict(message: string, details?: unknown): APIGatewayProxyResult {
    return this.error(message, 409, details);
  }
}

export interface SoilHealthErrorDetails {
  category: SoilHealthError['category'];
  code: string;
  parameter?: string;
}

export function describeSoilHealthError(error: SoilHealthError): SoilHealthErrorDetails {
  const details: SoilHealthErrorDetails = { category: error.category, code: error.code };
  if (error instanceof InvalidReadingError || error instanceof MissingFieldError) {
    details.parameter = error.parameter;
  }
  return details;
}

/**
 * Error handler wrapper for Lambda functions
 */
export function handleLambdaError(error: unknown, logger: Logger = new Logger()): APIGatewayProxyResult {
  if (error instanceof ValidationError) {
    logger.warn('Request rejected', { errors: error.errors });
    return LambdaResponse.validationError(error.errors);
  }

  if (error instanceof SyntaxError) {
    logger.warn('Request body is not valid JSON', { reason: error.message });
    return LambdaResponse.validationError(['Request body must be valid JSON']);
  }

  if (isSoilHealthError(error)) {
    const details = describeSoilHealthError(error);
    if (error instanceof OutOfOrderReadingError || error instanceof StageRegressionError) {
      logger.warn('Request conflicts with field state', { code: error.code, reason: error.message });
      return LambdaResponse.conflict(error.message, details);
    }

    if (error.category === 'validation') {
      logger.warn('Soil reading rejected', { code: error.code, reason: error.message });
      return LambdaResponse.error(error.message, 400, details);
    }

    logger.error('Engine configuration error', error);
    return LambdaResponse.error('Engine configuration error', 500, details);
  }

  logger.error('Lambda function error', error);

  // Default to internal server error
  return LambdaResponse.error(
    'Internal server error',
    500,
    process.env.NODE_ENV === 'development' && error instanceof Error ? error.stack : undefined
  );
}
