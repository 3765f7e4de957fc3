/**
 * Soil Health API Lambda Functions
 * API Gateway handlers for ingesting readings and querying field history
 */

import { APIGatewayProxyEvent, APIGatewayProxyResult, Context } from 'aws-lambda';
import {
  GrowthStage,
  RawSensorSample,
  TemperatureUnit,
  ValidationResult
} from '../types';
import { toGrowthStage } from '../shared/config/engine-config';
import { getEnvironmentValue } from '../shared/config/environment';
import { createLambdaLogger } from '../shared/utils/logger';
import { Validator, ValidationError } from '../shared/utils/validation';
import { LambdaResponse, handleLambdaError } from '../shared/utils/lambda-response';
import { getSoilHealthService } from '../soil-health-engine';

const SAMPLE_VALUE_KEYS = ['nitrogen', 'phosphorus', 'potassium', 'ph', 'moisture', 'temperature', 'humidity'] as const;

type SampleValueKey = typeof SAMPLE_VALUE_KEYS[number];

/** The parts of the API Gateway event and context these handlers read */
export type SoilHealthApiEvent = Pick<APIGatewayProxyEvent, 'body' | 'pathParameters' | 'queryStringParameters'>;
export type SoilHealthApiContext = Pick<Context, 'awsRequestId'>;

export interface IngestReadingRequest extends Omit<RawSensorSample, 'fieldId'> {
  stage?: GrowthStage;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseBody(event: SoilHealthApiEvent): Record<string, unknown> {
  const body: unknown = JSON.parse(event.body || '{}');
  if (!isRecord(body)) {
    throw new ValidationError('Request body must be a JSON object');
  }
  return body;
}

function requireFieldId(event: SoilHealthApiEvent): string {
  const fieldId = event.pathParameters?.fieldId;
  Validator.throwIfInvalid(Validator.validateFieldId(fieldId));
  return fieldId ?? '';
}

function toSampleValue(value: unknown): number | string | null | undefined {
  if (value === undefined || value === null || typeof value === 'number' || typeof value === 'string') {
    return value;
  }
  return undefined;
}

function toTemperatureUnit(value: unknown): TemperatureUnit | undefined {
  return value === 'C' || value === 'F' ? value : undefined;
}

/**
 * Shape checks only; ranges and presence are enforced by the engine
 */
export function validateIngestReadingRequest(body: Record<string, unknown>): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  for (const key of SAMPLE_VALUE_KEYS) {
    const value = body[key];
    if (value !== undefined && value !== null && typeof value !== 'number' && typeof value !== 'string') {
      errors.push(`${key} must be a number or numeric string`);
    }
  }

  const { timestamp, temperatureUnit, stage } = body;
  if (timestamp !== undefined && typeof timestamp !== 'string' && typeof timestamp !== 'number') {
    errors.push('timestamp must be an ISO string or epoch milliseconds');
  }
  if (temperatureUnit !== undefined && !toTemperatureUnit(temperatureUnit)) {
    errors.push('temperatureUnit must be C or F');
  }
  if (stage !== undefined) {
    errors.push(...Validator.validateGrowthStage(stage).errors);
  }
  if (body.fieldId !== undefined) {
    warnings.push('fieldId in the body is ignored; the path parameter is used');
  }

  return {
    isValid: errors.length === 0,
    errors,
    warnings
  };
}

function toIngestReadingRequest(body: Record<string, unknown>): IngestReadingRequest {
  const values: Partial<Record<SampleValueKey, number | string | null>> = {};
  for (const key of SAMPLE_VALUE_KEYS) {
    const value = toSampleValue(body[key]);
    if (value !== undefined) {
      values[key] = value;
    }
  }

  const { timestamp } = body;
  return {
    ...values,
    timestamp: typeof timestamp === 'string' || typeof timestamp === 'number' ? timestamp : undefined,
    temperatureUnit: toTemperatureUnit(body.temperatureUnit),
    stage: toGrowthStage(body.stage)
  };
}

/**
 * POST /fields/{fieldId}/readings
 */
export const ingestReading = async (
  event: SoilHealthApiEvent,
  context: SoilHealthApiContext
): Promise<APIGatewayProxyResult> => {
  const logger = createLambdaLogger('ingest-reading', context.awsRequestId);

  try {
    const fieldId = requireFieldId(event);
    logger.addContext({ fieldId });

    const body = parseBody(event);
    const validationResult = validateIngestReadingRequest(body);
    if (!validationResult.isValid) {
      return LambdaResponse.validationError(validationResult.errors);
    }
    for (const warning of validationResult.warnings) {
      logger.warn(warning);
    }

    const { stage, ...sample } = toIngestReadingRequest(body);
    const summary = await getSoilHealthService().ingest({ ...sample, fieldId }, { stage });

    return LambdaResponse.success(summary, 201);
  } catch (error) {
    return handleLambdaError(error, logger);
  }
};

/**
 * GET /fields/{fieldId}/history?limit=n
 */
export const getFieldHistory = async (
  event: SoilHealthApiEvent,
  context: SoilHealthApiContext
): Promise<APIGatewayProxyResult> => {
  const logger = createLambdaLogger('get-field-history', context.awsRequestId);

  try {
    const fieldId = requireFieldId(event);
    const maxLimit = getEnvironmentValue('historyWindow');
    const rawLimit = event.queryStringParameters?.limit;

    const validationResult = Validator.validateHistoryLimit(rawLimit, maxLimit);
    if (!validationResult.isValid) {
      return LambdaResponse.validationError(validationResult.errors);
    }

    const limit = rawLimit === undefined ? maxLimit : Math.min(Number(rawLimit), maxLimit);
    const history = await getSoilHealthService().getHistory(fieldId, limit);
    logger.debug('Field history retrieved', { fieldId, count: history.length });

    return LambdaResponse.success({ fieldId, history, warnings: validationResult.warnings });
  } catch (error) {
    return handleLambdaError(error, logger);
  }
};

/**
 * GET /fields/{fieldId}/trend
 */
export const getFieldTrend = async (
  event: SoilHealthApiEvent,
  context: SoilHealthApiContext
): Promise<APIGatewayProxyResult> => {
  const logger = createLambdaLogger('get-field-trend', context.awsRequestId);

  try {
    const fieldId = requireFieldId(event);
    const trend = await getSoilHealthService().getTrend(fieldId);

    return LambdaResponse.success({ fieldId, trend: trend ?? null });
  } catch (error) {
    return handleLambdaError(error, logger);
  }
};

/**
 * PUT /fields/{fieldId}/stage
 */
export const setFieldStage = async (
  event: SoilHealthApiEvent,
  context: SoilHealthApiContext
): Promise<APIGatewayProxyResult> => {
  const logger = createLambdaLogger('set-field-stage', context.awsRequestId);

  try {
    const fieldId = requireFieldId(event);
    const body = parseBody(event);

    const validationResult = Validator.validateGrowthStage(body.stage);
    const stage = toGrowthStage(body.stage);
    if (!validationResult.isValid || !stage) {
      return LambdaResponse.validationError(validationResult.errors);
    }

    const current = await getSoilHealthService().setStage(fieldId, stage);
    return LambdaResponse.success({ fieldId, stage: current });
  } catch (error) {
    return handleLambdaError(error, logger);
  }
};
