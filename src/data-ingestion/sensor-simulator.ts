/**
 * Sensor Simulator
 * Produces plausible black pepper soil samples for demos and load testing
 * when no probe or ThingSpeak channel is available.
 */

import { Handler } from 'aws-lambda';
import { createLambdaLogger } from '../shared/utils/logger';
import { Validator } from '../shared/utils/validation';
import { GrowthStage, NumericBounds, RawSensorSample } from '../types';
import { AssessmentSummary } from '../soil-health-engine/soil-health-service';
import { getSoilHealthService } from '../soil-health-engine';

export type RandomSource = () => number;

interface SimulatedRange extends NumericBounds {
  decimals: number;
}

export const SIMULATION_RANGES = {
  temperature: { min: 22, max: 35, decimals: 1 },
  moisture: { min: 40, max: 80, decimals: 1 },
  nitrogen: { min: 100, max: 250, decimals: 0 },
  phosphorus: { min: 10, max: 60, decimals: 0 },
  potassium: { min: 150, max: 300, decimals: 0 },
  ph: { min: 5.5, max: 7.5, decimals: 2 },
  humidity: { min: 60, max: 90, decimals: 1 }
} satisfies Record<string, SimulatedRange>;

function draw(range: SimulatedRange, random: RandomSource): number {
  const value = range.min + random() * (range.max - range.min);
  const factor = Math.pow(10, range.decimals);
  return Math.round(value * factor) / factor;
}

export class SensorSimulator {
  constructor(
    private readonly random: RandomSource = Math.random,
    private readonly clock: () => Date = () => new Date()
  ) {}

  sample(fieldId: string): RawSensorSample {
    return {
      fieldId,
      timestamp: this.clock(),
      temperature: draw(SIMULATION_RANGES.temperature, this.random),
      moisture: draw(SIMULATION_RANGES.moisture, this.random),
      nitrogen: draw(SIMULATION_RANGES.nitrogen, this.random),
      phosphorus: draw(SIMULATION_RANGES.phosphorus, this.random),
      potassium: draw(SIMULATION_RANGES.potassium, this.random),
      ph: draw(SIMULATION_RANGES.ph, this.random),
      humidity: draw(SIMULATION_RANGES.humidity, this.random)
    };
  }
}

export interface SimulationEvent {
  fieldId: string;
  stage?: GrowthStage;
}

/**
 * Lambda handler function
 */
export const handler: Handler<SimulationEvent, AssessmentSummary> = async (event, context) => {
  const logger = createLambdaLogger('sensor-simulator', context.awsRequestId);

  try {
    Validator.throwIfInvalid(Validator.validateFieldId(event.fieldId));

    const sample = new SensorSimulator().sample(event.fieldId);
    logger.info('Simulated soil sample generated', { fieldId: event.fieldId });

    return await getSoilHealthService().ingest(sample, { stage: event.stage });
  } catch (error) {
    logger.error('Sensor simulation failed', error, { fieldId: event.fieldId });
    throw error;
  }
};
