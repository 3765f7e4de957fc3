/**
 * Soil health engine exports and the wiring used by the Lambda functions
 */

import { DynamoDB, EventBridge } from 'aws-sdk';
import { getEnvironment } from '../shared/config/environment';
import { loadEngineConfig } from '../shared/config/engine-config';
import { DynamoDBHelper } from '../shared/utils/dynamodb-helper';
import { Logger } from '../shared/utils/logger';
import { SoilHealthEngine } from './soil-health-engine';
import { HistoryRepository } from './history-repository';
import { SoilHealthService } from './soil-health-service';

export * from '../shared';
export * from './reading-normalizer';
export * from './nutrient-range-table';
export * from './deficiency-classifier';
export * from './health-scorer';
export * from './recommendation-engine';
export * from './history-tracker';
export * from './growth-stage-registry';
export * from './soil-health-engine';
export * from './history-repository';
export * from './soil-health-service';

/**
 * Build a service against the tables and event bus named in the environment
 */
export function createSoilHealthService(logger: Logger): SoilHealthService {
  const config = getEnvironment();

  const engine = new SoilHealthEngine(loadEngineConfig(), {
    logger: logger.child({ component: 'SoilHealthEngine' }),
    historyWindow: config.historyWindow,
    historyRetention: config.historyRetention
  });

  const docClient = new DynamoDB.DocumentClient({ region: config.region });
  const repository = new HistoryRepository(
    new DynamoDBHelper(docClient),
    { historyTableName: config.historyTableName, fieldStagesTableName: config.fieldStagesTableName },
    logger.child({ component: 'HistoryRepository' })
  );

  return new SoilHealthService(
    engine,
    repository,
    new EventBridge({ region: config.region }),
    { eventBusName: config.eventBusName, historyWindow: config.historyWindow },
    logger
  );
}

// Reused across warm invocations so field history stays in memory
let sharedService: SoilHealthService | undefined;

export function getSoilHealthService(): SoilHealthService {
  if (!sharedService) {
    sharedService = createSoilHealthService(new Logger({ component: 'SoilHealthService' }));
  }
  return sharedService;
}

/**
 * Replace the shared service; pass undefined to rebuild from the environment on next use
 */
export function setSoilHealthService(service: SoilHealthService | undefined): void {
  sharedService = service;
}
