/**
 * Environment configuration for the soil health Lambda functions
 * Centralizes environment variable management and validation
 */

import { TABLE_NAMES, DEFAULT_VALUES } from './constants';

export interface EnvironmentConfig {
  // AWS Configuration
  region: string;
  stage: string;

  // DynamoDB Tables
  historyTableName: string;
  fieldStagesTableName: string;

  // EventBridge
  eventBusName: string;

  // ThingSpeak feed
  thingSpeakApiUrl: string;
  thingSpeakChannelId?: string;
  thingSpeakReadApiKey?: string;
  thingSpeakFieldId?: string;

  // Application Settings
  logLevel: string;

  // Performance
  defaultTimeout: number;
  maxRetries: number;

  // History
  historyWindow: number;
  historyRetention: number;
}

class EnvironmentManager {
  private config: EnvironmentConfig;

  constructor() {
    this.config = this.loadConfiguration();
    this.validateConfiguration();
  }

  private loadConfiguration(): EnvironmentConfig {
    return {
      // AWS Configuration
      region: process.env.AWS_REGION || DEFAULT_VALUES.AWS_REGION,
      stage: process.env.STAGE || 'development',

      // DynamoDB Tables
      historyTableName: process.env.HISTORY_TABLE_NAME || TABLE_NAMES.SOIL_HEALTH_HISTORY,
      fieldStagesTableName: process.env.FIELD_STAGES_TABLE_NAME || TABLE_NAMES.FIELD_STAGES,

      // EventBridge
      eventBusName: process.env.EVENT_BUS_NAME || DEFAULT_VALUES.EVENT_BUS_NAME,

      // ThingSpeak feed
      thingSpeakApiUrl: process.env.THINGSPEAK_API_URL || DEFAULT_VALUES.THINGSPEAK_API_URL,
      thingSpeakChannelId: process.env.THINGSPEAK_CHANNEL_ID,
      thingSpeakReadApiKey: process.env.THINGSPEAK_READ_API_KEY,
      thingSpeakFieldId: process.env.THINGSPEAK_FIELD_ID,

      // Application Settings
      logLevel: process.env.LOG_LEVEL || DEFAULT_VALUES.LOG_LEVEL,

      // Performance
      defaultTimeout: parseInt(process.env.DEFAULT_TIMEOUT || '5000', 10),
      maxRetries: parseInt(process.env.MAX_RETRIES || '3', 10),

      // History
      historyWindow: parseInt(process.env.HISTORY_WINDOW || String(DEFAULT_VALUES.HISTORY_WINDOW), 10),
      historyRetention: parseInt(process.env.HISTORY_RETENTION || String(DEFAULT_VALUES.HISTORY_RETENTION), 10),
    };
  }

  private validateConfiguration(): void {
    const errors: string[] = [];

    // Validate numeric values
    if (isNaN(this.config.defaultTimeout) || this.config.defaultTimeout < 1000 || this.config.defaultTimeout > 900000) {
      errors.push('DEFAULT_TIMEOUT must be between 1000 and 900000 milliseconds');
    }

    if (isNaN(this.config.maxRetries) || this.config.maxRetries < 1 || this.config.maxRetries > 10) {
      errors.push('MAX_RETRIES must be between 1 and 10');
    }

    if (isNaN(this.config.historyWindow) || this.config.historyWindow < 2 || this.config.historyWindow > 1000) {
      errors.push('HISTORY_WINDOW must be between 2 and 1000 records');
    }

    if (isNaN(this.config.historyRetention) || this.config.historyRetention < this.config.historyWindow) {
      errors.push('HISTORY_RETENTION must be a number no smaller than HISTORY_WINDOW');
    }

    // Validate log level
    const validLogLevels = ['DEBUG', 'INFO', 'WARN', 'ERROR'];
    if (!validLogLevels.includes(this.config.logLevel.toUpperCase())) {
      errors.push(`LOG_LEVEL must be one of: ${validLogLevels.join(', ')}`);
    }

    // Validate stage
    const validStages = ['development', 'staging', 'production'];
    if (!validStages.includes(this.config.stage)) {
      errors.push(`STAGE must be one of: ${validStages.join(', ')}`);
    }

    if (errors.length > 0) {
      throw new Error(`Environment configuration errors:\n${errors.join('\n')}`);
    }
  }

  getConfig(): EnvironmentConfig {
    return { ...this.config };
  }

  get<K extends keyof EnvironmentConfig>(key: K): EnvironmentConfig[K] {
    return this.config[key];
  }
}

// Singleton instance
let environmentManager: EnvironmentManager | undefined;

function getManager(): EnvironmentManager {
  if (!environmentManager) {
    environmentManager = new EnvironmentManager();
  }
  return environmentManager;
}

export function getEnvironment(): EnvironmentConfig {
  return getManager().getConfig();
}

export function getEnvironmentValue<K extends keyof EnvironmentConfig>(key: K): EnvironmentConfig[K] {
  return getManager().get(key);
}

/**
 * Drop the cached configuration so the next read re-parses process.env
 */
export function resetEnvironment(): void {
  environmentManager = undefined;
}
