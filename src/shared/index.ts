/**
 * Shared utilities and configuration exports
 * Main entry point for the Lambda layer
 */

// Utilities
export * from './utils';

// Configuration
export * from './config/constants';
export * from './config/environment';
export * from './config/engine-config';

// Types (re-export for convenience)
export * from '../types';
