/**
 * Main types export file
 */

// Core types
export * from './core';

// Soil health types
export * from './soil-health';
