/**
 * Logging
 * Main export file for logging utilities
 */

export * from './logger';
export * from './app-logger';
