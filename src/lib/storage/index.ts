/**
 * Result Storage
 * Main export file for result persistence
 */

export * from './result-store';
