/**
 * HTTP Transport
 * Main export file for page fetching
 */

export * from './http.types';
export * from './page-fetcher';
