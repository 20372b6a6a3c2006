/**
 * Fetching
 * Main export file for the polite HTTP fetcher
 */

export * from './fetch.types';
export * from './fetch-errors';
export * from './politeness';
export * from './fetcher';
