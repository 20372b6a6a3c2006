/**
 * Deduplication
 * Main export file for hashing and duplicate detection
 */

export * from './content-hasher';
export * from './content-deduplicator';
