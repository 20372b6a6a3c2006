/**
 * Corpus Output
 * Main export file for corpus writing and resume
 */

export * from './corpus.types';
export * from './corpus-errors';
export * from './corpus-files';
export * from './corpus-state';
export * from './corpus-writer';
