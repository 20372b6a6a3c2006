/**
 * Content Processing System
 * Main export file for content processing
 */

export * from './text.processor';
export * from './html-cleaner';
export * from './chunker';
