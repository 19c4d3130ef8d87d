/**
 * Content Processing System
 * Main export file for content processing
 */

export * from './html.processor';
export * from './text.processor';
