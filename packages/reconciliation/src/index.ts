/**
 * @intake/reconciliation
 *
 * Receiving reconciliation pipeline: line parsing, record extraction,
 * catalog matching and the invoice/manifest join.
 */

// Types
export * from './types/index.js';

// Interfaces
export * from './interfaces/index.js';

// Parsing
export * from './parsing/index.js';

// Extraction
export * from './extraction/index.js';

// Catalog
export * from './catalog/index.js';

// Engine
export * from './engine/index.js';

// Formatters
export * from './formatters/index.js';
