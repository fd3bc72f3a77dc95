/**
 * @intake/core
 *
 * Shared record types, errors, logging and collaborator interfaces
 * for the receiving intake pipeline
 */

// Types
export * from './types/index.js';

// Interfaces
export * from './interfaces/index.js';

// Errors
export * from './errors/index.js';

// Logging
export * from './logging/index.js';

// Utilities
export * from './utils/index.js';
