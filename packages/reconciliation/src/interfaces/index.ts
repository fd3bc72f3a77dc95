/**
 * Interface exports for the reconciliation package
 */

export type { IReconciliationEngine } from './reconciliation-engine.js';
