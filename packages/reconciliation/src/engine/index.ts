/**
 * Engine Module Exports
 */

export {
  ReconciliationEngine,
  createReconciliationEngine,
  resolveSettings,
  DEFAULT_ROOM,
  DEFAULT_SETTINGS,
} from './reconciliation-engine.js';
export type { ReconciliationEngineOptions } from './reconciliation-engine.js';
export { joinManifests } from './join.js';
export { computePricing, DEFAULT_PRICING } from './pricing.js';
