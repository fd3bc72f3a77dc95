/**
 * Type exports for the reconciliation package
 */

export type {
  PricingSettings,
  ReceivingSettings,
  ReceivingSettingsInput,
  JoinedRow,
  ExtractionStats,
  ReconciliationInput,
  ReceivingSources,
  ReconciliationSummary,
  ReconciliationReport,
} from './reconciliation.js';
