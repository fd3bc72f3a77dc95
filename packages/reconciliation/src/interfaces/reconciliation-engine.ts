/**
 * Reconciliation Engine Interface
 */

import type {
  ReceivingSources,
  ReconciliationInput,
  ReconciliationReport,
} from '../types/index.js';

/**
 * Turns invoice images, manifest images and a catalog into the normalized
 * receiving record set.
 */
export interface IReconciliationEngine {
  /**
   * Recognize and extract both image categories, then reconcile.
   *
   * @throws ReceivingError NO_INVOICE_LINES when the invoices yield no line items
   * @throws ReceivingError RECOGNITION_FAILED when an image cannot be recognized
   */
  run(sources: ReceivingSources): Promise<ReconciliationReport>;

  /**
   * Join already-extracted records and enrich them from the catalog.
   *
   * @throws ReceivingError NO_INVOICE_LINES when `input.invoices` is empty
   */
  reconcile(input: ReconciliationInput): ReconciliationReport;
}
