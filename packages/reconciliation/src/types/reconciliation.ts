/**
 * Reconciliation Types
 *
 * Settings, inputs and reports of a receiving reconciliation run.
 */

import type {
  CatalogEntry,
  ImageSource,
  InvoiceLineRecord,
  ManifestLineRecord,
  NormalizedReceivingRecord,
} from '@intake/core';
import type { CatalogMatcherOptions } from '../catalog/index.js';

/**
 * Pricing constants: pricePerUnit = (unitPrice / markupDivisor) * priceMultiplier
 */
export interface PricingSettings {
  markupDivisor: number;
  priceMultiplier: number;
}

export interface ReceivingSettings {
  /** Room every received package is booked into */
  room: string;
  pricing: PricingSettings;
  catalog: CatalogMatcherOptions;
}

/** Settings as accepted by the engine; omitted fields take defaults */
export interface ReceivingSettingsInput {
  room?: string;
  pricing?: Partial<PricingSettings>;
  catalog?: CatalogMatcherOptions;
}

/** An invoice line paired with at most one manifest line */
export interface JoinedRow {
  invoice: InvoiceLineRecord;
  /** Null when no manifest line has the same normalized name */
  manifest: ManifestLineRecord | null;
}

/** Counters gathered while extracting records from images */
export interface ExtractionStats {
  invoiceImages: number;
  manifestImages: number;
  rejectedLines: number;
}

export interface ReconciliationInput {
  invoices: readonly InvoiceLineRecord[];
  manifests: readonly ManifestLineRecord[];
  catalog: readonly CatalogEntry[];
  extraction?: ExtractionStats;
}

export interface ReceivingSources {
  invoiceImages: readonly ImageSource[];
  manifestImages: readonly ImageSource[];
  catalog: readonly CatalogEntry[];
}

/**
 * Summary statistics for a run
 */
export interface ReconciliationSummary extends ExtractionStats {
  /** Invoice line records extracted */
  invoiceLines: number;
  /** Manifest line records extracted */
  manifestLines: number;
  /** Rows in the output record set */
  outputRows: number;
  /** Output rows carrying a package id */
  manifestMatchedRows: number;
  /** Output rows without a manifest line */
  rowsWithoutManifest: number;
  /** Output rows with a catalog product */
  catalogMatchedRows: number;
  /** Output rows without a catalog product */
  rowsWithoutCatalogMatch: number;
}

/**
 * Complete reconciliation report
 */
export interface ReconciliationReport {
  /** Unique report ID */
  id: string;
  /** Report generation timestamp */
  timestamp: Date;
  /** Final record set, in join order */
  records: NormalizedReceivingRecord[];
  summary: ReconciliationSummary;
  /** Distinct invoice product names no manifest line matched */
  productsWithoutManifest: string[];
  /** Distinct invoice product names no catalog entry matched */
  productsWithoutCatalogMatch: string[];
  /** Processing time in milliseconds */
  processingTimeMs: number;
}
