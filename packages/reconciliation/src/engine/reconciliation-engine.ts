/**
 * Reconciliation Engine
 *
 * Extracts invoice and manifest records from recognized text, joins them on
 * normalized name and enriches every joined row from the vendor catalog.
 */

import { randomUUID } from 'node:crypto';
import type {
  InvoiceLineRecord,
  Logger,
  ManifestLineRecord,
  NormalizedReceivingRecord,
  TextRecognizer,
} from '@intake/core';
import { ReceivingError, silentLogger } from '@intake/core';
import type { IReconciliationEngine } from '../interfaces/index.js';
import type {
  ExtractionStats,
  JoinedRow,
  ReceivingSettings,
  ReceivingSettingsInput,
  ReceivingSources,
  ReconciliationInput,
  ReconciliationReport,
  ReconciliationSummary,
} from '../types/index.js';
import { CatalogMatcher, NO_CATALOG_MATCH } from '../catalog/index.js';
import {
  createInvoiceLoader,
  createManifestLoader,
  DEFAULT_RECOGNITION_CONCURRENCY,
  Semaphore,
} from '../extraction/index.js';
import { joinManifests } from './join.js';
import { computePricing, DEFAULT_PRICING } from './pricing.js';

export const DEFAULT_ROOM = 'Receiving Room';

export const DEFAULT_SETTINGS: ReceivingSettings = {
  room: DEFAULT_ROOM,
  pricing: DEFAULT_PRICING,
  catalog: {},
};

export interface ReconciliationEngineOptions {
  /** Required by run(); reconcile() works on records that are already extracted */
  recognizer?: TextRecognizer;
  settings?: ReceivingSettingsInput;
  /** Maximum recognition calls in flight per category */
  concurrency?: number;
  logger?: Logger;
}

/**
 * Merge user settings over the defaults
 */
export function resolveSettings(input: ReceivingSettingsInput = {}): ReceivingSettings {
  return {
    room: input.room ?? DEFAULT_SETTINGS.room,
    pricing: {
      markupDivisor: input.pricing?.markupDivisor ?? DEFAULT_PRICING.markupDivisor,
      priceMultiplier: input.pricing?.priceMultiplier ?? DEFAULT_PRICING.priceMultiplier,
    },
    catalog: {
      prefixLength: input.catalog?.prefixLength,
      tieBreak: input.catalog?.tieBreak,
    },
  };
}

export class ReconciliationEngine implements IReconciliationEngine {
  readonly settings: ReceivingSettings;
  private readonly recognizer?: TextRecognizer;
  private readonly concurrency?: number;
  private readonly logger: Logger;

  constructor(options: ReconciliationEngineOptions = {}) {
    this.settings = resolveSettings(options.settings);
    this.validateSettings(this.settings);
    this.recognizer = options.recognizer;
    this.concurrency = options.concurrency;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Extraction stage followed by join and enrichment.
   */
  async run(sources: ReceivingSources): Promise<ReconciliationReport> {
    const startTime = Date.now();
    const recognizer = this.recognizer;
    if (!recognizer) {
      throw new ReceivingError({
        code: 'INVALID_CONFIG',
        stage: 'config',
        message: 'A text recognizer is required to run the extraction stage',
        suggestion: 'Pass a TextRecognizer in the engine options.',
      });
    }

    this.logger.info('Extracting records', {
      invoiceImages: sources.invoiceImages.length,
      manifestImages: sources.manifestImages.length,
      recognizer: recognizer.name,
    });

    // Both categories draw from one slot pool and stop together on failure.
    const loaderOptions = {
      recognizer,
      semaphore: new Semaphore(this.concurrency ?? DEFAULT_RECOGNITION_CONCURRENCY),
      abortController: new AbortController(),
      logger: this.logger,
    };
    const [invoices, manifests] = await Promise.all([
      createInvoiceLoader(loaderOptions).load(sources.invoiceImages),
      createManifestLoader(loaderOptions).load(sources.manifestImages),
    ]);

    const report = this.reconcile({
      invoices: invoices.records,
      manifests: manifests.records,
      catalog: sources.catalog,
      extraction: {
        invoiceImages: invoices.images,
        manifestImages: manifests.images,
        rejectedLines: invoices.rejectedLines + manifests.rejectedLines,
      },
    });

    return { ...report, processingTimeMs: Date.now() - startTime };
  }

  /**
   * Join and enrichment stages over extracted records.
   */
  reconcile(input: ReconciliationInput): ReconciliationReport {
    const startTime = Date.now();

    if (input.invoices.length === 0) {
      throw new ReceivingError({
        code: 'NO_INVOICE_LINES',
        stage: 'extraction',
        message: 'No invoice line items extracted',
        suggestion:
          'Check that invoice images exist and that their recognized text has the "<name>  <qty> <price> <total>" column layout.',
        context: { invoiceImages: input.extraction?.invoiceImages ?? 0 },
      });
    }

    if (input.manifests.length === 0) {
      this.logger.warn('No manifest records; package ids and expiration dates will be empty');
    }

    const matcher = new CatalogMatcher(input.catalog, this.settings.catalog);
    const rows = joinManifests(input.invoices, input.manifests);
    const records = this.assemble(rows, matcher);

    const productsWithoutManifest = distinct(
      rows.filter((r) => r.manifest === null).map((r) => r.invoice.productName)
    );
    const productsWithoutCatalogMatch = distinct(
      rows
        .filter((_, i) => records[i]?.catalogProduct === NO_CATALOG_MATCH)
        .map((r) => r.invoice.productName)
    );

    for (const product of productsWithoutCatalogMatch) {
      this.logger.debug('No catalog match', { product });
    }

    const summary = this.summarize(input, records);
    this.logger.info('Reconciled receiving records', { ...summary });

    return {
      id: randomUUID(),
      timestamp: new Date(),
      records,
      summary,
      productsWithoutManifest,
      productsWithoutCatalogMatch,
      processingTimeMs: Date.now() - startTime,
    };
  }

  /**
   * Build one output record per joined row, in row order.
   */
  private assemble(rows: JoinedRow[], matcher: CatalogMatcher): NormalizedReceivingRecord[] {
    const matches = new Map<string, string>();
    const catalogProductFor = (invoice: InvoiceLineRecord): string => {
      let product = matches.get(invoice.productName);
      if (product === undefined) {
        product = matcher.match(invoice.productName);
        matches.set(invoice.productName, product);
      }
      return product;
    };

    return rows.map(({ invoice, manifest }) =>
      this.toNormalizedRecord(invoice, manifest, catalogProductFor(invoice))
    );
  }

  private toNormalizedRecord(
    invoice: InvoiceLineRecord,
    manifest: ManifestLineRecord | null,
    catalogProduct: string
  ): NormalizedReceivingRecord {
    const { pricePerUnit, costPerUnit } = computePricing(invoice.unitPrice, this.settings.pricing);
    return {
      packageId: manifest?.packageId ?? '',
      catalogProduct,
      room: this.settings.room,
      pricePerUnit,
      costPerUnit,
      quantity: Math.trunc(invoice.quantity),
      expirationDate: manifest?.expirationDate ?? '',
    };
  }

  private summarize(
    input: ReconciliationInput,
    records: NormalizedReceivingRecord[]
  ): ReconciliationSummary {
    const extraction: ExtractionStats = input.extraction ?? {
      invoiceImages: 0,
      manifestImages: 0,
      rejectedLines: 0,
    };
    const manifestMatchedRows = records.filter((r) => r.packageId !== '').length;
    const catalogMatchedRows = records.filter((r) => r.catalogProduct !== NO_CATALOG_MATCH).length;

    return {
      ...extraction,
      invoiceLines: input.invoices.length,
      manifestLines: input.manifests.length,
      outputRows: records.length,
      manifestMatchedRows,
      rowsWithoutManifest: records.length - manifestMatchedRows,
      catalogMatchedRows,
      rowsWithoutCatalogMatch: records.length - catalogMatchedRows,
    };
  }

  /**
   * Validate pricing constants.
   */
  private validateSettings(settings: ReceivingSettings): void {
    const { markupDivisor, priceMultiplier } = settings.pricing;
    if (!Number.isFinite(markupDivisor) || markupDivisor <= 0) {
      throw new ReceivingError({
        code: 'INVALID_CONFIG',
        stage: 'config',
        message: `pricing.markupDivisor must be a positive number (got ${markupDivisor})`,
      });
    }
    if (!Number.isFinite(priceMultiplier) || priceMultiplier < 0) {
      throw new ReceivingError({
        code: 'INVALID_CONFIG',
        stage: 'config',
        message: `pricing.priceMultiplier must be a non-negative number (got ${priceMultiplier})`,
      });
    }
  }
}

function distinct(values: string[]): string[] {
  return Array.from(new Set(values));
}

/**
 * Factory function to create a ReconciliationEngine
 */
export function createReconciliationEngine(
  options?: ReconciliationEngineOptions
): ReconciliationEngine {
  return new ReconciliationEngine(options);
}
