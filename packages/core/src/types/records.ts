/**
 * Record types produced and consumed by the receiving pipeline
 */

/** One line item parsed from a vendor invoice image */
export interface InvoiceLineRecord {
  /** File name of the image the line was recognized from */
  readonly sourceId: string;
  /** Unique identifier for this line */
  readonly lineId: string;
  /** Free-text product description as printed on the invoice */
  readonly productName: string;
  readonly quantity: number;
  readonly unitPrice: number;
  readonly lineTotal: number;
}

/** One package line parsed from a regulatory manifest image */
export interface ManifestLineRecord {
  readonly sourceId: string;
  /** Regulatory package tracking code (starts with "1A") */
  readonly packageId: string;
  readonly itemName: string;
  readonly quantity: number;
  /** Date as printed (e.g. "01/27/27"), or empty when absent */
  readonly expirationDate: string;
}

/** Source category an image belongs to */
export type SourceCategory = 'invoice' | 'manifest';

/** Entry of the vendor reference catalog */
export interface CatalogEntry {
  /** Authoritative product label */
  readonly canonicalName: string;
  /** Lowercased, trimmed canonical name */
  readonly normalizedKey: string;
}

/**
 * Final output unit, one per joined invoice row
 */
export interface NormalizedReceivingRecord {
  /** Package id from the matched manifest line, or empty */
  readonly packageId: string;
  /** Canonical catalog name, or empty when nothing matched */
  readonly catalogProduct: string;
  readonly room: string;
  readonly pricePerUnit: number;
  readonly costPerUnit: number;
  readonly quantity: number;
  /** Expiration date from the matched manifest line, or empty */
  readonly expirationDate: string;
}
