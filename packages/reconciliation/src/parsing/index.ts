/**
 * Parsing Module Exports
 */

export {
  INVOICE_LINE_PATTERN,
  MANIFEST_LINE_PATTERN,
  parseAmount,
  parseInvoiceLine,
  parseManifestLine,
  parseLine,
} from './line-grammar.js';
export type { LineVariant, ParsedInvoiceLine, ParsedManifestLine } from './line-grammar.js';

export {
  splitLines,
  extractRecords,
  extractInvoiceRecords,
  extractManifestRecords,
} from './record-extractor.js';
export type { ExtractionResult, RecordExtractor } from './record-extractor.js';
