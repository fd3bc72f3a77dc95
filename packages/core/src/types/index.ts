export type {
  InvoiceLineRecord,
  ManifestLineRecord,
  SourceCategory,
  CatalogEntry,
  NormalizedReceivingRecord,
} from './records.js';

export type { ImageSource } from './source.js';
