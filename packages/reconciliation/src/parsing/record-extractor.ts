/**
 * Record Extractor
 *
 * Runs a line grammar over every line of one recognized text block and tags
 * the records it yields with the block's source identifier.
 */

import { randomUUID } from 'node:crypto';
import type { InvoiceLineRecord, ManifestLineRecord } from '@intake/core';
import { parseInvoiceLine, parseManifestLine, type LineVariant } from './line-grammar.js';

export interface ExtractionResult<T> {
  records: T[];
  /** Non-blank lines that did not fit the grammar */
  rejectedLines: number;
}

/** Turns one recognized text block into records */
export type RecordExtractor<T> = (text: string, sourceId: string) => ExtractionResult<T>;

/** Every line boundary, including form feeds and Unicode line/paragraph separators */
const LINE_BREAK = /\r\n|[\n\v\f\r\x1c-\x1e\x85\u2028\u2029]/;

/**
 * Split recognized text into trimmed, non-blank lines
 */
export function splitLines(text: string): string[] {
  return text
    .split(LINE_BREAK)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

function extractWith<P, T>(
  text: string,
  parse: (line: string) => P | null,
  build: (parsed: P) => T
): ExtractionResult<T> {
  const records: T[] = [];
  let rejectedLines = 0;

  for (const line of splitLines(text)) {
    const parsed = parse(line);
    if (parsed === null) {
      rejectedLines++;
      continue;
    }
    records.push(build(parsed));
  }

  return { records, rejectedLines };
}

export function extractInvoiceRecords(
  text: string,
  sourceId: string,
  createId: () => string = randomUUID
): ExtractionResult<InvoiceLineRecord> {
  return extractWith(text, parseInvoiceLine, (parsed) => ({
    sourceId,
    lineId: createId(),
    ...parsed,
  }));
}

export function extractManifestRecords(
  text: string,
  sourceId: string
): ExtractionResult<ManifestLineRecord> {
  return extractWith(text, parseManifestLine, (parsed) => ({ sourceId, ...parsed }));
}

/**
 * Extract records of the given variant from one recognized text block
 */
export function extractRecords(
  text: string,
  sourceId: string,
  variant: 'invoice'
): ExtractionResult<InvoiceLineRecord>;
export function extractRecords(
  text: string,
  sourceId: string,
  variant: 'manifest'
): ExtractionResult<ManifestLineRecord>;
export function extractRecords(
  text: string,
  sourceId: string,
  variant: LineVariant
): ExtractionResult<InvoiceLineRecord> | ExtractionResult<ManifestLineRecord>;
export function extractRecords(
  text: string,
  sourceId: string,
  variant: LineVariant
): ExtractionResult<InvoiceLineRecord> | ExtractionResult<ManifestLineRecord> {
  return variant === 'invoice'
    ? extractInvoiceRecords(text, sourceId)
    : extractManifestRecords(text, sourceId);
}
