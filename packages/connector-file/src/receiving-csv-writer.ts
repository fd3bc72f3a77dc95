/**
 * Receiving CSV Writer
 * Serializes the normalized record set in the import column order
 */

import { mkdir, rename, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { stringify } from 'csv-stringify/sync';
import type { NormalizedReceivingRecord } from '@intake/core';
import { ReceivingError } from '@intake/core';

/** Output header, in the order the inventory import expects */
export const RECEIVING_COLUMNS = [
  'packageID',
  'catalogProduct',
  'room',
  'PricePerUnit',
  'costPerUnit',
  'quantity',
  'expDate',
] as const;

export type ReceivingColumn = (typeof RECEIVING_COLUMNS)[number];

export interface ReceivingCsvOptions {
  /** CSV delimiter (default: ',') */
  delimiter?: string;
  /**
   * Mitigate CSV/Excel formula injection by prefixing strings that start
   * with =, +, -, or @ (after optional whitespace). Default: true.
   */
  sanitizeFormulas?: boolean;
  /** Prefix used when sanitizeFormulas is enabled (default: "'"). */
  formulaEscapePrefix?: string;
}

function sanitizeFormulaValue(value: string, prefix: string): string {
  if (value.startsWith(prefix)) return value;
  return /^[\t\r\n ]*[=+\-@]/.test(value) ? `${prefix}${value}` : value;
}

export function toReceivingRow(
  record: NormalizedReceivingRecord,
  options: ReceivingCsvOptions = {}
): Record<ReceivingColumn, string | number> {
  const sanitize = options.sanitizeFormulas !== false;
  const prefix = options.formulaEscapePrefix ?? "'";
  const text = (value: string): string => (sanitize ? sanitizeFormulaValue(value, prefix) : value);

  return {
    packageID: text(record.packageId),
    catalogProduct: text(record.catalogProduct),
    room: text(record.room),
    PricePerUnit: record.pricePerUnit,
    costPerUnit: record.costPerUnit,
    quantity: record.quantity,
    expDate: text(record.expirationDate),
  };
}

export function renderReceivingCsv(
  records: readonly NormalizedReceivingRecord[],
  options: ReceivingCsvOptions = {}
): string {
  return stringify(
    records.map((r) => toReceivingRow(r, options)),
    {
      header: true,
      columns: [...RECEIVING_COLUMNS],
      delimiter: options.delimiter ?? ',',
    }
  );
}

/**
 * Write the record set to `filePath`.
 *
 * Content goes to a sibling temp file first and is renamed into place, so a
 * failed write never leaves a truncated output file behind.
 */
export async function writeReceivingCsv(
  records: readonly NormalizedReceivingRecord[],
  filePath: string,
  options: ReceivingCsvOptions = {}
): Promise<void> {
  const content = renderReceivingCsv(records, options);
  const tmpPath = `${filePath}.${process.pid}.tmp`;

  try {
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(tmpPath, content, 'utf-8');
    await rename(tmpPath, filePath);
  } catch (error) {
    await rm(tmpPath, { force: true });
    throw new ReceivingError({
      code: 'WRITE_FAILED',
      stage: 'output',
      message: `Failed to write ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      cause: error instanceof Error ? error : undefined,
    });
  }
}
