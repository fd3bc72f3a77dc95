/**
 * Catalog Source
 *
 * Locates the single vendor catalog file in a directory and turns its
 * canonical-name column into catalog entries.
 */

import { readdir } from 'node:fs/promises';
import { extname, join } from 'node:path';
import type { CatalogEntry, Logger } from '@intake/core';
import { ReceivingError, normalizeName, silentLogger } from '@intake/core';
import { CsvReader, type CsvReaderOptions } from './csv-reader.js';
import { ExcelReader, type ExcelReaderOptions } from './excel-reader.js';
import type { TabularReader } from './tabular-reader.js';

export interface CatalogSourceOptions {
  /** Header of the canonical product name column (default: 'Product') */
  column?: string;
  csv?: CsvReaderOptions;
  excel?: ExcelReaderOptions;
  logger?: Logger;
}

export const DEFAULT_CATALOG_COLUMN = 'Product';

function createReaders(options: CatalogSourceOptions): TabularReader[] {
  return [new CsvReader(options.csv), new ExcelReader(options.excel)];
}

function readerFor(filePath: string, readers: TabularReader[]): TabularReader | undefined {
  const ext = extname(filePath).toLowerCase();
  return readers.find((r) => r.extensions.includes(ext));
}

/**
 * Find the one catalog file in `dir`.
 *
 * Dotfiles and spreadsheet lock files (`~$name.xlsx`) are not catalog sources.
 */
export async function findCatalogFile(
  dir: string,
  options: CatalogSourceOptions = {}
): Promise<string> {
  const readers = createReaders(options);
  let names: string[];
  try {
    names = await readdir(dir);
  } catch (error) {
    throw new ReceivingError({
      code: 'CATALOG_NOT_FOUND',
      stage: 'catalog',
      message: `Catalog directory not readable: ${dir}`,
      suggestion: 'Create the catalog directory and place exactly one .csv or .xlsx catalog in it.',
      cause: error instanceof Error ? error : undefined,
    });
  }

  const candidates = names
    .filter((name) => !name.startsWith('.') && !name.startsWith('~$'))
    .filter((name) => readerFor(name, readers) !== undefined)
    .sort();

  if (candidates.length === 0) {
    throw new ReceivingError({
      code: 'CATALOG_NOT_FOUND',
      stage: 'catalog',
      message: `No catalog file found in ${dir}`,
      suggestion: 'Place the vendor catalog (.csv or .xlsx) in the catalog directory.',
    });
  }

  if (candidates.length > 1) {
    throw new ReceivingError({
      code: 'CATALOG_AMBIGUOUS',
      stage: 'catalog',
      message: `Multiple catalog files found in ${dir}: ${candidates.join(', ')}`,
      suggestion: 'Keep only one catalog file per vendor run.',
      context: { files: candidates },
    });
  }

  return join(dir, candidates[0] ?? '');
}

/**
 * Read catalog entries from one file, in file order.
 * Rows whose canonical name is blank are skipped.
 */
export async function readCatalogFile(
  filePath: string,
  options: CatalogSourceOptions = {}
): Promise<CatalogEntry[]> {
  const column = options.column ?? DEFAULT_CATALOG_COLUMN;
  const logger = options.logger ?? silentLogger;
  const reader = readerFor(filePath, createReaders(options));

  if (!reader) {
    throw new ReceivingError({
      code: 'CATALOG_READ_FAILED',
      stage: 'catalog',
      message: `Unsupported catalog file type: ${filePath}`,
      suggestion: 'Provide the catalog as .csv or .xlsx.',
    });
  }

  const table = await reader.read(filePath);

  if (!table.headers.includes(column)) {
    throw new ReceivingError({
      code: 'CATALOG_COLUMN_MISSING',
      stage: 'catalog',
      message: `Catalog ${filePath} must have a '${column}' column`,
      suggestion: `Rename the product name column to '${column}' or set catalog.column in the config.`,
      context: { headers: table.headers },
    });
  }

  const entries: CatalogEntry[] = [];
  let skipped = 0;
  for (const row of table.rows) {
    const canonicalName = (row[column] ?? '').trim();
    if (!canonicalName) {
      skipped++;
      continue;
    }
    entries.push({ canonicalName, normalizedKey: normalizeName(canonicalName) });
  }

  if (skipped > 0) {
    logger.debug('Skipped catalog rows without a product name', { file: filePath, skipped });
  }

  if (entries.length === 0) {
    throw new ReceivingError({
      code: 'CATALOG_EMPTY',
      stage: 'catalog',
      message: `Catalog ${filePath} has no product entries`,
      suggestion: `Fill the '${column}' column with the vendor's product names.`,
    });
  }

  return entries;
}

/**
 * Locate and read the catalog in `dir`.
 */
export async function loadCatalog(
  dir: string,
  options: CatalogSourceOptions = {}
): Promise<CatalogEntry[]> {
  const filePath = await findCatalogFile(dir, options);
  const entries = await readCatalogFile(filePath, options);
  (options.logger ?? silentLogger).info('Loaded catalog', { file: filePath, entries: entries.length });
  return entries;
}
