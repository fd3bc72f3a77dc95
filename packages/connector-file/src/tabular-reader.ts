/**
 * Base class for tabular file readers
 * Handles file access errors and header validation; subclasses parse the bytes
 */

import { readFile, access } from 'node:fs/promises';
import { constants } from 'node:fs';
import { ReceivingError } from '@intake/core';

/** One data row keyed by header name */
export type TableRow = Record<string, string>;

export interface Table {
  headers: string[];
  rows: TableRow[];
}

export interface TabularReaderOptions {
  /** Character encoding for text formats (default: utf-8) */
  encoding?: BufferEncoding;
}

const FORBIDDEN_HEADERS = new Set(['__proto__', 'prototype', 'constructor']);

export abstract class TabularReader<TOptions extends TabularReaderOptions = TabularReaderOptions> {
  constructor(protected readonly options: TOptions) {}

  /** File extensions (lowercase, with dot) this reader understands */
  abstract readonly extensions: readonly string[];

  async read(filePath: string): Promise<Table> {
    let content: Buffer;
    try {
      await access(filePath, constants.R_OK);
      content = await readFile(filePath);
    } catch (error) {
      const code =
        error instanceof Error && 'code' in error ? String(error.code) : undefined;

      if (code === 'ENOENT') {
        throw new ReceivingError({
          code: 'CATALOG_NOT_FOUND',
          stage: 'catalog',
          message: `File not found: ${filePath}`,
          suggestion: 'Check that the file path is correct and the file exists.',
        });
      }

      throw new ReceivingError({
        code: 'CATALOG_READ_FAILED',
        stage: 'catalog',
        message: `Cannot read file: ${filePath}`,
        suggestion: code === 'EACCES' ? 'Check file permissions.' : undefined,
        cause: error instanceof Error ? error : undefined,
      });
    }

    let table: Table;
    try {
      table = await this.parseContent(content, filePath);
    } catch (error) {
      if (error instanceof ReceivingError) throw error;
      throw new ReceivingError({
        code: 'CATALOG_READ_FAILED',
        stage: 'catalog',
        message: `Failed to parse ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
        cause: error instanceof Error ? error : undefined,
      });
    }

    for (const header of table.headers) {
      if (FORBIDDEN_HEADERS.has(header)) {
        throw new ReceivingError({
          code: 'CATALOG_READ_FAILED',
          stage: 'catalog',
          message: `Unsafe header name in ${filePath}: ${header}`,
          suggestion: 'Rename the column to a safe field name and try again.',
        });
      }
    }

    return table;
  }

  /**
   * Parse file content into a header list and rows (implemented by subclasses)
   */
  protected abstract parseContent(content: Buffer, filePath: string): Promise<Table>;
}

/**
 * Zip header names with cell values; missing cells become empty strings
 */
export function toRow(headers: string[], cells: readonly string[]): TableRow {
  const row: TableRow = Object.create(null);
  headers.forEach((header, i) => {
    row[header] = cells[i] ?? '';
  });
  return row;
}
