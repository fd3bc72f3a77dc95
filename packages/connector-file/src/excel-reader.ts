/**
 * Excel Reader
 * Reads the first (or a named) worksheet of an .xlsx workbook
 */

import ExcelJS from 'exceljs';
import { ReceivingError } from '@intake/core';
import { TabularReader, toRow, type Table, type TabularReaderOptions } from './tabular-reader.js';

export interface ExcelReaderOptions extends TabularReaderOptions {
  /** Sheet name or 1-based index (default: first sheet) */
  sheet?: string | number;
}

export class ExcelReader extends TabularReader<ExcelReaderOptions> {
  readonly extensions = ['.xlsx'] as const;

  constructor(options: ExcelReaderOptions = {}) {
    super(options);
  }

  protected async parseContent(_content: Buffer, filePath: string): Promise<Table> {
    // ExcelJS reads the workbook from disk itself
    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.readFile(filePath);

    const sheet =
      this.options.sheet === undefined
        ? workbook.worksheets[0]
        : workbook.getWorksheet(this.options.sheet);

    if (!sheet) {
      throw new ReceivingError({
        code: 'CATALOG_READ_FAILED',
        stage: 'catalog',
        message: `Sheet not found: ${this.options.sheet ?? 'first sheet'}`,
        suggestion: 'Check that the sheet name/index is correct.',
      });
    }

    const headers: string[] = [];
    const rows: Table['rows'] = [];

    sheet.eachRow({ includeEmpty: false }, (row) => {
      const cells: string[] = [];
      row.eachCell({ includeEmpty: true }, (cell, colNumber) => {
        cells[colNumber - 1] = cell.text.trim();
      });

      if (headers.length === 0) {
        for (let i = 0; i < cells.length; i++) headers[i] = cells[i] ?? '';
        return;
      }

      if (cells.some((c) => c !== '')) {
        rows.push(toRow(headers, cells));
      }
    });

    return { headers, rows };
  }
}
