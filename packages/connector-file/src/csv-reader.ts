/**
 * CSV Reader
 * Reads delimited text with a header row; every cell stays a string
 */

import { parse } from 'csv-parse/sync';
import { TabularReader, toRow, type Table, type TabularReaderOptions } from './tabular-reader.js';

export interface CsvReaderOptions extends TabularReaderOptions {
  /** CSV delimiter (default: ',') */
  delimiter?: string;
  /** Quote character (default: '"') */
  quote?: string;
}

export class CsvReader extends TabularReader<CsvReaderOptions> {
  readonly extensions = ['.csv'] as const;

  constructor(options: CsvReaderOptions = {}) {
    super(options);
  }

  protected async parseContent(content: Buffer): Promise<Table> {
    const rows: string[][] = parse(content.toString(this.options.encoding ?? 'utf-8'), {
      columns: false,
      bom: true,
      delimiter: this.options.delimiter ?? ',',
      quote: this.options.quote ?? '"',
      skip_empty_lines: true,
      relax_column_count: true,
      trim: true,
    });

    const [headerRow, ...dataRows] = rows;
    if (!headerRow) return { headers: [], rows: [] };

    const headers = headerRow.map((h) => String(h));
    return {
      headers,
      rows: dataRows.map((cells) => toRow(headers, cells)),
    };
  }
}
