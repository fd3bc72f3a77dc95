/**
 * @intake/connector-file
 *
 * File-based sources and sinks: catalog files, image directories, output CSV
 */

export { TabularReader, toRow } from './tabular-reader.js';
export type { Table, TableRow, TabularReaderOptions } from './tabular-reader.js';

export { CsvReader } from './csv-reader.js';
export type { CsvReaderOptions } from './csv-reader.js';

export { ExcelReader } from './excel-reader.js';
export type { ExcelReaderOptions } from './excel-reader.js';

export {
  DEFAULT_CATALOG_COLUMN,
  findCatalogFile,
  readCatalogFile,
  loadCatalog,
} from './catalog-source.js';
export type { CatalogSourceOptions } from './catalog-source.js';

export { IMAGE_EXTENSIONS, listImageSources } from './image-source.js';

export {
  RECEIVING_COLUMNS,
  toReceivingRow,
  renderReceivingCsv,
  writeReceivingCsv,
} from './receiving-csv-writer.js';
export type { ReceivingColumn, ReceivingCsvOptions } from './receiving-csv-writer.js';
