/**
 * One receiving run: catalog, images, reconciliation, output file.
 */

import type { Logger, TextRecognizer } from '@intake/core';
import { silentLogger } from '@intake/core';
import { listImageSources, loadCatalog, writeReceivingCsv } from '@intake/connector-file';
import { createTesseractRecognizer } from '@intake/connector-ocr';
import { createReconciliationEngine, type ReconciliationReport } from '@intake/reconciliation';
import { resolvePaths, type ReceivingConfig, type ReceivingPaths } from './config.js';

export interface RunOptions {
  config: ReceivingConfig;
  /** Skip writing the output file */
  dryRun?: boolean;
  /** Defaults to the tesseract CLI configured under `ocr` */
  recognizer?: TextRecognizer;
  /** Base for a relative workDir (default: process.cwd()) */
  cwd?: string;
  logger?: Logger;
}

export interface RunResult {
  report: ReconciliationReport;
  paths: ReceivingPaths;
  written: boolean;
}

export function createRecognizer(config: ReceivingConfig, logger: Logger): TextRecognizer {
  return createTesseractRecognizer({
    command: config.ocr.command,
    language: config.ocr.language,
    pageSegMode: config.ocr.pageSegMode,
    timeoutMs: config.ocr.timeoutMs,
    logger,
  });
}

/**
 * Execute the pipeline. Any fatal condition rejects with a ReceivingError
 * before the output file is touched.
 */
export async function runReceiving(options: RunOptions): Promise<RunResult> {
  const { config } = options;
  const logger = options.logger ?? silentLogger;
  const paths = resolvePaths(config, options.cwd);

  logger.info('Starting receiving run', { workDir: paths.workDir, dryRun: options.dryRun === true });

  const catalog = await loadCatalog(paths.catalog, {
    column: config.catalog.column,
    logger,
  });

  const [invoiceImages, manifestImages] = await Promise.all([
    listImageSources(paths.invoices, logger),
    listImageSources(paths.manifests, logger),
  ]);

  const engine = createReconciliationEngine({
    recognizer: options.recognizer ?? createRecognizer(config, logger),
    settings: {
      room: config.room,
      pricing: config.pricing,
      catalog: {
        prefixLength: config.catalog.prefixLength,
        tieBreak: config.catalog.tieBreak,
      },
    },
    concurrency: config.ocr.concurrency,
    logger,
  });

  const report = await engine.run({ invoiceImages, manifestImages, catalog });

  if (options.dryRun) {
    logger.info('Dry run; output not written', { file: paths.outputFile });
    return { report, paths, written: false };
  }

  await writeReceivingCsv(report.records, paths.outputFile, {
    sanitizeFormulas: config.output.sanitizeFormulas,
  });
  logger.info('Wrote output', { file: paths.outputFile, rows: report.records.length });

  return { report, paths, written: true };
}
