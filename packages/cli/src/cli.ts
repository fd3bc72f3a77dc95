#!/usr/bin/env node
/**
 * CLI entry point for the receiving pipeline
 *
 * Usage:
 *   intake-receiving --config ./receiving.json
 *   intake-receiving --workdir ./receiving_workdir --dry-run
 */

import { Logger, createRunId, wrapError } from '@intake/core';
import { formatReconciliationReport } from '@intake/reconciliation';
import { USAGE, parseCliArgs } from './args.js';
import { loadConfig, parseConfig, type ReceivingConfig } from './config.js';
import { runReceiving } from './run.js';

async function main(): Promise<void> {
  let logger = new Logger();

  try {
    const args = parseCliArgs(process.argv.slice(2));
    if (args.help) {
      console.log(USAGE);
      return;
    }

    let config: ReceivingConfig = args.configPath
      ? await loadConfig(args.configPath)
      : parseConfig({});
    if (args.workDir) {
      config = { ...config, workDir: args.workDir };
    }

    logger = new Logger({
      level: config.logging.level,
      format: config.logging.format,
    }).child({ runId: createRunId() });

    const { report, paths, written } = await runReceiving({
      config,
      dryRun: args.dryRun,
      logger,
    });

    process.stderr.write(`${formatReconciliationReport(report)}\n`);
    if (written) {
      console.log(`Wrote ${report.records.length} rows to ${paths.outputFile}`);
    } else {
      console.log(`Dry run: ${report.records.length} rows not written to ${paths.outputFile}`);
    }
  } catch (error) {
    const failure = wrapError(error);
    logger.error('Receiving run failed', { code: failure.code, stage: failure.stage });
    process.stderr.write(`${failure.toActionableMessage()}\n`);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  process.stderr.write(`${String(error)}\n`);
  process.exit(1);
});
