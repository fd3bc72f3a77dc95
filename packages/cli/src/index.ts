/**
 * @intake/cli
 *
 * Config loading and the run orchestration behind the `intake-receiving` command
 */

export {
  configFileSchema,
  expandEnvVars,
  formatZodError,
  loadConfig,
  parseConfig,
  resolvePaths,
} from './config.js';
export type {
  ConfigFileInput,
  EnvExpansionOptions,
  ReceivingConfig,
  ReceivingPaths,
} from './config.js';
export { parseCliArgs, USAGE } from './args.js';
export type { CliArgs } from './args.js';
export { createRecognizer, runReceiving } from './run.js';
export type { RunOptions, RunResult } from './run.js';
