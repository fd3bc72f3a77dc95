import { ReceivingError } from '@intake/core';

export interface CliArgs {
  configPath?: string;
  workDir?: string;
  dryRun: boolean;
  help: boolean;
}

export const USAGE = `Usage: intake-receiving [--config <config.json>] [--workdir <dir>] [--dry-run]

  --config <file>   JSON config file (defaults apply when omitted)
  --workdir <dir>   Overrides workDir; expects invoices/, manifests/, catalog/ inside
  --dry-run         Run the pipeline and print the summary without writing the CSV
  --help            Show this message`;

function valueAfter(args: readonly string[], index: number, flag: string): string {
  const value = args[index + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new ReceivingError({
      code: 'INVALID_CONFIG',
      stage: 'config',
      message: `Missing value for ${flag}`,
      suggestion: USAGE,
    });
  }
  return value;
}

export function parseCliArgs(args: readonly string[]): CliArgs {
  const parsed: CliArgs = { dryRun: false, help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--config':
        parsed.configPath = valueAfter(args, i, arg);
        i++;
        break;
      case '--workdir':
        parsed.workDir = valueAfter(args, i, arg);
        i++;
        break;
      case '--dry-run':
        parsed.dryRun = true;
        break;
      case '--help':
      case '-h':
        parsed.help = true;
        break;
      default:
        throw new ReceivingError({
          code: 'INVALID_CONFIG',
          stage: 'config',
          message: `Unknown argument: ${arg}`,
          suggestion: USAGE,
        });
    }
  }

  return parsed;
}
