import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { z } from 'zod';
import { ReceivingError } from '@intake/core';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

export type EnvExpansionOptions = {
  /**
   * If true, missing env vars leave placeholders unchanged instead of erroring.
   * Default: false (fail-fast).
   */
  allowMissing?: boolean;
  env?: NodeJS.ProcessEnv;
};

function expandEnvInString(input: string, options?: EnvExpansionOptions): string {
  const env = options?.env ?? process.env;
  return input.replace(/\$\{([^}]+)\}/g, (match, inner: string) => {
    const [rawName, rawDefault] = inner.split(':-', 2);
    const name = (rawName ?? '').trim();
    if (!name) return match;

    const envValue = env[name];
    if (envValue !== undefined && envValue !== '') return envValue;

    if (rawDefault !== undefined) return rawDefault;

    if (options?.allowMissing) return match;

    throw new ReceivingError({
      code: 'INVALID_CONFIG',
      stage: 'config',
      message: `Missing required environment variable: ${name}`,
      suggestion: `Set ${name} or give the placeholder a default: \${${name}:-value}`,
    });
  });
}

/**
 * Replace `${VAR}` and `${VAR:-default}` in every string of a parsed JSON value
 */
export function expandEnvVars(value: unknown, options?: EnvExpansionOptions): unknown {
  if (typeof value === 'string') {
    return expandEnvInString(value, options);
  }
  if (Array.isArray(value)) {
    return value.map((v) => expandEnvVars(v, options));
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = expandEnvVars(v, options);
    }
    return out;
  }
  return value;
}

const directoriesSchema = z
  .object({
    invoices: z.string().min(1).default('invoices'),
    manifests: z.string().min(1).default('manifests'),
    catalog: z.string().min(1).default('catalog'),
    output: z.string().min(1).default('output'),
  })
  .strict();

const outputSchema = z
  .object({
    fileName: z.string().min(1).default('receiving_normalized.csv'),
    sanitizeFormulas: z.boolean().default(true),
  })
  .strict();

const pricingSchema = z
  .object({
    markupDivisor: z.number().positive().default(0.8),
    priceMultiplier: z.number().min(0).default(2),
  })
  .strict();

const catalogSchema = z
  .object({
    column: z.string().min(1).default('Product'),
    prefixLength: z.number().int().min(1).max(256).default(15),
    tieBreak: z.enum(['first', 'closest']).default('first'),
  })
  .strict();

const ocrSchema = z
  .object({
    command: z.string().min(1).default('tesseract'),
    language: z.string().min(1).default('eng'),
    pageSegMode: z.number().int().min(0).max(13).optional(),
    timeoutMs: z.number().int().min(1).max(600_000).default(60_000),
    concurrency: z.number().int().min(1).max(16).default(2),
  })
  .strict();

const loggingSchema = z
  .object({
    format: z.enum(['text', 'json']).default('text'),
    level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  })
  .strict();

export const configFileSchema = z
  .object({
    $schema: z.string().min(1).optional(),
    workDir: z.string().min(1).default('./receiving_workdir'),
    directories: directoriesSchema.default({}),
    output: outputSchema.default({}),
    room: z.string().min(1).default('Receiving Room'),
    pricing: pricingSchema.default({}),
    catalog: catalogSchema.default({}),
    ocr: ocrSchema.default({}),
    logging: loggingSchema.default({}),
  })
  .strict();

export type ConfigFileInput = z.input<typeof configFileSchema>;
export type ReceivingConfig = z.infer<typeof configFileSchema>;

export interface ReceivingPaths {
  workDir: string;
  invoices: string;
  manifests: string;
  catalog: string;
  outputDir: string;
  outputFile: string;
}

export function formatZodError(err: z.ZodError, label = 'Invalid config'): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `${label}:\n${issues}`;
}

/**
 * Validate a raw config value, filling in defaults
 */
export function parseConfig(raw: unknown, options?: EnvExpansionOptions): ReceivingConfig {
  const parsed = configFileSchema.safeParse(expandEnvVars(raw, options));
  if (!parsed.success) {
    throw new ReceivingError({
      code: 'INVALID_CONFIG',
      stage: 'config',
      message: formatZodError(parsed.error),
    });
  }
  return parsed.data;
}

function stripUtf8Bom(text: string): string {
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

/**
 * Read and validate a JSON config file
 */
export async function loadConfig(
  configPath: string,
  options?: EnvExpansionOptions
): Promise<ReceivingConfig> {
  const absolutePath = resolve(process.cwd(), configPath);

  let text: string;
  try {
    text = stripUtf8Bom(await readFile(absolutePath, 'utf-8'));
  } catch (error) {
    throw new ReceivingError({
      code: 'INVALID_CONFIG',
      stage: 'config',
      message: `Cannot read config file: ${absolutePath}`,
      cause: error instanceof Error ? error : undefined,
    });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ReceivingError({
      code: 'INVALID_CONFIG',
      stage: 'config',
      message: `Config file is not valid JSON: ${absolutePath}`,
      suggestion: error instanceof Error ? error.message : undefined,
    });
  }

  return parseConfig(raw, options);
}

/**
 * Absolute input and output locations. `workDir` resolves against `cwd`,
 * the sub-directories against `workDir`.
 */
export function resolvePaths(config: ReceivingConfig, cwd: string = process.cwd()): ReceivingPaths {
  const workDir = resolve(cwd, config.workDir);
  const outputDir = resolve(workDir, config.directories.output);
  return {
    workDir,
    invoices: resolve(workDir, config.directories.invoices),
    manifests: resolve(workDir, config.directories.manifests),
    catalog: resolve(workDir, config.directories.catalog),
    outputDir,
    outputFile: resolve(outputDir, config.output.fileName),
  };
}
