/**
 * Tesseract command-line recognizer
 *
 * Runs the locally installed `tesseract` program once per image and returns
 * its plain-text output. Interword spaces are preserved so that column gaps
 * survive into the recognized text.
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import type { ImageSource, Logger, TextRecognizer } from '@intake/core';
import { ReceivingError, silentLogger } from '@intake/core';

const execFileAsync = promisify(execFile);

export interface ExecFileOptions {
  timeout: number;
  maxBuffer: number;
  encoding: 'utf8';
}

/** Signature of the process runner; swapped out in tests */
export type ExecFileFn = (
  file: string,
  args: string[],
  options: ExecFileOptions
) => Promise<{ stdout: string; stderr: string }>;

export interface TesseractCliOptions {
  /** Executable name or path (default: 'tesseract') */
  command?: string;
  /** Tesseract language code(s), e.g. 'eng' or 'eng+spa' (default: 'eng') */
  language?: string;
  /** Page segmentation mode passed as --psm */
  pageSegMode?: number;
  /** Per-image timeout (default: 60s) */
  timeoutMs?: number;
  /** Keep runs of spaces between words (default: true) */
  preserveInterwordSpaces?: boolean;
  execFile?: ExecFileFn;
  logger?: Logger;
}

const MAX_OUTPUT_BYTES = 20 * 1024 * 1024;

type ExecFailure = Error & { code?: unknown; stderr?: unknown; killed?: unknown };

function isExecFailure(error: unknown): error is ExecFailure {
  return error instanceof Error;
}

const defaultExecFile: ExecFileFn = (file, args, options) =>
  execFileAsync(file, args, options);

export class TesseractCliRecognizer implements TextRecognizer {
  readonly name = 'tesseract';
  private readonly command: string;
  private readonly exec: ExecFileFn;
  private readonly logger: Logger;

  constructor(private readonly options: TesseractCliOptions = {}) {
    this.command = options.command ?? 'tesseract';
    this.exec = options.execFile ?? defaultExecFile;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Command-line arguments for one image (output goes to stdout)
   */
  buildArgs(imagePath: string): string[] {
    const args = [imagePath, 'stdout', '-l', this.options.language ?? 'eng'];
    if (this.options.pageSegMode !== undefined) {
      args.push('--psm', String(this.options.pageSegMode));
    }
    if (this.options.preserveInterwordSpaces !== false) {
      args.push('-c', 'preserve_interword_spaces=1');
    }
    return args;
  }

  async recognize(image: ImageSource): Promise<string> {
    const startTime = Date.now();
    const args = this.buildArgs(image.path);

    try {
      const { stdout } = await this.exec(this.command, args, {
        timeout: this.options.timeoutMs ?? 60_000,
        maxBuffer: MAX_OUTPUT_BYTES,
        encoding: 'utf8',
      });

      // Tesseract terminates each page with a form feed.
      const text = stdout.replace(/\f/g, '');
      this.logger.debug('Recognized image', {
        image: image.id,
        chars: text.length,
        durationMs: Date.now() - startTime,
      });
      return text;
    } catch (error) {
      throw this.toReceivingError(error, image);
    }
  }

  private toReceivingError(error: unknown, image: ImageSource): ReceivingError {
    const cause = error instanceof Error ? error : undefined;
    const context = { image: image.id, command: this.command };

    if (isExecFailure(error) && error.code === 'ENOENT') {
      return new ReceivingError({
        code: 'RECOGNITION_FAILED',
        stage: 'extraction',
        message: `Tesseract binary not found at "${this.command}"`,
        suggestion:
          'Install tesseract-ocr (e.g. apt-get install tesseract-ocr tesseract-ocr-eng) and make sure it is on PATH, or set ocr.command.',
        cause,
        context,
      });
    }

    if (isExecFailure(error) && error.killed === true) {
      return new ReceivingError({
        code: 'RECOGNITION_FAILED',
        stage: 'extraction',
        message: `Text recognition timed out for ${image.id}`,
        suggestion: 'Raise ocr.timeoutMs or check the image size.',
        cause,
        context,
      });
    }

    const stderr =
      isExecFailure(error) && typeof error.stderr === 'string' ? error.stderr.trim() : '';
    return new ReceivingError({
      code: 'RECOGNITION_FAILED',
      stage: 'extraction',
      message: stderr
        ? `Text recognition failed for ${image.id}: ${stderr}`
        : `Text recognition failed for ${image.id}`,
      cause,
      context,
    });
  }
}

/**
 * Factory function to create a Tesseract recognizer
 */
export function createTesseractRecognizer(options?: TesseractCliOptions): TesseractCliRecognizer {
  return new TesseractCliRecognizer(options);
}
