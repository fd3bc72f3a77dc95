/**
 * Batch Loader
 *
 * Recognizes every image of one source category and concatenates the
 * extracted records. Images are independent, so recognition runs with
 * bounded concurrency; records always come back in image order.
 */

import type {
  ImageSource,
  InvoiceLineRecord,
  Logger,
  ManifestLineRecord,
  SourceCategory,
  TextRecognizer,
} from '@intake/core';
import { silentLogger, wrapError } from '@intake/core';
import type { RecordExtractor } from '../parsing/index.js';
import { extractInvoiceRecords, extractManifestRecords } from '../parsing/index.js';
import { Semaphore } from './semaphore.js';

export const DEFAULT_RECOGNITION_CONCURRENCY = 2;

export interface BatchLoaderOptions<T> {
  category: SourceCategory;
  recognizer: TextRecognizer;
  extract: RecordExtractor<T>;
  /** Maximum recognition calls in flight (default: 2); ignored when `semaphore` is given */
  concurrency?: number;
  /** Slot pool shared with other loaders so their calls count against one limit */
  semaphore?: Semaphore;
  /**
   * Aborted on the first recognition failure. Loaders sharing a controller
   * stop starting new recognitions once any of them has failed.
   */
  abortController?: AbortController;
  logger?: Logger;
}

export interface BatchLoadResult<T> {
  records: T[];
  /** Number of images processed */
  images: number;
  /** Non-blank lines rejected by the grammar, across all images */
  rejectedLines: number;
  /** Images whose text produced no records */
  emptySources: string[];
}

export class BatchLoader<T> {
  private readonly category: SourceCategory;
  private readonly recognizer: TextRecognizer;
  private readonly extract: RecordExtractor<T>;
  private readonly concurrency: number;
  private readonly semaphore?: Semaphore;
  private readonly abortController?: AbortController;
  private readonly logger: Logger;

  constructor(options: BatchLoaderOptions<T>) {
    this.category = options.category;
    this.recognizer = options.recognizer;
    this.extract = options.extract;
    this.concurrency = options.concurrency ?? DEFAULT_RECOGNITION_CONCURRENCY;
    this.semaphore = options.semaphore;
    this.abortController = options.abortController;
    this.logger = (options.logger ?? silentLogger).child({ category: options.category });
  }

  /**
   * Load records from all images.
   * @throws ReceivingError (RECOGNITION_FAILED) if any image cannot be recognized
   */
  async load(images: readonly ImageSource[]): Promise<BatchLoadResult<T>> {
    const semaphore = this.semaphore ?? new Semaphore(this.concurrency);
    const controller = this.abortController ?? new AbortController();

    const perImage = await Promise.all(
      images.map((image) =>
        semaphore.run(async () => {
          // Queued behind a failed recognition; the load is already lost.
          if (controller.signal.aborted) return null;

          let text: string;
          try {
            text = await this.recognize(image);
          } catch (error) {
            controller.abort(error);
            throw error;
          }

          const result = this.extract(text, image.id);
          this.logger.debug('Extracted records from image', {
            image: image.id,
            records: result.records.length,
            rejectedLines: result.rejectedLines,
          });
          return { image, result };
        })
      )
    );

    const records: T[] = [];
    const emptySources: string[] = [];
    let rejectedLines = 0;

    for (const entry of perImage) {
      if (!entry) continue;
      const { image, result } = entry;
      records.push(...result.records);
      rejectedLines += result.rejectedLines;
      if (result.records.length === 0) {
        emptySources.push(image.id);
      }
    }

    if (emptySources.length > 0) {
      this.logger.warn('Images produced no parseable lines', { images: emptySources });
    }

    return { records, images: images.length, rejectedLines, emptySources };
  }

  private async recognize(image: ImageSource): Promise<string> {
    try {
      return await this.recognizer.recognize(image);
    } catch (error) {
      throw wrapError(error, 'RECOGNITION_FAILED', 'extraction');
    }
  }
}

type LoaderOptions = Omit<BatchLoaderOptions<never>, 'category' | 'extract'>;

/**
 * Loader for vendor invoice images
 */
export function createInvoiceLoader(options: LoaderOptions): BatchLoader<InvoiceLineRecord> {
  return new BatchLoader<InvoiceLineRecord>({
    ...options,
    category: 'invoice',
    extract: (text, sourceId) => extractInvoiceRecords(text, sourceId),
  });
}

/**
 * Loader for regulatory manifest images
 */
export function createManifestLoader(options: LoaderOptions): BatchLoader<ManifestLineRecord> {
  return new BatchLoader<ManifestLineRecord>({
    ...options,
    category: 'manifest',
    extract: extractManifestRecords,
  });
}
