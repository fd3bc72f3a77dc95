/**
 * Extraction Module Exports
 */

export {
  BatchLoader,
  createInvoiceLoader,
  createManifestLoader,
  DEFAULT_RECOGNITION_CONCURRENCY,
} from './batch-loader.js';
export type { BatchLoaderOptions, BatchLoadResult } from './batch-loader.js';
export { Semaphore } from './semaphore.js';
