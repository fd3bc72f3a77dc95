/**
 * Catalog Module Exports
 */

export {
  CatalogMatcher,
  createCatalogMatcher,
  leadingChars,
  NO_CATALOG_MATCH,
  DEFAULT_PREFIX_LENGTH,
} from './catalog-matcher.js';
export type {
  CatalogMatcherOptions,
  CatalogTieBreak,
  CatalogMatch,
  CatalogMatchKind,
} from './catalog-matcher.js';
