/**
 * Catalog Matcher
 *
 * Maps a free-text invoice description to a canonical catalog name.
 *
 * OCR damage concentrates at the tail of long product names, so the first
 * pass only looks at the head of the query: the first `prefixLength`
 * characters must appear somewhere inside a catalog key. Short names that
 * are already canonical are recovered by the exact fallback.
 */

import { distance as levenshteinDistance } from 'fastest-levenshtein';
import type { CatalogEntry } from '@intake/core';
import { ReceivingError, normalizeName } from '@intake/core';

/** Sentinel returned when nothing in the catalog corresponds */
export const NO_CATALOG_MATCH = '';

export const DEFAULT_PREFIX_LENGTH = 15;

/**
 * How to choose among several prefix hits:
 * - first: earliest entry in catalog order
 * - closest: smallest edit distance to the full query (catalog order breaks ties)
 */
export type CatalogTieBreak = 'first' | 'closest';

export interface CatalogMatcherOptions {
  /** Characters of the normalized query used for the containment pass (default: 15) */
  prefixLength?: number;
  /** Default: 'first' */
  tieBreak?: CatalogTieBreak;
}

export type CatalogMatchKind = 'prefix' | 'exact';

export interface CatalogMatch {
  entry: CatalogEntry;
  kind: CatalogMatchKind;
}

/**
 * Leading `length` characters of `value`, counted in code points
 */
export function leadingChars(value: string, length: number): string {
  return Array.from(value).slice(0, length).join('');
}

export class CatalogMatcher {
  private readonly prefixLength: number;
  private readonly tieBreak: CatalogTieBreak;

  constructor(
    private readonly entries: readonly CatalogEntry[],
    options: CatalogMatcherOptions = {}
  ) {
    if (entries.length === 0) {
      throw new ReceivingError({
        code: 'CATALOG_EMPTY',
        stage: 'catalog',
        message: 'Catalog has no entries to match against',
      });
    }

    const prefixLength = options.prefixLength ?? DEFAULT_PREFIX_LENGTH;
    if (!Number.isInteger(prefixLength) || prefixLength < 1) {
      throw new ReceivingError({
        code: 'INVALID_CONFIG',
        stage: 'config',
        message: `catalog.prefixLength must be a positive integer (got ${prefixLength})`,
      });
    }

    this.prefixLength = prefixLength;
    this.tieBreak = options.tieBreak ?? 'first';
  }

  /**
   * Canonical name for `query`, or NO_CATALOG_MATCH.
   */
  match(query: string): string {
    return this.matchEntry(query)?.entry.canonicalName ?? NO_CATALOG_MATCH;
  }

  /**
   * Matched entry and the pass that found it, or null.
   */
  matchEntry(query: string): CatalogMatch | null {
    const normalized = normalizeName(query);
    if (!normalized) return null;

    const prefix = leadingChars(normalized, this.prefixLength);
    const prefixHits = this.entries.filter((e) => e.normalizedKey.includes(prefix));
    const best = this.pick(prefixHits, normalized);
    if (best) return { entry: best, kind: 'prefix' };

    const exact = this.entries.find((e) => e.normalizedKey === normalized);
    if (exact) return { entry: exact, kind: 'exact' };

    return null;
  }

  private pick(hits: CatalogEntry[], normalized: string): CatalogEntry | undefined {
    if (this.tieBreak === 'first' || hits.length < 2) return hits[0];

    let best: CatalogEntry | undefined;
    let bestDistance = Infinity;
    for (const hit of hits) {
      const d = levenshteinDistance(normalized, hit.normalizedKey);
      if (d < bestDistance) {
        best = hit;
        bestDistance = d;
      }
    }
    return best;
  }
}

/**
 * Factory function to create a CatalogMatcher
 */
export function createCatalogMatcher(
  entries: readonly CatalogEntry[],
  options?: CatalogMatcherOptions
): CatalogMatcher {
  return new CatalogMatcher(entries, options);
}
