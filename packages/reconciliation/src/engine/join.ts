/**
 * Invoice ↔ manifest join
 */

import type { InvoiceLineRecord, ManifestLineRecord } from '@intake/core';
import { normalizeName } from '@intake/core';
import type { JoinedRow } from '../types/index.js';

/**
 * Left outer join of invoice lines to manifest lines on normalized name.
 *
 * Every invoice line is kept. An invoice line with several same-named
 * manifest lines fans out into one row per manifest line, in manifest order;
 * one without any yields a single row with `manifest: null`.
 */
export function joinManifests(
  invoices: readonly InvoiceLineRecord[],
  manifests: readonly ManifestLineRecord[]
): JoinedRow[] {
  const byName = new Map<string, ManifestLineRecord[]>();
  for (const manifest of manifests) {
    const key = normalizeName(manifest.itemName);
    const bucket = byName.get(key);
    if (bucket) bucket.push(manifest);
    else byName.set(key, [manifest]);
  }

  const rows: JoinedRow[] = [];
  for (const invoice of invoices) {
    const matches = byName.get(normalizeName(invoice.productName));
    if (!matches) {
      rows.push({ invoice, manifest: null });
      continue;
    }
    for (const manifest of matches) {
      rows.push({ invoice, manifest });
    }
  }
  return rows;
}
