/**
 * Reconciliation Report Formatter
 *
 * Formats a run report as plain text for the operator.
 */

import type { ReconciliationReport } from '../types/index.js';

const SAMPLE_SIZE = 10;

function percent(part: number, whole: number): string {
  return `${(whole > 0 ? (part / whole) * 100 : 0).toFixed(1)}%`;
}

function pushSample(lines: string[], title: string, items: string[]): void {
  if (items.length === 0) return;

  lines.push(`### ${title} (${items.length})`);
  for (const item of items.slice(0, SAMPLE_SIZE)) {
    lines.push(`- ${item}`);
  }
  if (items.length > SAMPLE_SIZE) {
    lines.push(`... and ${items.length - SAMPLE_SIZE} more`);
  }
  lines.push('');
}

/**
 * Format a reconciliation report as plain text
 */
export function formatReconciliationReport(report: ReconciliationReport): string {
  const lines: string[] = [];
  const { summary } = report;

  lines.push(`## Receiving Reconciliation`);
  lines.push(`Generated: ${report.timestamp.toISOString()}`);
  lines.push('');

  lines.push(`### Extraction`);
  lines.push(`- Invoice images: ${summary.invoiceImages} (${summary.invoiceLines} line items)`);
  lines.push(`- Manifest images: ${summary.manifestImages} (${summary.manifestLines} packages)`);
  lines.push(`- Unparsed lines: ${summary.rejectedLines}`);
  lines.push('');

  lines.push(`### Output`);
  lines.push(`- Rows: ${summary.outputRows}`);
  lines.push(
    `- With package id: ${summary.manifestMatchedRows} (${percent(summary.manifestMatchedRows, summary.outputRows)})`
  );
  lines.push(
    `- With catalog product: ${summary.catalogMatchedRows} (${percent(summary.catalogMatchedRows, summary.outputRows)})`
  );
  lines.push('');

  pushSample(lines, 'Products Without Manifest Line', report.productsWithoutManifest);
  pushSample(lines, 'Products Without Catalog Match', report.productsWithoutCatalogMatch);

  lines.push(`---`);
  lines.push(`Processing time: ${report.processingTimeMs}ms`);

  return lines.join('\n');
}
