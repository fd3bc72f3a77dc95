/**
 * Line Grammars
 *
 * Recognized text is noisy; the only structural signal that survives OCR is
 * column alignment. Both grammars treat a run of two or more whitespace
 * characters as a field boundary, so a single space inside a product name
 * never splits it.
 *
 * Parsers return null for any line that does not fit. They never throw.
 */

/**
 * Invoice line: `<name>  <qty> <unit price> <line total>`
 *
 * The name is separated from the numbers by a column gap; the three numeric
 * fields close the line. Amounts may carry thousands separators.
 *
 * @example "Black Mamba Distillate 1G   20   24.00   480.00"
 */
export const INVOICE_LINE_PATTERN =
  /^(?<name>.+?)\s{2,}(?<qty>\d+)\s+(?<price>[0-9.,]+)\s+(?<total>[0-9.,]+)$/;

/**
 * Manifest line: `<package id> <item name>  <qty> [<date>]`
 *
 * The package id is "1A" followed by uppercase alphanumerics at the start of
 * the line. The date (D/D/YY up to DD/DD/YYYY) is optional and anything after
 * it is ignored.
 *
 * @example "1A1234ABCDEFGH Black Mamba Distillate 1G   20   01/27/27"
 */
export const MANIFEST_LINE_PATTERN =
  /^(?<packageId>1A[A-Z0-9]+).*?(?<itemName>.+?)\s{2,}(?<qty>\d+)\s*(?<expDate>\d{1,2}\/\d{1,2}\/\d{2,4})?/;

export type LineVariant = 'invoice' | 'manifest';

export interface ParsedInvoiceLine {
  productName: string;
  quantity: number;
  unitPrice: number;
  lineTotal: number;
}

export interface ParsedManifestLine {
  packageId: string;
  itemName: string;
  quantity: number;
  expirationDate: string;
}

/**
 * Parse an amount such as "2,640.00". Blank reads as 0.
 * Returns null for anything that is not a finite, non-negative number.
 */
export function parseAmount(raw: string): number | null {
  const cleaned = raw.replace(/,/g, '').trim();
  if (cleaned === '') return 0;

  const value = Number(cleaned);
  return Number.isFinite(value) && value >= 0 ? value : null;
}

function parseQuantity(raw: string): number | null {
  const value = Number.parseInt(raw, 10);
  return Number.isSafeInteger(value) && value >= 0 ? value : null;
}

export function parseInvoiceLine(line: string): ParsedInvoiceLine | null {
  const groups = INVOICE_LINE_PATTERN.exec(line)?.groups;
  if (!groups) return null;

  const productName = (groups.name ?? '').trim();
  const quantity = parseQuantity(groups.qty ?? '');
  const unitPrice = parseAmount(groups.price ?? '');
  const lineTotal = parseAmount(groups.total ?? '');

  if (!productName || quantity === null || unitPrice === null || lineTotal === null) {
    return null;
  }

  return { productName, quantity, unitPrice, lineTotal };
}

export function parseManifestLine(line: string): ParsedManifestLine | null {
  const groups = MANIFEST_LINE_PATTERN.exec(line)?.groups;
  if (!groups) return null;

  const packageId = (groups.packageId ?? '').trim();
  const itemName = (groups.itemName ?? '').trim();
  const quantity = parseQuantity(groups.qty ?? '');

  if (!packageId || !itemName || quantity === null) return null;

  return {
    packageId,
    itemName,
    quantity,
    expirationDate: (groups.expDate ?? '').trim(),
  };
}

/**
 * Parse one trimmed, non-empty line with the given variant's grammar
 */
export function parseLine(line: string, variant: 'invoice'): ParsedInvoiceLine | null;
export function parseLine(line: string, variant: 'manifest'): ParsedManifestLine | null;
export function parseLine(
  line: string,
  variant: LineVariant
): ParsedInvoiceLine | ParsedManifestLine | null;
export function parseLine(
  line: string,
  variant: LineVariant
): ParsedInvoiceLine | ParsedManifestLine | null {
  return variant === 'invoice' ? parseInvoiceLine(line) : parseManifestLine(line);
}
