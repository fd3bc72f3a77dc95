import type {
  CatalogEntry,
  ImageSource,
  InvoiceLineRecord,
  ManifestLineRecord,
  TextRecognizer,
} from '@intake/core';
import { normalizeName } from '@intake/core';

/**
 * Recognizer that serves canned text per image id
 */
export class InMemoryRecognizer implements TextRecognizer {
  readonly name = 'in-memory';
  readonly calls: string[] = [];

  constructor(private readonly texts: Record<string, string>) {}

  async recognize(image: ImageSource): Promise<string> {
    this.calls.push(image.id);
    return this.texts[image.id] ?? '';
  }
}

export function images(...ids: string[]): ImageSource[] {
  return ids.map((id) => ({ id, path: `/work/${id}` }));
}

export function catalogOf(...names: string[]): CatalogEntry[] {
  return names.map((canonicalName) => ({
    canonicalName,
    normalizedKey: normalizeName(canonicalName),
  }));
}

let lineCounter = 0;

export function invoiceLine(
  productName: string,
  quantity: number,
  unitPrice: number
): InvoiceLineRecord {
  lineCounter++;
  return {
    sourceId: 'invoice-1.png',
    lineId: `line-${lineCounter}`,
    productName,
    quantity,
    unitPrice,
    lineTotal: quantity * unitPrice,
  };
}

export function manifestLine(
  packageId: string,
  itemName: string,
  quantity: number,
  expirationDate = ''
): ManifestLineRecord {
  return { sourceId: 'manifest-1.png', packageId, itemName, quantity, expirationDate };
}

/** Error thrown by `fn`, or undefined when it returns */
export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}
