import { describe, expect, it } from 'vitest';
import {
  extractInvoiceRecords,
  extractManifestRecords,
  extractRecords,
  splitLines,
} from '../src/parsing/index.js';

const invoiceText = [
  'ACME DISTRIBUTION',
  'Invoice #1001',
  '',
  '  Black Mamba Distillate 1G   20   24.00   480.00  ',
  'Sour Haze Shatter 1G  10  30.00  300.00',
  '   ',
  'Total  780.00',
].join('\r\n');

describe('splitLines', () => {
  it('handles every line break style and drops blank lines', () => {
    expect(splitLines('a\r\nb\rc\n\n  d  \n')).toEqual(['a', 'b', 'c', 'd']);
  });

  it('breaks on form feeds, vertical tabs and Unicode separators', () => {
    expect(splitLines('a\fb\vc\u2028d\u2029e\x85f')).toEqual(['a', 'b', 'c', 'd', 'e', 'f']);
  });

  it('does not glue lines joined by a page break into one product name', () => {
    const text =
      'Black Mamba Distillate 1G   20   24.00   480.00\fSour Haze Shatter 1G  10  30.00  300.00';

    const { records } = extractInvoiceRecords(text, 'invoice-1.png');

    expect(records.map((r) => r.productName)).toEqual([
      'Black Mamba Distillate 1G',
      'Sour Haze Shatter 1G',
    ]);
  });
});

describe('extractInvoiceRecords', () => {
  it('keeps parsed lines, tags provenance and counts rejected lines', () => {
    let n = 0;
    const result = extractInvoiceRecords(invoiceText, 'invoice-1.png', () => `line-${++n}`);

    expect(result.records).toEqual([
      {
        sourceId: 'invoice-1.png',
        lineId: 'line-1',
        productName: 'Black Mamba Distillate 1G',
        quantity: 20,
        unitPrice: 24,
        lineTotal: 480,
      },
      {
        sourceId: 'invoice-1.png',
        lineId: 'line-2',
        productName: 'Sour Haze Shatter 1G',
        quantity: 10,
        unitPrice: 30,
        lineTotal: 300,
      },
    ]);
    expect(result.rejectedLines).toBe(3);
  });

  it('assigns a distinct UUID to every line by default', () => {
    const { records } = extractInvoiceRecords(invoiceText, 'invoice-1.png');

    expect(records).toHaveLength(2);
    for (const record of records) {
      expect(record.lineId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
    }
    expect(records[0]?.lineId).not.toBe(records[1]?.lineId);
  });

  it('returns no records for empty text', () => {
    expect(extractInvoiceRecords('', 'blank.png')).toEqual({ records: [], rejectedLines: 0 });
  });
});

describe('extractManifestRecords', () => {
  it('extracts package lines and skips the rest', () => {
    const text = [
      'METRC MANIFEST',
      '1A1234ABCDEFGH Black Mamba Distillate 1G   20   01/27/27',
      '1A1234ABCDEFGJ Sour Haze Shatter 1G   10',
    ].join('\n');

    expect(extractManifestRecords(text, 'manifest-1.png')).toEqual({
      records: [
        {
          sourceId: 'manifest-1.png',
          packageId: '1A1234ABCDEFGH',
          itemName: 'Black Mamba Distillate 1G',
          quantity: 20,
          expirationDate: '01/27/27',
        },
        {
          sourceId: 'manifest-1.png',
          packageId: '1A1234ABCDEFGJ',
          itemName: 'Sour Haze Shatter 1G',
          quantity: 10,
          expirationDate: '',
        },
      ],
      rejectedLines: 1,
    });
  });
});

describe('extractRecords', () => {
  it('dispatches on the line variant', () => {
    const manifest = extractRecords(
      '1A1234ABCDEFGH Black Mamba Distillate 1G   20   01/27/27\u2028noise',
      'manifest-1.png',
      'manifest'
    );
    const invoice = extractRecords(invoiceText, 'invoice-1.png', 'invoice');

    expect(manifest).toEqual({
      records: [
        {
          sourceId: 'manifest-1.png',
          packageId: '1A1234ABCDEFGH',
          itemName: 'Black Mamba Distillate 1G',
          quantity: 20,
          expirationDate: '01/27/27',
        },
      ],
      rejectedLines: 1,
    });
    expect(invoice.records.map((r) => r.productName)).toEqual([
      'Black Mamba Distillate 1G',
      'Sour Haze Shatter 1G',
    ]);
  });
});
