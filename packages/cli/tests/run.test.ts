import { afterEach, describe, expect, it } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import type { ImageSource, TextRecognizer } from '@intake/core';
import { Logger } from '@intake/core';
import { parseConfig, runReceiving } from '../src/index.js';

let tmpDir = '';

afterEach(() => {
  if (tmpDir) {
    rmSync(tmpDir, { recursive: true, force: true });
    tmpDir = '';
  }
});

class CannedRecognizer implements TextRecognizer {
  readonly name = 'canned';
  readonly calls: string[] = [];

  constructor(private readonly texts: Record<string, string>) {}

  async recognize(image: ImageSource): Promise<string> {
    this.calls.push(image.id);
    return this.texts[image.id] ?? '';
  }
}

interface WorkDirLayout {
  catalog?: Record<string, string>;
  invoices?: string[];
  manifests?: string[];
}

function makeWorkDir(layout: WorkDirLayout): string {
  tmpDir = mkdtempSync(join(tmpdir(), 'intake-cli-'));
  const workDir = join(tmpDir, 'receiving_workdir');
  const dirs: Array<[string, Record<string, string>]> = [
    ['catalog', layout.catalog ?? {}],
    ['invoices', Object.fromEntries((layout.invoices ?? []).map((n) => [n, '']))],
    ['manifests', Object.fromEntries((layout.manifests ?? []).map((n) => [n, '']))],
  ];
  for (const [dir, files] of dirs) {
    if (Object.keys(files).length === 0) continue;
    mkdirSync(join(workDir, dir), { recursive: true });
    for (const [name, content] of Object.entries(files)) {
      writeFileSync(join(workDir, dir, name), content, 'utf-8');
    }
  }
  return workDir;
}

const CATALOG = {
  'vendor_catalog.csv': 'Product,Brand\nBlack Mamba Distillate 1G,Acme\nSour Haze Shatter 1G,Acme\n',
};

const TEXTS = {
  'invoice-1.png': [
    'ACME DISTRIBUTION           INVOICE 0042',
    'Black Mamba Distillate 1G   20   24.00   480.00',
    'Mystery Gummies 10pk   3   5.00   15.00',
    'TOTAL   495.00',
  ].join('\n'),
  'manifest-1.jpg': '1A1234ABCDEFGH Black Mamba Distillate 1G   20   01/27/27\n',
};

describe('runReceiving', () => {
  it('writes the normalized CSV for a vendor work directory', async () => {
    const workDir = makeWorkDir({
      catalog: CATALOG,
      invoices: ['invoice-1.png', 'notes.txt'],
      manifests: ['manifest-1.jpg'],
    });
    const recognizer = new CannedRecognizer(TEXTS);

    const result = await runReceiving({ config: parseConfig({ workDir }), recognizer });

    expect(recognizer.calls.sort()).toEqual(['invoice-1.png', 'manifest-1.jpg']);
    expect(result.written).toBe(true);
    expect(result.paths.outputFile).toBe(join(workDir, 'output', 'receiving_normalized.csv'));
    expect(readFileSync(result.paths.outputFile, 'utf-8')).toBe(
      'packageID,catalogProduct,room,PricePerUnit,costPerUnit,quantity,expDate\n' +
        '1A1234ABCDEFGH,Black Mamba Distillate 1G,Receiving Room,60,24,20,01/27/27\n' +
        ',,Receiving Room,12.5,5,3,\n'
    );
    expect(result.report.summary).toMatchObject({
      invoiceImages: 1,
      manifestImages: 1,
      invoiceLines: 2,
      manifestLines: 1,
      outputRows: 2,
      rowsWithoutCatalogMatch: 1,
    });
  });

  it('resolves a relative work directory against cwd', async () => {
    const workDir = makeWorkDir({ catalog: CATALOG, invoices: ['invoice-1.png'] });

    const result = await runReceiving({
      config: parseConfig({ workDir: 'receiving_workdir', room: 'Vault' }),
      recognizer: new CannedRecognizer(TEXTS),
      cwd: tmpDir,
    });

    expect(result.paths.workDir).toBe(workDir);
    expect(result.report.records.map((r) => r.room)).toEqual(['Vault', 'Vault']);
  });

  it('continues without a manifests directory and warns', async () => {
    const workDir = makeWorkDir({ catalog: CATALOG, invoices: ['invoice-1.png'] });
    const lines: string[] = [];

    const result = await runReceiving({
      config: parseConfig({ workDir }),
      recognizer: new CannedRecognizer(TEXTS),
      logger: new Logger({ sink: (line) => lines.push(line) }),
    });

    expect(result.report.records.map((r) => r.packageId)).toEqual(['', '']);
    expect(lines.some((l) => l.includes('WARN Image directory does not exist'))).toBe(true);
    expect(lines.some((l) => l.includes('WARN No manifest records'))).toBe(true);
  });

  it('leaves the output untouched on a dry run', async () => {
    const workDir = makeWorkDir({ catalog: CATALOG, invoices: ['invoice-1.png'] });

    const result = await runReceiving({
      config: parseConfig({ workDir }),
      recognizer: new CannedRecognizer(TEXTS),
      dryRun: true,
    });

    expect(result.written).toBe(false);
    expect(result.report.records).toHaveLength(2);
    expect(existsSync(join(workDir, 'output'))).toBe(false);
  });

  it('writes nothing when no invoice line can be parsed', async () => {
    const workDir = makeWorkDir({
      catalog: CATALOG,
      invoices: ['invoice-1.png'],
      manifests: ['manifest-1.jpg'],
    });
    const recognizer = new CannedRecognizer({ 'invoice-1.png': 'smudged beyond recognition' });

    await expect(
      runReceiving({ config: parseConfig({ workDir }), recognizer })
    ).rejects.toMatchObject({ code: 'NO_INVOICE_LINES' });
    expect(existsSync(join(workDir, 'output', 'receiving_normalized.csv'))).toBe(false);
  });

  it('stops before recognition when the catalog is missing', async () => {
    const workDir = makeWorkDir({ invoices: ['invoice-1.png'] });
    const recognizer = new CannedRecognizer(TEXTS);

    await expect(
      runReceiving({ config: parseConfig({ workDir }), recognizer })
    ).rejects.toMatchObject({ code: 'CATALOG_NOT_FOUND', stage: 'catalog' });
    expect(recognizer.calls).toEqual([]);
  });
});
