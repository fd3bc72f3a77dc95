import { afterEach, describe, expect, it } from 'vitest';
import { mkdtempSync, readdirSync, readFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import type { NormalizedReceivingRecord } from '@intake/core';
import { renderReceivingCsv, writeReceivingCsv } from '../src/index.js';

const matched: NormalizedReceivingRecord = {
  packageId: '1A1234ABCDEFGH',
  catalogProduct: 'Black Mamba Distillate 1G',
  room: 'Receiving Room',
  pricePerUnit: 60,
  costPerUnit: 24,
  quantity: 20,
  expirationDate: '01/27/27',
};

const unmatched: NormalizedReceivingRecord = {
  packageId: '',
  catalogProduct: '',
  room: 'Receiving Room',
  pricePerUnit: 2.5,
  costPerUnit: 1,
  quantity: 3,
  expirationDate: '',
};

let tmpDir = '';

afterEach(() => {
  if (tmpDir) {
    rmSync(tmpDir, { recursive: true, force: true });
    tmpDir = '';
  }
});

describe('renderReceivingCsv', () => {
  it('writes the import columns in fixed order', () => {
    expect(renderReceivingCsv([matched, unmatched])).toBe(
      'packageID,catalogProduct,room,PricePerUnit,costPerUnit,quantity,expDate\n' +
        '1A1234ABCDEFGH,Black Mamba Distillate 1G,Receiving Room,60,24,20,01/27/27\n' +
        ',,Receiving Room,2.5,1,3,\n'
    );
  });

  it('escapes values that a spreadsheet would evaluate', () => {
    const csv = renderReceivingCsv([{ ...matched, catalogProduct: '=SUM(A1)' }]);

    expect(csv.split('\n')[1]).toBe(
      "1A1234ABCDEFGH,'=SUM(A1),Receiving Room,60,24,20,01/27/27"
    );
  });

  it('leaves values untouched when sanitizing is disabled', () => {
    const csv = renderReceivingCsv([{ ...matched, catalogProduct: '=SUM(A1)' }], {
      sanitizeFormulas: false,
    });

    expect(csv.split('\n')[1]).toBe(
      '1A1234ABCDEFGH,=SUM(A1),Receiving Room,60,24,20,01/27/27'
    );
  });
});

describe('writeReceivingCsv', () => {
  it('creates the output directory and leaves no temp file', async () => {
    tmpDir = mkdtempSync(join(tmpdir(), 'connector-file-'));
    const outDir = join(tmpDir, 'output');
    const filePath = join(outDir, 'receiving_normalized.csv');

    await writeReceivingCsv([matched], filePath);

    expect(readFileSync(filePath, 'utf-8')).toBe(renderReceivingCsv([matched]));
    expect(readdirSync(outDir)).toEqual(['receiving_normalized.csv']);
  });
});
