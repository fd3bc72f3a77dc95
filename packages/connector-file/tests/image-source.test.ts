import { afterEach, describe, expect, it } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { listImageSources } from '../src/index.js';

let tmpDir = '';

afterEach(() => {
  if (tmpDir) {
    rmSync(tmpDir, { recursive: true, force: true });
    tmpDir = '';
  }
});

describe('listImageSources', () => {
  it('returns jpg, jpeg and png files in any case, sorted by name', async () => {
    tmpDir = mkdtempSync(join(tmpdir(), 'connector-file-'));
    for (const name of ['c.JPEG', 'a.jpg', 'b.PNG', 'notes.txt', 'scan.gif']) {
      writeFileSync(join(tmpDir, name), '');
    }
    mkdirSync(join(tmpDir, 'nested.png'));

    const images = await listImageSources(tmpDir);

    expect(images).toEqual([
      { id: 'a.jpg', path: join(tmpDir, 'a.jpg') },
      { id: 'b.PNG', path: join(tmpDir, 'b.PNG') },
      { id: 'c.JPEG', path: join(tmpDir, 'c.JPEG') },
    ]);
  });

  it('returns an empty list for a missing directory', async () => {
    tmpDir = mkdtempSync(join(tmpdir(), 'connector-file-'));

    await expect(listImageSources(join(tmpDir, 'manifests'))).resolves.toEqual([]);
  });
});
