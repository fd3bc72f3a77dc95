/**
 * Image Source Enumerator
 * Lists the recognizable images of one source category directory
 */

import type { Dirent } from 'node:fs';
import { readdir } from 'node:fs/promises';
import { extname, join } from 'node:path';
import type { ImageSource, Logger } from '@intake/core';
import { ReceivingError, silentLogger } from '@intake/core';

export const IMAGE_EXTENSIONS: readonly string[] = ['.jpg', '.jpeg', '.png'];

/**
 * Image files directly inside `dir`, sorted by file name.
 * A missing directory yields an empty list.
 */
export async function listImageSources(
  dir: string,
  logger: Logger = silentLogger
): Promise<ImageSource[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      logger.warn('Image directory does not exist', { dir });
      return [];
    }
    throw new ReceivingError({
      code: 'SOURCE_READ_FAILED',
      stage: 'extraction',
      message: `Cannot list images in ${dir}`,
      suggestion: 'Check directory permissions.',
      cause: error instanceof Error ? error : undefined,
    });
  }

  return entries
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .filter((name) => IMAGE_EXTENSIONS.includes(extname(name).toLowerCase()))
    .sort()
    .map((name) => ({ id: name, path: join(dir, name) }));
}
