/**
 * Empty the cache directory. The directory itself stays in place.
 */

import fs from 'fs';
import path from 'path';
import { logger } from '../logger';
import { isMissingFileError } from '../resolver/path-resolver';

export interface ClearCacheResult {
  cacheDir: string;
  removed: string[];
}

export async function clearCache(cacheDir: string): Promise<ClearCacheResult> {
  const root = path.resolve(cacheDir);
  let names: string[];
  try {
    names = await fs.promises.readdir(root);
  } catch (err) {
    if (isMissingFileError(err)) {
      logger.info('Cache directory does not exist; nothing to clear', { cacheDir: root });
      return { cacheDir: root, removed: [] };
    }
    throw err;
  }

  for (const name of names) {
    await fs.promises.rm(path.join(root, name), { recursive: true, force: true });
  }
  logger.info('Cache cleared', { cacheDir: root, removed: names.length });
  return { cacheDir: root, removed: names.sort() };
}
