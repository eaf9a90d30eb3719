import { readdir, rm, stat } from 'fs/promises';
import { join } from 'path';
import { RETENTION } from '../config.js';
import { errorMessage } from '../errors.js';
import { logger } from '../utils/logger.js';
import type { MediaStorage, Variant } from './types.js';

/**
 * Remove top-level entries of `dir` last modified more than `maxAgeMs` ago.
 * A missing directory counts as clean. Returns the number of entries removed.
 */
export async function sweepTempDir(
  dir: string = RETENTION.tempDir,
  maxAgeMs: number = RETENTION.tempMaxAgeMs,
  now: Date = new Date(),
): Promise<number> {
  let entries: string[];
  try {
    entries = await readdir(dir);
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return 0;
    throw err;
  }

  let removed = 0;
  for (const name of entries) {
    const full = join(dir, name);
    try {
      const { mtimeMs } = await stat(full);
      if (now.getTime() - mtimeMs <= maxAgeMs) continue;
      await rm(full, { recursive: true, force: true });
      removed++;
    } catch (err) {
      logger.warn('Sweep: could not remove entry', { path: full, error: errorMessage(err) });
    }
  }

  logger.info('Sweep: temp directory cleaned', { dir, removed });
  return removed;
}

/** Delete a batch's working files; failures are logged only. */
export async function removeBatchFiles(paths: string[]): Promise<void> {
  for (const p of paths) {
    await rm(p, { recursive: true, force: true }).catch((err: unknown) => {
      logger.warn('Cleanup: could not remove batch files', { path: p, error: errorMessage(err) });
    });
  }
}

/**
 * Delete uploaded variants that will never be published, so they do not stay
 * behind in the public bucket. Failures are logged; returns how many went.
 */
export async function discardStoredVariants(storage: MediaStorage, variants: Variant[]): Promise<number> {
  let removed = 0;
  for (const variant of variants) {
    try {
      await storage.remove(variant.media.handle);
      removed++;
    } catch (err) {
      logger.warn('Cleanup: could not remove stored variant', { handle: variant.media.handle, error: errorMessage(err) });
    }
  }
  if (variants.length) logger.info('Cleanup: unpublished variants removed', { removed, of: variants.length });
  return removed;
}
