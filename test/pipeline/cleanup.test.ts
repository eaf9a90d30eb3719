import { existsSync } from 'fs';
import { mkdir, mkdtemp, readdir, rm, utimes, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { discardStoredVariants, removeBatchFiles, sweepTempDir } from '../../src/pipeline/cleanup.js';
import { MemoryStorage, makeVariant, target } from '../helpers/fakes.js';

const HOUR = 3_600_000;

describe('cleanup', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'cleanup-test-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('sweeps entries older than the age limit and keeps fresh ones', async () => {
    const now = new Date('2030-01-01T12:00:00Z');
    const stale = new Date(now.getTime() - 30 * HOUR);
    const fresh = new Date(now.getTime() - HOUR);

    await mkdir(join(dir, 'old-batch'));
    await writeFile(join(dir, 'old-batch', 'v.mp4'), 'x');
    await utimes(join(dir, 'old-batch'), stale, stale);
    await writeFile(join(dir, 'old.mp4'), 'x');
    await utimes(join(dir, 'old.mp4'), stale, stale);
    await writeFile(join(dir, 'new.mp4'), 'x');
    await utimes(join(dir, 'new.mp4'), fresh, fresh);

    const removed = await sweepTempDir(dir, 24 * HOUR, now);

    expect(removed).toBe(2);
    expect(await readdir(dir)).toEqual(['new.mp4']);
  });

  it('treats a missing directory as clean', async () => {
    await expect(sweepTempDir(join(dir, 'missing'), HOUR)).resolves.toBe(0);
  });

  it('removes batch directories and ignores paths that are gone', async () => {
    const batch = join(dir, 'batch-1');
    await mkdir(batch);
    await writeFile(join(batch, 'a.mp4'), 'x');

    await removeBatchFiles([batch, join(dir, 'never-created')]);

    expect(existsSync(batch)).toBe(false);
  });

  it('discards stored variants and counts only the ones that went', async () => {
    const storage = new MemoryStorage();
    const variants = [makeVariant(target('1')), makeVariant(target('2'))];
    for (const v of variants) storage.stored.set(v.media.handle, '/local');
    storage.failRemoveKeys.add('batch/2.mp4');

    await expect(discardStoredVariants(storage, variants)).resolves.toBe(1);
    expect([...storage.stored.keys()]).toEqual(['batch/2.mp4']);
  });
});
