/**
 * Variant storage on a Supabase Storage bucket. Objects are public so the
 * publishing provider can fetch them by URL.
 */
import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname } from 'path';
import type { SupabaseClient } from '@supabase/supabase-js';
import { env } from '../config.js';
import { getSupabase } from '../db/client.js';
import type { MediaStorage, StoredMedia } from '../pipeline/types.js';
import { logger } from '../utils/logger.js';
import { NonRetryableError, withRetry } from '../utils/retry.js';

const RETRY = { maxAttempts: 3, baseDelayMs: 2_000, backoffFactor: 2 } as const;

export class SupabaseMediaStorage implements MediaStorage {
  constructor(
    private readonly client: SupabaseClient = getSupabase(),
    private readonly bucket: string = env.STORAGE_BUCKET,
  ) {}

  async store(localPath: string, key: string): Promise<StoredMedia> {
    const body = await readFile(localPath);

    await withRetry(async () => {
      const { error } = await this.client.storage
        .from(this.bucket)
        .upload(key, body, { contentType: 'video/mp4', upsert: true });
      if (error) throw new Error(`Storage: upload of ${key} failed: ${error.message}`);
    }, RETRY);

    const { data } = this.client.storage.from(this.bucket).getPublicUrl(key);
    logger.info('Storage: variant uploaded', { key, bytes: body.length });
    return { handle: key, url: data.publicUrl };
  }

  async retrieve(handle: string, destination: string): Promise<string> {
    const blob = await withRetry(async () => {
      const { data, error } = await this.client.storage.from(this.bucket).download(handle);
      if (error) {
        // A missing object will not appear on retry.
        if (/not.?found/i.test(error.message)) {
          throw new NonRetryableError(`Storage: ${handle} not found in ${this.bucket}`, error);
        }
        throw new Error(`Storage: download of ${handle} failed: ${error.message}`);
      }
      return data;
    }, {
      ...RETRY,
      isRetryable: e => !(e instanceof NonRetryableError),
    });

    await mkdir(dirname(destination), { recursive: true });
    await writeFile(destination, Buffer.from(await blob.arrayBuffer()));
    logger.debug('Storage: object downloaded', { handle, destination });
    return destination;
  }

  async remove(handle: string): Promise<void> {
    const { error } = await this.client.storage.from(this.bucket).remove([handle]);
    if (error) throw new Error(`Storage: remove of ${handle} failed: ${error.message}`);
  }
}
