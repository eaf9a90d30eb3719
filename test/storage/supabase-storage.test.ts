import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { createClient } from '@supabase/supabase-js';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { SupabaseMediaStorage } from '../../src/storage/supabase-storage.js';

const SUPABASE_URL = 'https://test.supabase.co';

describe('SupabaseMediaStorage', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'storage-test-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const storageWith = (fetchImpl: typeof fetch) => {
    const fakeFetch = vi.fn(fetchImpl);
    const client = createClient(SUPABASE_URL, 'test-service-key', {
      auth: { persistSession: false },
      global: { fetch: fakeFetch },
    });
    return { storage: new SupabaseMediaStorage(client, 'variants'), fakeFetch };
  };

  it('uploads a variant and returns its public url', async () => {
    const file = join(dir, 'v.mp4');
    await writeFile(file, 'variant-bytes');
    const { storage, fakeFetch } = storageWith(async () =>
      new Response(JSON.stringify({ Key: 'variants/batch-1/vk-1.mp4', Id: 'obj-1' }), {
        status: 200,
        headers: { 'Content-Type': 'application/json' },
      }));

    const stored = await storage.store(file, 'batch-1/vk-1.mp4');

    expect(stored).toEqual({
      handle: 'batch-1/vk-1.mp4',
      url: `${SUPABASE_URL}/storage/v1/object/public/variants/batch-1/vk-1.mp4`,
    });
    expect(String(fakeFetch.mock.calls[0]?.[0])).toBe(`${SUPABASE_URL}/storage/v1/object/variants/batch-1/vk-1.mp4`);
  });

  it('downloads an object to the destination', async () => {
    const { storage } = storageWith(async () => new Response('source-bytes', { status: 200 }));
    const destination = join(dir, 'nested', 'source.mp4');

    await expect(storage.retrieve('uploads/clip.mp4', destination)).resolves.toBe(destination);
    expect(await readFile(destination, 'utf8')).toBe('source-bytes');
  });

  it('deletes an object from the bucket', async () => {
    const { storage, fakeFetch } = storageWith(async () =>
      new Response(JSON.stringify([{ name: 'batch-1/vk-1.mp4' }]), {
        status: 200,
        headers: { 'Content-Type': 'application/json' },
      }));

    await expect(storage.remove('batch-1/vk-1.mp4')).resolves.toBeUndefined();

    const [url, init] = fakeFetch.mock.calls[0] ?? [];
    expect(String(url)).toBe(`${SUPABASE_URL}/storage/v1/object/variants`);
    expect(init?.method).toBe('DELETE');
    expect(JSON.parse(String(init?.body))).toEqual({ prefixes: ['batch-1/vk-1.mp4'] });
  });

  it('reports a refused delete', async () => {
    const { storage } = storageWith(async () =>
      new Response(JSON.stringify({ statusCode: '403', error: 'Unauthorized', message: 'not allowed' }), {
        status: 403,
        headers: { 'Content-Type': 'application/json' },
      }));

    await expect(storage.remove('batch-1/vk-1.mp4')).rejects.toThrow('Storage: remove of batch-1/vk-1.mp4 failed');
  });
});
