import { describe, expect, it } from 'vitest';
import {
  EncodeProcessFailedError,
  NoEncoderAvailableError,
  OutputValidationFailedError,
} from '../../src/errors.js';
import { SOFTWARE_BACKEND, type EncoderProvider } from '../../src/media/encoder-capability.js';
import { UniqueizationEngine, type Encoder } from '../../src/pipeline/uniqueizer.js';
import type { EncodedFile, EncoderBackend, SourceMedia, TransformSpec } from '../../src/pipeline/types.js';
import { hashString } from '../../src/utils/hash.js';
import { MemoryStorage, bounds, makeSource, target } from '../helpers/fakes.js';

const NVENC: EncoderBackend = { name: 'nvenc', encoder: 'h264_nvenc', hardware: true };

type Behaviour = (spec: TransformSpec, backend: EncoderBackend, outputPath: string) => EncodedFile | Error;

class ScriptedEncoder implements Encoder {
  readonly sessions = 1;
  readonly calls: Array<{ salt: string; draw: number; backend: string }> = [];

  constructor(private readonly behaviour: Behaviour = (spec, backend, path) => encoded(spec, backend, path)) {}

  async encode(_source: SourceMedia, spec: TransformSpec, backend: EncoderBackend, outputPath: string): Promise<EncodedFile> {
    this.calls.push({ salt: spec.salt, draw: spec.draw, backend: backend.name });
    const result = this.behaviour(spec, backend, outputPath);
    if (result instanceof Error) throw result;
    return result;
  }
}

function encoded(spec: TransformSpec, backend: EncoderBackend, path: string, checksum = hashString(path)): EncodedFile {
  return { path, spec, checksum, backend: backend.name, durationSec: 10 };
}

const capability = (fallback: EncoderBackend | null = null, primary: EncoderBackend = NVENC): EncoderProvider => ({
  resolve: async () => primary,
  softwareFallback: async () => fallback,
});

const encodeFailure = () => new EncodeProcessFailedError('nvenc crashed', { name: 'nvenc', hardware: true }, { exitCode: 1 });

const source = makeSource('/in/source.mp4');
const opts = { seed: 'seed-1', batchId: 'batch-1', bounds: bounds() };

function engine(encoder: Encoder, storage = new MemoryStorage(), cap = capability()) {
  return new UniqueizationEngine({ encoder, capability: cap, storage, workDir: '/tmp/work' });
}

describe('UniqueizationEngine', () => {
  it('produces and stores one distinct variant per account', async () => {
    const storage = new MemoryStorage();
    const targets = [target('1'), target('2', 'instagram'), target('3', 'youtube')];

    const { variants, failures } = await engine(new ScriptedEncoder(), storage).uniqueize(source, targets, opts);

    expect(failures).toEqual([]);
    expect(variants.map(v => v.target)).toEqual(targets);
    expect(new Set(variants.map(v => v.checksum)).size).toBe(3);
    expect(variants.map(v => v.spec.salt)).toEqual(['vk:1', 'instagram:2', 'youtube:3']);
    expect([...storage.stored.keys()]).toEqual([
      'batch-1/vk-1.mp4',
      'batch-1/instagram-2.mp4',
      'batch-1/youtube-3.mp4',
    ]);
    expect(variants[0]?.media.url).toBe('https://cdn.test/batch-1/vk-1.mp4');
    expect(variants[0]?.path).toBe('/tmp/work/batch-1/vk_1-d0-nvenc.mp4');
  });

  it('retries a failed hardware encode once on the software fallback', async () => {
    const encoder = new ScriptedEncoder((spec, backend, path) =>
      backend.hardware ? encodeFailure() : encoded(spec, backend, path));

    const { variants, failures } = await engine(encoder, undefined, capability(SOFTWARE_BACKEND))
      .uniqueize(source, [target('1')], opts);

    expect(failures).toEqual([]);
    expect(variants[0]?.backend).toBe('software');
    expect(encoder.calls.map(c => c.backend)).toEqual(['nvenc', 'software']);
  });

  it('fails the account when the hardware encode fails and no fallback is configured', async () => {
    const encoder = new ScriptedEncoder(() => encodeFailure());

    const { variants, failures } = await engine(encoder).uniqueize(source, [target('1')], opts);

    expect(variants).toEqual([]);
    expect(failures).toEqual([{ target: target('1'), reason: 'UniqueizationFailed', message: 'nvenc crashed' }]);
    expect(encoder.calls).toHaveLength(1);
  });

  it('redraws the transform once when the output is rejected', async () => {
    const encoder = new ScriptedEncoder((spec, backend, path) =>
      spec.draw === 0 ? new OutputValidationFailedError('duration', 'too short') : encoded(spec, backend, path));

    const { variants } = await engine(encoder).uniqueize(source, [target('1')], opts);

    expect(variants[0]?.spec.draw).toBe(1);
    expect(encoder.calls.map(c => c.draw)).toEqual([0, 1]);
  });

  it('gives up after a second rejected output', async () => {
    const encoder = new ScriptedEncoder(() => new OutputValidationFailedError('decode', 'truncated'));

    const { failures } = await engine(encoder).uniqueize(source, [target('1')], opts);

    expect(failures).toEqual([{
      target: target('1'),
      reason: 'UniqueizationFailed',
      message: 'Output validation failed (decode): truncated',
    }]);
    expect(encoder.calls).toHaveLength(2);
  });

  it('redraws an account whose output collides with another variant', async () => {
    const encoder = new ScriptedEncoder((spec, backend, path) =>
      encoded(spec, backend, path, spec.draw === 0 ? 'same-checksum' : `unique-${spec.salt}`));

    const { variants, failures } = await engine(encoder).uniqueize(source, [target('1'), target('2')], opts);

    expect(failures).toEqual([]);
    expect(variants.map(v => v.checksum)).toEqual(['same-checksum', 'unique-vk:2']);
    expect(variants[1]?.spec.draw).toBe(1);
  });

  it('treats a variant identical to the source as a collision', async () => {
    const encoder = new ScriptedEncoder((spec, backend, path) =>
      encoded(spec, backend, path, spec.draw === 0 ? source.checksum : 'fresh'));

    const { variants } = await engine(encoder).uniqueize(source, [target('1')], opts);
    expect(variants[0]?.checksum).toBe('fresh');
  });

  it('isolates one failing account from the rest', async () => {
    const encoder = new ScriptedEncoder((spec, backend, path) =>
      spec.salt === 'vk:2' ? new Error('disk full') : encoded(spec, backend, path));

    const { variants, failures } = await engine(encoder)
      .uniqueize(source, [target('1'), target('2'), target('3')], opts);

    expect(variants.map(v => v.target.accountId)).toEqual(['1', '3']);
    expect(failures).toEqual([{ target: target('2'), reason: 'UniqueizationFailed', message: 'disk full' }]);
  });

  it('records a storage failure against the account', async () => {
    const storage = new MemoryStorage();
    storage.failKeys.add('batch-1/vk-2.mp4');

    const { variants, failures } = await engine(new ScriptedEncoder(), storage)
      .uniqueize(source, [target('1'), target('2')], opts);

    expect(variants).toHaveLength(1);
    expect(failures).toEqual([{
      target: target('2'),
      reason: 'UniqueizationFailed',
      message: 'storage: upload of batch-1/vk-2.mp4 refused',
    }]);
  });

  it('propagates NoEncoderAvailable without encoding anything', async () => {
    const encoder = new ScriptedEncoder();
    const cap: EncoderProvider = {
      resolve: async () => { throw new NoEncoderAvailableError(['nvenc']); },
      softwareFallback: async () => null,
    };

    await expect(engine(encoder, undefined, cap).uniqueize(source, [target('1')], opts))
      .rejects.toBeInstanceOf(NoEncoderAvailableError);
    expect(encoder.calls).toEqual([]);
  });

  it('removes the variants already uploaded when the encoder goes away mid-run', async () => {
    const storage = new MemoryStorage();
    const encoder = new ScriptedEncoder((spec, backend, path) =>
      spec.salt === 'vk:2' ? new NoEncoderAvailableError(['nvenc']) : encoded(spec, backend, path));

    await expect(engine(encoder, storage).uniqueize(source, [target('1'), target('2')], opts))
      .rejects.toBeInstanceOf(NoEncoderAvailableError);
    expect(encoder.calls.map(c => c.salt)).toEqual(['vk:1', 'vk:2']);
    expect(storage.stored.size).toBe(0);
  });

  it('cancels every account when the batch is already aborted', async () => {
    const encoder = new ScriptedEncoder();
    const controller = new AbortController();
    controller.abort();

    const { variants, failures } = await engine(encoder)
      .uniqueize(source, [target('1'), target('2')], { ...opts, signal: controller.signal });

    expect(variants).toEqual([]);
    expect(failures.map(f => f.reason)).toEqual(['Cancelled', 'Cancelled']);
    expect(encoder.calls).toEqual([]);
  });

  it('finishes the running encode and cancels the accounts not started', async () => {
    const controller = new AbortController();
    const encoder = new ScriptedEncoder((spec, backend, path) => {
      controller.abort();
      return encoded(spec, backend, path);
    });

    const { variants, failures } = await engine(encoder)
      .uniqueize(source, [target('1'), target('2'), target('3')], { ...opts, signal: controller.signal });

    expect(variants.map(v => v.target.accountId)).toEqual(['1']);
    expect(failures).toEqual([
      { target: target('2'), reason: 'Cancelled', message: 'batch cancelled before uniqueization started' },
      { target: target('3'), reason: 'Cancelled', message: 'batch cancelled before uniqueization started' },
    ]);
  });
});
