/**
 * Variant encoder: turns (source, TransformSpec, backend) into one encoded
 * file and proves it usable before anyone uploads it.
 *
 * Filter chain, in order:
 *   crop → scale by (1 + scaleDelta) → scale back to source size → hue →
 *   eq (brightness/contrast/saturation/gamma) → noise → setpts (speed)
 * Audio (when present): asetrate/aresample for pitch, atempo for speed.
 */
import { mkdir, rm, stat } from 'fs/promises';
import { dirname } from 'path';
import { ENCODER, getTransformBounds, type TransformBounds } from '../config.js';
import { EncodeProcessFailedError, OutputValidationFailedError, errorMessage } from '../errors.js';
import type { EncodedFile, EncoderBackend, SourceMedia, TransformSpec } from '../pipeline/types.js';
import { hashFile } from '../utils/hash.js';
import { logger } from '../utils/logger.js';
import { Semaphore } from '../utils/semaphore.js';
import { decodeTail, probeMedia, ToolError, type MediaToolchain, type MediaProbe } from './ffmpeg.js';
import { boundsViolations } from './transform.js';

// Tags the mp4 muxer writes on its own; anything else is leaked metadata.
export const STRUCTURAL_TAGS = new Set(['major_brand', 'minor_version', 'compatible_brands', 'encoder']);

const FALLBACK_SOURCE_KBPS = 4_000;
const DEFAULT_SAMPLE_RATE = 44_100;

export interface VariantEncoderOptions {
  sessions: number;
  timeoutMs: number;
  probeTimeoutMs: number;
  durationToleranceSec: number;
  minBitrateKbps: number;
  /** Current bounds; re-read on every encode. */
  bounds: () => TransformBounds;
}

export const defaultEncoderOptions = (): VariantEncoderOptions => ({
  sessions:             ENCODER.sessions,
  timeoutMs:            ENCODER.timeoutMs,
  probeTimeoutMs:       ENCODER.probeTimeoutMs,
  durationToleranceSec: ENCODER.durationToleranceSec,
  minBitrateKbps:       ENCODER.minBitrateKbps,
  bounds:               getTransformBounds,
});

// ── Argument construction ─────────────────────────────────────────────────────

const fmt = (n: number): string => String(Number(n.toFixed(4)));

const even = (n: number): number => Math.max(2, Math.round(n / 2) * 2);

export function buildVideoFilter(source: SourceMedia, spec: TransformSpec): string {
  const { width: w, height: h } = source;
  const filters: string[] = [];

  const crop = spec.cropPx;
  if (crop > 0 && w - 2 * crop > 0 && h - 2 * crop > 0) {
    filters.push(`crop=${w - 2 * crop}:${h - 2 * crop}:${crop}:${crop}`);
  }
  if (spec.scaleDelta !== 0) {
    filters.push(`scale=${even(w * (1 + spec.scaleDelta))}:${even(h * (1 + spec.scaleDelta))}`);
  }
  filters.push(`scale=${w}:${h}`, 'setsar=1');
  filters.push(`hue=h=${fmt(spec.hueShiftDeg)}`);
  filters.push(
    `eq=brightness=${fmt(spec.brightness)}:contrast=${fmt(spec.contrast)}` +
    `:saturation=${fmt(spec.saturation)}:gamma=${fmt(spec.gamma)}`,
  );
  if (spec.noiseLevel > 0) {
    filters.push(`noise=alls=${spec.noiseLevel}:allf=${spec.noiseMode}`);
  }
  filters.push(`setpts=PTS/${fmt(spec.speedFactor)}`);
  filters.push('format=yuv420p');

  return filters.join(',');
}

/** Pitch shift by resampling, then correct tempo so the net speed is speedFactor. */
export function buildAudioFilter(source: SourceMedia, spec: TransformSpec): string {
  const rate = source.sampleRate ?? DEFAULT_SAMPLE_RATE;
  const pitch = Math.pow(2, spec.audioPitchSemitones / 12);
  return [
    `asetrate=${Math.round(rate * pitch)}`,
    `aresample=${rate}`,
    `atempo=${fmt(spec.speedFactor / pitch)}`,
  ].join(',');
}

export function targetBitrateKbps(source: SourceMedia, spec: TransformSpec, minKbps: number): number {
  const base = source.bitRateKbps ?? FALLBACK_SOURCE_KBPS;
  return Math.max(minKbps, Math.round(base * spec.bitrateFactor));
}

export function codecArgs(backend: EncoderBackend, kbps: number): string[] {
  const rate    = `${kbps}k`;
  const maxrate = `${Math.round(kbps * 1.5)}k`;
  const bufsize = `${kbps * 2}k`;

  switch (backend.name) {
    case 'nvenc':
      return ['-c:v', backend.encoder, '-preset', 'p4', '-rc', 'vbr', '-b:v', rate, '-maxrate', maxrate, '-bufsize', bufsize];
    case 'qsv':
      return ['-c:v', backend.encoder, '-preset', 'medium', '-b:v', rate, '-maxrate', maxrate];
    case 'amf':
      return ['-c:v', backend.encoder, '-quality', 'balanced', '-rc', 'vbr_peak', '-b:v', rate, '-maxrate', maxrate];
    case 'videotoolbox':
      return ['-c:v', backend.encoder, '-b:v', rate];
    case 'software':
      return ['-c:v', backend.encoder, '-preset', 'medium', '-b:v', rate, '-maxrate', maxrate, '-bufsize', bufsize];
  }
}

export function buildEncodeArgs(
  source: SourceMedia,
  spec: TransformSpec,
  backend: EncoderBackend,
  outputPath: string,
  minBitrateKbps: number,
): string[] {
  const audio = source.hasAudio
    ? ['-map', '0:a:0', '-af', buildAudioFilter(source, spec), '-c:a', 'aac', '-b:a', '128k', '-flags:a', '+bitexact']
    : ['-an'];

  return [
    '-i', source.path,
    '-map', '0:v:0',
    '-vf', buildVideoFilter(source, spec),
    ...codecArgs(backend, targetBitrateKbps(source, spec, minBitrateKbps)),
    '-flags:v', '+bitexact',
    ...audio,
    '-sn', '-dn',
    '-map_metadata', '-1',
    '-map_chapters', '-1',
    '-fflags', '+bitexact',
    '-movflags', '+faststart',
    '-f', 'mp4',
    outputPath,
  ];
}

// ── Encoder ───────────────────────────────────────────────────────────────────

export class VariantEncoder {
  private readonly session: Semaphore;

  constructor(
    private readonly toolchain: MediaToolchain,
    private readonly opts: VariantEncoderOptions = defaultEncoderOptions(),
  ) {
    this.session = new Semaphore(opts.sessions);
  }

  get sessions(): number {
    return this.opts.sessions;
  }

  /**
   * Encode and validate one variant. Throws EncodeProcessFailedError when
   * ffmpeg fails, OutputValidationFailedError when the spec is out of bounds
   * or the output is unusable. A failed output file is removed.
   */
  async encode(
    source: SourceMedia,
    spec: TransformSpec,
    backend: EncoderBackend,
    outputPath: string,
  ): Promise<EncodedFile> {
    const violations = boundsViolations(spec, this.opts.bounds());
    if (violations.length) {
      throw new OutputValidationFailedError('bounds', violations.join('; '));
    }

    const args = buildEncodeArgs(source, spec, backend, outputPath, this.opts.minBitrateKbps);
    await mkdir(dirname(outputPath), { recursive: true });

    const started = Date.now();
    await this.session.run(async () => {
      try {
        await this.toolchain.ffmpeg(args, { label: `encode:${backend.name}`, timeoutMs: this.opts.timeoutMs });
      } catch (err) {
        await rm(outputPath, { force: true });
        if (err instanceof ToolError) {
          throw new EncodeProcessFailedError(
            `Encode on ${backend.name} failed: ${err.message}`,
            { name: backend.name, hardware: backend.hardware },
            { exitCode: err.exitCode, timedOut: err.timedOut, stderrTail: err.stderrTail },
            { cause: err },
          );
        }
        throw err;
      }
    });

    try {
      const result = await this.validate(source, spec, backend, outputPath);
      logger.debug('Encoder: variant validated', {
        salt: spec.salt, draw: spec.draw, backend: backend.name, ms: Date.now() - started,
      });
      return result;
    } catch (err) {
      await rm(outputPath, { force: true });
      throw err;
    }
  }

  private async validate(
    source: SourceMedia,
    spec: TransformSpec,
    backend: EncoderBackend,
    outputPath: string,
  ): Promise<EncodedFile> {
    const size = await stat(outputPath).then(s => s.size, () => 0);
    if (size === 0) throw new OutputValidationFailedError('exists', `${outputPath} is missing or empty`);

    let probe: MediaProbe;
    try {
      probe = await probeMedia(this.toolchain, outputPath, this.opts.probeTimeoutMs);
    } catch (err) {
      throw new OutputValidationFailedError('probe', errorMessage(err));
    }

    if (!probe.hasVideo) throw new OutputValidationFailedError('video-stream', 'output has no video stream');

    if (probe.width !== source.width || probe.height !== source.height) {
      throw new OutputValidationFailedError(
        'resolution',
        `${probe.width}x${probe.height} differs from source ${source.width}x${source.height}`,
      );
    }

    const expected = source.durationSec / spec.speedFactor;
    if (Math.abs(probe.durationSec - expected) > this.opts.durationToleranceSec) {
      throw new OutputValidationFailedError(
        'duration',
        `${probe.durationSec.toFixed(3)}s, expected ${expected.toFixed(3)}s ± ${this.opts.durationToleranceSec}s`,
      );
    }

    try {
      await decodeTail(this.toolchain, outputPath, this.opts.probeTimeoutMs);
    } catch (err) {
      throw new OutputValidationFailedError('decode', errorMessage(err));
    }

    const leaked = Object.keys(probe.tags).filter(k => !STRUCTURAL_TAGS.has(k.toLowerCase()));
    if (leaked.length) {
      throw new OutputValidationFailedError('metadata', `container tags remain: ${leaked.join(', ')}`);
    }

    const checksum = await hashFile(outputPath);
    if (checksum === source.checksum) {
      throw new OutputValidationFailedError('checksum', 'output is byte-identical to the source');
    }

    return { path: outputPath, spec, checksum, backend: backend.name, durationSec: probe.durationSec };
  }
}
