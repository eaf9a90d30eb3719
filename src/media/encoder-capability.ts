/**
 * Hardware encoder discovery. Probes once per instance (one instance per
 * process in production), caches the answer (including "nothing usable")
 * and shares a single in-flight probe between concurrent callers.
 */
import { ENCODER, type HardwareBackendKind } from '../config.js';
import { NoEncoderAvailableError, errorMessage } from '../errors.js';
import type { EncoderBackend } from '../pipeline/types.js';
import { logger } from '../utils/logger.js';
import { listEncoders, type MediaToolchain } from './ffmpeg.js';

export const HARDWARE_ENCODERS: Record<HardwareBackendKind, string> = {
  nvenc:        'h264_nvenc',
  qsv:          'h264_qsv',
  amf:          'h264_amf',
  videotoolbox: 'h264_videotoolbox',
};

export const SOFTWARE_BACKEND: EncoderBackend = { name: 'software', encoder: 'libx264', hardware: false };

export interface CapabilityOptions {
  preference: readonly HardwareBackendKind[];
  allowSoftware: boolean;
  probeTimeoutMs: number;
}

export interface EncoderSelection {
  primary: EncoderBackend | null;
  /** Software backend, offered only when enabled and the primary is hardware. */
  fallback: EncoderBackend | null;
  tried: string[];
}

/** What the uniqueization engine and the batch need from the probe. */
export interface EncoderProvider {
  resolve(): Promise<EncoderBackend>;
  softwareFallback(): Promise<EncoderBackend | null>;
}

export class EncoderCapability implements EncoderProvider {
  private probe: Promise<EncoderSelection> | null = null;

  constructor(
    private readonly toolchain: MediaToolchain,
    private readonly opts: CapabilityOptions = {
      preference:     ENCODER.preference,
      allowSoftware:  ENCODER.allowSoftware,
      probeTimeoutMs: ENCODER.probeTimeoutMs,
    },
  ) {}

  /** Cached probe result. */
  selection(): Promise<EncoderSelection> {
    if (!this.probe) this.probe = this.runProbe();
    return this.probe;
  }

  /** The backend every encode starts on. Throws NoEncoderAvailableError. */
  async resolve(): Promise<EncoderBackend> {
    const { primary, tried } = await this.selection();
    if (!primary) throw new NoEncoderAvailableError(tried);
    return primary;
  }

  async softwareFallback(): Promise<EncoderBackend | null> {
    return (await this.selection()).fallback;
  }

  private async runProbe(): Promise<EncoderSelection> {
    const tried: string[] = [];
    let available: Set<string>;
    try {
      available = await listEncoders(this.toolchain, this.opts.probeTimeoutMs);
    } catch (err) {
      logger.error('Encoder: could not list ffmpeg encoders', { error: errorMessage(err) });
      return { primary: null, fallback: null, tried: ['ffmpeg -encoders'] };
    }

    let primary: EncoderBackend | null = null;
    for (const kind of this.opts.preference) {
      const backend: EncoderBackend = { name: kind, encoder: HARDWARE_ENCODERS[kind], hardware: true };
      tried.push(kind);
      if (await this.usable(backend, available)) {
        primary = backend;
        break;
      }
    }

    let software: EncoderBackend | null = null;
    if (this.opts.allowSoftware) {
      tried.push(SOFTWARE_BACKEND.name);
      if (await this.usable(SOFTWARE_BACKEND, available)) software = SOFTWARE_BACKEND;
    }

    if (primary) {
      logger.info('Encoder: hardware backend selected', { backend: primary.name, encoder: primary.encoder });
      return { primary, fallback: software, tried };
    }
    if (software) {
      logger.warn('Encoder: no hardware encoder usable, running on software (libx264)', { tried });
      return { primary: software, fallback: null, tried };
    }
    logger.error('Encoder: no usable encoder backend', { tried });
    return { primary: null, fallback: null, tried };
  }

  /** Listed by the build and able to encode a single frame on this machine. */
  private async usable(backend: EncoderBackend, available: Set<string>): Promise<boolean> {
    if (!available.has(backend.encoder)) {
      logger.debug('Encoder: not compiled in', { encoder: backend.encoder });
      return false;
    }
    try {
      await this.toolchain.ffmpeg(
        [
          '-v', 'error',
          '-f', 'lavfi', '-i', 'color=c=black:s=256x256:d=0.1',
          '-frames:v', '1',
          '-c:v', backend.encoder,
          '-f', 'null', '-',
        ],
        { label: `testEncode:${backend.name}`, timeoutMs: this.opts.probeTimeoutMs },
      );
      return true;
    } catch (err) {
      logger.debug('Encoder: test encode failed', { encoder: backend.encoder, error: errorMessage(err) });
      return false;
    }
  }
}
