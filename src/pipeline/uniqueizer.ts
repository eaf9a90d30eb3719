/**
 * Uniqueization engine: one stored Variant per account target.
 *
 * Failures are isolated per target. Retry policy:
 *   EncodeProcessFailed on hardware     → once more on the software fallback (when enabled)
 *   OutputValidationFailed / collision  → once more with the next draw
 * Anything else ends the target as UniqueizationFailed. NoEncoderAvailable
 * aborts the whole run, after the variants already uploaded are removed.
 */
import { join } from 'path';
import type { TransformBounds } from '../config.js';
import {
  EncodeProcessFailedError,
  NoEncoderAvailableError,
  OutputValidationFailedError,
  errorMessage,
} from '../errors.js';
import type { EncoderProvider } from '../media/encoder-capability.js';
import type { VariantEncoder } from '../media/encoder.js';
import { accountSalt, selectTransform } from '../media/transform.js';
import { logger } from '../utils/logger.js';
import { discardStoredVariants } from './cleanup.js';
import type {
  AccountTarget,
  EncodedFile,
  EncoderBackend,
  MediaStorage,
  PreDispatchFailure,
  SourceMedia,
  Variant,
} from './types.js';

export type Encoder = Pick<VariantEncoder, 'encode' | 'sessions'>;

export interface UniqueizeOptions {
  seed: string;
  batchId: string;
  bounds: TransformBounds;
  signal?: AbortSignal;
}

export interface UniqueizeResult {
  variants: Variant[];
  failures: PreDispatchFailure[];
}

interface EngineDeps {
  encoder: Encoder;
  capability: EncoderProvider;
  storage: MediaStorage;
  workDir: string;
}

const safeName = (s: string) => s.replace(/[^A-Za-z0-9_-]+/g, '_');

export class UniqueizationEngine {
  constructor(private readonly deps: EngineDeps) {}

  async uniqueize(
    source: SourceMedia,
    targets: AccountTarget[],
    opts: UniqueizeOptions,
  ): Promise<UniqueizeResult> {
    const primary = await this.deps.capability.resolve();
    const fallback = primary.hardware ? await this.deps.capability.softwareFallback() : null;

    const run = new UniqueizationRun(this.deps, source, opts, primary, fallback);
    return run.execute(targets);
  }
}

class UniqueizationRun {
  private readonly variants: Variant[] = [];
  private readonly failures: PreDispatchFailure[] = [];
  private readonly checksums = new Set<string>();
  private fatal: unknown = null;

  constructor(
    private readonly deps: EngineDeps,
    private readonly source: SourceMedia,
    private readonly opts: UniqueizeOptions,
    private readonly primary: EncoderBackend,
    private readonly fallback: EncoderBackend | null,
  ) {
    // The source itself never counts as a variant.
    this.checksums.add(source.checksum);
  }

  async execute(targets: AccountTarget[]): Promise<UniqueizeResult> {
    let next = 0;
    const worker = async () => {
      while (next < targets.length && this.fatal === null) {
        const target = targets[next++];
        if (!target) break;
        if (this.opts.signal?.aborted) {
          this.fail(target, 'Cancelled', 'batch cancelled before uniqueization started');
          continue;
        }
        try {
          await this.processTarget(target);
        } catch (err) {
          this.fatal = err;
        }
      }
    };

    const workers = Math.max(1, Math.min(this.deps.encoder.sessions, targets.length));
    await Promise.all(Array.from({ length: workers }, worker));

    if (this.fatal !== null) {
      await discardStoredVariants(this.deps.storage, this.variants);
      throw this.fatal;
    }

    logger.info('Uniqueizer: run complete', {
      batchId: this.opts.batchId, variants: this.variants.length, failures: this.failures.length,
    });
    return { variants: this.variants, failures: this.failures };
  }

  private fail(target: AccountTarget, reason: PreDispatchFailure['reason'], message: string): void {
    this.failures.push({ target, reason, message });
  }

  /** Throws only NoEncoderAvailableError; every other outcome is recorded. */
  private async processTarget(target: AccountTarget): Promise<void> {
    const salt = accountSalt(target);
    let backend = this.primary;
    let draw = 0;
    let switchedBackend = false;
    let redrawn = false;

    for (;;) {
      let encoded: EncodedFile;
      try {
        encoded = await this.encodeOnce(salt, draw, backend);
      } catch (err) {
        if (err instanceof NoEncoderAvailableError) throw err;

        const canRetry = !this.opts.signal?.aborted;
        if (canRetry && err instanceof EncodeProcessFailedError && backend.hardware && this.fallback && !switchedBackend) {
          logger.warn('Uniqueizer: hardware encode failed, retrying on software', { salt, error: err.message });
          switchedBackend = true;
          backend = this.fallback;
          continue;
        }
        if (canRetry && err instanceof OutputValidationFailedError && !redrawn) {
          logger.warn('Uniqueizer: output rejected, redrawing transform', { salt, check: err.check });
          redrawn = true;
          draw++;
          continue;
        }

        logger.error('Uniqueizer: target failed', { salt, error: errorMessage(err) });
        this.fail(target, 'UniqueizationFailed', errorMessage(err));
        return;
      }

      try {
        const key = `${this.opts.batchId}/${safeName(target.platform)}-${safeName(target.accountId)}.mp4`;
        const media = await this.deps.storage.store(encoded.path, key);
        this.variants.push({ ...encoded, id: `${this.opts.batchId}:${salt}`, target, media });
      } catch (err) {
        logger.error('Uniqueizer: storing variant failed', { salt, error: errorMessage(err) });
        this.fail(target, 'UniqueizationFailed', `storage: ${errorMessage(err)}`);
      }
      return;
    }
  }

  private async encodeOnce(salt: string, draw: number, backend: EncoderBackend): Promise<EncodedFile> {
    const spec = selectTransform(this.opts.seed, salt, this.opts.bounds, draw);
    const out = join(this.deps.workDir, this.opts.batchId, `${safeName(salt)}-d${draw}-${backend.name}.mp4`);
    const encoded = await this.deps.encoder.encode(this.source, spec, backend, out);

    if (this.checksums.has(encoded.checksum)) {
      throw new OutputValidationFailedError('checksum', 'variant collides with another file of this batch');
    }
    this.checksums.add(encoded.checksum);
    return encoded;
  }
}
