import { ENCODER, RETENTION, getTransformBounds } from '../config.js';
import { supabaseLedger } from '../db/posts.js';
import { EncoderCapability } from '../media/encoder-capability.js';
import { VariantEncoder } from '../media/encoder.js';
import { nodeToolchain } from '../media/ffmpeg.js';
import { telegramNotifier } from '../monitoring/telegram.js';
import { SmmBoxClient } from '../platforms/smmbox.js';
import { SupabaseMediaStorage } from '../storage/supabase-storage.js';
import type { BatchDependencies } from './index.js';

let _capability: EncoderCapability | null = null;

/** One probe per process, shared by every batch and CLI command. */
export function getEncoderCapability(): EncoderCapability {
  if (!_capability) _capability = new EncoderCapability(nodeToolchain);
  return _capability;
}

/** Production wiring: ffmpeg on PATH, Supabase, SmmBox and Telegram. */
export function createDefaultDependencies(): BatchDependencies {
  return {
    toolchain:      nodeToolchain,
    capability:     getEncoderCapability(),
    encoder:        new VariantEncoder(nodeToolchain),
    storage:        new SupabaseMediaStorage(),
    provider:       new SmmBoxClient(),
    ledger:         supabaseLedger,
    notifier:       telegramNotifier,
    bounds:         getTransformBounds(),
    workDir:        RETENTION.tempDir,
    probeTimeoutMs: ENCODER.probeTimeoutMs,
  };
}
