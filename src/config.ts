import { readFileSync } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';

dotenvConfig();

// ── Domain Types ─────────────────────────────────────────────────────────────

export const PLATFORMS = ['vk', 'instagram', 'youtube', 'pinterest'] as const;
export type Platform = typeof PLATFORMS[number];

export const ACCOUNT_TYPES = ['user', 'group', 'page'] as const;
export type AccountType = typeof ACCOUNT_TYPES[number];

export const HARDWARE_BACKENDS = ['nvenc', 'qsv', 'amf', 'videotoolbox'] as const;
export type HardwareBackendKind = typeof HARDWARE_BACKENDS[number];

// ── Env Schema ────────────────────────────────────────────────────────────────

const EnvSchema = z.object({
  // Publishing provider (SmmBox)
  SMMBOX_API_URL:          z.string().url().default('https://smmbox.com/api/'),
  SMMBOX_API_TOKEN:        z.string().min(1),

  // Storage + publish ledger
  SUPABASE_URL:            z.string().url(),
  SUPABASE_SERVICE_KEY:    z.string().min(1),
  STORAGE_BUCKET:          z.string().min(1).default('variants'),

  // Notifications (optional; alerts are skipped when unset)
  TELEGRAM_BOT_TOKEN:      z.string().optional(),
  TELEGRAM_CHAT_ID:        z.string().optional(),

  // Encoding
  ENCODER_PREFERENCE:      z.string()
    .default(HARDWARE_BACKENDS.join(','))
    .transform(v => v.split(',').map(s => s.trim()).filter(Boolean))
    .pipe(z.array(z.enum(HARDWARE_BACKENDS))),
  ALLOW_SOFTWARE_ENCODER:  z.string().transform(v => v === 'true').default('false'),
  ENCODER_SESSIONS:        z.coerce.number().int().positive().default(1),
  ENCODE_TIMEOUT_MS:       z.coerce.number().int().positive().default(900_000),
  DURATION_TOLERANCE_SEC:  z.coerce.number().positive().default(0.5),
  TRANSFORM_BOUNDS_PATH:   z.string().optional(),

  // Publishing
  PUBLISH_CONCURRENCY:     z.coerce.number().int().positive().default(4),
  PUBLISH_TIMEOUT_MS:      z.coerce.number().int().positive().default(30_000),
  PUBLISH_MAX_ATTEMPTS:    z.coerce.number().int().positive().default(3),
  PUBLISH_RETRY_BASE_MS:   z.coerce.number().int().nonnegative().default(2_000),

  // Local storage
  TEMP_DIR:                z.string().default('/tmp/variant-dispatch'),
  TEMP_RETENTION_HOURS:    z.coerce.number().positive().default(24),

  // Logging
  LOG_LEVEL:               z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_FORMAT:              z.enum(['text', 'json']).default('text'),
});

const parsed = EnvSchema.safeParse(process.env);
if (!parsed.success) {
  const missing = parsed.error.issues.map(i => i.path.join('.')).join(', ');
  throw new Error(`Missing or invalid environment variables: ${missing}`);
}

export const env = parsed.data;

// ── Scheduling ────────────────────────────────────────────────────────────────
// Publish times without an explicit offset are read as Moscow time.

export const PUBLISH_TIMEZONE_OFFSET = '+03:00';

// ── Encoder ───────────────────────────────────────────────────────────────────

export const ENCODER = {
  preference:          env.ENCODER_PREFERENCE,
  allowSoftware:       env.ALLOW_SOFTWARE_ENCODER,
  sessions:            env.ENCODER_SESSIONS,
  timeoutMs:           env.ENCODE_TIMEOUT_MS,
  durationToleranceSec: env.DURATION_TOLERANCE_SEC,
  probeTimeoutMs:      15_000,
  minBitrateKbps:      1_000,
} as const;

// ── Publishing ────────────────────────────────────────────────────────────────

export const PUBLISH = {
  concurrency:  env.PUBLISH_CONCURRENCY,
  timeoutMs:    env.PUBLISH_TIMEOUT_MS,
  maxAttempts:  env.PUBLISH_MAX_ATTEMPTS,
  retryBaseMs:  env.PUBLISH_RETRY_BASE_MS,
  captionLimit: 5_000,
} as const;

// ── Storage Retention ─────────────────────────────────────────────────────────

export const RETENTION = {
  tempDir:        env.TEMP_DIR,
  tempMaxAgeMs:   env.TEMP_RETENTION_HOURS * 3_600_000,
} as const;

// ── Transform Bounds ──────────────────────────────────────────────────────────

const RangeBoundSchema = z.object({
  min:     z.number(),
  max:     z.number(),
  integer: z.boolean().default(false),
})
  .refine(b => b.min <= b.max, { message: 'min must not exceed max' })
  .refine(b => !b.integer || Math.ceil(b.min) <= Math.floor(b.max), { message: 'integer range contains no integer' });

export type RangeBound = z.infer<typeof RangeBoundSchema>;

export const NOISE_MODES = ['t', 'u', 't+u'] as const;
export type NoiseMode = typeof NOISE_MODES[number];

export const TransformBoundsSchema = z.object({
  cropPx:              RangeBoundSchema.refine(b => b.min >= 0, { message: 'cropPx cannot be negative' }),
  scaleDelta:          RangeBoundSchema.refine(b => b.min > -1, { message: 'scaleDelta must stay above -1' }),
  hueShiftDeg:         RangeBoundSchema,
  noiseLevel:          RangeBoundSchema.refine(b => b.min >= 0 && b.max <= 100, { message: 'noiseLevel must be within 0..100' }),
  noiseMode:           z.object({ choices: z.array(z.enum(NOISE_MODES)).min(1) }),
  speedFactor:         RangeBoundSchema.refine(b => b.min >= 0.5 && b.max <= 2, { message: 'speedFactor must be within 0.5..2' }),
  audioPitchSemitones: RangeBoundSchema,
  brightness:          RangeBoundSchema,
  contrast:            RangeBoundSchema.refine(b => b.min > 0, { message: 'contrast must be positive' }),
  saturation:          RangeBoundSchema.refine(b => b.min >= 0, { message: 'saturation cannot be negative' }),
  gamma:               RangeBoundSchema.refine(b => b.min > 0, { message: 'gamma must be positive' }),
  bitrateFactor:       RangeBoundSchema.refine(b => b.min > 0, { message: 'bitrateFactor must be positive' }),
});

export type TransformBounds = z.infer<typeof TransformBoundsSchema>;

export function loadTransformBounds(filePath: string): TransformBounds {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new Error(`Transform bounds at ${filePath} could not be read: ${String(err)}`);
  }
  const result = TransformBoundsSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid transform bounds in ${filePath}: ${issues}`);
  }
  return result.data;
}

let _bounds: TransformBounds | null = null;

/** Bounds from TRANSFORM_BOUNDS_PATH (or config/transform-bounds.json), read once. */
export function getTransformBounds(): TransformBounds {
  if (!_bounds) {
    const file = env.TRANSFORM_BOUNDS_PATH || 'config/transform-bounds.json';
    _bounds = loadTransformBounds(path.resolve(process.cwd(), file));
  }
  return _bounds;
}
