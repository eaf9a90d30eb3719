/**
 * Transform selection: derives one bounded, reproducible set of
 * uniqueization parameters per (seed, account salt, draw).
 *
 * Every knob is drawn independently from
 *   sha256( sha256(seed ‖ salt) ‖ knob ‖ draw )
 * so the salt is mixed in before any parameter is derived: two accounts
 * share a spec only if every knob's digest collides.
 */
import type { RangeBound, TransformBounds, NoiseMode } from '../config.js';
import type { AccountTarget, NumericKnob, TransformSpec } from '../pipeline/types.js';
import { hashString, unitInterval } from '../utils/hash.js';

export const NUMERIC_KNOBS: readonly NumericKnob[] = [
  'cropPx',
  'scaleDelta',
  'hueShiftDeg',
  'noiseLevel',
  'speedFactor',
  'audioPitchSemitones',
  'brightness',
  'contrast',
  'saturation',
  'gamma',
  'bitrateFactor',
];

const DECIMALS = 4;
const EPSILON = 1e-9;

/** Stable per-account salt. */
export const accountSalt = (target: AccountTarget): string => `${target.platform}:${target.accountId}`;

function round(value: number): number {
  const f = 10 ** DECIMALS;
  return Math.round(value * f) / f;
}

/** Map u ∈ [0, 1) uniformly onto the bound. A single-point range returns that point. */
export function drawInRange(bound: RangeBound, u: number): number {
  if (bound.integer) {
    const lo = Math.ceil(bound.min);
    const hi = Math.floor(bound.max);
    // No integer inside: the nearest one, which boundsViolations then reports.
    if (lo > hi) return Math.round(bound.min);
    if (lo === hi) return lo;
    return Math.min(hi, lo + Math.floor(u * (hi - lo + 1)));
  }

  if (bound.min === bound.max) return bound.min;

  const value = round(bound.min + u * (bound.max - bound.min));
  return Math.min(bound.max, Math.max(bound.min, value));
}

function pickChoice(choices: readonly NoiseMode[], u: number): NoiseMode {
  const index = Math.min(choices.length - 1, Math.floor(u * choices.length));
  return choices[index] ?? 't';
}

/**
 * Pure and total: the same (seed, salt, draw) always yields the same spec.
 * `draw` selects an alternative spec for the same account, used when an
 * encode with the previous draw produced an unusable output.
 */
export function selectTransform(
  seed: string,
  salt: string,
  bounds: TransformBounds,
  draw = 0,
): TransformSpec {
  const base = hashString(`${seed}\u0000${salt}`);
  const u = (knob: string) => unitInterval(hashString(`${base}:${knob}:${draw}`));
  const pick = (knob: NumericKnob) => drawInRange(bounds[knob], u(knob));

  return {
    seed,
    salt,
    draw,
    cropPx:              pick('cropPx'),
    scaleDelta:          pick('scaleDelta'),
    hueShiftDeg:         pick('hueShiftDeg'),
    noiseLevel:          pick('noiseLevel'),
    noiseMode:           pickChoice(bounds.noiseMode.choices, u('noiseMode')),
    speedFactor:         pick('speedFactor'),
    audioPitchSemitones: pick('audioPitchSemitones'),
    brightness:          pick('brightness'),
    contrast:            pick('contrast'),
    saturation:          pick('saturation'),
    gamma:               pick('gamma'),
    bitrateFactor:       pick('bitrateFactor'),
  };
}

/** Knob-by-knob violations of `bounds`; empty when the spec is in range. */
export function boundsViolations(spec: TransformSpec, bounds: TransformBounds): string[] {
  const violations: string[] = [];

  for (const knob of NUMERIC_KNOBS) {
    const value = spec[knob];
    const bound = bounds[knob];
    if (!Number.isFinite(value)) {
      violations.push(`${knob}=${value} is not a finite number`);
    } else if (value < bound.min - EPSILON || value > bound.max + EPSILON) {
      violations.push(`${knob}=${value} outside [${bound.min}, ${bound.max}]`);
    } else if (bound.integer && !Number.isInteger(value)) {
      violations.push(`${knob}=${value} must be an integer`);
    }
  }

  if (!bounds.noiseMode.choices.includes(spec.noiseMode)) {
    violations.push(`noiseMode=${spec.noiseMode} not in {${bounds.noiseMode.choices.join(', ')}}`);
  }

  return violations;
}
