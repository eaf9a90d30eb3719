import type { AccountType, HardwareBackendKind, NoiseMode, Platform } from '../config.js';

// ── Inputs ────────────────────────────────────────────────────────────────────

export interface AccountTarget {
  accountId: string;
  platform: Platform;
  type: AccountType;
  name?: string;
}

/** Probed, read-only handle to the batch's source video. */
export interface SourceMedia {
  path: string;
  format: string;
  durationSec: number;
  width: number;
  height: number;
  bitRateKbps: number | null;
  hasAudio: boolean;
  sampleRate: number | null;
  checksum: string;
}

// ── Uniqueization ─────────────────────────────────────────────────────────────

export interface TransformSpec {
  seed: string;
  salt: string;
  draw: number;
  cropPx: number;
  scaleDelta: number;
  hueShiftDeg: number;
  noiseLevel: number;
  noiseMode: NoiseMode;
  speedFactor: number;
  audioPitchSemitones: number;
  brightness: number;
  contrast: number;
  saturation: number;
  gamma: number;
  bitrateFactor: number;
}

export type NumericKnob = Exclude<keyof TransformSpec, 'seed' | 'salt' | 'draw' | 'noiseMode'>;

export type BackendName = HardwareBackendKind | 'software';

export interface EncoderBackend {
  name: BackendName;
  /** ffmpeg encoder name, e.g. h264_nvenc */
  encoder: string;
  hardware: boolean;
}

export interface StoredMedia {
  handle: string;
  url: string;
}

/** Local encode result, before it is handed to storage. */
export interface EncodedFile {
  path: string;
  spec: TransformSpec;
  checksum: string;
  backend: BackendName;
  durationSec: number;
}

export interface Variant extends EncodedFile {
  id: string;
  target: AccountTarget;
  media: StoredMedia;
}

// ── Publishing ────────────────────────────────────────────────────────────────

export type JobState = 'pending' | 'in_flight' | 'succeeded' | 'failed' | 'cancelled';
export type TerminalJobState = Extract<JobState, 'succeeded' | 'failed' | 'cancelled'>;

export interface PublishJob {
  readonly id: string;
  readonly target: AccountTarget;
  readonly variant: Variant;
  readonly caption?: string;
  readonly scheduledAt: Date;
  state: JobState;
  attempts: number;
  lastError?: string;
}

export type FailureReason =
  | 'UniqueizationFailed'
  | 'PublishRejected'
  | 'PublishTransientError'
  | 'Cancelled';

export interface JobOutcome {
  jobId: string;
  target: AccountTarget;
  variant: Variant;
  state: TerminalJobState;
  attempts: number;
  postId?: string;
  reason?: FailureReason;
  message?: string;
}

export interface PreDispatchFailure {
  target: AccountTarget;
  reason: Extract<FailureReason, 'UniqueizationFailed' | 'Cancelled'>;
  message: string;
}

// ── Result ────────────────────────────────────────────────────────────────────

export interface BatchFailure {
  accountId: string;
  platform: Platform;
  reason: FailureReason;
  message: string;
}

export interface BatchResult {
  totalAccounts: number;
  totalVideos: number;
  published: number;
  failures: BatchFailure[];
}

// ── Collaborators ─────────────────────────────────────────────────────────────

export interface MediaStorage {
  store(localPath: string, key: string): Promise<StoredMedia>;
  /** Download `handle` to `destination`; resolves with the local path. */
  retrieve(handle: string, destination: string): Promise<string>;
  remove(handle: string): Promise<void>;
}

export interface PublishRequest {
  target: AccountTarget;
  mediaUrl: string;
  caption?: string;
  scheduledAt: Date;
}

export interface PublishReceipt {
  /** Absent when the provider accepted the post without echoing an id. */
  postId?: string;
}

/** Throws PublishTransientError or PublishRejectedError on failure. */
export interface PublishProvider {
  publish(request: PublishRequest, signal: AbortSignal): Promise<PublishReceipt>;
}

export interface AccountGroup {
  platform: Platform;
  count: number;
  accounts: AccountTarget[];
}

export interface AccountRegistry {
  listAccounts(): Promise<AccountGroup[]>;
}

export interface LedgerBatch {
  batchId: string;
  seed: string;
  scheduledAt: Date;
  outcomes: JobOutcome[];
  preDispatchFailures: PreDispatchFailure[];
}

export interface PublishLedger {
  record(batch: LedgerBatch): Promise<void>;
}

export type AlertLevel = 'info' | 'warning' | 'critical';

export interface Notifier {
  alert(message: string, level: AlertLevel): Promise<void>;
}
