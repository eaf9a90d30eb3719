/**
 * Batch entry point.
 *
 *   validate → load source → resolve encoder → uniqueize → dispatch →
 *   aggregate → drop unpublished variants → ledger → alert → clean up
 *
 * Only ValidationError and NoEncoderAvailableError escape; every per-account
 * problem ends up in the returned BatchResult.
 */
import { randomUUID } from 'crypto';
import { extname, join } from 'path';
import { z } from 'zod';
import { ACCOUNT_TYPES, PLATFORMS, PUBLISH, type TransformBounds } from '../config.js';
import { NoEncoderAvailableError, ValidationError, errorMessage } from '../errors.js';
import type { EncoderProvider } from '../media/encoder-capability.js';
import type { MediaToolchain } from '../media/ffmpeg.js';
import { loadSource } from '../media/source.js';
import { formatBatchSummary } from '../monitoring/telegram.js';
import { logger } from '../utils/logger.js';
import { formatPublishTime, parseScheduledAt } from '../utils/schedule-time.js';
import { aggregate } from './aggregator.js';
import { discardStoredVariants, removeBatchFiles } from './cleanup.js';
import { PublishOrchestrator, createPublishJobs, type OrchestratorOptions } from './publisher.js';
import { UniqueizationEngine, type Encoder } from './uniqueizer.js';
import type {
  AccountTarget,
  BatchResult,
  MediaStorage,
  Notifier,
  PublishLedger,
  PublishProvider,
} from './types.js';

// ── Request ───────────────────────────────────────────────────────────────────

export const AccountTargetSchema = z.object({
  accountId: z.string().trim().min(1),
  platform:  z.enum(PLATFORMS),
  type:      z.enum(ACCOUNT_TYPES),
  name:      z.string().optional(),
}).strict();

type SourceRef = { kind: 'path'; path: string } | { kind: 'handle'; handle: string };

const SourceSchema = z.union([
  z.string().trim().min(1).transform((path): SourceRef => ({ kind: 'path', path })),
  z.object({ path: z.string().trim().min(1) }).strict().transform(({ path }): SourceRef => ({ kind: 'path', path })),
  z.object({ handle: z.string().trim().min(1) }).strict().transform(({ handle }): SourceRef => ({ kind: 'handle', handle })),
]);

export const PublishBatchRequestSchema = z.object({
  source:      SourceSchema,
  targets:     z.array(AccountTargetSchema).min(1, 'at least one target account is required'),
  scheduledAt: z.string().trim().min(1),
  caption:     z.string().max(PUBLISH.captionLimit).optional(),
  seed:        z.string().min(1).optional(),
});

/** Local path, `{ path }`, or `{ handle }` of an object already in storage. */
export type PublishBatchRequest = z.input<typeof PublishBatchRequestSchema>;

export interface ValidatedRequest {
  source: SourceRef;
  targets: AccountTarget[];
  scheduledAt: Date;
  caption?: string;
  seed?: string;
}

/** Throws ValidationError listing every problem found. */
export function validateRequest(request: unknown, now: Date): ValidatedRequest {
  const parsed = PublishBatchRequestSchema.safeParse(request);
  if (!parsed.success) {
    throw new ValidationError(parsed.error.issues.map(i => `${i.path.join('.') || 'request'}: ${i.message}`));
  }

  const { source, targets, scheduledAt: rawTime, caption, seed } = parsed.data;
  const issues: string[] = [];

  const seen = new Set<string>();
  for (const t of targets) {
    const key = `${t.platform}:${t.accountId}`;
    if (seen.has(key)) issues.push(`targets: duplicate account ${key}`);
    seen.add(key);
  }

  const scheduledAt = parseScheduledAt(rawTime);
  if (!scheduledAt) {
    issues.push(`scheduledAt: "${rawTime}" is not a valid ISO-8601 date-time`);
  } else if (scheduledAt.getTime() <= now.getTime()) {
    issues.push(`scheduledAt: ${formatPublishTime(scheduledAt)} is not in the future`);
  }

  if (issues.length || !scheduledAt) throw new ValidationError(issues);
  return { source, targets, scheduledAt, caption: caption?.trim() || undefined, seed };
}

// ── Dependencies ──────────────────────────────────────────────────────────────

export interface BatchDependencies {
  toolchain: MediaToolchain;
  capability: EncoderProvider;
  encoder: Encoder;
  storage: MediaStorage;
  provider: PublishProvider;
  ledger?: PublishLedger;
  notifier?: Notifier;
  bounds: TransformBounds;
  workDir: string;
  probeTimeoutMs: number;
  orchestrator?: OrchestratorOptions;
  now?: () => Date;
}

export interface BatchOptions {
  signal?: AbortSignal;
}

// ── Batch ─────────────────────────────────────────────────────────────────────

export async function runPublishBatch(
  request: PublishBatchRequest,
  deps: BatchDependencies,
  { signal }: BatchOptions = {},
): Promise<BatchResult> {
  const input = validateRequest(request, deps.now?.() ?? new Date());
  const batchId = randomUUID();
  const seed = input.seed ?? batchId;
  const batchDir = join(deps.workDir, batchId);

  logger.info('Batch: starting', {
    batchId,
    targets: input.targets.length,
    scheduledAt: formatPublishTime(input.scheduledAt),
  });

  try {
    const sourcePath = await resolveSourcePath(input.source, deps.storage, batchDir);
    const source = await loadSource(deps.toolchain, sourcePath, deps.probeTimeoutMs);
    await deps.capability.resolve();

    const engine = new UniqueizationEngine({
      encoder:    deps.encoder,
      capability: deps.capability,
      storage:    deps.storage,
      workDir:    deps.workDir,
    });
    const { variants, failures } = await engine.uniqueize(source, input.targets, {
      seed, batchId, bounds: deps.bounds, signal,
    });

    const jobs = createPublishJobs(variants, input.scheduledAt, input.caption);
    const outcomes = await new PublishOrchestrator(deps.provider, deps.orchestrator).dispatch(jobs, { signal });
    const result = aggregate(outcomes, failures);
    await discardStoredVariants(deps.storage, outcomes.filter(o => o.state !== 'succeeded').map(o => o.variant));

    logger.info('Batch: complete', {
      batchId,
      totalAccounts: result.totalAccounts,
      totalVideos:   result.totalVideos,
      published:     result.published,
      failed:        result.failures.length,
    });

    if (deps.ledger) {
      await deps.ledger.record({ batchId, seed, scheduledAt: input.scheduledAt, outcomes, preDispatchFailures: failures })
        .catch((err: unknown) => logger.error('Batch: ledger write failed', { batchId, error: errorMessage(err) }));
    }
    if (result.failures.length) {
      await notify(deps.notifier, formatBatchSummary(batchId, result), result.published ? 'warning' : 'critical');
    }
    return result;
  } catch (err) {
    if (err instanceof NoEncoderAvailableError) {
      await notify(deps.notifier, `Batch ${batchId} aborted: ${err.message}`, 'critical');
    }
    throw err;
  } finally {
    await removeBatchFiles([batchDir]);
  }
}

async function resolveSourcePath(source: SourceRef, storage: MediaStorage, batchDir: string): Promise<string> {
  if (source.kind === 'path') return source.path;
  const destination = join(batchDir, `source${extname(source.handle) || '.mp4'}`);
  try {
    return await storage.retrieve(source.handle, destination);
  } catch (err) {
    throw new ValidationError([`source: could not retrieve ${source.handle} (${errorMessage(err)})`]);
  }
}

async function notify(notifier: Notifier | undefined, message: string, level: 'warning' | 'critical'): Promise<void> {
  if (!notifier) return;
  await notifier.alert(message, level)
    .catch((err: unknown) => logger.warn('Batch: alert failed', { error: errorMessage(err) }));
}
