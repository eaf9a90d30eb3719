/**
 * Publish ledger: one `publish_posts` row per account per batch, whatever
 * the account's outcome.
 */
import type { Platform } from '../config.js';
import type { JobState, LedgerBatch, PublishLedger } from '../pipeline/types.js';
import { logger } from '../utils/logger.js';
import { dbInsertMany } from './client.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export type PostStatus = Extract<JobState, 'succeeded' | 'failed' | 'cancelled'>;

export type PublishPostRecord = {
  batch_id: string;
  seed: string;
  account_id: string;
  platform: Platform;
  status: PostStatus;
  provider_post_id: string | null;
  variant_checksum: string | null;
  media_handle: string | null;
  encoder_backend: string | null;
  attempts: number;
  failure_reason: string | null;
  error_msg: string | null;
  scheduled_at: string;
  created_at: string;
};

// ─── Mapping ──────────────────────────────────────────────────────────────────

export function toPostRecords(batch: LedgerBatch, now: Date = new Date()): PublishPostRecord[] {
  const common = {
    batch_id:     batch.batchId,
    seed:         batch.seed,
    scheduled_at: batch.scheduledAt.toISOString(),
    created_at:   now.toISOString(),
  };

  const published = batch.outcomes.map((o): PublishPostRecord => ({
    ...common,
    account_id:       o.target.accountId,
    platform:         o.target.platform,
    status:           o.state,
    provider_post_id: o.postId ?? null,
    variant_checksum: o.variant.checksum,
    media_handle:     o.variant.media.handle,
    encoder_backend:  o.variant.backend,
    attempts:         o.attempts,
    failure_reason:   o.reason ?? null,
    error_msg:        o.message ?? null,
  }));

  const skipped = batch.preDispatchFailures.map((f): PublishPostRecord => ({
    ...common,
    account_id:       f.target.accountId,
    platform:         f.target.platform,
    status:           f.reason === 'Cancelled' ? 'cancelled' : 'failed',
    provider_post_id: null,
    variant_checksum: null,
    media_handle:     null,
    encoder_backend:  null,
    attempts:         0,
    failure_reason:   f.reason,
    error_msg:        f.message,
  }));

  return [...published, ...skipped];
}

// ─── Ledger ───────────────────────────────────────────────────────────────────

export const supabaseLedger: PublishLedger = {
  async record(batch) {
    const rows = toPostRecords(batch);
    const { queued } = await dbInsertMany('publish_posts', rows);
    logger.info('Ledger: batch recorded', { batchId: batch.batchId, rows: rows.length, queued });
  },
};
