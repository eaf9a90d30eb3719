import type { BatchFailure, BatchResult, JobOutcome, PreDispatchFailure } from './types.js';

/**
 * Fold terminal job outcomes and pre-dispatch failures into one BatchResult.
 * Pure; never throws.
 */
export function aggregate(outcomes: JobOutcome[], preDispatchFailures: PreDispatchFailure[]): BatchResult {
  const failures: BatchFailure[] = [];

  for (const f of preDispatchFailures) {
    failures.push({ accountId: f.target.accountId, platform: f.target.platform, reason: f.reason, message: f.message });
  }

  let published = 0;
  const checksums = new Set<string>();
  for (const o of outcomes) {
    // A job cancelled before its first attempt never submitted its variant.
    if (o.attempts > 0) checksums.add(o.variant.checksum);
    if (o.state === 'succeeded') {
      published++;
      continue;
    }
    failures.push({
      accountId: o.target.accountId,
      platform:  o.target.platform,
      reason:    o.reason ?? (o.state === 'cancelled' ? 'Cancelled' : 'PublishRejected'),
      message:   o.message ?? o.state,
    });
  }

  return {
    totalAccounts: outcomes.length + preDispatchFailures.length,
    totalVideos:   checksums.size,
    published,
    failures,
  };
}
