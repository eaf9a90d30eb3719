import { describe, expect, it } from 'vitest';
import { aggregate } from '../../src/pipeline/aggregator.js';
import type { JobOutcome } from '../../src/pipeline/types.js';
import { makeVariant, target } from '../helpers/fakes.js';

const outcome = (id: string, state: JobOutcome['state'], extra: Partial<JobOutcome> = {}): JobOutcome => ({
  jobId: `job-${id}`,
  target: target(id),
  variant: makeVariant(target(id)),
  state,
  attempts: 1,
  ...extra,
});

describe('aggregate', () => {
  it('counts accounts, distinct videos and published posts', () => {
    const result = aggregate(
      [
        outcome('1', 'succeeded', { postId: 'p1' }),
        outcome('2', 'succeeded', { postId: 'p2' }),
        outcome('3', 'failed', { reason: 'PublishRejected', message: 'banned' }),
      ],
      [{ target: target('4'), reason: 'UniqueizationFailed', message: 'encode failed' }],
    );

    expect(result).toEqual({
      totalAccounts: 4,
      totalVideos: 3,
      published: 2,
      failures: [
        { accountId: '4', platform: 'vk', reason: 'UniqueizationFailed', message: 'encode failed' },
        { accountId: '3', platform: 'vk', reason: 'PublishRejected', message: 'banned' },
      ],
    });
  });

  it('counts a shared checksum as one video', () => {
    const shared = (id: string) => outcome(id, 'succeeded', { variant: makeVariant(target(id), 'same') });
    expect(aggregate([shared('1'), shared('2')], []).totalVideos).toBe(1);
  });

  it('counts only the variants that were submitted at least once', () => {
    const result = aggregate(
      [outcome('1', 'succeeded'), outcome('2', 'failed', { reason: 'PublishRejected', message: 'x' }), outcome('3', 'cancelled', { attempts: 0 })],
      [],
    );
    expect(result.totalVideos).toBe(2);
    expect(result.totalAccounts).toBe(3);
  });

  it('fills in the reason of a cancelled job without one', () => {
    const { failures } = aggregate([outcome('1', 'cancelled', { attempts: 0 })], []);
    expect(failures).toEqual([{ accountId: '1', platform: 'vk', reason: 'Cancelled', message: 'cancelled' }]);
  });

  it('returns an empty result for an empty batch', () => {
    expect(aggregate([], [])).toEqual({ totalAccounts: 0, totalVideos: 0, published: 0, failures: [] });
  });

  it('keeps published plus failures equal to the account total', () => {
    const result = aggregate(
      [outcome('1', 'succeeded'), outcome('2', 'failed', { reason: 'PublishTransientError', message: 'x' })],
      [{ target: target('3'), reason: 'Cancelled', message: 'stop' }],
    );
    expect(result.published + result.failures.length).toBe(result.totalAccounts);
  });
});
