/**
 * Publish orchestrator. Fans publish jobs out to the provider under a
 * concurrency ceiling.
 *
 * A job waiting out a retry backoff does not hold a pool slot: it is put back
 * on the queue by a timer. Each job object is resent as-is on retry, so an
 * account can never get a second job within one dispatch.
 */
import { randomUUID } from 'crypto';
import { PUBLISH } from '../config.js';
import { PublishRejectedError, PublishTransientError, ValidationError, errorMessage } from '../errors.js';
import { logger } from '../utils/logger.js';
import { backoffDelayMs } from '../utils/retry.js';
import type {
  FailureReason,
  JobOutcome,
  PublishJob,
  PublishProvider,
  TerminalJobState,
  Variant,
} from './types.js';

export interface OrchestratorOptions {
  concurrency: number;
  timeoutMs: number;
  maxAttempts: number;
  retryBaseMs: number;
}

export interface DispatchOptions {
  signal?: AbortSignal;
}

const accountKey = (j: { target: { platform: string; accountId: string } }) =>
  `${j.target.platform}:${j.target.accountId}`;

/** One pending job per variant. Two variants for the same account are refused. */
export function createPublishJobs(variants: Variant[], scheduledAt: Date, caption?: string): PublishJob[] {
  const seen = new Set<string>();
  const duplicates: string[] = [];
  for (const v of variants) {
    const key = accountKey(v);
    if (seen.has(key)) duplicates.push(key);
    seen.add(key);
  }
  if (duplicates.length) {
    throw new ValidationError(duplicates.map(k => `duplicate publish job for account ${k}`));
  }

  return variants.map((variant): PublishJob => ({
    id: randomUUID(),
    target: variant.target,
    variant,
    caption,
    scheduledAt,
    state: 'pending',
    attempts: 0,
  }));
}

type Classified =
  | { kind: 'transient'; message: string }
  | { kind: 'rejected'; message: string };

function classify(err: unknown): Classified {
  if (err instanceof PublishTransientError) return { kind: 'transient', message: err.message };
  if (err instanceof PublishRejectedError) return { kind: 'rejected', message: err.message };
  if (err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError')) {
    return { kind: 'transient', message: err.message };
  }
  return { kind: 'rejected', message: errorMessage(err) };
}

export class PublishOrchestrator {
  constructor(
    private readonly provider: PublishProvider,
    private readonly opts: OrchestratorOptions = {
      concurrency: PUBLISH.concurrency,
      timeoutMs:   PUBLISH.timeoutMs,
      maxAttempts: PUBLISH.maxAttempts,
      retryBaseMs: PUBLISH.retryBaseMs,
    },
  ) {}

  /** Resolves once every job is terminal. Never rejects for per-job failures. */
  dispatch(jobs: PublishJob[], { signal }: DispatchOptions = {}): Promise<JobOutcome[]> {
    const keys = new Set(jobs.map(accountKey));
    if (keys.size !== jobs.length) {
      return Promise.reject(new ValidationError(['dispatch received more than one job for an account']));
    }
    return new DispatchRun(this.provider, this.opts, jobs, signal).start();
  }
}

class DispatchRun {
  private readonly queue: PublishJob[];
  private readonly backoff = new Map<PublishJob, ReturnType<typeof setTimeout>>();
  private readonly outcomes: JobOutcome[] = [];
  private inFlight = 0;
  private resolve: (outcomes: JobOutcome[]) => void = () => {};

  constructor(
    private readonly provider: PublishProvider,
    private readonly opts: OrchestratorOptions,
    private readonly jobs: PublishJob[],
    private readonly signal: AbortSignal | undefined,
  ) {
    this.queue = [...jobs];
  }

  start(): Promise<JobOutcome[]> {
    return new Promise(resolve => {
      this.resolve = resolve;
      if (this.signal?.aborted) this.onAbort();
      else this.signal?.addEventListener('abort', this.onAbort, { once: true });
      this.pump();
      this.checkDone();
    });
  }

  private pump(): void {
    while (!this.signal?.aborted && this.inFlight < this.opts.concurrency) {
      const job = this.queue.shift();
      if (!job) return;
      this.inFlight++;
      void this.execute(job);
    }
  }

  /** Never rejects: every path ends in finish() or a scheduled retry. */
  private async execute(job: PublishJob): Promise<void> {
    job.state = 'in_flight';
    job.attempts++;

    let failure: Classified | null = null;
    let postId: string | undefined;
    try {
      const receipt = await this.publishWithTimeout(job);
      postId = receipt.postId;
    } catch (err) {
      failure = classify(err);
    }
    this.inFlight--;

    if (!failure) {
      logger.info('Publisher: post scheduled', { account: accountKey(job), postId, attempts: job.attempts });
      this.finish(job, 'succeeded', postId ? { postId } : {});
    } else if (failure.kind === 'rejected') {
      job.lastError = failure.message;
      logger.warn('Publisher: post rejected', { account: accountKey(job), error: failure.message });
      this.finish(job, 'failed', { reason: 'PublishRejected', message: failure.message });
    } else {
      job.lastError = failure.message;
      if (job.attempts < this.opts.maxAttempts && !this.signal?.aborted) {
        this.scheduleRetry(job);
      } else {
        logger.warn('Publisher: giving up after transient failures', {
          account: accountKey(job), attempts: job.attempts, error: failure.message,
        });
        this.finish(job, 'failed', { reason: 'PublishTransientError', message: failure.message });
      }
    }

    this.pump();
  }

  private async publishWithTimeout(job: PublishJob) {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new PublishTransientError(`publish timed out after ${this.opts.timeoutMs}ms`));
      }, this.opts.timeoutMs);
    });

    try {
      return await Promise.race([
        this.provider.publish(
          {
            target:      job.target,
            mediaUrl:    job.variant.media.url,
            caption:     job.caption,
            scheduledAt: job.scheduledAt,
          },
          controller.signal,
        ),
        timeout,
      ]);
    } finally {
      clearTimeout(timer);
    }
  }

  private scheduleRetry(job: PublishJob): void {
    const delay = backoffDelayMs(job.attempts, this.opts.retryBaseMs);
    job.state = 'pending';
    logger.warn(`Publisher: retry ${job.attempts}/${this.opts.maxAttempts} in ${delay}ms`, {
      account: accountKey(job), error: job.lastError,
    });
    const timer = setTimeout(() => {
      this.backoff.delete(job);
      this.queue.push(job);
      this.pump();
    }, delay);
    this.backoff.set(job, timer);
  }

  private readonly onAbort = (): void => {
    for (const [job, timer] of this.backoff) {
      clearTimeout(timer);
      this.finish(job, 'failed', {
        reason: 'PublishTransientError',
        message: `cancelled during retry backoff: ${job.lastError ?? 'unknown error'}`,
      });
    }
    this.backoff.clear();

    for (const job of this.queue.splice(0)) {
      if (job.attempts === 0) {
        this.finish(job, 'cancelled', { reason: 'Cancelled', message: 'batch cancelled before publishing' });
      } else {
        this.finish(job, 'failed', {
          reason: 'PublishTransientError',
          message: `cancelled before retry: ${job.lastError ?? 'unknown error'}`,
        });
      }
    }
  };

  private finish(
    job: PublishJob,
    state: TerminalJobState,
    extra: { postId?: string; reason?: FailureReason; message?: string },
  ): void {
    job.state = state;
    this.outcomes.push({
      jobId:    job.id,
      target:   job.target,
      variant:  job.variant,
      state,
      attempts: job.attempts,
      ...extra,
    });
    this.checkDone();
  }

  private checkDone(): void {
    if (this.outcomes.length !== this.jobs.length || this.inFlight > 0) return;
    this.signal?.removeEventListener('abort', this.onAbort);
    this.resolve(this.outcomes);
  }
}
