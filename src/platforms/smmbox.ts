/**
 * SmmBox API client: the publishing provider and the source of connected
 * account groups.
 *
 * Every response is wrapped as { success, response, error: { message } }.
 * Failures are mapped onto the pipeline taxonomy:
 *   network error, timeout, HTTP 429/5xx → PublishTransientError
 *   other HTTP 4xx, success:false, unreadable body → PublishRejectedError
 * A success:true postpone without a post id still counts as scheduled.
 */
import { z } from 'zod';
import { env, type Platform } from '../config.js';
import { PublishRejectedError, PublishTransientError, errorMessage } from '../errors.js';
import type { PublishProvider, PublishReceipt, PublishRequest } from '../pipeline/types.js';
import { logger } from '../utils/logger.js';
import { toUnixSeconds } from '../utils/schedule-time.js';

// ── Constants ─────────────────────────────────────────────────────────────────

export const SOCIAL_CODES: Record<Platform, string> = {
  vk:        'vk',
  instagram: 'io',
  youtube:   'gg',
  pinterest: 'pi',
};

// ── Types ─────────────────────────────────────────────────────────────────────

export interface SmmBoxConfig {
  baseUrl: string;
  token: string;
}

const GroupSchema = z.object({
  id:     z.union([z.string(), z.number()]).transform(String),
  social: z.string(),
  type:   z.string(),
  name:   z.string().nullish(),
});

export type SmmBoxGroup = z.infer<typeof GroupSchema>;

const EnvelopeSchema = z.object({
  success:  z.boolean(),
  response: z.unknown().optional(),
  error:    z.union([z.object({ message: z.string().optional() }).passthrough(), z.string()]).nullish(),
});

const PostponeSchema = z.object({
  posts: z.array(z.object({ id: z.union([z.string(), z.number()]).transform(String) }).passthrough()).default([]),
}).passthrough();

// ── Helpers ───────────────────────────────────────────────────────────────────

/** .env values are sometimes pasted with quotes around them. */
export function cleanToken(raw: string): string {
  return raw.trim().replace(/^["']+|["']+$/g, '').trim();
}

const isTransientStatus = (status: number) => status === 429 || status >= 500;

function envelopeError(error: z.infer<typeof EnvelopeSchema>['error']): string {
  if (typeof error === 'string') return error;
  return error?.message ?? 'unknown provider error';
}

// ── Client ────────────────────────────────────────────────────────────────────

export class SmmBoxClient implements PublishProvider {
  private readonly baseUrl: string;
  private readonly token: string;

  constructor(config: SmmBoxConfig = { baseUrl: env.SMMBOX_API_URL, token: env.SMMBOX_API_TOKEN }) {
    this.baseUrl = config.baseUrl.endsWith('/') ? config.baseUrl : `${config.baseUrl}/`;
    this.token = cleanToken(config.token);
  }

  private async request(
    method: 'GET' | 'POST',
    endpoint: string,
    body?: Record<string, unknown>,
    signal?: AbortSignal,
  ): Promise<unknown> {
    const url = `${this.baseUrl}${endpoint}`;
    let res: Response;
    try {
      res = await fetch(url, {
        method,
        headers: {
          'Content-Type':  'application/json',
          'Authorization': `Bearer ${this.token}`,
        },
        body: body ? JSON.stringify(body) : undefined,
        signal,
      });
    } catch (err) {
      const timedOut = signal?.aborted === true || (err instanceof Error && err.name === 'TimeoutError');
      throw new PublishTransientError(
        `SmmBox ${method} ${endpoint} ${timedOut ? 'timed out' : `network error: ${errorMessage(err)}`}`,
        undefined,
        { cause: err },
      );
    }

    const text = await res.text().catch(() => '');
    let json: unknown = null;
    try {
      json = text ? JSON.parse(text) : null;
    } catch {
      json = null;
    }
    const envelope = EnvelopeSchema.safeParse(json);

    if (!res.ok) {
      const detail = envelope.success ? envelopeError(envelope.data.error) : text.slice(0, 200);
      const message = `SmmBox ${method} ${endpoint} failed: HTTP ${res.status} ${detail}`.trim();
      if (isTransientStatus(res.status)) throw new PublishTransientError(message, res.status);
      throw new PublishRejectedError(message, res.status);
    }

    if (!envelope.success) {
      throw new PublishRejectedError(`SmmBox ${method} ${endpoint}: unexpected response body`, res.status);
    }
    if (!envelope.data.success) {
      throw new PublishRejectedError(`SmmBox ${method} ${endpoint}: ${envelopeError(envelope.data.error)}`, res.status);
    }
    return envelope.data.response;
  }

  /** All account groups connected to the SmmBox workspace. */
  async listGroups(): Promise<SmmBoxGroup[]> {
    const response = await this.request('GET', 'v1/groups', undefined, AbortSignal.timeout(30_000));
    const groups = z.array(GroupSchema).safeParse(response ?? []);
    if (!groups.success) {
      throw new PublishRejectedError(`SmmBox v1/groups: unexpected group list: ${groups.error.message}`);
    }
    logger.info('SmmBox: groups fetched', { count: groups.data.length });
    return groups.data;
  }

  /** Schedule one post. The caption, when given, goes first as a text attachment. */
  async publish(req: PublishRequest, signal: AbortSignal): Promise<PublishReceipt> {
    const attachments: Array<Record<string, string>> = [];
    if (req.caption) attachments.push({ type: 'text', text: req.caption });
    attachments.push({ type: 'video', url: req.mediaUrl });

    const post = {
      group: {
        id:     req.target.accountId,
        social: SOCIAL_CODES[req.target.platform],
        type:   req.target.type,
      },
      attachments,
      date: toUnixSeconds(req.scheduledAt),
    };

    logger.debug('SmmBox: postponing post', { platform: req.target.platform, accountId: req.target.accountId });
    const response = await this.request('POST', 'v1/posts/postpone', { posts: [post] }, signal);

    // success:true means the post is scheduled, with or without an id echoed back.
    const parsed = PostponeSchema.safeParse(response ?? {});
    const postId = parsed.success ? parsed.data.posts[0]?.id : undefined;
    if (!postId) {
      logger.warn('SmmBox: post accepted without a post id', {
        platform: req.target.platform, accountId: req.target.accountId,
      });
      return {};
    }
    return { postId };
  }
}
