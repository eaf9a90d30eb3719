import { afterEach, describe, expect, it, vi } from 'vitest';
import { PublishRejectedError, PublishTransientError } from '../../src/errors.js';
import { SmmBoxClient, cleanToken } from '../../src/platforms/smmbox.js';
import type { PublishRequest } from '../../src/pipeline/types.js';

const respond = (body: unknown, status = 200) =>
  new Response(typeof body === 'string' ? body : JSON.stringify(body), { status });

const request = (overrides: Partial<PublishRequest> = {}): PublishRequest => ({
  target: { accountId: '42', platform: 'instagram', type: 'page' },
  mediaUrl: 'https://cdn.test/v.mp4',
  caption: 'hi',
  scheduledAt: new Date('2030-01-02T07:00:00Z'),
  ...overrides,
});

describe('cleanToken', () => {
  it('strips whitespace and quotes pasted around the token', () => {
    expect(cleanToken('  "test-secret"\n')).toBe('test-secret');
    expect(cleanToken("'test-secret'")).toBe('test-secret');
  });
});

describe('SmmBoxClient', () => {
  const client = new SmmBoxClient({ baseUrl: 'https://smmbox.test/api', token: '"test-secret"' });
  const stubFetch = (impl: () => Promise<Response>) => vi.spyOn(globalThis, 'fetch').mockImplementation(impl);

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const publish = (req = request(), signal = new AbortController().signal) => client.publish(req, signal);
  const failure = (promise: Promise<unknown>) => promise.then(() => null, (e: unknown) => e);

  it('postpones a post with the caption first and returns the post id', async () => {
    const fetchSpy = stubFetch(async () => respond({ success: true, response: { posts: [{ id: 555 }] } }));

    await expect(publish()).resolves.toEqual({ postId: '555' });

    const [url, init] = fetchSpy.mock.calls[0] ?? [];
    expect(url).toBe('https://smmbox.test/api/v1/posts/postpone');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({ 'Content-Type': 'application/json', 'Authorization': 'Bearer test-secret' });
    expect(JSON.parse(String(init?.body))).toEqual({
      posts: [{
        group: { id: '42', social: 'io', type: 'page' },
        attachments: [
          { type: 'text', text: 'hi' },
          { type: 'video', url: 'https://cdn.test/v.mp4' },
        ],
        date: 1893567600,
      }],
    });
  });

  it('sends only the video when there is no caption', async () => {
    const fetchSpy = stubFetch(async () => respond({ success: true, response: { posts: [{ id: 'a1' }] } }));

    await publish(request({ caption: undefined }));

    const body: unknown = JSON.parse(String(fetchSpy.mock.calls[0]?.[1]?.body));
    expect(body).toMatchObject({ posts: [{ attachments: [{ type: 'video', url: 'https://cdn.test/v.mp4' }] }] });
  });

  it.each([429, 500, 503])('treats HTTP %i as transient', async status => {
    stubFetch(async () => respond({ success: false, error: { message: 'busy' } }, status));

    const err = await failure(publish());

    expect(err).toBeInstanceOf(PublishTransientError);
    expect(err instanceof PublishTransientError && err.status).toBe(status);
    expect(err instanceof Error && err.message).toBe(`SmmBox POST v1/posts/postpone failed: HTTP ${status} busy`);
  });

  it('treats other HTTP errors as rejections', async () => {
    stubFetch(async () => respond('bad request', 400));

    const err = await failure(publish());

    expect(err).toBeInstanceOf(PublishRejectedError);
    expect(err instanceof Error && err.message).toBe('SmmBox POST v1/posts/postpone failed: HTTP 400 bad request');
  });

  it('rejects when the envelope reports failure', async () => {
    stubFetch(async () => respond({ success: false, error: 'token expired' }));
    await expect(publish()).rejects.toThrow(new PublishRejectedError('SmmBox POST v1/posts/postpone: token expired'));
  });

  it('rejects an unreadable body', async () => {
    stubFetch(async () => respond('<html>'));
    await expect(publish()).rejects.toThrow('SmmBox POST v1/posts/postpone: unexpected response body');
  });

  it('accepts a scheduled post that came back without an id', async () => {
    stubFetch(async () => respond({ success: true, response: { posts: [{}] } }));
    await expect(publish()).resolves.toEqual({});
  });

  it('accepts a success envelope with no post list', async () => {
    stubFetch(async () => respond({ success: true }));
    await expect(publish()).resolves.toEqual({});
  });

  it('maps a network error to a transient failure', async () => {
    stubFetch(async () => { throw new TypeError('fetch failed'); });

    const err = await failure(publish());

    expect(err).toBeInstanceOf(PublishTransientError);
    expect(err instanceof Error && err.message).toBe('SmmBox POST v1/posts/postpone network error: fetch failed');
  });

  it('reports an aborted request as timed out', async () => {
    const controller = new AbortController();
    controller.abort();
    stubFetch(async () => { throw new DOMException('This operation was aborted', 'AbortError'); });

    await expect(publish(request(), controller.signal)).rejects.toThrow('SmmBox POST v1/posts/postpone timed out');
  });

  it('lists connected groups', async () => {
    const fetchSpy = stubFetch(async () => respond({
      success: true,
      response: [
        { id: 1, social: 'vk', type: 'group', name: 'Cats' },
        { id: 'x9', social: 'io', type: 'user', name: null },
      ],
    }));

    await expect(client.listGroups()).resolves.toEqual([
      { id: '1', social: 'vk', type: 'group', name: 'Cats' },
      { id: 'x9', social: 'io', type: 'user', name: null },
    ]);
    expect(fetchSpy.mock.calls[0]?.[0]).toBe('https://smmbox.test/api/v1/groups');
    expect(fetchSpy.mock.calls[0]?.[1]?.method).toBe('GET');
  });

  it('rejects a malformed group list', async () => {
    stubFetch(async () => respond({ success: true, response: [{ social: 'vk' }] }));
    await expect(client.listGroups()).rejects.toBeInstanceOf(PublishRejectedError);
  });
});
