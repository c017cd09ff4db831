import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import { HttpError } from '../../../shared/api';
import type { RedditListingResponse } from '../model';
import { createRedditClient, RANKING_LISTINGS } from './reddit-client';

const TOKEN_URL = 'https://www.reddit.com/api/v1/access_token';

function jsonResponse(body: unknown, status = 200, statusText = 'OK'): Response {
  return new Response(JSON.stringify(body), { status, statusText });
}

function listing(ids: string[], after: string | null): RedditListingResponse {
  return {
    kind: 'Listing',
    data: {
      after,
      before: null,
      dist: ids.length,
      children: ids.map((id) => ({
        kind: 't3',
        data: {
          id,
          name: `t3_${id}`,
          title: `Post ${id}`,
          url: `https://youtu.be/${id}`,
          permalink: `/r/videos/comments/${id}/post/`,
          subreddit: 'videos',
          is_self: false,
        },
      })),
    },
  };
}

describe('createRedditClient', () => {
  const credentials = { clientId: 'test-id', clientSecret: 'test-secret' };
  let pages: RedditListingResponse[];
  let fetchMock: Mock;

  beforeEach(() => {
    pages = [];
    fetchMock = vi.fn().mockImplementation(async (url: string) => {
      if (url === TOKEN_URL) {
        return jsonResponse({ access_token: 'test-token', token_type: 'bearer', expires_in: 86400, scope: '*' });
      }
      const page = pages.shift();
      return page ? jsonResponse(page) : jsonResponse({ message: 'Forbidden' }, 403, 'Forbidden');
    });
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('maps every ranking mode to its listing', () => {
    expect(Object.keys(RANKING_LISTINGS)).toEqual(['hot', 'new', 'top', 'controversial', 'rising']);
    expect(RANKING_LISTINGS.top.params).toEqual({ t: 'all' });
    expect(RANKING_LISTINGS.hot.params).toEqual({});
  });

  it('authenticates with the client credentials grant', async () => {
    pages.push(listing(['abc123'], null));
    const client = createRedditClient(credentials, { userAgent: 'test-agent' });

    await client.fetchEntries('videos', 'hot', 20);

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe(TOKEN_URL);
    expect(init.headers).toEqual({
      'Content-Type': 'application/x-www-form-urlencoded',
      'User-Agent': 'test-agent',
      Authorization: `Basic ${Buffer.from('test-id:test-secret').toString('base64')}`,
    });
    expect(init.body).toBe('grant_type=client_credentials');
  });

  it('requests the listing for the ranking mode', async () => {
    pages.push(listing(['abc123', 'def456'], null));
    const client = createRedditClient(credentials, { userAgent: 'test-agent' });

    const entries = await client.fetchEntries('videos', 'top', 20);

    const [url, init] = fetchMock.mock.calls[1];
    expect(url).toBe('https://oauth.reddit.com/r/videos/top?limit=20&raw_json=1&t=all');
    expect(init.headers).toEqual({ 'User-Agent': 'test-agent', Authorization: 'Bearer test-token' });
    expect(entries).toEqual([
      { id: 'abc123', title: 'Post abc123', url: 'https://youtu.be/abc123', permalink: '/r/videos/comments/abc123/post/' },
      { id: 'def456', title: 'Post def456', url: 'https://youtu.be/def456', permalink: '/r/videos/comments/def456/post/' },
    ]);
  });

  it('reuses the app token across requests', async () => {
    pages.push(listing(['a1'], null), listing(['b2'], null));
    const client = createRedditClient(credentials, { userAgent: 'test-agent' });

    await client.fetchEntries('videos', 'new', 5);
    await client.fetchEntries('videos', 'rising', 5);

    const tokenCalls = fetchMock.mock.calls.filter(([url]) => url === TOKEN_URL);
    expect(tokenCalls).toHaveLength(1);
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it('follows the after cursor when the limit exceeds one page', async () => {
    const first = Array.from({ length: 100 }, (_, i) => `p1v${i}`);
    const second = Array.from({ length: 50 }, (_, i) => `p2v${i}`);
    pages.push(listing(first, 't3_p1v99'), listing(second, 't3_p2v49'));
    const client = createRedditClient(credentials, { userAgent: 'test-agent' });

    const entries = await client.fetchEntries('videos', 'hot', 150);

    expect(entries).toHaveLength(150);
    expect(fetchMock.mock.calls[1][0]).toBe('https://oauth.reddit.com/r/videos/hot?limit=100&raw_json=1');
    expect(fetchMock.mock.calls[2][0]).toBe('https://oauth.reddit.com/r/videos/hot?limit=50&after=t3_p1v99&raw_json=1');
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it('stops when the listing runs out', async () => {
    pages.push(listing(['only1', 'only2'], null));
    const client = createRedditClient(credentials, { userAgent: 'test-agent' });

    const entries = await client.fetchEntries('videos', 'hot', 150);

    expect(entries.map((e) => e.id)).toEqual(['only1', 'only2']);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('propagates listing failures as HttpError', async () => {
    const client = createRedditClient(credentials, { userAgent: 'test-agent' });

    const error = await client.fetchEntries('private_sub', 'hot', 20).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HttpError);
    expect(error).toMatchObject({ status: 403 });
  });
});
