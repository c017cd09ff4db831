/**
 * Reddit API client (read-only)
 *
 * Authenticates with application-only OAuth (client credentials grant),
 * then reads subreddit listings from oauth.reddit.com.
 */

import { createHttpClient } from '../../../shared/api';
import { logger } from '../../../shared/lib';
import type { FeedEntry, RankingMode } from '../../../entities/feed-entry';
import type { RedditCredentials } from '../../../entities/credentials';
import type { RedditClientOptions, RedditListingResponse, RedditTokenResponse } from '../model';

const REDDIT_AUTH_BASE = 'https://www.reddit.com/';
const REDDIT_API_BASE = 'https://oauth.reddit.com/';

/** Reddit caps listing pages at 100 children */
const MAX_PAGE_SIZE = 100;

/** Refresh the app token this long before Reddit says it expires */
const TOKEN_EXPIRY_MARGIN_MS = 60_000;

/**
 * Listing endpoint and extra query parameters for each ranking mode
 */
export const RANKING_LISTINGS: Record<RankingMode, { path: string; params: Record<string, string> }> = {
  hot: { path: 'hot', params: {} },
  new: { path: 'new', params: {} },
  top: { path: 'top', params: { t: 'all' } },
  controversial: { path: 'controversial', params: { t: 'all' } },
  rising: { path: 'rising', params: {} },
};

/**
 * Create a read-only Reddit API client
 */
export function createRedditClient(credentials: RedditCredentials, options: RedditClientOptions) {
  const headers = { 'User-Agent': options.userAgent };
  const auth = createHttpClient({ baseUrl: REDDIT_AUTH_BASE, headers });

  let token: { value: string; expiresAt: number } | null = null;

  async function getAccessToken(): Promise<string> {
    if (token && token.expiresAt - TOKEN_EXPIRY_MARGIN_MS > Date.now()) {
      return token.value;
    }

    const basic = Buffer.from(`${credentials.clientId}:${credentials.clientSecret}`).toString('base64');
    const response = await auth.postForm<RedditTokenResponse>(
      'api/v1/access_token',
      { grant_type: 'client_credentials' },
      { headers: { Authorization: `Basic ${basic}` } }
    );

    token = {
      value: response.access_token,
      expiresAt: Date.now() + response.expires_in * 1000,
    };
    logger.debug(`Reddit: obtained app token (scope: ${response.scope})`);
    return token.value;
  }

  const api = createHttpClient({ baseUrl: REDDIT_API_BASE, headers, getAccessToken });

  return {
    /**
     * Fetch up to `limit` entries of a subreddit in the given ranking order
     */
    async fetchEntries(subreddit: string, ranking: RankingMode, limit: number): Promise<FeedEntry[]> {
      if (limit <= 0) {
        return [];
      }

      const listing = RANKING_LISTINGS[ranking];
      const entries: FeedEntry[] = [];
      let after: string | null = null;

      do {
        const pageSize = Math.min(MAX_PAGE_SIZE, limit - entries.length);
        const response: RedditListingResponse = await api.get<RedditListingResponse>(
          `r/${encodeURIComponent(subreddit)}/${listing.path}`,
          {
            params: {
              limit: pageSize,
              after: after ?? undefined,
              raw_json: 1,
              ...listing.params,
            },
          }
        );

        const children = response.data.children.slice(0, pageSize);
        for (const child of children) {
          entries.push({
            id: child.data.id,
            title: child.data.title,
            url: child.data.url,
            permalink: child.data.permalink,
          });
        }

        logger.debug(`Reddit: got ${children.length} entries from r/${subreddit}/${listing.path}`);

        if (children.length === 0) {
          break;
        }
        after = response.data.after;
      } while (after && entries.length < limit);

      return entries;
    },
  };
}

/**
 * Type for the Reddit client
 */
export type RedditClient = ReturnType<typeof createRedditClient>;
