/**
 * Feed scanning logic
 *
 * Reads a subreddit listing and keeps the YouTube video IDs its links point to
 */

import { matchVideoId, type VideoId } from '../../../entities/video-id';
import type { RankingMode } from '../../../entities/feed-entry';
import { logger } from '../../../shared/lib';
import type { RedditClient } from '../api';

/** Default number of entries to scan */
export const DEFAULT_SCAN_LIMIT = 20;

/**
 * The part of the Reddit client the scanner needs
 */
export type FeedSource = Pick<RedditClient, 'fetchEntries'>;

/**
 * Scan a feed and return the distinct video IDs linked from its entries
 *
 * Entries that do not link to a YouTube video are skipped. Request failures
 * propagate to the caller.
 */
export async function scanFeed(
  source: FeedSource,
  feedName: string,
  ranking: RankingMode,
  limit: number = DEFAULT_SCAN_LIMIT
): Promise<Set<VideoId>> {
  logger.info(`Retrieving URLs from subreddit: ${feedName} (${ranking}, limit ${limit})`);

  const entries = await source.fetchEntries(feedName, ranking, limit);
  const videoIds = new Set<VideoId>();

  for (const entry of entries) {
    const videoId = matchVideoId(entry.url);
    if (videoId) {
      videoIds.add(videoId);
    } else {
      logger.debug(`  - ${entry.id}: not a video link (${entry.url})`);
    }
  }

  logger.info(`Retrieved ${videoIds.size} video URLs from subreddit: ${feedName}`);
  return videoIds;
}
