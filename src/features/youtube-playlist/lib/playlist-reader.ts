/**
 * Playlist enumeration
 *
 * Reads every page of a playlist to build the set of videos it already holds
 */

import type { VideoId } from '../../../entities/video-id';
import { logger, sleep } from '../../../shared/lib';
import { MAX_PAGE_SIZE, type YouTubeClient } from '../api';
import type { PlaylistReaderOptions } from '../model';

/** Delay between page requests, to stay under the API rate limit */
export const DEFAULT_PAGE_DELAY_MS = 500;

/**
 * The part of the YouTube client the reader needs
 */
export type PlaylistSource = Pick<YouTubeClient, 'listPlaylistItems'>;

/**
 * Return the IDs of every video currently in the playlist
 *
 * Follows `nextPageToken` until the API stops returning one. A failed page
 * request propagates; there is no resume.
 */
export async function listPlaylistMembers(
  source: PlaylistSource,
  playlistId: string,
  options: PlaylistReaderOptions = {}
): Promise<Set<VideoId>> {
  const { pageSize = MAX_PAGE_SIZE, pageDelayMs = DEFAULT_PAGE_DELAY_MS } = options;
  const members = new Set<VideoId>();

  let pageToken: string | undefined;
  let pages = 0;

  do {
    if (pages > 0) {
      await sleep(pageDelayMs);
    }

    const response = await source.listPlaylistItems(playlistId, pageToken, pageSize);
    pages++;

    for (const item of response.items) {
      members.add(item.contentDetails.videoId);
    }
    logger.debug(`YouTube: page ${pages} of playlist ${playlistId} had ${response.items.length} items`);

    pageToken = response.nextPageToken;
  } while (pageToken);

  return members;
}
