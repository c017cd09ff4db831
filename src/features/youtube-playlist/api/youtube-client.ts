/**
 * YouTube Data API v3 client
 *
 * Uses playlistItems.list (1 unit per page) to read a playlist and
 * playlistItems.insert (50 units) to add videos. Every request carries the
 * OAuth access token of the playlist owner.
 */

import { createHttpClient } from '../../../shared/api';
import type { VideoId } from '../../../entities/video-id';
import type {
  YouTubeInsertedPlaylistItem,
  YouTubePlaylistItemInsert,
  YouTubePlaylistItemsResponse,
} from '../model';

const YOUTUBE_API_BASE = 'https://www.googleapis.com/youtube/v3/';

/** Largest page the playlistItems endpoint returns */
export const MAX_PAGE_SIZE = 50;

/**
 * Create a YouTube API client
 *
 * @param getAccessToken - Resolves a valid OAuth access token
 */
export function createYouTubeClient(getAccessToken: () => Promise<string>) {
  const http = createHttpClient({ baseUrl: YOUTUBE_API_BASE, getAccessToken });

  return {
    /**
     * Fetch one page of playlist items
     *
     * @param pageToken - `nextPageToken` of the previous page, if any
     */
    async listPlaylistItems(
      playlistId: string,
      pageToken?: string,
      maxResults: number = MAX_PAGE_SIZE
    ): Promise<YouTubePlaylistItemsResponse> {
      return http.get<YouTubePlaylistItemsResponse>('playlistItems', {
        params: {
          part: 'contentDetails',
          maxResults,
          playlistId,
          pageToken,
        },
      });
    },

    /**
     * Insert a video into a playlist at the given position (0 = top)
     */
    async insertPlaylistItem(
      playlistId: string,
      videoId: VideoId,
      position: number = 0
    ): Promise<YouTubeInsertedPlaylistItem> {
      const body: YouTubePlaylistItemInsert = {
        snippet: {
          playlistId,
          position,
          resourceId: {
            kind: 'youtube#video',
            videoId,
          },
        },
      };

      return http.post<YouTubeInsertedPlaylistItem>('playlistItems', body, {
        params: { part: 'snippet' },
      });
    },
  };
}

/**
 * Type for the YouTube client
 */
export type YouTubeClient = ReturnType<typeof createYouTubeClient>;
