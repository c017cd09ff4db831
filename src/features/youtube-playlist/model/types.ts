/**
 * YouTube playlist types
 */

import type { VideoId } from '../../../entities/video-id';
import type { HttpError } from '../../../shared/api';

/**
 * YouTube API playlist items response (`part=contentDetails`)
 */
export interface YouTubePlaylistItemsResponse {
  kind: string;
  etag: string;
  nextPageToken?: string;
  prevPageToken?: string;
  pageInfo: {
    totalResults: number;
    resultsPerPage: number;
  };
  items: YouTubePlaylistItem[];
}

/**
 * Individual playlist item from the API
 */
export interface YouTubePlaylistItem {
  kind: string;
  etag: string;
  id: string;
  contentDetails: {
    videoId: string;
    videoPublishedAt?: string;
  };
}

/**
 * Request body for `playlistItems.insert`
 */
export interface YouTubePlaylistItemInsert {
  snippet: {
    playlistId: string;
    position: number;
    resourceId: {
      kind: 'youtube#video';
      videoId: string;
    };
  };
}

/**
 * Resource returned by `playlistItems.insert`
 */
export interface YouTubeInsertedPlaylistItem {
  kind: string;
  etag: string;
  id: string;
  snippet: {
    playlistId: string;
    position: number;
    title: string;
    resourceId: {
      kind: string;
      videoId: string;
    };
  };
}

/**
 * Google OAuth token endpoint response
 */
export interface GoogleTokenResponse {
  access_token: string;
  /** Lifetime in seconds */
  expires_in: number;
  /** Only present on the initial code exchange */
  refresh_token?: string;
  scope?: string;
  token_type?: string;
}

/**
 * Result of inserting one video into a playlist
 *
 * - `inserted`: the video is now at the head of the playlist
 * - `failed`: non-fatal, the caller moves on to the next video
 * - `quota-exhausted`: the daily API quota is spent, the caller must stop
 */
export type InsertOutcome =
  | { status: 'inserted'; videoId: VideoId }
  | { status: 'failed'; videoId: VideoId; error: Error }
  | { status: 'quota-exhausted'; videoId: VideoId; error: HttpError };

export interface PlaylistReaderOptions {
  /** Items per page (the API allows at most 50) */
  pageSize?: number;
  /** Delay before every page request after the first, in milliseconds */
  pageDelayMs?: number;
}

export interface PlaylistWriterOptions {
  /** Delay after a successful insertion, in milliseconds */
  insertDelayMs?: number;
}
