/**
 * Playlist synchronization types
 */

import type { VideoId } from '../../../entities/video-id';
import type { RankingMode } from '../../../entities/feed-entry';
import type { FeedSource } from '../../reddit-feed';
import type {
  InsertOutcome,
  PlaylistReaderOptions,
  PlaylistSource,
  PlaylistTarget,
  PlaylistWriterOptions,
} from '../../youtube-playlist';

/**
 * What one synchronization pass should do
 */
export interface SyncOptions extends PlaylistReaderOptions, PlaylistWriterOptions {
  /** Target YouTube playlist ID */
  playlistId: string;

  /** Subreddit to scan */
  feedName: string;

  /** Listing order of the subreddit */
  ranking: RankingMode;

  /** Maximum number of feed entries to scan */
  limit: number;
}

/**
 * Upstream clients the synchronizer drives
 */
export interface SyncDependencies {
  feed: FeedSource;
  playlist: PlaylistSource & PlaylistTarget;
}

/**
 * Outcome of one synchronization pass
 */
export interface SyncResult {
  /** Number of videos in the playlist before the run */
  playlistSize: number;

  /** Number of distinct videos found in the feed */
  candidateCount: number;

  /** Videos that were missing from the playlist */
  toAdd: VideoId[];

  /** Videos added this run */
  inserted: VideoId[];

  /** Non-fatal insertion failures; these are retried on the next run */
  failed: Array<Extract<InsertOutcome, { status: 'failed' }>>;

  /** Set when the run stopped early because the API quota is spent */
  quotaExhausted: Extract<InsertOutcome, { status: 'quota-exhausted' }> | null;
}
