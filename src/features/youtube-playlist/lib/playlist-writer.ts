/**
 * Playlist insertion
 *
 * Adds one video to the head of a playlist and classifies the outcome.
 * Quota exhaustion is the only outcome that tells the caller to stop; every
 * other failure is reported and left for the next run.
 */

import type { VideoId } from '../../../entities/video-id';
import { HttpError } from '../../../shared/api';
import { logger, sleep } from '../../../shared/lib';
import type { YouTubeClient } from '../api';
import type { InsertOutcome, PlaylistWriterOptions } from '../model';

/** Delay after each successful insertion, to stay under the API rate limit */
export const DEFAULT_INSERT_DELAY_MS = 500;

/**
 * The part of the YouTube client the writer needs
 */
export type PlaylistTarget = Pick<YouTubeClient, 'insertPlaylistItem'>;

/**
 * Insert a video at position 0 of the playlist
 *
 * Never throws: failures are returned as `failed` or `quota-exhausted`.
 */
export async function insertPlaylistVideo(
  target: PlaylistTarget,
  playlistId: string,
  videoId: VideoId,
  options: PlaylistWriterOptions = {}
): Promise<InsertOutcome> {
  const { insertDelayMs = DEFAULT_INSERT_DELAY_MS } = options;

  try {
    await target.insertPlaylistItem(playlistId, videoId, 0);
  } catch (error) {
    if (error instanceof HttpError) {
      logger.warn(`Failed to add '${videoId}' to playlist: HTTP ${error.status} ${error.reason}`);

      if (error.isQuotaExceeded()) {
        logger.info("Hit a quota limit, so that's all we can do for today");
        return { status: 'quota-exhausted', videoId, error };
      }
      return { status: 'failed', videoId, error };
    }

    const failure = error instanceof Error ? error : new Error(String(error));
    logger.warn(`Failed to add '${videoId}' to playlist: ${failure.message}`);
    return { status: 'failed', videoId, error: failure };
  }

  await sleep(insertDelayMs);
  return { status: 'inserted', videoId };
}
