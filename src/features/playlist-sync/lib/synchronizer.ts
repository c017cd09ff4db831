/**
 * Synchronization pass
 *
 * Reads the playlist, scans the feed, and inserts every video the feed links
 * to that the playlist does not already hold.
 */

import type { VideoId } from '../../../entities/video-id';
import { logger } from '../../../shared/lib';
import { scanFeed } from '../../reddit-feed';
import { insertPlaylistVideo, listPlaylistMembers } from '../../youtube-playlist';
import type { SyncDependencies, SyncOptions, SyncResult } from '../model';

/**
 * Videos in `candidates` that are not in `members`, each listed once
 */
export function selectNewVideos(candidates: Iterable<VideoId>, members: ReadonlySet<VideoId>): VideoId[] {
  const selected = new Set<VideoId>();
  for (const videoId of candidates) {
    if (!members.has(videoId)) {
      selected.add(videoId);
    }
  }
  return [...selected];
}

/**
 * Run one synchronization pass
 *
 * Read failures propagate. Insertion failures are collected in the result;
 * the loop stops at the first quota-exhausted insertion.
 */
export async function syncPlaylist(deps: SyncDependencies, options: SyncOptions): Promise<SyncResult> {
  const { playlistId, feedName, ranking, limit } = options;

  const members = await listPlaylistMembers(deps.playlist, playlistId, options);
  logger.info(`Found ${members.size} items in the YouTube playlist`);

  const candidates = await scanFeed(deps.feed, feedName, ranking, limit);
  logger.info(`Found ${candidates.size} candidate submissions`);

  const toAdd = selectNewVideos(candidates, members);
  logger.info(`Found ${toAdd.length} videos to add`);

  const result: SyncResult = {
    playlistSize: members.size,
    candidateCount: candidates.size,
    toAdd,
    inserted: [],
    failed: [],
    quotaExhausted: null,
  };

  for (const videoId of toAdd) {
    logger.info(`Adding video '${videoId}' to playlist`);
    const outcome = await insertPlaylistVideo(deps.playlist, playlistId, videoId, options);

    if (outcome.status === 'inserted') {
      logger.info(`✓ Added: ${videoId}`);
      result.inserted.push(videoId);
    } else if (outcome.status === 'failed') {
      logger.warn(`✗ Skipped: ${videoId}`);
      result.failed.push(outcome);
    } else {
      result.quotaExhausted = outcome;
      break;
    }
  }

  logger.info(
    `Finished adding videos: ${result.inserted.length}/${toAdd.length} added` +
      (result.failed.length > 0 ? `, ${result.failed.length} failed` : '') +
      (result.quotaExhausted ? ', stopped by quota' : '')
  );
  return result;
}
