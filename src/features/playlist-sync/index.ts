/**
 * Playlist Sync feature - public API
 *
 * Adds the YouTube videos linked from a subreddit to a playlist
 */

// Types
export type { SyncOptions, SyncDependencies, SyncResult } from './model';

// Sync logic
export { syncPlaylist, selectNewVideos } from './lib';
