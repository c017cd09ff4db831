/**
 * YouTube Playlist feature - public API
 *
 * Reads and appends to a YouTube playlist owned by the authorized account
 */

// API client and authorization
export {
  createYouTubeClient,
  createYouTubeAuth,
  buildAuthorizationUrl,
  extractAuthorizationCode,
  MAX_PAGE_SIZE,
  YOUTUBE_SCOPE,
  type YouTubeClient,
  type YouTubeAuth,
  type YouTubeAuthOptions,
} from './api';

// Types
export type {
  InsertOutcome,
  PlaylistReaderOptions,
  PlaylistWriterOptions,
  YouTubePlaylistItemsResponse,
  YouTubeInsertedPlaylistItem,
} from './model';

// Read and write logic
export {
  listPlaylistMembers,
  insertPlaylistVideo,
  DEFAULT_PAGE_DELAY_MS,
  DEFAULT_INSERT_DELAY_MS,
  type PlaylistSource,
  type PlaylistTarget,
} from './lib';
