/**
 * YouTube playlist model exports
 */
export type {
  YouTubePlaylistItemsResponse,
  YouTubePlaylistItem,
  YouTubePlaylistItemInsert,
  YouTubeInsertedPlaylistItem,
  GoogleTokenResponse,
  InsertOutcome,
  PlaylistReaderOptions,
  PlaylistWriterOptions,
} from './types';
