/**
 * YouTube playlist library exports
 */
export { listPlaylistMembers, DEFAULT_PAGE_DELAY_MS, type PlaylistSource } from './playlist-reader';
export { insertPlaylistVideo, DEFAULT_INSERT_DELAY_MS, type PlaylistTarget } from './playlist-writer';
