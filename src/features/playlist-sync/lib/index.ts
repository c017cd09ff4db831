/**
 * Playlist sync library exports
 */
export { syncPlaylist, selectNewVideos } from './synchronizer';
