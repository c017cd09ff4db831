/**
 * Playlist sync model exports
 */
export type { SyncOptions, SyncDependencies, SyncResult } from './types';
