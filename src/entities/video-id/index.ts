/**
 * Video ID entity - public API
 */
export { type VideoId } from './types';

export { matchVideoId } from './url-matcher';
