/**
 * Reddit feed library exports
 */
export { scanFeed, DEFAULT_SCAN_LIMIT, type FeedSource } from './feed-reader';
