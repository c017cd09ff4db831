/**
 * Reddit Feed feature - public API
 *
 * Scans a subreddit for links to YouTube videos
 */

// API client
export { createRedditClient, RANKING_LISTINGS, type RedditClient } from './api';

// Types
export type { RedditSubmission, RedditListingResponse, RedditClientOptions } from './model';

// Scanning logic
export { scanFeed, DEFAULT_SCAN_LIMIT, type FeedSource } from './lib';
