/**
 * Reddit feed API exports
 */
export { createRedditClient, RANKING_LISTINGS, type RedditClient } from './reddit-client';
