/**
 * Reddit feed model exports
 */
export type {
  RedditTokenResponse,
  RedditSubmission,
  RedditListingResponse,
  RedditClientOptions,
} from './types';
