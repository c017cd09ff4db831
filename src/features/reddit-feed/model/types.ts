/**
 * Reddit API types
 */

/**
 * Response from the application-only OAuth token endpoint
 */
export interface RedditTokenResponse {
  access_token: string;
  token_type: string;
  /** Lifetime in seconds */
  expires_in: number;
  scope: string;
}

/**
 * Submission ("t3") data as returned inside a listing
 */
export interface RedditSubmission {
  id: string;
  name: string;
  title: string;
  url: string;
  permalink: string;
  subreddit: string;
  is_self: boolean;
}

/**
 * Listing response for `/r/<subreddit>/<ranking>`
 */
export interface RedditListingResponse {
  kind: 'Listing';
  data: {
    /** Fullname of the last child, used to request the next page */
    after: string | null;
    before: string | null;
    dist: number;
    children: Array<{
      kind: string;
      data: RedditSubmission;
    }>;
  };
}

/**
 * Options for creating a Reddit client
 */
export interface RedditClientOptions {
  /** Descriptive User-Agent required by the Reddit API rules */
  userAgent: string;
}
