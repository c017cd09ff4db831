/**
 * Feed entry types - one submission read from a community feed
 */

/**
 * Ordering of a feed listing
 */
export const RANKING_MODES = ['hot', 'new', 'top', 'controversial', 'rising'] as const;

export type RankingMode = (typeof RANKING_MODES)[number];

/**
 * A single feed submission
 * Only `url` takes part in synchronization; the rest is kept for logging
 */
export interface FeedEntry {
  /** Submission ID on the feed service */
  id: string;

  /** Submission title */
  title: string;

  /** The link the submission points to */
  url: string;

  /** Path of the discussion page, relative to the feed site */
  permalink: string;
}
