/**
 * Feed entry entity - public API
 */
export {
  type FeedEntry,
  type RankingMode,
  RANKING_MODES,
} from './types';
