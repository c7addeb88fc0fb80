export {
  fetchSearchPage,
  fetchProfilePage,
  fetchAuthorStats,
  parseSearchPage,
  parseAuthorStats,
  withAuthorStats,
  calculateEngagementRate,
  toHashtag,
} from './tiktok.js';
export type { FetchOptions } from './tiktok.js';
export type { SearchRequest, InfluencerRecord, AuthorStats, SearchPage, CollectorResult, StopReason } from './types.js';
