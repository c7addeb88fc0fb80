export interface SearchRequest {
  keyword: string;
  maxInfluencers: number;
}

export interface AuthorStats {
  follower_count: number | null;
  following_count: number | null;
  heart_count: number | null;
  video_count: number | null;
}

export type InfluencerRecord = Readonly<
  AuthorStats & {
    username: string;
    profile_url: string;
    nickname: string;
    bio: string;
    verified: boolean;
    video_id: string;
    video_url: string;
    description: string;
    hashtags: readonly string[];
    engagement_rate: number;
    posted_at: string | null; // ISO 8601
  }
>;

export interface SearchPage {
  records: InfluencerRecord[];
  /** TikTok's own end-of-results marker; undefined when the payload has none. */
  hasMore?: boolean;
  /** Offset TikTok suggests for the next request, when present. */
  nextCursor?: number;
}

export type StopReason = 'limit' | 'exhausted' | 'error';

export interface CollectorResult {
  records: InfluencerRecord[];
  errors: string[];
  stoppedBy: StopReason;
  pages: number;
}
