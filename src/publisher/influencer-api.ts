import type { InfluencerRecord } from '../scrapers/types.js';
import { StorageError, errorMessage } from '../errors.js';

export interface ProfileForm {
  name: string;
  username: string;
  email: string | null;
  bio: string;
  profile_url: string;
  avatar_url: string;
  location: string;
  date_last_post: string | null; // "YYYY-MM-DD HH:mm:ss", UTC
  fake_follower_rate: number;
  avg_engagement_by_day: string;
  avg_posting_time: string;
  platform_ids: string[];
  category_ids: string[];
  metrics: {
    follower_count: number | null;
    engagement_rate: number;
    active_status: boolean;
  };
  platform_metrics: unknown[];
}

export interface PublisherOptions {
  url: string;
  platformId?: string;
  categoryId?: string;
  timeoutMs?: number;
}

function formatPostDate(iso: string | null): string | null {
  if (!iso) return null;
  return iso.slice(0, 19).replace('T', ' ');
}

/** Maps a scraped record onto the influencer API's profile form. */
export function toProfileForm(record: InfluencerRecord, opts: Pick<PublisherOptions, 'platformId' | 'categoryId'> = {}): ProfileForm {
  return {
    name: record.nickname,
    username: record.username,
    email: null,
    bio: record.bio,
    profile_url: record.profile_url,
    avatar_url: '',
    location: '',
    date_last_post: formatPostDate(record.posted_at),
    fake_follower_rate: 0,
    avg_engagement_by_day: '',
    avg_posting_time: '',
    platform_ids: opts.platformId ? [opts.platformId] : [],
    category_ids: opts.categoryId ? [opts.categoryId] : [],
    metrics: {
      follower_count: record.follower_count,
      engagement_rate: record.engagement_rate,
      active_status: true,
    },
    platform_metrics: [],
  };
}

export async function publishProfile(record: InfluencerRecord, opts: PublisherOptions): Promise<void> {
  const form = toProfileForm(record, opts);

  let res: Response;
  try {
    res = await fetch(opts.url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(form),
      signal: AbortSignal.timeout(opts.timeoutMs ?? 30_000),
    });
  } catch (err) {
    throw new StorageError(`Influencer API POST failed for ${record.username}: ${errorMessage(err)}`, { cause: err });
  }

  if (!res.ok) {
    throw new StorageError(`Influencer API returned ${res.status} for ${record.username}`);
  }
}
