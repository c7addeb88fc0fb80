import type { InfluencerRecord } from '../src/scrapers/types.js';

export const CREATE_TIME = 1700000000; // 2023-11-14T22:13:20.000Z

export function makeItem(username: string) {
  return {
    id: `${username}-video`,
    desc: `morning routine by ${username} #kbeauty`,
    createTime: CREATE_TIME,
    author: { uniqueId: username, nickname: `Nick ${username}`, signature: 'skincare notes', verified: false },
    authorStats: { followerCount: 1000, followingCount: 10, heartCount: 5000, videoCount: 42 },
    stats: { diggCount: 80, commentCount: 10, shareCount: 10, playCount: 1000 },
    textExtra: [{ hashtagName: 'kbeauty' }, { hashtagName: '' }, { type: 0 }],
  };
}

/** A search response body with `n` items authored by `${prefix}0` .. `${prefix}{n-1}`. */
export function searchBody(prefix: string, n: number, extra: Record<string, unknown> = {}): string {
  const items = Array.from({ length: n }, (_, i) => makeItem(`${prefix}${i}`));
  return JSON.stringify({ status_code: 0, item_list: items, ...extra });
}

export function makeRecord(username: string): InfluencerRecord {
  return {
    username,
    profile_url: `https://www.tiktok.com/@${username}`,
    nickname: `Nick ${username}`,
    bio: 'skincare notes',
    verified: false,
    follower_count: 1000,
    following_count: 10,
    heart_count: 5000,
    video_count: 42,
    video_id: `${username}-video`,
    video_url: `https://www.tiktok.com/@${username}/video/${username}-video`,
    description: `morning routine by ${username} #kbeauty`,
    hashtags: ['kbeauty'],
    engagement_rate: 10,
    posted_at: '2023-11-14T22:13:20.000Z',
  };
}

export const PROFILE_HTML =
  '<script id="__UNIVERSAL_DATA_FOR_REHYDRATION__">{"userInfo":{"user":{"id":"1","uniqueId":"a0"},' +
  '"stats":{"followerCount":2500,"followingCount":12,"heart":90000,"heartCount":90000,"videoCount":30,"diggCount":5}}}</script>';

export function okResponse(body: string) {
  return { ok: true, status: 200, text: () => Promise.resolve(body) };
}

export function errorResponse(status: number) {
  return { ok: false, status, text: () => Promise.resolve('') };
}

/**
 * Serves search pages keyed by offset (a number entry is an HTTP error
 * status) and profile pages for any /@user path. Unknown offsets are empty.
 */
export function tiktokResponder(pages: Record<number, string | number>, profile: string | number = PROFILE_HTML) {
  return async (url: string) => {
    const u = new URL(url);
    if (u.pathname.startsWith('/@')) {
      return typeof profile === 'number' ? errorResponse(profile) : okResponse(profile);
    }
    const page = pages[Number(u.searchParams.get('offset'))];
    if (typeof page === 'number') return errorResponse(page);
    return okResponse(page ?? JSON.stringify({ status_code: 0, item_list: [] }));
  };
}
