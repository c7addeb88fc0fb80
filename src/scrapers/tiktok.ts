import type { AuthorStats, InfluencerRecord, SearchPage } from './types.js';
import { NetworkError, ParseError, errorMessage } from '../errors.js';

export const TIKTOK_HOST = 'https://www.tiktok.com';
const SEARCH_URL = `${TIKTOK_HOST}/api/search/item/full/`;

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';

// Fixed query parameters the web client sends with every search request
const WEB_CLIENT_PARAMS: Record<string, string> = {
  aid: '1988',
  app_language: 'en',
  app_name: 'tiktok_web',
  browser_language: 'en-US',
  browser_platform: 'Win32',
  device_platform: 'web_pc',
  region: 'US',
};

export interface FetchOptions {
  userAgent?: string;
  cookie?: string;
  timeoutMs?: number;
  pageSize?: number;
}

export function toHashtag(keyword: string): string {
  const trimmed = keyword.trim();
  return trimmed.startsWith('#') ? trimmed : `#${trimmed}`;
}

export function buildSearchUrl(hashtag: string, offset: number, pageSize = 20): string {
  const params = new URLSearchParams({
    ...WEB_CLIENT_PARAMS,
    keyword: hashtag,
    offset: String(offset),
    count: String(pageSize),
  });
  return `${SEARCH_URL}?${params.toString()}`;
}

async function getText(url: string, opts: FetchOptions): Promise<string> {
  const headers: Record<string, string> = {
    'User-Agent': opts.userAgent || DEFAULT_USER_AGENT,
    Accept: 'application/json, text/html;q=0.9, */*;q=0.8',
    'Accept-Language': 'en-US,en;q=0.9',
    Referer: `${TIKTOK_HOST}/`,
  };
  if (opts.cookie) {
    headers['Cookie'] = opts.cookie;
  }

  let res: Response;
  try {
    res = await fetch(url, {
      headers,
      signal: AbortSignal.timeout(opts.timeoutMs ?? 30_000),
    });
  } catch (err) {
    throw new NetworkError(`Request failed: ${errorMessage(err)}`, url, undefined, { cause: err });
  }

  if (!res.ok) {
    throw new NetworkError(`TikTok returned ${res.status}`, url, res.status);
  }

  try {
    return await res.text();
  } catch (err) {
    throw new NetworkError(`Reading response body failed: ${errorMessage(err)}`, url, res.status, { cause: err });
  }
}

/** Fetches one page of search results for a hashtag, starting at `offset`. */
export async function fetchSearchPage(hashtag: string, offset: number, opts: FetchOptions = {}): Promise<string> {
  return getText(buildSearchUrl(hashtag, offset, opts.pageSize), opts);
}

export async function fetchProfilePage(username: string, opts: FetchOptions = {}): Promise<string> {
  return getText(`${TIKTOK_HOST}/@${encodeURIComponent(username)}`, opts);
}

// --- parsing ---------------------------------------------------------------

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function field(obj: unknown, key: string): unknown {
  return isObject(obj) ? obj[key] : undefined;
}

function str(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return '';
}

// Counts come back as numbers in `stats` and as strings in `statsV2`
function count(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

function flag(value: unknown): boolean | undefined {
  if (typeof value === 'boolean') return value;
  if (value === 0 || value === 1) return value === 1;
  return undefined;
}

export function calculateEngagementRate(likes: number, comments: number, shares: number, views: number): number {
  if (views <= 0) return 0;
  return Math.round(((likes + comments + shares) / views) * 100 * 100) / 100;
}

export function profileUrl(username: string): string {
  return `${TIKTOK_HOST}/@${username}`;
}

// Dates outside ±8.64e15 ms cannot be represented
const MAX_DATE_MS = 8.64e15;

function postedAt(createTime: number | null): string | null {
  if (createTime === null) return null;
  const ms = createTime * 1000;
  if (Math.abs(ms) > MAX_DATE_MS) return null;
  return new Date(ms).toISOString();
}

function parseHashtags(textExtra: unknown): string[] {
  if (!Array.isArray(textExtra)) return [];
  return textExtra
    .map((t) => str(field(t, 'hashtagName')))
    .filter((name) => name.length > 0);
}

function parseItem(item: unknown): InfluencerRecord | null {
  const author = field(item, 'author');
  const username = str(field(author, 'uniqueId'));
  if (!username) return null;

  const id = str(field(item, 'id'));
  const stats = field(item, 'stats');
  const authorStats = field(item, 'authorStats');
  const createTime = count(field(item, 'createTime'));

  return {
    username,
    profile_url: profileUrl(username),
    nickname: str(field(author, 'nickname')),
    bio: str(field(author, 'signature')),
    verified: field(author, 'verified') === true,
    follower_count: count(field(authorStats, 'followerCount')),
    following_count: count(field(authorStats, 'followingCount')),
    heart_count: count(field(authorStats, 'heartCount')),
    video_count: count(field(authorStats, 'videoCount')),
    video_id: id,
    video_url: `${profileUrl(username)}/video/${id}`,
    description: str(field(item, 'desc')),
    hashtags: parseHashtags(field(item, 'textExtra')),
    engagement_rate: calculateEngagementRate(
      count(field(stats, 'diggCount')) ?? 0,
      count(field(stats, 'commentCount')) ?? 0,
      count(field(stats, 'shareCount')) ?? 0,
      count(field(stats, 'playCount')) ?? 0,
    ),
    posted_at: postedAt(createTime),
  };
}

/**
 * Turns a search response body into influencer records. Pure: the same body
 * always yields the same page.
 */
export function parseSearchPage(body: string): SearchPage {
  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch (err) {
    throw new ParseError(`Search response is not JSON: ${errorMessage(err)}`, { cause: err });
  }

  if (!isObject(data)) {
    throw new ParseError('Search response is not a JSON object');
  }

  const hasMore = flag(data.has_more);
  const items = data.item_list;

  if (items === undefined || items === null) {
    // TikTok drops item_list entirely on the last page
    if (hasMore === false) return { records: [], hasMore };
    throw new ParseError('Search response has no item_list');
  }
  if (!Array.isArray(items)) {
    throw new ParseError('Search response item_list is not an array');
  }

  const records: InfluencerRecord[] = [];
  for (const item of items) {
    const record = parseItem(item);
    if (record) records.push(record);
  }

  const cursor = count(data.cursor);
  return cursor === null ? { records, hasMore } : { records, hasMore, nextCursor: cursor };
}

const STATS_PATTERN = /"stats":(\{[^}]*\})/;

/** Extracts the author stats blob embedded in a profile page. Null when the page has none. */
export function parseAuthorStats(html: string): AuthorStats | null {
  const match = html.match(STATS_PATTERN);
  if (!match) return null;

  let stats: unknown;
  try {
    stats = JSON.parse(match[1]);
  } catch (err) {
    throw new ParseError(`Profile stats blob is not JSON: ${errorMessage(err)}`, { cause: err });
  }

  return {
    follower_count: count(field(stats, 'followerCount')),
    following_count: count(field(stats, 'followingCount')),
    heart_count: count(field(stats, 'heartCount')) ?? count(field(stats, 'heart')),
    video_count: count(field(stats, 'videoCount')),
  };
}

export async function fetchAuthorStats(username: string, opts: FetchOptions = {}): Promise<AuthorStats | null> {
  const html = await fetchProfilePage(username, opts);
  return parseAuthorStats(html);
}

/** Overlays profile stats on a record, keeping the search values where the profile has none. */
export function withAuthorStats(record: InfluencerRecord, stats: AuthorStats): InfluencerRecord {
  return {
    ...record,
    follower_count: stats.follower_count ?? record.follower_count,
    following_count: stats.following_count ?? record.following_count,
    heart_count: stats.heart_count ?? record.heart_count,
    video_count: stats.video_count ?? record.video_count,
  };
}
