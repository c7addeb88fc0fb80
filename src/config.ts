import { readFile } from 'node:fs/promises';
import type { SearchRequest } from './scrapers/types.js';
import { DATASET_BACKENDS, type DatasetBackend } from './dataset/types.js';
import type { PublisherOptions } from './publisher/influencer-api.js';
import { ConfigError, errorMessage } from './errors.js';

export const DEFAULT_INPUT_PATH = 'storage/key_value_stores/default/INPUT.json';

export interface ScrapeInput {
  keyword: string;
  max_influencers: number;
  fetch_author_stats: boolean;
  page_size: number;
  delay_ms: number;
}

export const DEFAULT_INPUT: Readonly<ScrapeInput> = {
  keyword: 'k-beauty',
  max_influencers: 50,
  fetch_author_stats: true,
  page_size: 20,
  delay_ms: 0,
};

export interface CliOverrides {
  keyword?: string;
  max?: string;
  backend?: string;
}

export interface RunConfig {
  request: SearchRequest;
  fetchAuthorStats: boolean;
  pageSize: number;
  delayMs: number;
  timeoutMs: number;
  userAgent?: string;
  cookie?: string;
  backend: DatasetBackend;
  storageDir: string;
  publisher?: PublisherOptions;
}

type Env = Record<string, string | undefined>;

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function positiveInt(value: unknown, name: string, max = Number.MAX_SAFE_INTEGER): number {
  const n = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  if (typeof n !== 'number' || !Number.isInteger(n) || n <= 0 || n > max) {
    throw new ConfigError(`${name} must be an integer between 1 and ${max}, got ${JSON.stringify(value)}`);
  }
  return n;
}

function keyword(value: unknown, name = 'keyword'): string {
  if (typeof value !== 'string') {
    throw new ConfigError(`${name} must be a string, got ${JSON.stringify(value)}`);
  }
  const trimmed = value.trim().replace(/^#/, '').trim();
  if (!trimmed) {
    throw new ConfigError(`${name} must not be empty`);
  }
  return trimmed;
}

function backend(value: string): DatasetBackend {
  const found = DATASET_BACKENDS.find((b) => b === value);
  if (!found) {
    throw new ConfigError(`Unknown dataset backend "${value}". Use one of: ${DATASET_BACKENDS.join(', ')}`);
  }
  return found;
}

/** Validates the input object, filling in defaults for missing fields. */
export function parseInput(raw: unknown): ScrapeInput {
  if (raw === null || raw === undefined) return { ...DEFAULT_INPUT };
  if (!isObject(raw)) {
    throw new ConfigError('Input must be a JSON object');
  }

  const input: ScrapeInput = { ...DEFAULT_INPUT };
  if (raw.keyword !== undefined) input.keyword = keyword(raw.keyword);
  if (raw.max_influencers !== undefined) input.max_influencers = positiveInt(raw.max_influencers, 'max_influencers');
  if (raw.page_size !== undefined) input.page_size = positiveInt(raw.page_size, 'page_size', 50);
  if (raw.fetch_author_stats !== undefined) {
    if (typeof raw.fetch_author_stats !== 'boolean') {
      throw new ConfigError('fetch_author_stats must be true or false');
    }
    input.fetch_author_stats = raw.fetch_author_stats;
  }
  if (raw.delay_ms !== undefined) {
    const d = raw.delay_ms;
    if (typeof d !== 'number' || !Number.isInteger(d) || d < 0) {
      throw new ConfigError(`delay_ms must be a non-negative integer, got ${JSON.stringify(d)}`);
    }
    input.delay_ms = d;
  }
  return input;
}

/** Reads the input JSON file. A missing file yields null, meaning "all defaults". */
export async function readInputFile(path: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null;
    throw new ConfigError(`Cannot read input file ${path}: ${errorMessage(err)}`);
  }

  try {
    return JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`Input file ${path} is not valid JSON: ${errorMessage(err)}`);
  }
}

export function resolveConfig(input: ScrapeInput, env: Env = process.env, overrides: CliOverrides = {}): RunConfig {
  const request: SearchRequest = {
    keyword: overrides.keyword !== undefined ? keyword(overrides.keyword, '--keyword') : input.keyword,
    maxInfluencers: overrides.max !== undefined ? positiveInt(overrides.max, '--max') : input.max_influencers,
  };

  const apiUrl = env.INFLUENCER_API_URL;
  const timeoutMs = env.REQUEST_TIMEOUT_MS ? positiveInt(env.REQUEST_TIMEOUT_MS, 'REQUEST_TIMEOUT_MS') : 30_000;

  return {
    request,
    fetchAuthorStats: input.fetch_author_stats,
    pageSize: input.page_size,
    delayMs: input.delay_ms,
    timeoutMs,
    userAgent: env.TIKTOK_USER_AGENT || undefined,
    cookie: env.TIKTOK_COOKIE || undefined,
    backend: backend(overrides.backend ?? env.DATASET_BACKEND ?? 'local'),
    storageDir: env.STORAGE_DIR || 'storage',
    publisher: apiUrl
      ? {
          url: apiUrl,
          platformId: env.INFLUENCER_PLATFORM_ID || undefined,
          categoryId: env.INFLUENCER_CATEGORY_ID || undefined,
          timeoutMs,
        }
      : undefined,
  };
}

/** Backends that keep records between runs, for commands that read a dataset back. */
export function persistentBackend(backend: DatasetBackend): Exclude<DatasetBackend, 'memory'> {
  if (backend === 'memory') {
    throw new ConfigError('The memory backend keeps nothing between runs; use local or supabase');
  }
  return backend;
}

// setTimeout takes a signed 32-bit delay; longer ones fire after 1 ms
const MAX_TIMER_MS = 2_147_483_647;

/** Converts a `--repeat-hours` value into the pause between runs, in milliseconds. */
export function parseRepeatInterval(hours: string): number {
  const h = Number(hours);
  if (hours.trim() === '' || !Number.isFinite(h) || h <= 0) {
    throw new ConfigError(`--repeat-hours must be a positive number, got "${hours}"`);
  }
  const ms = Math.round(h * 60 * 60 * 1000);
  if (ms > MAX_TIMER_MS) {
    throw new ConfigError(`--repeat-hours must be at most ${Math.floor(MAX_TIMER_MS / 3_600_000)}, got "${hours}"`);
  }
  return ms;
}

export async function loadConfig(
  inputPath: string = process.env.INPUT_PATH || DEFAULT_INPUT_PATH,
  env: Env = process.env,
  overrides: CliOverrides = {},
): Promise<RunConfig> {
  const raw = await readInputFile(inputPath);
  return resolveConfig(parseInput(raw), env, overrides);
}
