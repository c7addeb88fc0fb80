import type { CollectorResult, InfluencerRecord, SearchPage, SearchRequest, StopReason } from '../scrapers/types.js';
import type { Dataset } from '../dataset/types.js';
import type { RunLogger } from '../logger.js';
import {
  fetchAuthorStats,
  fetchSearchPage,
  parseSearchPage,
  toHashtag,
  withAuthorStats,
  type FetchOptions,
} from '../scrapers/index.js';
import { ScraperError, errorMessage } from '../errors.js';

export interface CollectOptions extends FetchOptions {
  /** Fetch each author's profile page for up-to-date stats. */
  fetchAuthorStats?: boolean;
  /** Pause between page requests. */
  delayMs?: number;
}

const DEFAULT_PAGE_SIZE = 20;

function describeError(err: unknown, offset: number): string {
  const kind = err instanceof ScraperError ? err.kind : 'unknown';
  return `${kind} error at offset ${offset}: ${errorMessage(err)}`;
}

async function enrich(record: InfluencerRecord, logger: RunLogger, opts: CollectOptions): Promise<InfluencerRecord> {
  try {
    const stats = await fetchAuthorStats(record.username, opts);
    if (!stats) {
      logger.warn(`No stats found on profile page of @${record.username}`);
      return record;
    }
    return withAuthorStats(record, stats);
  } catch (err) {
    const kind = err instanceof ScraperError ? err.kind : 'unknown';
    logger.warn(`Author stats for @${record.username} failed (${kind}): ${errorMessage(err)}`);
    return record;
  }
}

/**
 * Pages through the hashtag search one page at a time, storing each record
 * as it is accepted. Stops at `maxInfluencers`, on an empty or final page,
 * or at the first fetch, parse or storage failure. Failures never throw:
 * they end the loop and come back in `errors` alongside the records
 * collected so far.
 */
export async function collectInfluencers(
  request: SearchRequest,
  dataset: Dataset,
  logger: RunLogger,
  opts: CollectOptions = {},
): Promise<CollectorResult> {
  const hashtag = toHashtag(request.keyword);
  const pageSize = opts.pageSize ?? DEFAULT_PAGE_SIZE;
  const records: InfluencerRecord[] = [];
  const errors: string[] = [];
  let offset = 0;
  let pages = 0;

  const done = (stoppedBy: StopReason): CollectorResult => {
    logger.info(`Collector done (${stoppedBy}): ${records.length} records from ${pages} pages`);
    return { records, errors, stoppedBy, pages };
  };

  while (records.length < request.maxInfluencers) {
    if (pages > 0 && opts.delayMs) {
      await new Promise((resolve) => setTimeout(resolve, opts.delayMs));
    }

    let page: SearchPage;
    try {
      const body = await fetchSearchPage(hashtag, offset, { ...opts, pageSize });
      page = parseSearchPage(body);
    } catch (err) {
      const msg = describeError(err, offset);
      errors.push(msg);
      logger.error(`Page for ${hashtag} failed: ${msg}`);
      return done('error');
    }
    pages++;

    logger.info(`Page ${pages} (${hashtag}, offset ${offset}): ${page.records.length} records`);
    if (page.records.length === 0) {
      return done('exhausted');
    }

    const room = request.maxInfluencers - records.length;
    for (const found of page.records.slice(0, room)) {
      const record = opts.fetchAuthorStats ? await enrich(found, logger, opts) : found;
      try {
        await dataset.pushData(record);
      } catch (err) {
        const msg = describeError(err, offset);
        errors.push(msg);
        logger.error(`Storing @${record.username} in ${dataset.name} failed: ${msg}`);
        return done('error');
      }
      records.push(record);
    }

    if (records.length >= request.maxInfluencers) break;
    if (page.hasMore === false) return done('exhausted');

    offset = page.nextCursor !== undefined && page.nextCursor > offset ? page.nextCursor : offset + pageSize;
  }

  return done('limit');
}
