import type { CollectorResult } from './scrapers/types.js';
import type { RunConfig } from './config.js';
import { openDataset, DATASET_NAME } from './dataset/index.js';
import { collectInfluencers } from './collector/collect.js';
import { createRunLogger, type RunLogger } from './logger.js';

export interface RunOutcome {
  result: CollectorResult;
  exitCode: number;
}

/**
 * One scrape run: open the dataset, collect, report. Exits non-zero only
 * when nothing was stored and something went wrong; partial success is
 * still success.
 */
export async function runScrape(config: RunConfig, logger: RunLogger = createRunLogger()): Promise<RunOutcome> {
  const start = Date.now();
  const { keyword, maxInfluencers } = config.request;
  logger.info(`Scraping up to ${maxInfluencers} influencers for #${keyword} into "${DATASET_NAME}" (${config.backend})`);

  const dataset = await openDataset(DATASET_NAME, {
    backend: config.backend,
    storageDir: config.storageDir,
    publisher: config.publisher,
    logger,
  });

  const result = await collectInfluencers(config.request, dataset, logger, {
    fetchAuthorStats: config.fetchAuthorStats,
    pageSize: config.pageSize,
    delayMs: config.delayMs,
    timeoutMs: config.timeoutMs,
    userAgent: config.userAgent,
    cookie: config.cookie,
  });

  const elapsed = ((Date.now() - start) / 1000).toFixed(1);
  logger.info(`Done in ${elapsed}s: ${result.records.length} stored, ${result.errors.length} errors`);
  for (const err of result.errors) {
    logger.error(`  ${err}`);
  }

  const exitCode = result.records.length === 0 && result.errors.length > 0 ? 1 : 0;
  return { result, exitCode };
}
