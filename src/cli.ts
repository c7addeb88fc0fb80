#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import { loadConfig, parseRepeatInterval, persistentBackend, DEFAULT_INPUT_PATH, type RunConfig } from './config.js';
import { runScrape } from './run.js';
import { openDataset, DATASET_NAME } from './dataset/index.js';
import { createRunLogger } from './logger.js';
import { errorMessage } from './errors.js';

const program = new Command();

program
  .name('tiktok-influencers')
  .description('Collect TikTok influencers posting under a hashtag into the "tiktok" dataset')
  .version('0.1.0');

program
  .command('scrape')
  .description('Search a hashtag and store the influencers found')
  .option('--input <path>', 'Input JSON file', process.env.INPUT_PATH || DEFAULT_INPUT_PATH)
  .option('--keyword <keyword>', 'Keyword to search as a hashtag (overrides input)')
  .option('--max <n>', 'Maximum number of influencers (overrides input)')
  .option('--backend <backend>', 'Dataset backend: local, supabase or memory')
  .option('--repeat-hours <hours>', 'Run again every N hours until stopped')
  .action(async (opts: { input: string; keyword?: string; max?: string; backend?: string; repeatHours?: string }) => {
    let config: RunConfig;
    try {
      config = await loadConfig(opts.input, process.env, opts);
    } catch (err) {
      console.error(`Invalid configuration: ${errorMessage(err)}`);
      process.exit(1);
    }

    if (!opts.repeatHours) {
      try {
        const { exitCode } = await runScrape(config);
        process.exitCode = exitCode;
      } catch (err) {
        console.error(`Scrape failed: ${errorMessage(err)}`);
        process.exit(1);
      }
      return;
    }

    let intervalMs: number;
    try {
      intervalMs = parseRepeatInterval(opts.repeatHours);
    } catch (err) {
      console.error(errorMessage(err));
      process.exit(1);
    }

    // Runs until the process is stopped; a failed run waits for the next one
    for (;;) {
      const logger = createRunLogger();
      try {
        await runScrape(config, logger);
      } catch (err) {
        logger.error(`Run failed: ${errorMessage(err)}`);
      }
      logger.info(`Sleeping ${opts.repeatHours}h before the next run...`);
      await new Promise((resolve) => setTimeout(resolve, intervalMs));
    }
  });

program
  .command('status')
  .description('Show how many records the dataset holds')
  .option('--backend <backend>', 'Dataset backend: local or supabase')
  .action(async (opts: { backend?: string }) => {
    try {
      const config = await loadConfig(undefined, process.env, { backend: opts.backend });
      const backend = persistentBackend(config.backend);
      const dataset = await openDataset(DATASET_NAME, { backend, storageDir: config.storageDir });
      console.log('tiktok-influencers status:');
      console.log(`  Dataset: ${DATASET_NAME} (${backend})`);
      console.log(`  Records: ${await dataset.count()}`);
    } catch (err) {
      console.error(`Status failed: ${errorMessage(err)}`);
      process.exit(1);
    }
  });

program.parseAsync().catch((err: unknown) => {
  console.error(errorMessage(err));
  process.exit(1);
});
