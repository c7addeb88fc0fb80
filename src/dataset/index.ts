import type { InfluencerRecord } from '../scrapers/types.js';
import type { Dataset, DatasetBackend } from './types.js';
import { LocalDataset } from './local.js';
import { MemoryDataset } from './memory.js';
import { SupabaseDataset } from './supabase.js';
import { publishProfile, type PublisherOptions } from '../publisher/influencer-api.js';
import { silentLogger, type RunLogger } from '../logger.js';
import { errorMessage } from '../errors.js';

export const DATASET_NAME = 'tiktok';

export interface OpenDatasetOptions {
  backend: DatasetBackend;
  storageDir: string;
  /** When set, every stored record is also POSTed to the influencer API. */
  publisher?: PublisherOptions;
  logger?: RunLogger;
}

/**
 * Stores into the wrapped dataset, then forwards the record to the
 * influencer API. Once the dataset holds the record a failed forward is only
 * logged, so the dataset and the run's results stay in step.
 */
export class PublishingDataset implements Dataset {
  private readonly inner: Dataset;
  private readonly publisher: PublisherOptions;
  private readonly logger: RunLogger;

  constructor(inner: Dataset, publisher: PublisherOptions, logger: RunLogger) {
    this.inner = inner;
    this.publisher = publisher;
    this.logger = logger;
  }

  get name(): string {
    return this.inner.name;
  }

  async pushData(record: InfluencerRecord): Promise<void> {
    await this.inner.pushData(record);
    try {
      await publishProfile(record, this.publisher);
    } catch (err) {
      this.logger.warn(`Influencer API push for @${record.username} failed: ${errorMessage(err)}`);
    }
  }

  async count(): Promise<number> {
    return this.inner.count();
  }
}

async function openBackend(name: string, opts: OpenDatasetOptions): Promise<Dataset> {
  switch (opts.backend) {
    case 'local':
      return LocalDataset.open(name, opts.storageDir);
    case 'supabase':
      return new SupabaseDataset(name);
    case 'memory':
      return new MemoryDataset(name);
  }
}

export async function openDataset(name: string, opts: OpenDatasetOptions): Promise<Dataset> {
  const dataset = await openBackend(name, opts);
  return opts.publisher ? new PublishingDataset(dataset, opts.publisher, opts.logger ?? silentLogger) : dataset;
}

export type { Dataset, DatasetBackend } from './types.js';
export { DATASET_BACKENDS } from './types.js';
export { LocalDataset } from './local.js';
export { MemoryDataset } from './memory.js';
export { SupabaseDataset } from './supabase.js';
