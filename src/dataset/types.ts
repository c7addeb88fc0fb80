import type { InfluencerRecord } from '../scrapers/types.js';

export type DatasetBackend = 'local' | 'supabase' | 'memory';

export const DATASET_BACKENDS: readonly DatasetBackend[] = ['local', 'supabase', 'memory'];

/** Append-only store for the records of one run. */
export interface Dataset {
  readonly name: string;
  /** Appends one record; rejects with StorageError when the write fails. */
  pushData(record: InfluencerRecord): Promise<void>;
  count(): Promise<number>;
}
