import type { InfluencerRecord } from '../scrapers/types.js';
import type { Dataset } from './types.js';
import { countDatasetItems, insertDatasetItem } from '../db/supabase.js';

export class SupabaseDataset implements Dataset {
  readonly name: string;

  constructor(name: string) {
    this.name = name;
  }

  async pushData(record: InfluencerRecord): Promise<void> {
    await insertDatasetItem(this.name, record);
  }

  async count(): Promise<number> {
    return countDatasetItems(this.name);
  }
}
