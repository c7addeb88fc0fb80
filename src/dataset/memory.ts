import type { InfluencerRecord } from '../scrapers/types.js';
import type { Dataset } from './types.js';

export class MemoryDataset implements Dataset {
  readonly name: string;
  readonly items: InfluencerRecord[] = [];

  constructor(name: string) {
    this.name = name;
  }

  async pushData(record: InfluencerRecord): Promise<void> {
    this.items.push(record);
  }

  async count(): Promise<number> {
    return this.items.length;
  }
}
