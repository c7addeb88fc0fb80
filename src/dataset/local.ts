import { mkdir, readdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { InfluencerRecord } from '../scrapers/types.js';
import type { Dataset } from './types.js';
import { StorageError, errorMessage } from '../errors.js';

const ITEM_FILE = /^(\d{9})\.json$/;

function itemFileName(index: number): string {
  return `${String(index).padStart(9, '0')}.json`;
}

/**
 * Dataset kept as one JSON file per item under
 * `<storageDir>/datasets/<name>/`, numbered from 000000001.
 */
export class LocalDataset implements Dataset {
  readonly name: string;
  readonly dir: string;
  private lastIndex: number;

  private constructor(name: string, dir: string, lastIndex: number) {
    this.name = name;
    this.dir = dir;
    this.lastIndex = lastIndex;
  }

  static async open(name: string, storageDir: string): Promise<LocalDataset> {
    const dir = join(storageDir, 'datasets', name);
    try {
      await mkdir(dir, { recursive: true });
      const files = await readdir(dir);
      let lastIndex = 0;
      for (const f of files) {
        const m = ITEM_FILE.exec(f);
        if (m) lastIndex = Math.max(lastIndex, Number(m[1]));
      }
      return new LocalDataset(name, dir, lastIndex);
    } catch (err) {
      throw new StorageError(`Cannot open dataset ${name} at ${dir}: ${errorMessage(err)}`, { cause: err });
    }
  }

  async pushData(record: InfluencerRecord): Promise<void> {
    const index = this.lastIndex + 1;
    const path = join(this.dir, itemFileName(index));
    try {
      await writeFile(path, JSON.stringify(record, null, 2) + '\n', { encoding: 'utf-8', flag: 'wx' });
    } catch (err) {
      throw new StorageError(`Write ${path} failed: ${errorMessage(err)}`, { cause: err });
    }
    this.lastIndex = index;
  }

  async count(): Promise<number> {
    try {
      const files = await readdir(this.dir);
      return files.filter((f) => ITEM_FILE.test(f)).length;
    } catch (err) {
      throw new StorageError(`Cannot list dataset ${this.name}: ${errorMessage(err)}`, { cause: err });
    }
  }
}
