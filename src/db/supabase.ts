import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import type { InfluencerRecord } from '../scrapers/types.js';
import { StorageError } from '../errors.js';

const ITEMS_TABLE = 'dataset_items';

let client: SupabaseClient | null = null;

export function getClient(): SupabaseClient {
  if (client) return client;

  const url = process.env.SUPABASE_URL;
  const key = process.env.SUPABASE_ANON_KEY;

  if (!url || !key) {
    throw new StorageError('Missing SUPABASE_URL or SUPABASE_ANON_KEY in environment');
  }

  client = createClient(url, key);
  return client;
}

export async function insertDatasetItem(dataset: string, item: InfluencerRecord): Promise<void> {
  const db = getClient();
  const { error } = await db
    .from(ITEMS_TABLE)
    .insert({ dataset, item, created_at: new Date().toISOString() });

  if (error) {
    throw new StorageError(`Insert into ${dataset}: ${error.message}`);
  }
}

export async function countDatasetItems(dataset: string): Promise<number> {
  const db = getClient();
  const { count, error } = await db
    .from(ITEMS_TABLE)
    .select('*', { count: 'exact', head: true })
    .eq('dataset', dataset);

  if (error) throw new StorageError(`Failed to count ${dataset} items: ${error.message}`);
  return count ?? 0;
}
