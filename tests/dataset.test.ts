import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readdir, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { LocalDataset, MemoryDataset, PublishingDataset, SupabaseDataset, openDataset } from '../src/dataset/index.js';
import { StorageError } from '../src/errors.js';
import { silentLogger } from '../src/logger.js';
import { makeRecord, okResponse, errorResponse } from './helpers.js';

// Mock Supabase client
const mockInsert = vi.fn();
const mockFrom = vi.fn((_table: string) => ({ insert: mockInsert }));

vi.mock('@supabase/supabase-js', () => ({
  createClient: vi.fn(() => ({
    from: mockFrom,
  })),
}));

const mockFetch = vi.fn();
vi.stubGlobal('fetch', mockFetch);

beforeEach(() => {
  mockFetch.mockReset();
  mockInsert.mockReset();
  mockFrom.mockClear();
});

describe('LocalDataset', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'tiktok-dataset-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes one numbered JSON file per record', async () => {
    const dataset = await LocalDataset.open('tiktok', dir);

    await dataset.pushData(makeRecord('a0'));
    await dataset.pushData(makeRecord('a1'));

    const itemsDir = join(dir, 'datasets', 'tiktok');
    expect((await readdir(itemsDir)).sort()).toEqual(['000000001.json', '000000002.json']);
    const first = JSON.parse(await readFile(join(itemsDir, '000000001.json'), 'utf-8'));
    expect(first).toEqual(makeRecord('a0'));
    expect(await dataset.count()).toBe(2);
  });

  it('continues numbering after existing items', async () => {
    const first = await LocalDataset.open('tiktok', dir);
    await first.pushData(makeRecord('a0'));

    const reopened = await LocalDataset.open('tiktok', dir);
    await reopened.pushData(makeRecord('b0'));

    const files = (await readdir(join(dir, 'datasets', 'tiktok'))).sort();
    expect(files).toEqual(['000000001.json', '000000002.json']);
    expect(await reopened.count()).toBe(2);
  });

  it('is what openDataset returns for the local backend', async () => {
    const dataset = await openDataset('tiktok', { backend: 'local', storageDir: dir });
    expect(dataset).toBeInstanceOf(LocalDataset);
  });
});

describe('SupabaseDataset', () => {
  it('fails with StorageError when credentials are missing', async () => {
    vi.stubEnv('SUPABASE_URL', '');
    vi.stubEnv('SUPABASE_ANON_KEY', '');
    vi.resetModules();
    const fresh = await import('../src/dataset/supabase.js');

    await expect(new fresh.SupabaseDataset('tiktok').pushData(makeRecord('a0'))).rejects.toThrow(
      'Missing SUPABASE_URL or SUPABASE_ANON_KEY in environment',
    );
    vi.unstubAllEnvs();
  });

  it('inserts each record as a dataset item', async () => {
    vi.stubEnv('SUPABASE_URL', 'http://localhost:54321');
    vi.stubEnv('SUPABASE_ANON_KEY', 'test-anon-key');
    mockInsert.mockResolvedValueOnce({ error: null });

    await new SupabaseDataset('tiktok').pushData(makeRecord('a0'));

    expect(mockFrom).toHaveBeenCalledWith('dataset_items');
    expect(mockInsert).toHaveBeenCalledWith(
      expect.objectContaining({ dataset: 'tiktok', item: makeRecord('a0') }),
    );
  });

  it('turns insert errors into StorageError', async () => {
    vi.stubEnv('SUPABASE_URL', 'http://localhost:54321');
    vi.stubEnv('SUPABASE_ANON_KEY', 'test-anon-key');
    mockInsert.mockResolvedValueOnce({ error: { message: 'permission denied for table dataset_items' } });

    const err = await new SupabaseDataset('tiktok').pushData(makeRecord('a0')).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(StorageError);
    expect(err).toMatchObject({ message: 'Insert into tiktok: permission denied for table dataset_items' });
  });
});

describe('PublishingDataset', () => {
  const publisher = { url: 'http://localhost:8080/api/v1/influencers/' };

  it('stores the record and posts its profile form', async () => {
    mockFetch.mockResolvedValueOnce(okResponse('{}'));
    const inner = new MemoryDataset('tiktok');

    await new PublishingDataset(inner, publisher, silentLogger).pushData(makeRecord('a0'));

    expect(inner.items).toEqual([makeRecord('a0')]);
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe('http://localhost:8080/api/v1/influencers/');
    expect(init.method).toBe('POST');
    expect(JSON.parse(init.body).username).toBe('a0');
  });

  it('logs a rejected post and keeps the stored record', async () => {
    mockFetch.mockResolvedValueOnce(errorResponse(500));
    const inner = new MemoryDataset('tiktok');
    const warn = vi.fn();

    await new PublishingDataset(inner, publisher, { ...silentLogger, warn }).pushData(makeRecord('a0'));

    expect(inner.items).toEqual([makeRecord('a0')]);
    expect(warn).toHaveBeenCalledWith('Influencer API push for @a0 failed: Influencer API returned 500 for a0');
  });

  it('still fails when the wrapped dataset rejects the write', async () => {
    const failing = {
      name: 'tiktok',
      pushData: async () => {
        throw new StorageError('disk full');
      },
      count: async () => 0,
    };

    await expect(new PublishingDataset(failing, publisher, silentLogger).pushData(makeRecord('a0'))).rejects.toThrow(
      'disk full',
    );
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('wraps the backend when openDataset is given a publisher', async () => {
    const dataset = await openDataset('tiktok', { backend: 'memory', storageDir: 'unused', publisher });

    expect(dataset).toBeInstanceOf(PublishingDataset);
    expect(dataset.name).toBe('tiktok');
  });
});
