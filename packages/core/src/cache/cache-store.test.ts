/**
 * Cache Store Tests
 *
 * Covers:
 * - loadIndex() / saveIndex() - persistence and self-healing reads
 * - addEntry() - naming, de-duplication, eviction
 * - loadEntry() - round trip and absent datasets
 * - findEntry() / pruneOrphans()
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';
import {
  FileCacheStore,
  formatCacheTimestamp,
  toFileNameToken,
} from './cache-store.js';
import { MAX_CACHE_ENTRIES } from './types.js';
import type { CacheEntry, CharacterRecord } from './types.js';

// =============================================================================
// Test Helpers
// =============================================================================

const FIXED_NOW = new Date(2026, 0, 2, 3, 4, 5);
const STAMP = '20260102_030405';

const RECORDS: CharacterRecord[] = [
  { character: '山', reading: 'san', meaning: 'mountain' },
  { character: '川', reading: 'sen', meaning: 'river' },
  { character: '木', reading: 'moku', meaning: 'tree' },
];

function createEntry(overrides: Partial<CacheEntry> = {}): CacheEntry {
  return {
    name: overrides.name ?? 'entry',
    sourceKind: overrides.sourceKind ?? 'local',
    source: overrides.source ?? '/data/entry.xlsx',
    cacheFile: overrides.cacheFile ?? 'entry.json',
    createdAt: overrides.createdAt ?? '2026-01-01T00:00:00.000Z',
    count: overrides.count ?? 1,
  };
}

// =============================================================================
// Tests
// =============================================================================

describe('FileCacheStore', () => {
  let dataDir: string;
  let store: FileCacheStore;

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'glyphdeck-cache-test-'));
    store = new FileCacheStore({ dataDir, now: () => FIXED_NOW });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  // ===========================================================================
  // Naming
  // ===========================================================================

  describe('naming', () => {
    it('should replace characters outside letters, digits, _ and -', () => {
      expect(toFileNameToken('N5 漢字 list!')).toBe('N5_漢字_list_');
      expect(toFileNameToken('unit-3_review')).toBe('unit-3_review');
    });

    it('should cap the token at 50 code points', () => {
      expect(toFileNameToken('字'.repeat(60))).toBe('字'.repeat(50));
    });

    it('should fall back to a placeholder for an empty name', () => {
      expect(toFileNameToken('')).toBe('dataset');
    });

    it('should format local time as YYYYMMDD_HHMMSS', () => {
      expect(formatCacheTimestamp(FIXED_NOW)).toBe(STAMP);
    });
  });

  // ===========================================================================
  // Index
  // ===========================================================================

  describe('loadIndex', () => {
    it('should return an empty index when no file exists', async () => {
      expect(await store.loadIndex()).toEqual({ files: [] });
    });

    it('should return an empty index for invalid JSON', async () => {
      await fs.writeFile(path.join(dataDir, 'cache-index.json'), 'not json{');
      expect(await store.loadIndex()).toEqual({ files: [] });
    });

    it('should return an empty index when files is not an array', async () => {
      await fs.writeFile(path.join(dataDir, 'cache-index.json'), JSON.stringify({ files: 'nope' }));
      expect(await store.loadIndex()).toEqual({ files: [] });
    });

    it('should drop malformed and duplicate entries but keep the rest', async () => {
      const good = createEntry({ name: 'good', source: '/a.xlsx', cacheFile: 'good.json' });
      const duplicate = createEntry({ name: 'dup', source: '/a.xlsx', cacheFile: 'dup.json' });
      const bad = { ...createEntry({ source: '/b.xlsx' }), count: -1 };
      const escaping = createEntry({ source: '/c.xlsx', cacheFile: '../evil.json' });
      await fs.writeFile(
        path.join(dataDir, 'cache-index.json'),
        JSON.stringify({ files: [good, bad, duplicate, escaping] })
      );

      expect(await store.loadIndex()).toEqual({ files: [good] });
    });
  });

  describe('saveIndex', () => {
    it('should write the index and leave no temporary files behind', async () => {
      const entry = createEntry();
      await store.saveIndex({ files: [entry] });

      const names = await fs.readdir(dataDir);
      expect(names).toEqual(['cache-index.json']);

      const content = JSON.parse(await fs.readFile(path.join(dataDir, 'cache-index.json'), 'utf-8'));
      expect(content).toEqual({ files: [entry] });
    });

    it('should replace a previous index', async () => {
      await store.saveIndex({ files: [createEntry({ name: 'old' })] });
      await store.saveIndex({ files: [createEntry({ name: 'new' })] });

      const index = await store.loadIndex();
      expect(index.files.map((f) => f.name)).toEqual(['new']);
    });
  });

  // ===========================================================================
  // Entries
  // ===========================================================================

  describe('addEntry', () => {
    it('should name the cache file from the display name and timestamp', async () => {
      const cacheFile = await store.addEntry('N5 漢字 list!', 'local', '/data/n5.xlsx', RECORDS);

      expect(cacheFile).toBe(`N5_漢字_list__${STAMP}.json`);
      await expect(fs.access(store.getDatasetPath(cacheFile))).resolves.toBeUndefined();
    });

    it('should record the entry at the front of the index', async () => {
      const cacheFile = await store.addEntry('kanji', 'remote', 'https://example.test/sheet', RECORDS);

      const index = await store.loadIndex();
      expect(index.files).toEqual([
        {
          name: 'kanji',
          sourceKind: 'remote',
          source: 'https://example.test/sheet',
          cacheFile,
          createdAt: FIXED_NOW.toISOString(),
          count: 3,
        },
      ]);
    });

    it('should round-trip records in their original order', async () => {
      const cacheFile = await store.addEntry('kanji', 'local', '/data/k.xlsx', RECORDS);

      expect(await store.loadEntry(cacheFile)).toEqual(RECORDS);
    });

    it('should add a counter when the file name is already taken', async () => {
      const first = await store.addEntry('same', 'local', '/data/one.xlsx', RECORDS);
      const second = await store.addEntry('same', 'local', '/data/two.xlsx', RECORDS);

      expect(first).toBe(`same_${STAMP}.json`);
      expect(second).toBe(`same_${STAMP}_2.json`);
    });

    it('should replace an entry with the same source and move it to the front', async () => {
      await store.addEntry('alpha', 'local', '/data/alpha.xlsx', RECORDS);
      await store.addEntry('beta', 'local', '/data/beta.xlsx', RECORDS);
      const replaced = await store.addEntry('alpha again', 'local', '/data/alpha.xlsx', RECORDS.slice(0, 1));

      const index = await store.loadIndex();
      expect(index.files.map((f) => f.source)).toEqual(['/data/alpha.xlsx', '/data/beta.xlsx']);
      expect(index.files[0]?.name).toBe('alpha again');
      expect(index.files[0]?.cacheFile).toBe(replaced);
      expect(index.files[0]?.count).toBe(1);
    });

    it('should emit entry:replaced for a known source and entry:added otherwise', async () => {
      const events: string[] = [];
      store.on('entry:added', (entry: CacheEntry) => events.push(`added:${entry.name}`));
      store.on('entry:replaced', (previous: CacheEntry, entry: CacheEntry) =>
        events.push(`replaced:${previous.name}->${entry.name}`)
      );

      await store.addEntry('one', 'local', '/data/x.xlsx', RECORDS);
      await store.addEntry('two', 'local', '/data/x.xlsx', RECORDS);

      expect(events).toEqual(['added:one', 'replaced:one->two']);
    });

    it(`should never keep more than ${MAX_CACHE_ENTRIES} entries`, async () => {
      const cacheFiles: string[] = [];
      for (let i = 0; i < 25; i++) {
        cacheFiles.push(await store.addEntry(`set-${i}`, 'local', `/data/set-${i}.xlsx`, RECORDS));
      }

      const index = await store.loadIndex();
      expect(index.files).toHaveLength(MAX_CACHE_ENTRIES);
      expect(index.files[0]?.source).toBe('/data/set-24.xlsx');
      expect(index.files[19]?.source).toBe('/data/set-5.xlsx');

      for (const evicted of cacheFiles.slice(0, 5)) {
        await expect(fs.access(store.getDatasetPath(evicted))).rejects.toThrow();
      }
      for (const kept of cacheFiles.slice(5)) {
        await expect(fs.access(store.getDatasetPath(kept))).resolves.toBeUndefined();
      }
    });

    it('should emit entry:evicted for each entry pushed past the cap', async () => {
      const evicted: string[] = [];
      store.on('entry:evicted', (entry: CacheEntry) => evicted.push(entry.name));

      for (let i = 0; i < MAX_CACHE_ENTRIES + 2; i++) {
        await store.addEntry(`set-${i}`, 'local', `/data/set-${i}.xlsx`, RECORDS);
      }

      expect(evicted).toEqual(['set-0', 'set-1']);
    });

    it('should keep evicted datasets when the index cannot be saved', async () => {
      const cacheFiles: string[] = [];
      for (let i = 0; i < MAX_CACHE_ENTRIES; i++) {
        cacheFiles.push(await store.addEntry(`set-${i}`, 'local', `/data/set-${i}.xlsx`, RECORDS));
      }
      vi.spyOn(store, 'saveIndex').mockRejectedValueOnce(new Error('ENOSPC: no space left on device'));

      await expect(store.addEntry('overflow', 'local', '/data/overflow.xlsx', RECORDS)).rejects.toThrow('ENOSPC');

      const index = await store.loadIndex();
      expect(index.files).toHaveLength(MAX_CACHE_ENTRIES);
      expect(index.files[19]?.name).toBe('set-0');
      expect(await store.loadEntry(cacheFiles[0] ?? '')).toEqual(RECORDS);
    });

    it('should drop an evicted entry even when its file cannot be deleted', async () => {
      const files = Array.from({ length: MAX_CACHE_ENTRIES }, (_, i) =>
        createEntry({ name: `old-${i}`, source: `/old/${i}.xlsx`, cacheFile: `old-${i}.json` })
      );
      await store.saveIndex({ files });
      // A directory cannot be unlinked, so deleting the oldest dataset fails
      await fs.mkdir(store.getDatasetPath('old-19.json'), { recursive: true });

      const failures: string[] = [];
      store.on('entry:evictionFailed', (entry: CacheEntry, error: Error) => {
        failures.push(entry.name);
        expect(error).toBeInstanceOf(Error);
      });

      await store.addEntry('fresh', 'local', '/data/fresh.xlsx', RECORDS);

      const index = await store.loadIndex();
      expect(index.files).toHaveLength(MAX_CACHE_ENTRIES);
      expect(index.files.some((f) => f.name === 'old-19')).toBe(false);
      expect(failures).toEqual(['old-19']);
    });
  });

  describe('loadEntry', () => {
    it('should return null for a reference that does not exist', async () => {
      expect(await store.loadEntry('missing_20260102_030405.json')).toBeNull();
    });

    it('should return null for a reference outside the datasets directory', async () => {
      await fs.writeFile(path.join(dataDir, 'outside.json'), JSON.stringify(RECORDS));
      expect(await store.loadEntry('../outside.json')).toBeNull();
    });

    it('should return null for a dataset that is not valid JSON', async () => {
      const cacheFile = await store.addEntry('kanji', 'local', '/data/k.xlsx', RECORDS);
      await fs.writeFile(store.getDatasetPath(cacheFile), '[{"character":');

      expect(await store.loadEntry(cacheFile)).toBeNull();
    });

    it('should drop malformed records from an otherwise valid dataset', async () => {
      const cacheFile = await store.addEntry('kanji', 'local', '/data/k.xlsx', RECORDS);
      await fs.writeFile(
        store.getDatasetPath(cacheFile),
        JSON.stringify([RECORDS[0], { character: '', reading: 'x', meaning: 'y' }, 42, RECORDS[2]])
      );

      expect(await store.loadEntry(cacheFile)).toEqual([RECORDS[0], RECORDS[2]]);
    });
  });

  describe('findEntry', () => {
    beforeEach(async () => {
      await store.addEntry('first', 'local', '/data/first.xlsx', RECORDS);
      await store.addEntry('second', 'remote', 'https://example.test/second', RECORDS);
    });

    it('should find by 1-based position, newest first', async () => {
      expect((await store.findEntry('1'))?.name).toBe('second');
      expect((await store.findEntry('2'))?.name).toBe('first');
    });

    it('should find by name or source', async () => {
      expect((await store.findEntry('first'))?.source).toBe('/data/first.xlsx');
      expect((await store.findEntry('https://example.test/second'))?.name).toBe('second');
    });

    it('should return null when nothing matches', async () => {
      expect(await store.findEntry('3')).toBeNull();
      expect(await store.findEntry('0')).toBeNull();
      expect(await store.findEntry('third')).toBeNull();
    });
  });

  describe('pruneOrphans', () => {
    it('should return an empty list before anything is cached', async () => {
      expect(await store.pruneOrphans()).toEqual([]);
    });

    it('should delete datasets no entry references', async () => {
      const superseded = await store.addEntry('alpha', 'local', '/data/alpha.xlsx', RECORDS);
      const current = await store.addEntry('alpha', 'local', '/data/alpha.xlsx', RECORDS);

      expect(await store.pruneOrphans()).toEqual([superseded]);
      await expect(fs.access(store.getDatasetPath(superseded))).rejects.toThrow();
      expect(await store.loadEntry(current)).toEqual(RECORDS);
    });
  });
});
