/**
 * Cache Store - Per-user persistence of loaded datasets
 *
 * Every dataset that loads successfully is written once to its own JSON
 * file and announced in cache-index.json. The index holds at most
 * MAX_CACHE_ENTRIES entries, newest first, one per source. Entries pushed
 * past the cap are evicted together with their dataset files.
 *
 * Reads never throw: an unreadable index is an empty index, and an
 * unreadable dataset file is reported as absent.
 *
 * @module cache/cache-store
 */

import { EventEmitter } from 'node:events';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import {
  isSafeCacheFileName,
  validateCacheIndex,
  validateDatasetFile,
} from './schema.js';
import { MAX_CACHE_ENTRIES } from './types.js';
import {
  errorMessage,
  silentLogger,
  type Logger,
} from '../utils/logger.js';
import {
  fileExists,
  isNotFound,
  readJsonOrNull,
  writeJsonAtomic,
} from '../utils/fs.js';

import type {
  CacheEntry,
  CacheIndex,
  CharacterRecord,
  SourceKind,
} from './types.js';

// ============================================================================
// Constants
// ============================================================================

const INDEX_FILE = 'cache-index.json';
const DATASETS_DIR = 'datasets';

/** Longest name prefix kept in a cache file name, in code points */
const MAX_NAME_TOKEN_LENGTH = 50;

const FALLBACK_NAME_TOKEN = 'dataset';

// ============================================================================
// Contract
// ============================================================================

/**
 * Storage contract used by the dataset loader and the CLI
 */
export interface CacheStore {
  loadIndex(): Promise<CacheIndex>;
  saveIndex(index: CacheIndex): Promise<void>;
  addEntry(
    name: string,
    sourceKind: SourceKind,
    source: string,
    records: readonly CharacterRecord[]
  ): Promise<string>;
  loadEntry(cacheFile: string): Promise<CharacterRecord[] | null>;
  listEntries(): Promise<CacheEntry[]>;
  findEntry(selector: string): Promise<CacheEntry | null>;
  pruneOrphans(): Promise<string[]>;
}

export interface FileCacheStoreConfig {
  /** Directory holding the index and the datasets directory */
  dataDir: string;
  logger?: Logger;
  /** Clock used for cache file names and createdAt */
  now?: () => Date;
}

// ============================================================================
// Naming
// ============================================================================

/**
 * Reduce a display name to a file-name token: letters, marks, digits,
 * underscore and hyphen survive, everything else becomes an underscore.
 */
export function toFileNameToken(name: string): string {
  const replaced = name.replace(/[^\p{L}\p{M}\p{N}_-]/gu, '_');
  const token = Array.from(replaced).slice(0, MAX_NAME_TOKEN_LENGTH).join('');
  return token.length > 0 ? token : FALLBACK_NAME_TOKEN;
}

/**
 * Local time as YYYYMMDD_HHMMSS
 */
export function formatCacheTimestamp(date: Date): string {
  const pad = (value: number): string => String(value).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

// ============================================================================
// File Cache Store
// ============================================================================

/**
 * JSON-file implementation of CacheStore.
 *
 * Emits 'entry:added', 'entry:replaced', 'entry:evicted' and
 * 'entry:evictionFailed' after the index has been saved.
 */
export class FileCacheStore extends EventEmitter implements CacheStore {
  private readonly dataDir: string;
  private readonly indexPath: string;
  private readonly datasetsDir: string;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(config: FileCacheStoreConfig) {
    super();
    this.dataDir = config.dataDir;
    this.indexPath = path.join(this.dataDir, INDEX_FILE);
    this.datasetsDir = path.join(this.dataDir, DATASETS_DIR);
    this.logger = config.logger ?? silentLogger;
    this.now = config.now ?? (() => new Date());
  }

  getIndexPath(): string {
    return this.indexPath;
  }

  getDatasetPath(cacheFile: string): string {
    return path.join(this.datasetsDir, cacheFile);
  }

  // ==========================================================================
  // Index
  // ==========================================================================

  async loadIndex(): Promise<CacheIndex> {
    const raw = await readJsonOrNull(this.indexPath);
    if (raw === null) {
      return { files: [] };
    }

    const result = validateCacheIndex(raw);
    for (const error of result.errors) {
      this.logger.debug(`cache index ${error.path || '(root)'}: ${error.message}`);
    }
    if (!result.valid) {
      this.logger.warn(`Ignoring malformed cache index at ${this.indexPath}`);
      return { files: [] };
    }

    return { files: result.items.slice(0, MAX_CACHE_ENTRIES) };
  }

  async saveIndex(index: CacheIndex): Promise<void> {
    await writeJsonAtomic(this.indexPath, { files: index.files });
  }

  // ==========================================================================
  // Entries
  // ==========================================================================

  /**
   * Cache a dataset and record it at the front of the index.
   *
   * @returns The cache file reference of the new entry
   */
  async addEntry(
    name: string,
    sourceKind: SourceKind,
    source: string,
    records: readonly CharacterRecord[]
  ): Promise<string> {
    const now = this.now();
    const cacheFile = await this.allocateCacheFile(name, now);
    await writeJsonAtomic(this.getDatasetPath(cacheFile), records);

    const index = await this.loadIndex();
    const previous = index.files.find((file) => file.source === source);

    const entry: CacheEntry = {
      name,
      sourceKind,
      source,
      cacheFile,
      createdAt: now.toISOString(),
      count: records.length,
    };

    const files = [entry, ...index.files.filter((file) => file.source !== source)];
    const evicted = files.splice(MAX_CACHE_ENTRIES);

    // Evicted files go only once the index no longer lists them
    await this.saveIndex({ files });

    const failures: Array<{ entry: CacheEntry; error: Error }> = [];
    for (const old of evicted) {
      if (files.some((file) => file.cacheFile === old.cacheFile)) {continue;}
      const error = await this.deleteDatasetFile(old.cacheFile);
      if (error) {
        this.logger.warn(`Could not delete evicted dataset ${old.cacheFile}: ${error.message}`);
        failures.push({ entry: old, error });
      }
    }

    if (previous) {
      this.emit('entry:replaced', previous, entry);
    } else {
      this.emit('entry:added', entry);
    }
    for (const old of evicted) {
      this.logger.debug(`Evicted ${old.name} (${old.cacheFile})`);
      this.emit('entry:evicted', old);
    }
    for (const failure of failures) {
      this.emit('entry:evictionFailed', failure.entry, failure.error);
    }

    return cacheFile;
  }

  /**
   * Read the records of a cached dataset.
   *
   * @returns The records in stored order, or null if the file is gone or unreadable
   */
  async loadEntry(cacheFile: string): Promise<CharacterRecord[] | null> {
    if (!isSafeCacheFileName(cacheFile)) {
      return null;
    }

    const raw = await readJsonOrNull(this.getDatasetPath(cacheFile));
    if (raw === null) {
      return null;
    }

    const result = validateDatasetFile(raw);
    if (!result.valid) {
      this.logger.warn(`Ignoring malformed dataset ${cacheFile}`);
      return null;
    }
    if (result.errors.length > 0) {
      this.logger.debug(`Dropped ${result.errors.length} malformed record(s) from ${cacheFile}`);
    }
    return result.items;
  }

  async listEntries(): Promise<CacheEntry[]> {
    const index = await this.loadIndex();
    return index.files;
  }

  /**
   * Look up an entry by 1-based position, exact name, or exact source
   */
  async findEntry(selector: string): Promise<CacheEntry | null> {
    const files = await this.listEntries();

    if (/^\d+$/.test(selector)) {
      const position = parseInt(selector, 10);
      return files[position - 1] ?? null;
    }

    return (
      files.find((file) => file.name === selector) ??
      files.find((file) => file.source === selector) ??
      null
    );
  }

  /**
   * Delete dataset files that no index entry references.
   *
   * @returns Names of the deleted files, sorted
   */
  async pruneOrphans(): Promise<string[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.datasetsDir);
    } catch (error) {
      if (isNotFound(error)) {return [];}
      throw error;
    }

    const referenced = new Set((await this.listEntries()).map((file) => file.cacheFile));
    const removed: string[] = [];

    for (const name of names.sort()) {
      if (referenced.has(name)) {continue;}
      if (!name.endsWith('.json') && !name.endsWith('.tmp')) {continue;}
      const error = await this.deleteDatasetFile(name);
      if (error) {
        this.logger.warn(`Could not delete orphaned dataset ${name}: ${error.message}`);
        continue;
      }
      removed.push(name);
    }

    return removed;
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private async allocateCacheFile(name: string, now: Date): Promise<string> {
    const base = `${toFileNameToken(name)}_${formatCacheTimestamp(now)}`;
    let candidate = `${base}.json`;
    let counter = 2;

    while (await fileExists(this.getDatasetPath(candidate))) {
      candidate = `${base}_${counter}.json`;
      counter++;
    }
    return candidate;
  }

  /**
   * @returns The failure, or null when the file is gone (including already gone)
   */
  private async deleteDatasetFile(cacheFile: string): Promise<Error | null> {
    try {
      await fs.unlink(this.getDatasetPath(cacheFile));
      return null;
    } catch (error) {
      if (isNotFound(error)) {return null;}
      return error instanceof Error ? error : new Error(errorMessage(error));
    }
  }
}
