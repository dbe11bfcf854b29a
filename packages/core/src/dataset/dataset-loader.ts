/**
 * Dataset Loader - Local and remote spreadsheets into the cache
 *
 * A load either succeeds completely (records parsed and cached) or
 * throws and leaves the cache as it was.
 *
 * @module dataset/dataset-loader
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import {
  EmptyDatasetError,
  InvalidSheetUrlError,
  SourceUnreadableError,
} from './errors.js';
import { DEFAULT_HEADER_LABELS, parseRows } from './parse-rows.js';
import { DEFAULT_SHEET_GID, resolveRemoteSource } from './remote-source.js';
import { readSheetRows, type SheetInput } from './sheet-reader.js';
import { errorMessage, silentLogger, type Logger } from '../utils/logger.js';

import type { CacheStore } from '../cache/cache-store.js';
import type { CacheEntry, CharacterRecord, SourceKind } from '../cache/types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * The part of a fetch Response the loader reads
 */
export interface FetchResponseLike {
  ok: boolean;
  status: number;
  statusText: string;
  text(): Promise<string>;
}

export type FetchLike = (url: string) => Promise<FetchResponseLike>;

export interface DatasetLoaderConfig {
  store: CacheStore;
  /** Character-column values that mark header rows */
  headerLabels?: readonly string[];
  /** Sheet tab exported from remote spreadsheets */
  sheetGid?: string;
  fetch?: FetchLike;
  logger?: Logger;
  now?: () => Date;
}

/**
 * A dataset that was parsed and written to the cache
 */
export interface LoadedDataset {
  name: string;
  sourceKind: SourceKind;
  source: string;
  cacheFile: string;
  records: CharacterRecord[];
}

export type CachedDatasetLookup =
  | { status: 'found'; entry: CacheEntry; records: CharacterRecord[] }
  | { status: 'missing-entry'; selector: string }
  | { status: 'missing-file'; entry: CacheEntry };

export interface RemoteSheetOptions {
  name?: string | undefined;
  gid?: string | undefined;
}

/** Extensions read as UTF-8 text rather than as a workbook */
const TEXT_EXTENSIONS = new Set(['.csv', '.tsv', '.txt']);

// ============================================================================
// Dataset Loader
// ============================================================================

export class DatasetLoader {
  private readonly store: CacheStore;
  private readonly headerLabels: readonly string[];
  private readonly sheetGid: string;
  private readonly fetch: FetchLike;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(config: DatasetLoaderConfig) {
    this.store = config.store;
    this.headerLabels = config.headerLabels ?? DEFAULT_HEADER_LABELS;
    this.sheetGid = config.sheetGid ?? DEFAULT_SHEET_GID;
    this.fetch = config.fetch ?? ((url) => fetch(url));
    this.logger = config.logger ?? silentLogger;
    this.now = config.now ?? (() => new Date());
  }

  /**
   * Load a spreadsheet or CSV file from disk.
   *
   * @param name - Display name; defaults to the file name without extension
   * @throws SourceUnreadableError if the file cannot be read or parsed
   * @throws EmptyDatasetError if no row yields a record
   */
  async loadLocalFile(filePath: string, name?: string): Promise<LoadedDataset> {
    const absolutePath = path.resolve(filePath);

    let input: SheetInput;
    try {
      const buffer = await fs.readFile(absolutePath);
      input = TEXT_EXTENSIONS.has(path.extname(absolutePath).toLowerCase())
        ? { kind: 'text', data: buffer.toString('utf-8') }
        : { kind: 'binary', data: buffer };
    } catch (error) {
      throw new SourceUnreadableError(
        `Could not read ${absolutePath}: ${errorMessage(error)}`,
        absolutePath,
        error instanceof Error ? error : undefined
      );
    }

    const displayName = name?.trim() || path.parse(absolutePath).name;
    return this.cacheRows(displayName, 'local', absolutePath, this.readRows(input, absolutePath));
  }

  /**
   * Load a published spreadsheet through its CSV export endpoint.
   *
   * @throws InvalidSheetUrlError if no sheet id can be found in the URL
   * @throws SourceUnreadableError if the request fails or the body cannot be parsed
   * @throws EmptyDatasetError if no row yields a record
   */
  async loadRemoteSheet(url: string, options: RemoteSheetOptions = {}): Promise<LoadedDataset> {
    const source = url.trim();
    const exportUrl = resolveRemoteSource(source, options.gid ?? this.sheetGid);
    if (!exportUrl) {
      throw new InvalidSheetUrlError(source);
    }

    this.logger.debug(`Fetching ${exportUrl}`);
    let text: string;
    try {
      const response = await this.fetch(exportUrl);
      if (!response.ok) {
        throw new SourceUnreadableError(
          `Spreadsheet request failed with ${response.status} ${response.statusText}. ` +
            'Check that the sheet is shared with anyone who has the link.',
          source
        );
      }
      text = await response.text();
    } catch (error) {
      if (error instanceof SourceUnreadableError) {
        throw error;
      }
      throw new SourceUnreadableError(
        `Could not fetch spreadsheet: ${errorMessage(error)}`,
        source,
        error instanceof Error ? error : undefined
      );
    }

    const displayName = options.name?.trim() || this.defaultSheetName();
    return this.cacheRows(displayName, 'remote', source, this.readRows({ kind: 'text', data: text }, source));
  }

  /**
   * Open a dataset from the cache by position, name or source.
   */
  async openCached(selector: string): Promise<CachedDatasetLookup> {
    const entry = await this.store.findEntry(selector);
    if (!entry) {
      return { status: 'missing-entry', selector };
    }

    const records = await this.store.loadEntry(entry.cacheFile);
    if (!records) {
      return { status: 'missing-file', entry };
    }
    return { status: 'found', entry, records };
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private readRows(input: SheetInput, source: string): unknown[][] {
    try {
      return readSheetRows(input);
    } catch (error) {
      throw new SourceUnreadableError(
        `Could not parse spreadsheet ${source}: ${errorMessage(error)}`,
        source,
        error instanceof Error ? error : undefined
      );
    }
  }

  private async cacheRows(
    name: string,
    sourceKind: SourceKind,
    source: string,
    rows: unknown[][]
  ): Promise<LoadedDataset> {
    const records = parseRows(rows, {
      headerLabels: this.headerLabels,
      onSkip: (rowIndex, error) =>
        this.logger.debug(`Skipped row ${rowIndex + 2} of ${source}: ${errorMessage(error)}`),
    });

    if (records.length === 0) {
      throw new EmptyDatasetError(source);
    }

    const cacheFile = await this.store.addEntry(name, sourceKind, source, records);
    this.logger.debug(`Cached ${records.length} record(s) from ${source} as ${cacheFile}`);

    return { name, sourceKind, source, cacheFile, records };
  }

  private defaultSheetName(): string {
    const date = this.now();
    const pad = (value: number): string => String(value).padStart(2, '0');
    return `sheet-${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  }
}
