/**
 * Cache Types - Shapes persisted by the dataset cache
 *
 * Storage structure:
 * ~/.glyphdeck/
 * ├── cache-index.json      # { "files": CacheEntry[] }, newest first
 * ├── config.json           # optional user settings
 * └── datasets/
 *     └── <name>_<YYYYMMDD_HHMMSS>.json   # CharacterRecord[]
 *
 * @module cache/types
 */

// ============================================================================
// Records
// ============================================================================

/**
 * One character with its reading and meaning
 */
export interface CharacterRecord {
  /** The character being memorized (never empty) */
  character: string;
  /** Pronunciation or sound reading */
  reading: string;
  /** Meaning or gloss */
  meaning: string;
}

// ============================================================================
// Index
// ============================================================================

/**
 * Where a dataset was loaded from
 */
export type SourceKind = 'local' | 'remote';

/** Valid source kinds */
export const SOURCE_KINDS: readonly SourceKind[] = ['local', 'remote'] as const;

/**
 * Metadata describing one previously loaded dataset
 */
export interface CacheEntry {
  /** Display name */
  name: string;
  /** Local file or remote spreadsheet */
  sourceKind: SourceKind;
  /** Absolute path or URL; unique across the index */
  source: string;
  /** File name of the dataset inside the datasets directory */
  cacheFile: string;
  /** ISO-8601 timestamp of when the dataset was cached */
  createdAt: string;
  /** Number of records in the dataset */
  count: number;
}

/**
 * Persisted index, most recently added entry first
 */
export interface CacheIndex {
  files: CacheEntry[];
}

/** Maximum number of datasets kept in the index */
export const MAX_CACHE_ENTRIES = 20;

// ============================================================================
// Events
// ============================================================================

export type CacheStoreEventType =
  | 'entry:added'      // (entry)
  | 'entry:replaced'   // (previous, entry)
  | 'entry:evicted'    // (entry)
  | 'entry:evictionFailed'; // (entry, error)
