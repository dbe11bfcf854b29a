/**
 * Cache Schema - Validation for the persisted index and dataset files
 *
 * Both files are user-writable JSON, so everything read back is checked
 * field by field. Invalid items are reported and dropped rather than
 * failing the whole file.
 *
 * @module cache/schema
 */

import { SOURCE_KINDS } from './types.js';

import type { CacheEntry, CharacterRecord, SourceKind } from './types.js';

// ============================================================================
// Validation Error Types
// ============================================================================

/**
 * Represents a single validation error
 */
export interface ValidationError {
  /** Path to the invalid field (e.g., 'files[3].count') */
  path: string;
  /** Error message describing the validation failure */
  message: string;
  /** Actual value received */
  actual?: unknown;
}

/**
 * Items that passed validation, plus what was rejected
 */
export interface PartialValidationResult<T> {
  /** Whether the container itself had the right shape */
  valid: boolean;
  /** Items that passed validation, in their original order */
  items: T[];
  /** Errors for the container or for dropped items */
  errors: ValidationError[];
}

// ============================================================================
// Helper Validation Functions
// ============================================================================

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function get(obj: Record<string, unknown>, key: string): unknown {
  return obj[key];
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.length > 0;
}

function isISODateString(value: unknown): value is string {
  if (typeof value !== 'string') {return false;}
  const date = new Date(value);
  return !isNaN(date.getTime()) && value.includes('T');
}

function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

function isSourceKind(value: unknown): value is SourceKind {
  return SOURCE_KINDS.some((kind) => kind === value);
}

/**
 * A cache file reference must be a bare file name inside the datasets directory
 */
export function isSafeCacheFileName(value: unknown): value is string {
  return (
    isNonEmptyString(value) &&
    value !== '.' &&
    value !== '..' &&
    !/[\\/]/.test(value) &&
    value.endsWith('.json')
  );
}

// ============================================================================
// Component Validators
// ============================================================================

/**
 * Validate one index entry, returning a clean copy when valid
 */
export function validateCacheEntry(
  value: unknown,
  path: string,
  errors: ValidationError[]
): CacheEntry | null {
  if (!isObject(value)) {
    errors.push({ path, message: 'Must be an object', actual: typeof value });
    return null;
  }

  const name = get(value, 'name');
  const sourceKind = get(value, 'sourceKind');
  const source = get(value, 'source');
  const cacheFile = get(value, 'cacheFile');
  const createdAt = get(value, 'createdAt');
  const count = get(value, 'count');

  if (typeof name !== 'string') {
    errors.push({ path: `${path}.name`, message: 'Must be a string', actual: name });
  }
  if (!isSourceKind(sourceKind)) {
    errors.push({ path: `${path}.sourceKind`, message: `Must be one of: ${SOURCE_KINDS.join(', ')}`, actual: sourceKind });
  }
  if (!isNonEmptyString(source)) {
    errors.push({ path: `${path}.source`, message: 'Must be a non-empty string', actual: source });
  }
  if (!isSafeCacheFileName(cacheFile)) {
    errors.push({ path: `${path}.cacheFile`, message: 'Must be a bare .json file name', actual: cacheFile });
  }
  if (!isISODateString(createdAt)) {
    errors.push({ path: `${path}.createdAt`, message: 'Must be a valid ISO date string', actual: createdAt });
  }
  if (!isNonNegativeInteger(count)) {
    errors.push({ path: `${path}.count`, message: 'Must be a non-negative integer', actual: count });
  }

  if (
    typeof name !== 'string' ||
    !isSourceKind(sourceKind) ||
    !isNonEmptyString(source) ||
    !isSafeCacheFileName(cacheFile) ||
    !isISODateString(createdAt) ||
    !isNonNegativeInteger(count)
  ) {
    return null;
  }

  return { name, sourceKind, source, cacheFile, createdAt, count };
}

/**
 * Validate one stored record, returning a clean copy when valid
 */
export function validateCharacterRecord(
  value: unknown,
  path: string,
  errors: ValidationError[]
): CharacterRecord | null {
  if (!isObject(value)) {
    errors.push({ path, message: 'Must be an object', actual: typeof value });
    return null;
  }

  const character = get(value, 'character');
  const reading = get(value, 'reading');
  const meaning = get(value, 'meaning');

  if (!isNonEmptyString(character)) {
    errors.push({ path: `${path}.character`, message: 'Must be a non-empty string', actual: character });
    return null;
  }
  if (typeof reading !== 'string' || typeof meaning !== 'string') {
    errors.push({ path, message: 'reading and meaning must be strings' });
    return null;
  }

  return { character, reading, meaning };
}

// ============================================================================
// File Validators
// ============================================================================

/**
 * Validate the parsed contents of cache-index.json.
 *
 * Later entries that repeat an earlier source are dropped, so the
 * one-entry-per-source invariant holds even for a hand-edited index.
 */
export function validateCacheIndex(data: unknown): PartialValidationResult<CacheEntry> {
  const errors: ValidationError[] = [];

  if (!isObject(data)) {
    errors.push({ path: '', message: 'Index must be an object', actual: typeof data });
    return { valid: false, items: [], errors };
  }

  const files = get(data, 'files');
  if (!Array.isArray(files)) {
    errors.push({ path: 'files', message: 'Must be an array', actual: typeof files });
    return { valid: false, items: [], errors };
  }

  const items: CacheEntry[] = [];
  const seen = new Set<string>();
  files.forEach((file: unknown, i: number) => {
    const entry = validateCacheEntry(file, `files[${i}]`, errors);
    if (!entry) {return;}
    if (seen.has(entry.source)) {
      errors.push({ path: `files[${i}].source`, message: 'Duplicate source', actual: entry.source });
      return;
    }
    seen.add(entry.source);
    items.push(entry);
  });

  return { valid: true, items, errors };
}

/**
 * Validate the parsed contents of a dataset file
 */
export function validateDatasetFile(data: unknown): PartialValidationResult<CharacterRecord> {
  const errors: ValidationError[] = [];

  if (!Array.isArray(data)) {
    errors.push({ path: '', message: 'Dataset must be an array', actual: typeof data });
    return { valid: false, items: [], errors };
  }

  const items: CharacterRecord[] = [];
  data.forEach((value: unknown, i: number) => {
    const record = validateCharacterRecord(value, `[${i}]`, errors);
    if (record) {
      items.push(record);
    }
  });

  return { valid: true, items, errors };
}
