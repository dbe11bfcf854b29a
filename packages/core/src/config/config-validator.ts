/**
 * Config Validator - Checks config.json values before they are merged
 *
 * @module config/config-validator
 */

import { PHASE_SECONDS_RANGE } from './defaults.js';

import type { GlyphdeckConfig } from './types.js';

// ============================================================================
// Validation Error Types
// ============================================================================

/**
 * Represents a single configuration validation error
 */
export interface ConfigValidationError {
  /** Name of the invalid option */
  path: string;
  /** Human-readable error message */
  message: string;
  /** Expected value or type */
  expected?: string;
  /** Actual value received */
  actual?: unknown;
}

/**
 * Result of a configuration validation operation
 */
export interface ConfigValidationResult {
  valid: boolean;
  /** Options that were present and valid */
  data: Partial<GlyphdeckConfig>;
  errors: ConfigValidationError[];
}

/**
 * Error thrown when config.json holds invalid values
 */
export class ConfigValidationException extends Error {
  constructor(
    message: string,
    public readonly errors: ConfigValidationError[]
  ) {
    super(message);
    this.name = 'ConfigValidationException';
  }

  formatErrors(): string {
    if (this.errors.length === 0) {return 'No errors';}

    return this.errors
      .map((e) => {
        let msg = `  - ${e.path}: ${e.message}`;
        if (e.expected) {msg += `\n    Expected: ${e.expected}`;}
        if (e.actual !== undefined) {msg += `\n    Got: ${JSON.stringify(e.actual)}`;}
        return msg;
      })
      .join('\n');
  }
}

// ============================================================================
// Helper Validation Functions
// ============================================================================

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isPhaseSeconds(value: unknown): value is number {
  return (
    typeof value === 'number' &&
    Number.isInteger(value) &&
    value >= PHASE_SECONDS_RANGE.min &&
    value <= PHASE_SECONDS_RANGE.max
  );
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string' && item.length > 0);
}

const KNOWN_KEYS: ReadonlyArray<keyof GlyphdeckConfig> = [
  'characterSeconds',
  'answerSeconds',
  'shuffleOnStudy',
  'headerLabels',
  'sheetGid',
];

// ============================================================================
// Validation
// ============================================================================

/**
 * Validate a parsed config.json. Every option is optional.
 */
export function validateConfig(data: unknown): ConfigValidationResult {
  const errors: ConfigValidationError[] = [];
  const result: Partial<GlyphdeckConfig> = {};

  if (!isPlainObject(data)) {
    errors.push({
      path: '',
      message: 'Configuration must be a JSON object',
      expected: 'object',
      actual: typeof data,
    });
    return { valid: false, data: result, errors };
  }

  const seconds = `integer ${PHASE_SECONDS_RANGE.min}-${PHASE_SECONDS_RANGE.max}`;
  for (const key of ['characterSeconds', 'answerSeconds'] as const) {
    const value = data[key];
    if (value === undefined) {continue;}
    if (isPhaseSeconds(value)) {
      result[key] = value;
    } else {
      errors.push({ path: key, message: 'Invalid phase duration', expected: seconds, actual: value });
    }
  }

  const shuffleOnStudy = data['shuffleOnStudy'];
  if (shuffleOnStudy !== undefined) {
    if (typeof shuffleOnStudy === 'boolean') {
      result.shuffleOnStudy = shuffleOnStudy;
    } else {
      errors.push({ path: 'shuffleOnStudy', message: 'Must be a boolean', expected: 'boolean', actual: shuffleOnStudy });
    }
  }

  const headerLabels = data['headerLabels'];
  if (headerLabels !== undefined) {
    if (isStringArray(headerLabels)) {
      result.headerLabels = [...headerLabels];
    } else {
      errors.push({ path: 'headerLabels', message: 'Must be an array of non-empty strings', expected: 'string[]', actual: headerLabels });
    }
  }

  const sheetGid = data['sheetGid'];
  if (sheetGid !== undefined) {
    if (typeof sheetGid === 'string' && /^\d+$/.test(sheetGid)) {
      result.sheetGid = sheetGid;
    } else {
      errors.push({ path: 'sheetGid', message: 'Must be a numeric string', expected: 'e.g. "0"', actual: sheetGid });
    }
  }

  for (const key of Object.keys(data)) {
    if (!KNOWN_KEYS.some((known) => known === key)) {
      errors.push({
        path: key,
        message: `Unknown configuration option "${key}"`,
        expected: KNOWN_KEYS.join(' | '),
      });
    }
  }

  return { valid: errors.length === 0, data: result, errors };
}

/**
 * Validate and throw if invalid
 *
 * @throws ConfigValidationException
 */
export function assertValidConfig(data: unknown): Partial<GlyphdeckConfig> {
  const result = validateConfig(data);
  if (!result.valid) {
    throw new ConfigValidationException(
      `Invalid configuration: ${result.errors.length} validation error(s)`,
      result.errors
    );
  }
  return result.data;
}
