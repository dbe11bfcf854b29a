/**
 * Row Normalization - Tabular rows to character records
 *
 * Column layout (1-indexed, as in the spreadsheet):
 *   1: id / row number (ignored)
 *   2: character
 *   3: reading
 *   4: meaning
 *
 * @module dataset/parse-rows
 */

import type { CharacterRecord } from '../cache/types.js';

/** Labels that mark a header row repeated inside the data */
export const DEFAULT_HEADER_LABELS: readonly string[] = ['한자'];

const CHARACTER_COLUMN = 1;
const READING_COLUMN = 2;
const MEANING_COLUMN = 3;

export interface ParseRowsOptions {
  /** Character-column values that identify a header row */
  headerLabels?: readonly string[];
  /** Called for each row that could not be read */
  onSkip?: (rowIndex: number, error: unknown) => void;
}

/**
 * Coerce one cell to trimmed text; missing and blank cells become ''
 */
export function coerceCell(value: unknown): string {
  if (value === null || value === undefined) {return '';}
  if (typeof value === 'number' && Number.isNaN(value)) {return '';}
  return String(value).trim();
}

function extractRecord(
  row: unknown,
  headerLabels: readonly string[]
): CharacterRecord | null {
  if (!Array.isArray(row)) {
    throw new TypeError(`Row is not an array: ${typeof row}`);
  }

  const character = coerceCell(row[CHARACTER_COLUMN]);
  if (character === '' || headerLabels.includes(character)) {
    return null;
  }

  return {
    character,
    reading: coerceCell(row[READING_COLUMN]),
    meaning: coerceCell(row[MEANING_COLUMN]),
  };
}

/**
 * Normalize rows into records, skipping blank rows, header rows and rows
 * that cannot be read.
 */
export function parseRows(
  rows: readonly unknown[],
  options: ParseRowsOptions = {}
): CharacterRecord[] {
  const headerLabels = options.headerLabels ?? DEFAULT_HEADER_LABELS;
  const records: CharacterRecord[] = [];

  rows.forEach((row, index) => {
    try {
      const record = extractRecord(row, headerLabels);
      if (record) {
        records.push(record);
      }
    } catch (error) {
      options.onSkip?.(index, error);
    }
  });

  return records;
}
