/**
 * Output format registration — table and JSON.
 */

import { formatJson } from './json.js';
import { formatTable } from './table.js';

export type OutputFormat = 'table' | 'json';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['table', 'json'];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * Format data for output in the specified format.
 */
export function formatOutput(
  data: unknown,
  format: OutputFormat,
): string {
  switch (format) {
    case 'json':
      return formatJson(data);
    case 'table':
    default:
      return formatTable(data);
  }
}

export { formatTable } from './table.js';
export { formatJson } from './json.js';
