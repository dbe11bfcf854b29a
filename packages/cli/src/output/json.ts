/**
 * JSON output format — machine-readable output.
 */

export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2) + '\n';
}
