/**
 * Remote Source - Shareable spreadsheet URL to CSV export URL
 *
 * @module dataset/remote-source
 */

/** Tried in order: /spreadsheets/d/<id>/..., then ?id=<id> */
const SHEET_ID_PATTERNS: readonly RegExp[] = [
  /\/spreadsheets\/d\/([\w-]+)/,
  /id=([\w-]+)/,
];

const EXPORT_BASE_URL = 'https://docs.google.com/spreadsheets/d';

export const DEFAULT_SHEET_GID = '0';

export function extractSheetId(url: string): string | null {
  for (const pattern of SHEET_ID_PATTERNS) {
    const match = pattern.exec(url);
    if (match?.[1]) {
      return match[1];
    }
  }
  return null;
}

/**
 * Build the CSV export URL for a shareable spreadsheet link.
 *
 * @returns The export URL, or null if no sheet id can be found
 */
export function resolveRemoteSource(
  url: string,
  gid: string = DEFAULT_SHEET_GID
): string | null {
  const sheetId = extractSheetId(url);
  if (!sheetId) {
    return null;
  }
  return `${EXPORT_BASE_URL}/${sheetId}/export?format=csv&gid=${encodeURIComponent(gid)}`;
}
