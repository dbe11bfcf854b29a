/**
 * Table output format — human-readable terminal output.
 */

type TableRow = Record<string, unknown>;

function isRow(value: unknown): value is TableRow {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Format data as a human-readable table.
 */
export function formatTable(data: unknown): string {
  if (data === null || data === undefined) {
    return '';
  }

  // Arrays of objects become table rows
  if (Array.isArray(data)) {
    if (data.length === 0) return 'No results.\n';
    const rows = data.filter(isRow);
    if (rows.length === data.length) {
      return renderObjectTable(rows);
    }
    return data.map(String).join('\n') + '\n';
  }

  // Single objects become key-value pairs
  if (isRow(data)) {
    return renderKeyValue(data);
  }

  return String(data) + '\n';
}

function renderObjectTable(rows: TableRow[]): string {
  const keys = Object.keys(rows[0] ?? {});
  const widths = keys.map((k) =>
    Math.max(k.length, ...rows.map((r) => formatCellValue(r[k]).length)),
  );

  const lines: string[] = [];

  lines.push(keys.map((k, i) => k.padEnd(widths[i] ?? 0)).join('  ').trimEnd());
  lines.push(widths.map((w) => '─'.repeat(w)).join('──'));

  for (const row of rows) {
    const line = keys
      .map((k, i) => formatCellValue(row[k]).padEnd(widths[i] ?? 0))
      .join('  ');
    lines.push(line.trimEnd());
  }

  return lines.join('\n') + '\n';
}

/**
 * Arrays show as a compact list, objects as JSON, long strings truncated.
 */
function formatCellValue(v: unknown): string {
  if (v === null || v === undefined) return '';
  if (Array.isArray(v)) return v.map(String).join(', ');
  if (typeof v === 'object') return JSON.stringify(v);
  const s = String(v);
  if (s.length > 80) return s.slice(0, 77) + '...';
  return s;
}

function renderKeyValue(obj: Record<string, unknown>): string {
  const entries = Object.entries(obj);
  if (entries.length === 0) return 'No data.\n';

  const maxKeyLen = Math.max(...entries.map(([k]) => k.length));
  return (
    entries
      .map(([k, v]) => `${k.padEnd(maxKeyLen)}  ${formatValue(v)}`)
      .join('\n') + '\n'
  );
}

function formatValue(v: unknown): string {
  if (v === null || v === undefined) return '—';
  if (Array.isArray(v)) return v.length === 0 ? '—' : v.map(String).join(', ');
  if (typeof v === 'object') return JSON.stringify(v);
  return String(v);
}
