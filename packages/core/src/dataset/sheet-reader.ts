/**
 * Sheet Reader - Workbook bytes or CSV text to raw rows
 *
 * Only the first sheet is read. Its first row is the header row and is
 * not returned. Rows always start at column A, even when column A is
 * empty, so positions line up with the spreadsheet's lettering. Text
 * input is read verbatim: no dates, numbers, booleans or formulas.
 *
 * @module dataset/sheet-reader
 */

import * as XLSX from 'xlsx';

export type SheetInput =
  | { kind: 'binary'; data: Buffer }
  | { kind: 'text'; data: string };

export function readSheetRows(input: SheetInput): unknown[][] {
  const workbook =
    input.kind === 'text'
      ? XLSX.read(input.data, { type: 'string', raw: true })
      : XLSX.read(input.data, { type: 'buffer' });

  const firstSheetName = workbook.SheetNames[0];
  if (firstSheetName === undefined) {
    return [];
  }
  const sheet = workbook.Sheets[firstSheetName];
  const ref = sheet?.['!ref'];
  if (!sheet || !ref) {
    return [];
  }

  const range = XLSX.utils.decode_range(ref);
  range.s.c = 0;

  const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    range,
    defval: null,
    blankrows: false,
    raw: false,
  });
  return rows.slice(1);
}
