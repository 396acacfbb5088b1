import * as XLSX from 'xlsx';
import type { RawBookingRecord } from '../normalization/transformer';

export class SpreadsheetReadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SpreadsheetReadError';
  }
}

/**
 * Read the first worksheet of a PMS booking export. The header row becomes
 * the keys; cells come back as their displayed text, empty cells are omitted.
 */
export function readSpreadsheetRows(buffer: Buffer): RawBookingRecord[] {
  if (buffer.length === 0) throw new SpreadsheetReadError('Spreadsheet is empty');

  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(buffer, { type: 'buffer', cellDates: true });
  } catch (err) {
    throw new SpreadsheetReadError(
      `Unreadable spreadsheet: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (!sheet) throw new SpreadsheetReadError('Workbook has no worksheets');

  return XLSX.utils.sheet_to_json<RawBookingRecord>(sheet, { raw: true, blankrows: false });
}
