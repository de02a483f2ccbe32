import { SHEET_LIMITS } from '../constants/style-defaults';

/**
 * Convert column index (0-based) to Excel letter(s): 0→A, 25→Z, 26→AA
 */
export function colIndexToLetter(index: number): string {
  let result = '';
  let n = index;
  while (n >= 0) {
    result = String.fromCharCode((n % 26) + 65) + result;
    n = Math.floor(n / 26) - 1;
  }
  return result;
}

/**
 * Build an A1 reference from a 0-based column and a 1-based row: (1, 3) → "B3"
 */
export function buildCellRef(col: number, row: number): string {
  return `${colIndexToLetter(col)}${row}`;
}

/**
 * Single-column range over 1-based rows: (1, 2, 5) → "B2:B5"
 */
export function buildRange(col: number, firstRow: number, lastRow: number): string {
  return `${buildCellRef(col, firstRow)}:${buildCellRef(col, lastRow)}`;
}

const A1_LIKE = /^[A-Za-z]{1,3}\d+$/;
const R1C1_LIKE = /^(R\d*C\d*|R\d*|C\d*)$/i;

/**
 * Quote a sheet name for use in a reference when it is not a plain identifier
 * or could be read as a cell reference in either A1 or R1C1 notation
 */
export function quoteSheetName(name: string): string {
  const plain = /^[A-Za-z_][A-Za-z0-9_.]*$/.test(name) && !A1_LIKE.test(name) && !R1C1_LIKE.test(name);
  return plain ? name : `'${name.replace(/'/g, "''")}'`;
}

/** Prefix a range with its sheet: ("Data 1", "B2:B5") → "'Data 1'!B2:B5" */
export function qualifyRange(sheetName: string, range: string): string {
  return `${quoteSheetName(sheetName)}!${range}`;
}

/**
 * Sanitize sheet name: remove invalid characters, limit length
 */
export function sanitizeSheetName(name: string): string {
  return name
    .replace(/[\\/*?[\]:]/g, '_')
    .slice(0, SHEET_LIMITS.MAX_SHEET_NAME_LENGTH)
    .trim() || 'Sheet';
}

/** `#RRGGBB` → ARGB with opaque alpha, as ExcelJS expects */
export function toArgb(color: string): string {
  return color.replace('#', 'FF').toUpperCase();
}
