import type ExcelJS from 'exceljs';
import type { CellScalar } from '@sheetmap/shared';
import { normalizeText } from '@sheetmap/shared';

/**
 * Plain value of a cell. Formula cells yield their cached result, rich text
 * and hyperlinks their text; blank strings and error values read as null.
 */
export function readCellValue(cell: ExcelJS.Cell): CellScalar {
  return toScalar(cell.value);
}

function toScalar(raw: ExcelJS.CellValue | undefined): CellScalar {
  if (raw === null || raw === undefined) return null;
  if (typeof raw === 'number' || typeof raw === 'boolean') return raw;
  if (typeof raw === 'string') return normalizeText(raw) || null;
  if (raw instanceof Date) return raw;

  if ('result' in raw) {
    const result: unknown = raw.result;
    if (typeof result === 'number' || typeof result === 'boolean') return result;
    if (typeof result === 'string') return normalizeText(result) || null;
    return result instanceof Date ? result : null;
  }
  if ('richText' in raw) {
    return normalizeText(raw.richText.map((r) => r.text).join('')) || null;
  }
  if ('text' in raw && typeof raw.text === 'string') {
    return normalizeText(raw.text) || null;
  }
  return null;
}

/** Cell content as trimmed text, '' when blank */
export function readCellText(cell: ExcelJS.Cell): string {
  const value = readCellValue(cell);
  if (value === null) return '';
  if (value instanceof Date) return value.toISOString();
  return String(value);
}
