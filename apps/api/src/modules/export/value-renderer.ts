import { format, isValid, parseISO } from 'date-fns';
import type { CellScalar, DataCategory, ExportOptions } from '@sheetmap/shared';
import { IMPORT_DEFAULTS } from '@sheetmap/shared';

/**
 * Convert a record value to the cell value of its category. Numeric categories
 * store numbers and the date category stores Dates, so formulas over them stay
 * typed; values that do not fit their category fall back to text.
 */
export function renderValue(value: unknown, category: DataCategory, options: ExportOptions): CellScalar {
  if (value === null || value === undefined) return null;
  if (typeof value === 'boolean') {
    return value ? options.booleanLabels.true : options.booleanLabels.false;
  }
  switch (category) {
    case 'number':
    case 'currency':
    case 'percentage':
    case 'formula':
      return toNumber(value) ?? toText(value);
    case 'date':
      return toDate(value) ?? toText(value);
    case 'text':
      return toText(value);
  }
}

function toNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'bigint') return Number(value);
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value.trim());
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

function toDate(value: unknown): Date | null {
  if (value instanceof Date) return isValid(value) ? value : null;
  if (typeof value === 'string') {
    const parsed = parseISO(value);
    return isValid(parsed) ? parsed : null;
  }
  return null;
}

function toText(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value instanceof Date) return isValid(value) ? format(value, IMPORT_DEFAULTS.DATE_FORMAT) : '';
  if (typeof value === 'object' && value !== null) return JSON.stringify(value);
  return String(value);
}
