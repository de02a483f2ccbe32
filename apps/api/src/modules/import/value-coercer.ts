import { isValid, parse, format } from 'date-fns';
import type { CellScalar, FieldValueType, ImportOptions } from '@sheetmap/shared';
import {
  CellCoercionError,
  excelSerialToDate,
  parseBooleanLabel,
  parseLocaleNumber,
  roundTo,
} from '@sheetmap/shared';

/**
 * Convert a raw cell value to the target value type.
 * Throws CellCoercionError when the value cannot be read as that type.
 */
export function coerceValue(raw: CellScalar, valueType: FieldValueType, options: ImportOptions): CellScalar {
  if (raw === null) return null;
  switch (valueType) {
    case 'string':
      return toText(raw, options);
    case 'integer':
      return Math.round(toNumber(raw, valueType, options));
    case 'decimal':
      return roundTo(toNumber(raw, valueType, options), options.decimalScale);
    case 'number':
      return toNumber(raw, valueType, options);
    case 'date':
      return toDate(raw, options);
    case 'boolean':
      return toBoolean(raw, options);
  }
}

function toText(raw: Exclude<CellScalar, null>, options: ImportOptions): string {
  if (raw instanceof Date) return format(raw, options.dateFormat);
  if (typeof raw === 'boolean') return raw ? options.booleanLabels.true : options.booleanLabels.false;
  return String(raw).trim();
}

function toNumber(raw: Exclude<CellScalar, null>, valueType: FieldValueType, options: ImportOptions): number {
  if (typeof raw === 'number') return raw;
  if (typeof raw === 'string') {
    const n = parseLocaleNumber(raw, options.decimalSeparator);
    if (n !== null) return n;
  }
  throw new CellCoercionError(raw, valueType);
}

function toDate(raw: Exclude<CellScalar, null>, options: ImportOptions): Date {
  if (raw instanceof Date) return raw;
  if (typeof raw === 'number') return excelSerialToDate(raw);
  if (typeof raw === 'string') {
    const parsed = parse(raw.trim(), options.dateFormat, new Date());
    if (isValid(parsed)) return parsed;
  }
  throw new CellCoercionError(raw, 'date');
}

function toBoolean(raw: Exclude<CellScalar, null>, options: ImportOptions): boolean {
  if (typeof raw === 'boolean') return raw;
  if (raw === 1 || raw === 0) return raw === 1;
  if (typeof raw === 'string') {
    const parsed = parseBooleanLabel(raw, options.booleanLabels);
    if (parsed !== null) return parsed;
  }
  throw new CellCoercionError(raw, 'boolean');
}
