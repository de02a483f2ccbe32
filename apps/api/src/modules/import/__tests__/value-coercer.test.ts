import { describe, it, expect } from 'vitest';
import { format } from 'date-fns';
import { CellCoercionError, importOptionsSchema } from '@sheetmap/shared';
import { coerceValue } from '../value-coercer';

const options = importOptionsSchema.parse({});

describe('coerceValue', () => {
  it('passes blanks through', () => {
    expect(coerceValue(null, 'integer', options)).toBeNull();
  });

  it('reads numbers written with a decimal comma', () => {
    expect(coerceValue('1.234,5', 'number', options)).toBe(1234.5);
    expect(coerceValue('3,7', 'integer', options)).toBe(4);
    expect(coerceValue(2.456, 'decimal', options)).toBe(2.46);
  });

  it('honors a decimal point separator', () => {
    const dot = importOptionsSchema.parse({ decimalSeparator: '.' });
    expect(coerceValue('1,234.5', 'number', dot)).toBe(1234.5);
  });

  it('throws CellCoercionError for text that is not a number', () => {
    expect(() => coerceValue('abc', 'integer', options)).toThrow(CellCoercionError);
    expect(() => coerceValue(true, 'number', options)).toThrow('Cannot read "true" as number');
  });

  it('reads dates from Date cells, serial numbers and formatted text', () => {
    const date = new Date(Date.UTC(2024, 2, 5));
    expect(coerceValue(date, 'date', options)).toBe(date);
    expect(coerceValue(45356, 'date', options)).toEqual(date);

    const parsed = coerceValue('05/03/2024', 'date', options);
    expect(parsed).toBeInstanceOf(Date);
    expect(parsed instanceof Date ? format(parsed, 'yyyy-MM-dd') : parsed).toBe('2024-03-05');
    expect(() => coerceValue('2024-03-05', 'date', options)).toThrow(CellCoercionError);
  });

  it('reads yes/no labels as booleans', () => {
    expect(coerceValue('SI', 'boolean', options)).toBe(true);
    expect(coerceValue('no', 'boolean', options)).toBe(false);
    expect(coerceValue(1, 'boolean', options)).toBe(true);
    expect(() => coerceValue('maybe', 'boolean', options)).toThrow(CellCoercionError);
  });

  it('reads strings from any cell value', () => {
    expect(coerceValue(42, 'string', options)).toBe('42');
    expect(coerceValue(false, 'string', options)).toBe('NO');
    expect(coerceValue(new Date(2024, 2, 5), 'string', options)).toBe('05/03/2024');
  });
});
