import { describe, it, expect } from 'vitest';
import {
  normalizeText,
  parseLocaleNumber,
  excelSerialToDate,
  roundTo,
  parseBooleanLabel,
} from '../value-utils';

describe('parseLocaleNumber', () => {
  it('reads comma decimals with dot grouping', () => {
    expect(parseLocaleNumber('1.234,56', ',')).toBe(1234.56);
    expect(parseLocaleNumber('-7,5', ',')).toBe(-7.5);
  });

  it('reads dot decimals with comma grouping', () => {
    expect(parseLocaleNumber('1,234.56', '.')).toBe(1234.56);
  });

  it('ignores currency symbols and scales percentages', () => {
    expect(parseLocaleNumber('€ 10,00', ',')).toBe(10);
    expect(parseLocaleNumber('12,5%', ',')).toBe(0.125);
  });

  it('returns null for text', () => {
    expect(parseLocaleNumber('abc', ',')).toBeNull();
    expect(parseLocaleNumber('', ',')).toBeNull();
    expect(parseLocaleNumber('1,2,3', ',')).toBeNull();
  });
});

describe('excelSerialToDate', () => {
  it('converts serial days to UTC dates', () => {
    expect(excelSerialToDate(45296).toISOString()).toBe('2024-01-05T00:00:00.000Z');
    expect(excelSerialToDate(45296.5).toISOString()).toBe('2024-01-05T12:00:00.000Z');
  });
});

describe('roundTo', () => {
  it('rounds half away from zero', () => {
    expect(roundTo(2.346, 2)).toBe(2.35);
    expect(roundTo(-2.5, 0)).toBe(-3);
    expect(roundTo(10, 2)).toBe(10);
  });
});

describe('parseBooleanLabel', () => {
  it('accepts default and configured labels', () => {
    expect(parseBooleanLabel('SI')).toBe(true);
    expect(parseBooleanLabel(' no ')).toBe(false);
    expect(parseBooleanLabel('Ja', { true: 'ja', false: 'nein' })).toBe(true);
    expect(parseBooleanLabel('nein', { true: 'ja', false: 'nein' })).toBe(false);
  });

  it('returns null for anything else', () => {
    expect(parseBooleanLabel('maybe')).toBeNull();
  });
});

describe('normalizeText', () => {
  it('collapses whitespace', () => {
    expect(normalizeText('  Total   amount ')).toBe('Total amount');
  });
});
