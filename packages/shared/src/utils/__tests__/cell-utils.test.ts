import { describe, it, expect } from 'vitest';
import {
  colIndexToLetter,
  buildCellRef,
  buildRange,
  quoteSheetName,
  qualifyRange,
  sanitizeSheetName,
  toArgb,
} from '../cell-utils';

describe('colIndexToLetter', () => {
  it('converts single-letter columns', () => {
    expect(colIndexToLetter(0)).toBe('A');
    expect(colIndexToLetter(25)).toBe('Z');
  });

  it('converts multi-letter columns', () => {
    expect(colIndexToLetter(26)).toBe('AA');
    expect(colIndexToLetter(51)).toBe('AZ');
    expect(colIndexToLetter(701)).toBe('ZZ');
    expect(colIndexToLetter(702)).toBe('AAA');
  });
});

describe('buildCellRef', () => {
  it('uses 0-based columns and 1-based rows', () => {
    expect(buildCellRef(1, 3)).toBe('B3');
    expect(buildCellRef(26, 1)).toBe('AA1');
  });
});

describe('buildRange', () => {
  it('builds a single-column range', () => {
    expect(buildRange(1, 2, 5)).toBe('B2:B5');
    expect(buildRange(27, 10, 10)).toBe('AB10:AB10');
  });
});

describe('quoteSheetName / qualifyRange', () => {
  it('leaves plain identifiers alone', () => {
    expect(quoteSheetName('Data')).toBe('Data');
    expect(qualifyRange('Data', 'B2:B5')).toBe('Data!B2:B5');
  });

  it('quotes names with spaces or that look like references', () => {
    expect(quoteSheetName('Sales 2024')).toBe("'Sales 2024'");
    expect(quoteSheetName('AB12')).toBe("'AB12'");
    expect(qualifyRange("Bob's", 'A1:A2')).toBe("'Bob''s'!A1:A2");
  });

  it('quotes names that read as R1C1 references', () => {
    expect(quoteSheetName('R1C1')).toBe("'R1C1'");
    expect(quoteSheetName('r2c10')).toBe("'r2c10'");
    expect(quoteSheetName('RC')).toBe("'RC'");
    expect(quoteSheetName('C')).toBe("'C'");
    expect(qualifyRange('R1C1', 'B2:B5')).toBe("'R1C1'!B2:B5");
    expect(quoteSheetName('Rates')).toBe('Rates');
  });
});

describe('sanitizeSheetName', () => {
  it('removes invalid characters', () => {
    expect(sanitizeSheetName('Sheet/1')).toBe('Sheet_1');
    expect(sanitizeSheetName('Test[2]')).toBe('Test_2_');
  });

  it('truncates to 31 chars', () => {
    expect(sanitizeSheetName('A'.repeat(50)).length).toBe(31);
  });

  it('returns "Sheet" for empty input', () => {
    expect(sanitizeSheetName('')).toBe('Sheet');
  });
});

describe('toArgb', () => {
  it('adds an opaque alpha channel', () => {
    expect(toArgb('#ddebf7')).toBe('FFDDEBF7');
  });
});
