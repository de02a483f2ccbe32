import { describe, it, expect } from 'vitest';
import { exportOptionsSchema } from '@sheetmap/shared';
import { StyleCache, solidFill } from '../style-cache';

const options = exportOptionsSchema.parse({});

describe('StyleCache', () => {
  it('returns one shared style per category and color', () => {
    const cache = new StyleCache(options);
    const a = cache.styleFor('number');
    expect(cache.styleFor('number')).toBe(a);
    expect(cache.styleFor('number', '#FF0000')).not.toBe(a);
    expect(cache.size).toBe(2);
  });

  it('applies number formats by category', () => {
    const cache = new StyleCache(options);
    expect(cache.styleFor('date').numFmt).toBe('dd/mm/yyyy');
    expect(cache.styleFor('currency').numFmt).toBe('#,##0.00 €');
    expect(cache.styleFor('percentage').numFmt).toBe('0.00%');
    expect(cache.styleFor('text').numFmt).toBeUndefined();
  });

  it('aligns text left and numbers right', () => {
    const cache = new StyleCache(options);
    expect(cache.styleFor('text').alignment?.horizontal).toBe('left');
    expect(cache.styleFor('currency').alignment?.horizontal).toBe('right');
    expect(cache.styleFor('date').alignment?.horizontal).toBe('center');
  });

  it('bolds formula cells', () => {
    const cache = new StyleCache(options);
    expect(cache.styleFor('formula').font?.bold).toBe(true);
    expect(cache.formulaStyleFor('number').font?.bold).toBe(true);
    expect(cache.styleFor('number').font?.bold).toBe(false);
  });

  it('fills the header with the configured color and font', () => {
    const cache = new StyleCache(exportOptionsSchema.parse({ fontName: 'Calibri', headerColor: '#112233' }));
    const header = cache.headerStyle();
    expect(header.fill).toEqual(solidFill('#112233'));
    expect(header.font).toEqual({ name: 'Calibri', size: 11, bold: true });
    expect(cache.headerStyle()).toBe(header);
  });
});

describe('solidFill', () => {
  it('converts the color to ARGB', () => {
    expect(solidFill('#c6efce')).toEqual({ type: 'pattern', pattern: 'solid', fgColor: { argb: 'FFC6EFCE' } });
  });
});
