import { describe, it, expect } from 'vitest';
import ExcelJS from 'exceljs';
import { headerMatches, matchColumns } from '../column-resolver';

function headerRow(values: ExcelJS.CellValue[]): ExcelJS.Row {
  const ws = new ExcelJS.Workbook().addWorksheet('Data');
  const row = ws.getRow(1);
  row.values = values;
  return row;
}

describe('headerMatches', () => {
  it('matches when the header contains the title, ignoring case', () => {
    expect(headerMatches('Customer  NAME (required)', { title: 'name' })).toBe(true);
    expect(headerMatches('Amount', { title: 'Amounts' })).toBe(false);
  });
});

describe('matchColumns', () => {
  it('maps each header to the first remaining configuration', () => {
    const name = { title: 'Name' };
    const amount = { title: 'Amount' };
    const match = matchColumns(headerRow(['Name', 'Total amount', 'Notes']), [amount, name], 1);

    expect(match.byColumn.get(1)).toBe(name);
    expect(match.byColumn.get(2)).toBe(amount);
    expect(match.byColumn.has(3)).toBe(false);
    expect(match.unmatched).toEqual([]);
  });

  it('uses each configuration once', () => {
    const date = { title: 'Date' };
    const match = matchColumns(headerRow(['Start date', 'End date']), [date], 1);
    expect([...match.byColumn.keys()]).toEqual([1]);
  });

  it('starts at the configured column and reports what did not match', () => {
    const name = { title: 'Name' };
    const email = { title: 'Email', required: true };
    const match = matchColumns(headerRow(['Name', 'Other', 'Name']), [name, email], 2);

    expect([...match.byColumn.entries()]).toEqual([[3, name]]);
    expect(match.unmatched).toEqual([email]);
  });
});
