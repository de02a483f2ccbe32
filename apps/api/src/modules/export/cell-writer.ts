import type ExcelJS from 'exceljs';
import type { SheetLayout } from './sheet-layout';
import type { CellStyle } from './style-cache';

export function formulaValue(formula: string): ExcelJS.CellFormulaValue {
  return { formula, date1904: false };
}

/** Write a value (null leaves a blank, styled cell) at a 0-based column */
export function writeCell(
  layout: SheetLayout,
  row: ExcelJS.Row,
  column: number,
  value: ExcelJS.CellValue,
  style: CellStyle,
): ExcelJS.Cell {
  const cell = row.getCell(column + 1);
  cell.value = value;
  cell.style = style;
  layout.touchColumn(column);
  return cell;
}

export function writeFormula(
  layout: SheetLayout,
  row: ExcelJS.Row,
  column: number,
  formula: string,
  style: CellStyle,
): ExcelJS.Cell {
  return writeCell(layout, row, column, formulaValue(formula), style);
}

/** Text spanning columns first..last of the row, merged when wider than one cell */
export function writeSpanning(
  layout: SheetLayout,
  row: ExcelJS.Row,
  first: number,
  last: number,
  text: string,
  style: CellStyle,
): void {
  writeCell(layout, row, first, text, style);
  if (last > first) {
    layout.sheet.mergeCells(row.number, first + 1, row.number, last + 1);
    layout.touchColumn(last);
  }
}
