import type { CellScalar, Operation, PivotAggregate } from '../types/field-types';
import { FORMULA_PLACEHOLDER } from '../constants/style-defaults';

/*
 * Formula text is produced without the leading "=", the form ExcelJS stores.
 */

export function sumFormula(...ranges: string[]): string {
  return `SUM(${ranges.join(',')})`;
}

/**
 * Replace each placeholder, left to right, with the next replacement.
 * Returns null when the placeholder count and the replacement count differ.
 */
export function applyFormulaTemplate(template: string, replacements: string[]): string | null {
  const parts = template.split(FORMULA_PLACEHOLDER);
  if (parts.length - 1 !== replacements.length) return null;
  return parts.reduce((acc, part, i) => acc + (replacements[i - 1] ?? '') + part);
}

/** Formula across cells of one row: SUM(B2,C2), B2-C2, B2/C2 or a template */
export function rowFormula(operation: Operation, refs: string[], template?: string): string | null {
  if (refs.length === 0) return null;
  switch (operation) {
    case 'sum':
      return sumFormula(...refs);
    case 'subtraction':
      return refs.join('-');
    case 'division':
      return refs.join('/');
    case 'custom':
      return template ? applyFormulaTemplate(template, refs) : null;
  }
}

/**
 * Aggregate of column ranges. One range per operand; subtraction and division
 * combine the operands' sums.
 */
export function columnFormula(operation: Operation, ranges: string[], template?: string): string | null {
  if (ranges.length === 0) return null;
  switch (operation) {
    case 'sum':
      return sumFormula(...ranges);
    case 'subtraction':
      return ranges.map((r) => sumFormula(r)).join('-');
    case 'division':
      return ranges.map((r) => sumFormula(r)).join('/');
    case 'custom':
      return template ? applyFormulaTemplate(template, ranges) : null;
  }
}

/** Literal usable as a criteria argument; text is quoted, dates become DATE() */
export function formatCriteria(value: CellScalar): string {
  if (value === null) return '""';
  if (typeof value === 'number') return String(value);
  if (typeof value === 'boolean') return value ? 'TRUE' : 'FALSE';
  if (value instanceof Date) {
    return `DATE(${value.getUTCFullYear()},${value.getUTCMonth() + 1},${value.getUTCDate()})`;
  }
  return `"${value.replace(/"/g, '""')}"`;
}

export interface CriteriaPair {
  range: string;
  value: CellScalar;
}

/** SUMIFS(<valueRange>,<range1>,<criteria1>,...) */
export function conditionalAggregateFormula(
  aggregate: PivotAggregate,
  valueRange: string,
  criteria: CriteriaPair[],
): string {
  const args = criteria.flatMap((c) => [c.range, formatCriteria(c.value)]);
  return `${aggregate}(${[valueRange, ...args].join(',')})`;
}
