export {
  colIndexToLetter,
  buildCellRef,
  buildRange,
  quoteSheetName,
  qualifyRange,
  sanitizeSheetName,
  toArgb,
} from './cell-utils';

export {
  sumFormula,
  applyFormulaTemplate,
  rowFormula,
  columnFormula,
  formatCriteria,
  conditionalAggregateFormula,
  type CriteriaPair,
} from './formula-utils';

export {
  normalizeText,
  parseLocaleNumber,
  excelSerialToDate,
  roundTo,
  parseBooleanLabel,
} from './value-utils';
