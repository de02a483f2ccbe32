export {
  STYLE_DEFAULTS,
  ROW_HEIGHTS,
  COLUMN_WIDTHS,
  FEEDBACK_COLORS,
  IMPORT_DEFAULTS,
  BOOLEAN_LABELS,
  SHEET_LIMITS,
  FORMULA_PLACEHOLDER,
  FILE_LIMITS,
} from './style-defaults';
