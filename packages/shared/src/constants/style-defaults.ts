/** Export styling defaults */
export const STYLE_DEFAULTS = {
  FONT_NAME: 'Arial',
  HEADER_COLOR: '#DDEBF7',
  HEADER_FONT_SIZE: 11,
  BODY_FONT_SIZE: 10,
  TITLE_FONT_SIZE: 12,
  DATE_FORMAT: 'dd/mm/yyyy',
  CURRENCY_FORMAT: '#,##0.00 €',
  PERCENTAGE_FORMAT: '0.00%',
  BORDER_COLOR: '#000000',
} as const;

/** Row heights in points */
export const ROW_HEIGHTS = {
  TITLE: 48,
  HEADER: 44,
} as const;

/** Column width bounds applied by autosize, in characters */
export const COLUMN_WIDTHS = {
  MIN: 8,
  MAX: 60,
  PADDING: 2,
  FORMULA: 14,
  DATE: 12,
} as const;

/** Marker colors written by the feedback annotator */
export const FEEDBACK_COLORS = {
  OK: '#C6EFCE',
  WARNING: '#FFEB9C',
  ERROR: '#FFC7CE',
} as const;

/** Import parsing defaults */
export const IMPORT_DEFAULTS = {
  HEADER_ROW: 1,
  START_COLUMN: 1,
  DECIMAL_SEPARATOR: ',',
  DATE_FORMAT: 'dd/MM/yyyy',
  DECIMAL_SCALE: 2,
  OK_MARKER: 'IMPORT OK',
  MARKER_TITLE: 'Import result',
} as const;

/** Labels written for boolean values and accepted back on import */
export const BOOLEAN_LABELS = {
  TRUE: 'SI',
  FALSE: 'NO',
  TRUE_ALIASES: ['si', 'sì', 'yes', 'y', 'true', 'x', '1'],
  FALSE_ALIASES: ['no', 'n', 'false', '0'],
} as const;

/** Excel's limit on sheet names */
export const SHEET_LIMITS = {
  MAX_SHEET_NAME_LENGTH: 31,
} as const;

/** Placeholder replaced by a range in custom formula templates */
export const FORMULA_PLACEHOLDER = '?';

/** Accepted uploads and the download content type */
export const FILE_LIMITS = {
  ALLOWED_EXTENSIONS: ['.xlsx'] as const,
  XLSX_MIME_TYPE: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
} as const;
