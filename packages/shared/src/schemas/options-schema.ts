import { z } from 'zod';
import { ORIENTATIONS } from '../types/field-types';
import { STYLE_DEFAULTS, IMPORT_DEFAULTS, BOOLEAN_LABELS } from '../constants/style-defaults';

export const hexColorSchema = z.string().regex(/^#[0-9a-fA-F]{6}$/, 'Expected a #RRGGBB color');

export const booleanLabelsSchema = z.object({
  true: z.string().min(1),
  false: z.string().min(1),
});

export const exportOptionsSchema = z.object({
  fontName: z.string().min(1).default(STYLE_DEFAULTS.FONT_NAME),
  headerColor: hexColorSchema.default(STYLE_DEFAULTS.HEADER_COLOR),
  orientation: z.enum(ORIENTATIONS).default('vertical'),
  distanceTable: z.number().int().min(0).max(100).default(1),
  freezeColumn: z.number().int().min(0).default(0),
  freezeRow: z.number().int().min(0).default(0),
  dateFormat: z.string().min(1).default(STYLE_DEFAULTS.DATE_FORMAT),
  currencyFormat: z.string().min(1).default(STYLE_DEFAULTS.CURRENCY_FORMAT),
  percentageFormat: z.string().min(1).default(STYLE_DEFAULTS.PERCENTAGE_FORMAT),
  booleanLabels: booleanLabelsSchema.default({ true: BOOLEAN_LABELS.TRUE, false: BOOLEAN_LABELS.FALSE }),
}).strict();

export const importOptionsSchema = z.object({
  sheet: z.string().min(1).optional(),
  headerRow: z.number().int().min(1).default(IMPORT_DEFAULTS.HEADER_ROW),
  startColumn: z.number().int().min(1).default(IMPORT_DEFAULTS.START_COLUMN),
  decimalSeparator: z.enum([',', '.']).default(IMPORT_DEFAULTS.DECIMAL_SEPARATOR),
  dateFormat: z.string().min(1).default(IMPORT_DEFAULTS.DATE_FORMAT),
  decimalScale: z.number().int().min(0).max(10).default(IMPORT_DEFAULTS.DECIMAL_SCALE),
  sentinels: z.array(z.string().min(1)).default([]),
  booleanLabels: booleanLabelsSchema.default({ true: BOOLEAN_LABELS.TRUE, false: BOOLEAN_LABELS.FALSE }),
}).strict();

export const feedbackOptionsSchema = z.object({
  sheet: z.string().min(1).optional(),
  headerRow: z.number().int().min(1).default(IMPORT_DEFAULTS.HEADER_ROW),
  startColumn: z.number().int().min(1).default(IMPORT_DEFAULTS.START_COLUMN),
  okMarker: z.string().min(1).default(IMPORT_DEFAULTS.OK_MARKER),
  markerTitle: z.string().min(1).default(IMPORT_DEFAULTS.MARKER_TITLE),
}).strict();

export type ExportOptions = z.infer<typeof exportOptionsSchema>;
export type ExportOptionsInput = z.input<typeof exportOptionsSchema>;
export type ImportOptions = z.infer<typeof importOptionsSchema>;
export type ImportOptionsInput = z.input<typeof importOptionsSchema>;
export type FeedbackOptions = z.infer<typeof feedbackOptionsSchema>;
export type FeedbackOptionsInput = z.input<typeof feedbackOptionsSchema>;
