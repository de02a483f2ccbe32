import { BOOLEAN_LABELS } from '../constants/style-defaults';

/** Days between the Excel epoch (1899-12-30) and the Unix epoch */
const EXCEL_EPOCH_OFFSET_DAYS = 25569;
const MS_PER_DAY = 86_400_000;

/** Collapse internal whitespace and trim */
export function normalizeText(value: string): string {
  return value.trim().replace(/\s+/g, ' ');
}

/**
 * Parse a number written with the given decimal separator: "1.234,5" → 1234.5 for ",".
 * Currency symbols and spaces are ignored; a trailing "%" divides by 100.
 * Returns null when the text is not a number.
 */
export function parseLocaleNumber(text: string, decimalSeparator: ',' | '.'): number | null {
  let cleaned = text.replace(/[\s€$£]/g, '');
  const percent = cleaned.endsWith('%');
  if (percent) cleaned = cleaned.slice(0, -1);
  if (cleaned === '') return null;

  const thousands = decimalSeparator === ',' ? '.' : ',';
  cleaned = cleaned.split(thousands).join('');
  if (decimalSeparator === ',') cleaned = cleaned.replace(',', '.');
  if (!/^[-+]?(\d+\.?\d*|\.\d+)(e[-+]?\d+)?$/i.test(cleaned)) return null;

  const n = Number(cleaned);
  if (!Number.isFinite(n)) return null;
  return percent ? n / 100 : n;
}

/** Excel serial day number → UTC Date */
export function excelSerialToDate(serial: number): Date {
  return new Date(Math.round((serial - EXCEL_EPOCH_OFFSET_DAYS) * MS_PER_DAY));
}

/** Round half away from zero to a number of decimals */
export function roundTo(value: number, scale: number): number {
  const factor = 10 ** scale;
  return Math.sign(value) * Math.round(Math.abs(value) * factor) / factor;
}

/**
 * Read a yes/no label. `extra` adds the labels the export side was configured with.
 * Returns null when the text is neither.
 */
export function parseBooleanLabel(
  text: string,
  extra: { true: string; false: string } = { true: BOOLEAN_LABELS.TRUE, false: BOOLEAN_LABELS.FALSE },
): boolean | null {
  const t = text.trim().toLowerCase();
  const yes: readonly string[] = BOOLEAN_LABELS.TRUE_ALIASES;
  const no: readonly string[] = BOOLEAN_LABELS.FALSE_ALIASES;
  if (t === extra.true.toLowerCase() || yes.includes(t)) return true;
  if (t === extra.false.toLowerCase() || no.includes(t)) return false;
  return null;
}
