export const SHEET_ERROR_CODES = [
  'CONFIGURATION_ERROR',
  'MISSING_REQUIRED_COLUMN',
  'MISSING_REQUIRED_VALUE',
  'CELL_COERCION_FAILED',
  'UNRESOLVED_FORMULA_REFERENCE',
] as const;
export type SheetErrorCode = (typeof SHEET_ERROR_CODES)[number];

/** Base class for every mapping failure raised by export, import and feedback */
export class SheetMappingError extends Error {
  constructor(
    readonly code: SheetErrorCode,
    message: string,
    readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Invalid options, empty column configuration or empty record list */
export class ConfigurationError extends SheetMappingError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CONFIGURATION_ERROR', message, details);
  }
}

/** A required import column never matched a header cell */
export class MissingRequiredColumnError extends SheetMappingError {
  constructor(readonly title: string) {
    super('MISSING_REQUIRED_COLUMN', `Missing required column "${title}"`, { title });
  }
}

/** A required field is blank (or unreadable) in an accepted data row */
export class MissingRequiredValueError extends SheetMappingError {
  constructor(readonly title: string, readonly rowNumber: number) {
    super(
      'MISSING_REQUIRED_VALUE',
      `Missing required value for column "${title}" at row ${rowNumber}`,
      { title, rowNumber },
    );
  }
}

/** A cell could not be converted to its field's value type */
export class CellCoercionError extends SheetMappingError {
  constructor(readonly raw: unknown, readonly valueType: string) {
    super('CELL_COERCION_FAILED', `Cannot read ${JSON.stringify(String(raw))} as ${valueType}`, {
      valueType,
    });
  }
}

/** A special column or pivot names a column that was not written */
export class UnresolvedFormulaReferenceError extends SheetMappingError {
  constructor(readonly column: string) {
    super('UNRESOLVED_FORMULA_REFERENCE', `Column "${column}" is not part of the table`, { column });
  }
}
