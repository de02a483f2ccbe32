export {
  SHEET_ERROR_CODES,
  SheetMappingError,
  ConfigurationError,
  MissingRequiredColumnError,
  MissingRequiredValueError,
  CellCoercionError,
  UnresolvedFormulaReferenceError,
  type SheetErrorCode,
} from './sheet-errors';
