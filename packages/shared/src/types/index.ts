export type {
  DataCategory,
  Operation,
  FieldValueType,
  Orientation,
  RowStatus,
  PivotAggregate,
  CellScalar,
  RowFormula,
  FieldSpec,
  SpecialField,
  ReferenceLabel,
  PivotDefinition,
} from './field-types';
export {
  DATA_CATEGORIES,
  OPERATIONS,
  FIELD_VALUE_TYPES,
  ORIENTATIONS,
  ROW_STATUSES,
  PIVOT_AGGREGATES,
} from './field-types';

export type {
  ImportColumnConfig,
  PlainRecord,
  ImportedRecord,
  ImportWithGeneralities,
  ValidationStatus,
  ValidationResult,
} from './import-types';
export { VALIDATION_STATUSES } from './import-types';

export type { ApiSuccess, ApiFailure, ImportResult } from './api-types';
