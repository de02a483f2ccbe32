import type { CellScalar, FieldValueType } from './field-types';

/** One configured import column */
export interface ImportColumnConfig {
  /** Matched against header text: header contains title, case-insensitive */
  title: string;
  /** Target property key or alias; defaults to the title for plain records */
  field?: string;
  /** Matches a field by declared order when `field` is absent */
  order?: number;
  valueType?: FieldValueType;
  required?: boolean;
}

export type PlainRecord = Record<string, CellScalar>;

export interface ImportedRecord<T> {
  /** 1-based sheet row the record was read from */
  rowNumber: number;
  record: T;
}

export interface ImportWithGeneralities<G, T> {
  generalities: G;
  records: ImportedRecord<T>[];
}

export const VALIDATION_STATUSES = ['ok', 'warning', 'error'] as const;
export type ValidationStatus = (typeof VALIDATION_STATUSES)[number];

/** Outcome of a downstream check for one row, optionally narrowed to one column */
export interface ValidationResult {
  row: number;
  column?: string;
  status: ValidationStatus;
  message?: string;
}
