/** Rendering category of an exported field; drives number format and alignment */
export const DATA_CATEGORIES = ['text', 'number', 'currency', 'date', 'percentage', 'formula'] as const;
export type DataCategory = (typeof DATA_CATEGORIES)[number];

/** Operations available to special columns and per-row formulas */
export const OPERATIONS = ['sum', 'subtraction', 'division', 'custom'] as const;
export type Operation = (typeof OPERATIONS)[number];

/** Target type of an imported cell */
export const FIELD_VALUE_TYPES = ['string', 'integer', 'decimal', 'number', 'date', 'boolean'] as const;
export type FieldValueType = (typeof FIELD_VALUE_TYPES)[number];

export const ORIENTATIONS = ['vertical', 'horizontal'] as const;
export type Orientation = (typeof ORIENTATIONS)[number];

export const ROW_STATUSES = ['empty', 'values', 'special'] as const;
export type RowStatus = (typeof ROW_STATUSES)[number];

/** Conditional aggregates usable by a pivot */
export const PIVOT_AGGREGATES = ['SUMIFS', 'AVERAGEIFS', 'MAXIFS', 'MINIFS'] as const;
export type PivotAggregate = (typeof PIVOT_AGGREGATES)[number];

/** Scalar a mapped cell can hold */
export type CellScalar = string | number | boolean | Date | null;

/** Formula computed across cells of the same row */
export interface RowFormula {
  operation: Operation;
  /** Property keys of the operands, in order */
  fields: string[];
  /** Template with `?` placeholders, used when operation is `custom` */
  template?: string;
  category: DataCategory;
}

/** Per-field mapping metadata, derived once per record type */
export interface FieldSpec {
  key: string;
  order: number;
  label: string;
  category: DataCategory;
  /** Background color override, `#RRGGBB` */
  color?: string;
  required: boolean;
  aliases: string[];
  valueType: FieldValueType;
  formula?: RowFormula;
  /** Sentinel field: its aliases mark the end of the data region on import */
  excluded: boolean;
  /** Written by the export side */
  exported: boolean;
}

/** Computed row appended after a table's data */
export interface SpecialField {
  label: string;
  order: number;
  /** Source columns, by label or property key */
  columns: string[];
  operation: Operation;
  formula?: string;
  category?: DataCategory;
}

export interface ReferenceLabel {
  text: string;
  bold?: boolean;
}

export interface PivotDefinition {
  conditionColumns: string[];
  valueColumns: string[];
  label?: string;
  /** Target sheet; the source sheet when omitted */
  sheet?: string;
  header?: boolean;
  aggregate?: PivotAggregate;
  specialField?: SpecialField;
}
