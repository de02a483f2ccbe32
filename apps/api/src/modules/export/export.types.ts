import type { FieldSpec, PivotDefinition, ReferenceLabel, SpecialField } from '@sheetmap/shared';
import { UnresolvedFormulaReferenceError } from '@sheetmap/shared';

/** One table to generate: the records plus everything written around them */
export interface TableDefinition<T extends object = object> {
  records: readonly T[];
  /** Target sheet, "Sheet1" when omitted */
  sheet?: string;
  /** Overrides the @SheetTable name */
  title?: string;
  header?: boolean;
  /** Inline fields for records that carry no decorators */
  fields?: FieldSpec[];
  referenceLabels?: ReferenceLabel[];
  specialFields?: SpecialField[];
  pivot?: PivotDefinition;
}

/** A key-value block of generalities followed by data tables on one sheet */
export interface ReportDefinition {
  sheet?: string;
  /** Decorated record whose fields become label/value rows */
  generalities: object;
  generalitiesFields?: FieldSpec[];
  title?: string;
  /** Rows reserved under the generalities, filled with totals over every table */
  summaries?: SpecialField[];
  tables: TableDefinition[];
}

/** Position of a table once its data rows are on the sheet */
export interface WrittenTable {
  sheetName: string;
  fields: FieldSpec[];
  columnOffset: number;
  firstDataRow: number;
  lastDataRow: number;
}

export function findField(table: WrittenTable, name: string): FieldSpec | undefined {
  return table.fields.find((f) => f.label === name || f.key === name);
}


/** Like findField, but an unknown name is an UnresolvedFormulaReferenceError */
export function requireField(table: WrittenTable, name: string): FieldSpec {
  const field = findField(table, name);
  if (!field) throw new UnresolvedFormulaReferenceError(name);
  return field;
}
