import 'reflect-metadata';
import type { DataCategory, FieldValueType, Operation } from '@sheetmap/shared';

export const SHEET_TABLE_KEY = 'sheetmap:table';
export const SHEET_COLUMNS_KEY = 'sheetmap:columns';

export interface SheetTableOptions {
  /** Title written above the table, merged across its columns */
  name: string;
}

export interface SheetColumnOptions {
  order: number;
  label?: string;
  category?: DataCategory;
  /** Background color, `#RRGGBB` */
  color?: string;
}

export interface SheetFormulaOptions {
  operation: Operation;
  /** Property keys of the operands */
  fields: string[];
  template?: string;
  category?: DataCategory;
}

export interface ImportColumnOptions {
  aliases?: string[];
  order?: number;
  required?: boolean;
  valueType?: FieldValueType;
  /** Aliases of a special field are end-of-data sentinels */
  special?: boolean;
}

export type ColumnMetadata =
  | { kind: 'column'; key: string; options: SheetColumnOptions }
  | { kind: 'formula'; key: string; options: SheetFormulaOptions }
  | { kind: 'import'; key: string; options: ImportColumnOptions };

/** Entries declared on a class and its ancestors, in declaration order */
export function readColumnMetadata(type: object): ColumnMetadata[] {
  const value: unknown = Reflect.getMetadata(SHEET_COLUMNS_KEY, type);
  return Array.isArray(value) ? value : [];
}

export function readTableMetadata(type: object): SheetTableOptions | undefined {
  const value: unknown = Reflect.getMetadata(SHEET_TABLE_KEY, type);
  if (typeof value === 'object' && value !== null && 'name' in value && typeof value.name === 'string') {
    return { name: value.name };
  }
  return undefined;
}

function appendColumnMetadata(target: object, entry: ColumnMetadata): void {
  // Stored on the constructor; a subclass starts from a copy of its parent's list
  const ctor = target.constructor;
  Reflect.defineMetadata(SHEET_COLUMNS_KEY, [...readColumnMetadata(ctor), entry], ctor);
}

export function SheetTable(options: SheetTableOptions): ClassDecorator {
  return (target) => {
    Reflect.defineMetadata(SHEET_TABLE_KEY, { ...options }, target);
  };
}

export function SheetColumn(options: SheetColumnOptions): PropertyDecorator {
  return (target, propertyKey) => {
    if (typeof propertyKey !== 'string') return;
    appendColumnMetadata(target, { kind: 'column', key: propertyKey, options });
  };
}

/** Computes the cell from other cells of the same row */
export function SheetFormula(options: SheetFormulaOptions): PropertyDecorator {
  return (target, propertyKey) => {
    if (typeof propertyKey !== 'string') return;
    appendColumnMetadata(target, { kind: 'formula', key: propertyKey, options });
  };
}

export function ImportColumn(options: ImportColumnOptions = {}): PropertyDecorator {
  return (target, propertyKey) => {
    if (typeof propertyKey !== 'string') return;
    appendColumnMetadata(target, { kind: 'import', key: propertyKey, options });
  };
}
