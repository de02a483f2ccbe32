import { Injectable, Logger } from '@nestjs/common';
import type {
  DataCategory,
  FieldDefinitionInput,
  FieldSpec,
  FieldValueType,
  RowFormula,
} from '@sheetmap/shared';
import {
  readColumnMetadata,
  readTableMetadata,
  type ColumnMetadata,
  type ImportColumnOptions,
  type SheetColumnOptions,
  type SheetFormulaOptions,
} from './sheet-metadata.decorators';

const DEFAULT_VALUE_TYPES: Record<DataCategory, FieldValueType> = {
  text: 'string',
  number: 'number',
  currency: 'decimal',
  date: 'date',
  percentage: 'number',
  formula: 'number',
};

/**
 * Derives the FieldSpec list of a decorated record type.
 * Specs are computed once per type and cached for the life of the registry.
 */
@Injectable()
export class FieldRegistry {
  private readonly logger = new Logger(FieldRegistry.name);
  private readonly cache = new Map<object, FieldSpec[]>();

  /** All declared fields, sorted by order; undecorated properties are not part of the result */
  resolve(type: object): FieldSpec[] {
    const cached = this.cache.get(type);
    if (cached) return cached;

    const byKey = new Map<string, ColumnMetadata[]>();
    for (const entry of readColumnMetadata(type)) {
      const list = byKey.get(entry.key) ?? [];
      list.push(entry);
      byKey.set(entry.key, list);
    }

    const specs: FieldSpec[] = [];
    for (const [key, entries] of byKey) {
      const spec = this.buildSpec(key, entries);
      if (spec) specs.push(spec);
    }
    specs.sort((a, b) => a.order - b.order);

    this.cache.set(type, specs);
    return specs;
  }

  /** Fields written by the export side, sentinel fields excluded */
  exportable(type: object): FieldSpec[] {
    return this.resolve(type).filter((s) => s.exported && !s.excluded);
  }

  tableName(type: object): string | undefined {
    return readTableMetadata(type)?.name;
  }

  private buildSpec(key: string, entries: ColumnMetadata[]): FieldSpec | null {
    let column: SheetColumnOptions | undefined;
    let formula: SheetFormulaOptions | undefined;
    let imported: ImportColumnOptions | undefined;
    // A subclass redeclaring a field overrides its parent: last entry wins
    for (const entry of entries) {
      if (entry.kind === 'column') column = entry.options;
      else if (entry.kind === 'formula') formula = entry.options;
      else imported = entry.options;
    }

    if (!column && !imported) {
      this.logger.warn(`Field "${key}" has a formula but no column declaration; skipped`);
      return null;
    }

    const category: DataCategory = column?.category ?? (formula ? 'formula' : 'text');
    const spec: FieldSpec = {
      key,
      order: column?.order ?? imported?.order ?? Number.MAX_SAFE_INTEGER,
      label: column?.label ?? key,
      category,
      required: imported?.required ?? false,
      aliases: imported?.aliases ?? [],
      valueType: imported?.valueType ?? DEFAULT_VALUE_TYPES[category],
      excluded: imported?.special ?? false,
      exported: column !== undefined,
    };
    if (column?.color) spec.color = column.color;
    if (formula) spec.formula = toRowFormula(formula);
    return spec;
  }
}

function toRowFormula(options: SheetFormulaOptions): RowFormula {
  const formula: RowFormula = {
    operation: options.operation,
    fields: [...options.fields],
    category: options.category ?? 'number',
  };
  if (options.template) formula.template = options.template;
  return formula;
}

/** FieldSpec for a field declared inline rather than through decorators */
export function toFieldSpec(definition: FieldDefinitionInput): FieldSpec {
  const category = definition.formula && definition.category === 'text' ? 'formula' : definition.category;
  const spec: FieldSpec = {
    key: definition.key,
    order: definition.order,
    label: definition.label ?? definition.key,
    category,
    required: false,
    aliases: [],
    valueType: DEFAULT_VALUE_TYPES[category],
    excluded: false,
    exported: true,
  };
  if (definition.color) spec.color = definition.color;
  if (definition.formula) {
    spec.formula = toRowFormula({
      operation: definition.formula.operation,
      fields: definition.formula.fields,
      template: definition.formula.template,
      category: definition.formula.category,
    });
  }
  return spec;
}
