import { Logger } from '@nestjs/common';
import type {
  CellScalar,
  ExportOptions,
  FieldSpec,
  PivotDefinition,
} from '@sheetmap/shared';
import {
  ROW_HEIGHTS,
  UnresolvedFormulaReferenceError,
  buildRange,
  conditionalAggregateFormula,
  qualifyRange,
  sanitizeSheetName,
} from '@sheetmap/shared';
import type { SheetLayout } from './sheet-layout';
import type { StyleCache } from './style-cache';
import type { SpecialColumnWriter } from './special-column.writer';
import { requireField, type WrittenTable } from './export.types';
import { renderValue } from './value-renderer';
import { writeCell, writeFormula, writeSpanning } from './cell-writer';

interface PivotGroup {
  values: CellScalar[];
}

/**
 * Writes one conditional-aggregate row per distinct combination of the
 * condition columns, in order of first appearance among the records.
 */
export class PivotWriter {
  private readonly logger = new Logger(PivotWriter.name);

  constructor(
    private readonly layout: SheetLayout,
    private readonly styles: StyleCache,
    private readonly specials: SpecialColumnWriter,
    private readonly options: ExportOptions,
  ) {}

  emit(source: WrittenTable, records: readonly object[], pivot: PivotDefinition): void {
    const conditions = this.resolveFields(source, pivot.conditionColumns);
    const values = this.resolveFields(source, pivot.valueColumns);
    if (conditions.length !== pivot.conditionColumns.length || conditions.length === 0) {
      this.logger.warn(`Pivot on "${source.sheetName}" skipped: condition columns not found`);
      return;
    }

    const groups = this.distinctGroups(records, conditions);
    const targetSheet = pivot.sheet ? sanitizeSheetName(pivot.sheet) : source.sheetName;
    const crossSheet = targetSheet !== source.sheetName;

    if (crossSheet) {
      this.layout.switchSheet(targetSheet);
      this.layout.beginTable();
    } else {
      this.layout.emptyRows(this.options.distanceTable);
    }

    const offset = crossSheet ? this.layout.columnOffset : source.columnOffset;
    const columns = [...conditions, ...values].map((f, i) => ({ ...f, order: i }));
    const lastColumn = offset + columns.length - 1;

    if (pivot.label) {
      const row = crossSheet ? this.layout.titleRow() : this.layout.nextRow(true);
      writeSpanning(this.layout, row, offset, lastColumn, pivot.label, this.styles.titleStyle());
      row.height = ROW_HEIGHTS.TITLE;
    }
    if (crossSheet) this.layout.beginBody();

    if (pivot.header !== false) {
      const row = this.layout.nextRow(true);
      columns.forEach((f, i) => writeCell(this.layout, row, offset + i, f.label, this.styles.headerStyle()));
      row.height = ROW_HEIGHTS.HEADER;
    }

    const rangeOf = (field: FieldSpec): string => {
      const range = buildRange(field.order + source.columnOffset, source.firstDataRow, source.lastDataRow);
      return crossSheet ? qualifyRange(source.sheetName, range) : range;
    };
    const aggregate = pivot.aggregate ?? 'SUMIFS';

    let firstRow = 0;
    let lastRow = 0;
    for (const group of groups) {
      const row = this.layout.nextRow(true);
      if (firstRow === 0) firstRow = row.number;
      lastRow = row.number;

      conditions.forEach((field, i) => {
        const style = this.styles.styleFor(field.category, field.color);
        writeCell(this.layout, row, offset + i, group.values[i] ?? null, style);
      });

      const criteria = conditions.map((field, i) => ({ range: rangeOf(field), value: group.values[i] ?? null }));
      values.forEach((field, j) => {
        const formula = conditionalAggregateFormula(aggregate, rangeOf(field), criteria);
        const style = this.styles.formulaStyleFor(field.category, field.color);
        writeFormula(this.layout, row, offset + conditions.length + j, formula, style);
      });
    }

    if (pivot.specialField && firstRow > 0) {
      const pivotTable: WrittenTable = {
        sheetName: this.layout.sheetName,
        fields: columns,
        columnOffset: offset,
        firstDataRow: firstRow,
        lastDataRow: lastRow,
      };
      this.specials.emit(pivotTable, [pivot.specialField]);
    }

    this.logger.debug(`Pivot "${pivot.label ?? targetSheet}": ${groups.length} group(s)`);

    if (crossSheet) {
      this.layout.endTable(columns.length);
      this.layout.switchSheet(source.sheetName);
    }
  }

  private resolveFields(source: WrittenTable, names: readonly string[]): FieldSpec[] {
    const fields: FieldSpec[] = [];
    for (const name of names) {
      try {
        fields.push(requireField(source, name));
      } catch (err) {
        if (!(err instanceof UnresolvedFormulaReferenceError)) throw err;
        this.logger.debug(`Pivot on "${source.sheetName}": ${err.message}`);
      }
    }
    return fields;
  }

  /** Distinct condition tuples, first-seen order; all-blank tuples are dropped */
  private distinctGroups(records: readonly object[], conditions: FieldSpec[]): PivotGroup[] {
    const seen = new Map<string, PivotGroup>();
    for (const record of records) {
      const values = conditions.map((field) => {
        const raw: unknown = Reflect.get(record, field.key);
        return renderValue(raw, field.category, this.options);
      });
      if (values.every((v) => v === null)) continue;
      const key = values.map(groupKey).join('\u0000');
      if (!seen.has(key)) seen.set(key, { values });
    }
    return [...seen.values()];
  }
}

function groupKey(value: CellScalar): string {
  if (value instanceof Date) return `date:${value.toISOString()}`;
  return `${typeof value}:${String(value)}`;
}
