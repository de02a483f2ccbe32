import { Logger } from '@nestjs/common';
import type ExcelJS from 'exceljs';
import type { ExportOptions, FieldSpec } from '@sheetmap/shared';
import { ConfigurationError, ROW_HEIGHTS, buildCellRef, rowFormula } from '@sheetmap/shared';
import type { FieldRegistry } from '../metadata/field-registry.service';
import type { SheetLayout } from './sheet-layout';
import type { StyleCache } from './style-cache';
import type { SpecialColumnWriter } from './special-column.writer';
import type { PivotWriter } from './pivot.writer';
import type { TableDefinition, WrittenTable } from './export.types';
import { renderValue } from './value-renderer';
import { writeCell, writeFormula, writeSpanning } from './cell-writer';

export const DEFAULT_SHEET_NAME = 'Sheet1';

/**
 * Writes title, reference labels, header and one row per record, then hands
 * the written extent to the special-column and pivot writers.
 */
export class TableWriter {
  private readonly logger = new Logger(TableWriter.name);

  constructor(
    private readonly layout: SheetLayout,
    private readonly styles: StyleCache,
    private readonly registry: FieldRegistry,
    private readonly specials: SpecialColumnWriter,
    private readonly pivots: PivotWriter,
    private readonly options: ExportOptions,
  ) {}

  write(table: TableDefinition): WrittenTable {
    const first = table.records[0];
    if (!first) {
      throw new ConfigurationError('Cannot write a table without records', { sheet: table.sheet ?? DEFAULT_SHEET_NAME });
    }
    const fields = table.fields ?? this.registry.exportable(first.constructor);
    if (fields.length === 0) {
      throw new ConfigurationError(`No exported fields declared on ${first.constructor.name}`);
    }
    const title = table.title ?? (table.fields ? undefined : this.registry.tableName(first.constructor));

    this.layout.switchSheet(table.sheet ?? DEFAULT_SHEET_NAME);
    this.layout.beginTable();

    const offset = this.layout.columnOffset;
    const minOrder = Math.min(...fields.map((f) => f.order));
    const maxOrder = Math.max(...fields.map((f) => f.order));

    if (title) {
      const row = this.layout.titleRow();
      writeSpanning(this.layout, row, offset + minOrder, offset + maxOrder, title, this.styles.titleStyle());
      row.height = ROW_HEIGHTS.TITLE;
    }
    this.layout.beginBody();

    for (const label of table.referenceLabels ?? []) {
      const row = this.layout.nextRow(true);
      const style = this.styles.referenceLabelStyle(label.bold ?? false);
      writeSpanning(this.layout, row, offset + minOrder, offset + maxOrder, label.text, style);
    }

    if (table.header !== false) {
      const row = this.layout.nextRow(true);
      for (const field of fields) {
        writeCell(this.layout, row, offset + field.order, field.label, this.styles.headerStyle());
      }
      row.height = ROW_HEIGHTS.HEADER;
    }

    let firstDataRow = 0;
    let lastDataRow = 0;
    for (const record of table.records) {
      const row = this.layout.nextRow(true);
      if (firstDataRow === 0) firstDataRow = row.number;
      lastDataRow = row.number;
      this.writeRecord(row, record, fields, offset);
    }

    const written: WrittenTable = {
      sheetName: this.layout.sheetName,
      fields,
      columnOffset: offset,
      firstDataRow,
      lastDataRow,
    };

    if (table.specialFields?.length) {
      this.specials.emit(written, table.specialFields);
    }
    if (table.pivot) {
      this.pivots.emit(written, table.records, table.pivot);
    }

    this.layout.endTable(maxOrder + 1);
    this.logger.debug(`Table on "${written.sheetName}": rows ${firstDataRow}-${lastDataRow}, ${fields.length} column(s)`);
    return written;
  }

  private writeRecord(row: ExcelJS.Row, record: object, fields: FieldSpec[], offset: number): void {
    for (const field of fields) {
      const column = offset + field.order;
      if (field.formula) {
        this.writeRowFormula(row, field, fields, offset);
        continue;
      }
      const raw: unknown = Reflect.get(record, field.key);
      writeCell(this.layout, row, column, renderValue(raw, field.category, this.options), this.styles.styleFor(field.category, field.color));
    }
  }

  /** Formula over operands of the same row; a blank cell when an operand is unknown */
  private writeRowFormula(row: ExcelJS.Row, field: FieldSpec, fields: FieldSpec[], offset: number): void {
    const column = offset + field.order;
    const spec = field.formula;
    if (!spec) return;

    const refs: string[] = [];
    for (const key of spec.fields) {
      const operand = fields.find((f) => f.key === key || f.label === key);
      if (!operand) {
        this.logger.debug(`Row formula "${field.key}": operand "${key}" is not an exported field`);
        writeCell(this.layout, row, column, null, this.styles.styleFor(spec.category, field.color));
        return;
      }
      refs.push(buildCellRef(offset + operand.order, row.number));
    }

    const formula = rowFormula(spec.operation, refs, spec.template);
    if (!formula) {
      writeCell(this.layout, row, column, null, this.styles.styleFor(spec.category, field.color));
      return;
    }
    writeFormula(this.layout, row, column, formula, this.styles.formulaStyleFor(spec.category, field.color));
  }
}
