import { Logger } from '@nestjs/common';
import type ExcelJS from 'exceljs';
import type { FieldSpec, SpecialField } from '@sheetmap/shared';
import { UnresolvedFormulaReferenceError, buildRange, columnFormula } from '@sheetmap/shared';
import type { SheetLayout } from './sheet-layout';
import type { StyleCache } from './style-cache';
import { findField, requireField, type WrittenTable } from './export.types';
import { writeCell, writeFormula } from './cell-writer';

interface ResolvedColumn {
  column: number;
  range: string;
  field: FieldSpec;
}

/**
 * Appends one computed row per special field, with formulas over the data rows
 * of the table just written. A field naming an unknown column is skipped.
 */
export class SpecialColumnWriter {
  private readonly logger = new Logger(SpecialColumnWriter.name);

  constructor(
    private readonly layout: SheetLayout,
    private readonly styles: StyleCache,
  ) {}

  emit(table: WrittenTable, specialFields: readonly SpecialField[]): void {
    for (const special of specialFields) {
      const row = this.layout.nextRow(true);
      writeCell(this.layout, row, special.order + table.columnOffset, special.label, this.styles.headerStyle());

      if (special.operation === 'sum') {
        this.writeColumnSums(row, table, special);
      } else {
        this.writeCombined(row, table, special);
      }
    }
  }

  /**
   * Totals across several tables, written on a reserved row with the label at
   * `order`. A sum writes one formula per column at `order + 1`, `order + 2`, ...
   * over that column's ranges in every table. Subtraction, division and custom
   * templates write a single formula at `order + 1`, one operand per column.
   */
  emitSummary(row: ExcelJS.Row, tables: readonly WrittenTable[], special: SpecialField): void {
    writeCell(this.layout, row, special.order, special.label, this.styles.headerStyle());
    const context = `Summary "${special.label}"`;

    if (special.operation === 'sum') {
      special.columns.forEach((name, i) => {
        const resolved = this.recover(context, () => this.resolveAcross(tables, name));
        const first = resolved?.[0];
        if (!resolved || !first) return;
        const formula = columnFormula('sum', resolved.map((r) => r.range));
        if (!formula) return;
        const style = this.styles.formulaStyleFor(special.category ?? first.field.category);
        writeFormula(this.layout, row, special.order + 1 + i, formula, style);
      });
      return;
    }

    const groups = this.recover(context, () => special.columns.map((name) => this.resolveAcross(tables, name)));
    const first = groups?.[0]?.[0];
    if (!groups || !first) return;
    const operands = groups.map((group) => group.map((r) => r.range).join(','));
    const formula = columnFormula(special.operation, operands, special.formula);
    if (!formula) {
      this.logger.debug(`${context}: template does not match ${operands.length} column(s)`);
      return;
    }
    const style = this.styles.formulaStyleFor(special.category ?? first.field.category);
    writeFormula(this.layout, row, special.order + 1, formula, style);
  }

  /** SUM of each referenced column, under that column */
  private writeColumnSums(row: ExcelJS.Row, table: WrittenTable, special: SpecialField): void {
    for (const name of special.columns) {
      const resolved = this.recover(`Special "${special.label}"`, () => this.resolve(table, name));
      if (!resolved) continue;
      const formula = columnFormula('sum', [resolved.range]);
      if (!formula) continue;
      const style = this.styles.formulaStyleFor(special.category ?? resolved.field.category, resolved.field.color);
      writeFormula(this.layout, row, resolved.column, formula, style);
    }
  }

  /**
   * Subtraction, division and custom templates combine every referenced range
   * into one formula, placed under the first referenced column. Nothing is
   * written when a reference is unknown.
   */
  private writeCombined(row: ExcelJS.Row, table: WrittenTable, special: SpecialField): void {
    const context = `Special "${special.label}"`;
    const resolved = this.recover(context, () => special.columns.map((name) => this.resolve(table, name)));
    const first = resolved?.[0];
    if (!resolved || !first) return;
    const formula = columnFormula(special.operation, resolved.map((r) => r.range), special.formula);
    if (!formula) {
      this.logger.debug(`${context}: template does not match ${resolved.length} column(s)`);
      return;
    }
    const style = this.styles.formulaStyleFor(special.category ?? first.field.category, first.field.color);
    writeFormula(this.layout, row, first.column, formula, style);
  }

  private resolve(table: WrittenTable, name: string): ResolvedColumn {
    const field = requireField(table, name);
    const column = field.order + table.columnOffset;
    return { column, field, range: buildRange(column, table.firstDataRow, table.lastDataRow) };
  }

  /** The column in every table that has it */
  private resolveAcross(tables: readonly WrittenTable[], name: string): ResolvedColumn[] {
    const resolved = tables.flatMap((table) => (findField(table, name) ? [this.resolve(table, name)] : []));
    if (resolved.length === 0) throw new UnresolvedFormulaReferenceError(name);
    return resolved;
  }

  /** Unknown columns are left out of the sheet */
  private recover<T>(context: string, resolve: () => T): T | null {
    try {
      return resolve();
    } catch (err) {
      if (!(err instanceof UnresolvedFormulaReferenceError)) throw err;
      this.logger.debug(`${context}: ${err.message}`);
      return null;
    }
  }
}
