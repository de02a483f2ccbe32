import ExcelJS from 'exceljs';
import type { ExportOptions } from '@sheetmap/shared';
import { ConfigurationError, ROW_HEIGHTS } from '@sheetmap/shared';
import type { FieldRegistry } from '../metadata/field-registry.service';
import { SheetLayout } from './sheet-layout';
import { StyleCache } from './style-cache';
import { SpecialColumnWriter } from './special-column.writer';
import { PivotWriter } from './pivot.writer';
import { TableWriter } from './table-writer';
import { renderValue } from './value-renderer';
import { writeCell, writeSpanning } from './cell-writer';
import type { ReportDefinition, TableDefinition, WrittenTable } from './export.types';

export const DEFAULT_REPORT_SHEET = 'Report';

/**
 * Owns one workbook with its style cache and layout cursors.
 * Create one per generation call; instances are not safe to share between calls.
 */
export class WorkbookBuilder {
  readonly workbook = new ExcelJS.Workbook();
  readonly styles: StyleCache;
  readonly layout: SheetLayout;
  private readonly specials: SpecialColumnWriter;
  private readonly tables: TableWriter;
  private tableCount = 0;

  constructor(
    private readonly registry: FieldRegistry,
    private readonly options: ExportOptions,
  ) {
    this.styles = new StyleCache(options);
    this.layout = new SheetLayout(this.workbook, options);
    this.specials = new SpecialColumnWriter(this.layout, this.styles);
    const pivots = new PivotWriter(this.layout, this.styles, this.specials, options);
    this.tables = new TableWriter(this.layout, this.styles, registry, this.specials, pivots, options);
  }

  get writtenTables(): number {
    return this.tableCount;
  }

  writeTable(table: TableDefinition): WrittenTable {
    const written = this.tables.write(table);
    this.tableCount++;
    return written;
  }

  /**
   * Generalities as label/value rows (labels in the first column, values in the
   * second), rows reserved for the summaries, then every table. The summaries
   * are filled last, with totals over the tables written on the report sheet.
   */
  writeReport(report: ReportDefinition): void {
    const sheet = report.sheet ?? DEFAULT_REPORT_SHEET;
    const ctor = report.generalities.constructor;
    const fields = report.generalitiesFields ?? this.registry.exportable(ctor);
    if (fields.length === 0) {
      throw new ConfigurationError(`No exported fields declared on ${ctor.name}`);
    }
    const title = report.title ?? (report.generalitiesFields ? undefined : this.registry.tableName(ctor));

    this.layout.switchSheet(sheet);
    this.layout.beginTable();
    const offset = this.layout.columnOffset;
    if (title) {
      const row = this.layout.titleRow();
      writeSpanning(this.layout, row, offset, offset + 1, title, this.styles.titleStyle());
      row.height = ROW_HEIGHTS.TITLE;
    }
    this.layout.beginBody();

    for (const field of fields) {
      const row = this.layout.nextRow(true);
      writeCell(this.layout, row, offset, field.label, this.styles.headerStyle());
      const raw: unknown = Reflect.get(report.generalities, field.key);
      writeCell(this.layout, row, offset + 1, renderValue(raw, field.category, this.options), this.styles.styleFor(field.category, field.color));
    }
    const summaries = report.summaries ?? [];
    const reserved = summaries.map(() => this.layout.nextRow(true));
    this.layout.endTable(2);

    const written = report.tables.map((table) => this.writeTable({ ...table, sheet: table.sheet ?? sheet }));

    this.layout.switchSheet(sheet);
    const onSheet = written.filter((w) => w.sheetName === this.layout.sheetName);
    summaries.forEach((special, i) => {
      const row = reserved[i];
      if (row) this.specials.emitSummary(row, onSheet, special);
    });
  }

  /** Freeze panes, autosize every sheet and serialize */
  async toBuffer(): Promise<Buffer> {
    this.layout.finalize();
    const buffer = await this.workbook.xlsx.writeBuffer();
    return Buffer.from(buffer);
  }
}
