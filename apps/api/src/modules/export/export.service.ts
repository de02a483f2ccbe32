import { Injectable, Logger } from '@nestjs/common';
import type { ExportOptionsInput } from '@sheetmap/shared';
import { ConfigurationError, exportOptionsSchema } from '@sheetmap/shared';
import { FieldRegistry } from '../metadata/field-registry.service';
import { parseOptions } from '../../common/utils/parse-options';
import { WorkbookBuilder } from './workbook-builder';
import { DEFAULT_SHEET_NAME } from './table-writer';
import type { ReportDefinition, TableDefinition } from './export.types';

@Injectable()
export class ExportService {
  private readonly logger = new Logger(ExportService.name);

  constructor(private readonly registry: FieldRegistry) {}

  /** New builder with validated options; one per document */
  createBuilder(options?: ExportOptionsInput): WorkbookBuilder {
    return new WorkbookBuilder(this.registry, parseOptions(exportOptionsSchema, options, 'export options'));
  }

  /**
   * Every list as one table on a single sheet, placed by the layout: stacked
   * when vertical, side by side when horizontal. Titles come from the record
   * types' table names.
   */
  async generateSimple(recordLists: readonly (readonly object[])[], options?: ExportOptionsInput): Promise<Buffer> {
    if (recordLists.length === 0) {
      throw new ConfigurationError('No record lists to export');
    }
    const builder = this.createBuilder(options);
    for (const records of recordLists) {
      builder.writeTable({ records, sheet: DEFAULT_SHEET_NAME });
    }
    return this.serialize(builder, 'simple');
  }

  /** Fully configured tables, each on its declared sheet */
  async generateTables(tables: readonly TableDefinition[], options?: ExportOptionsInput): Promise<Buffer> {
    if (tables.length === 0) {
      throw new ConfigurationError('No tables to export');
    }
    const builder = this.createBuilder(options);
    for (const table of tables) {
      builder.writeTable(table);
    }
    return this.serialize(builder, 'tables');
  }

  /** Generalities block with summary rows, followed by the report's tables */
  async generateReport(report: ReportDefinition, options?: ExportOptionsInput): Promise<Buffer> {
    const builder = this.createBuilder(options);
    builder.writeReport(report);
    return this.serialize(builder, 'report');
  }

  private async serialize(builder: WorkbookBuilder, kind: string): Promise<Buffer> {
    const buffer = await builder.toBuffer();
    this.logger.log(
      `XLSX ${kind} export: ${builder.workbook.worksheets.length} sheet(s), ` +
      `${builder.writtenTables} table(s), ${builder.styles.size} style(s), ${buffer.length} bytes`,
    );
    return buffer;
  }
}
