import { Injectable, Logger } from '@nestjs/common';
import type ExcelJS from 'exceljs';
import type {
  FeedbackOptions,
  FeedbackOptionsInput,
  ImportColumnConfig,
  ValidationResult,
  ValidationStatus,
} from '@sheetmap/shared';
import {
  COLUMN_WIDTHS,
  ConfigurationError,
  FEEDBACK_COLORS,
  feedbackOptionsSchema,
  normalizeText,
} from '@sheetmap/shared';
import { parseOptions } from '../../common/utils/parse-options';
import { openWorksheet } from '../../common/utils/workbook-io';
import { matchColumns, type ColumnMatch } from '../import/column-resolver';
import { readCellValue } from '../import/cell-reader';
import { solidFill } from '../export/style-cache';

const SEVERITY: Record<ValidationStatus, number> = { ok: 0, warning: 1, error: 2 };

const STATUS_COLORS: Record<ValidationStatus, string> = {
  ok: FEEDBACK_COLORS.OK,
  warning: FEEDBACK_COLORS.WARNING,
  error: FEEDBACK_COLORS.ERROR,
};

const NO_FILL: ExcelJS.Fill = { type: 'pattern', pattern: 'none' };

export interface FeedbackSummary {
  markerColumn: number;
  annotatedRows: number;
  okRows: number;
  /** Results aimed at rows past the end of the data */
  unmatchedResults: number;
}

@Injectable()
export class FeedbackService {
  private readonly logger = new Logger(FeedbackService.name);

  /** Re-open a produced workbook and mark each data row with its validation outcome */
  async annotate(
    buffer: Buffer,
    columns: readonly ImportColumnConfig[],
    results: readonly ValidationResult[],
    options?: FeedbackOptionsInput,
  ): Promise<Buffer> {
    const opts = parseOptions(feedbackOptionsSchema, options, 'feedback options');
    const { workbook, worksheet } = await openWorksheet(buffer, opts.sheet);
    const summary = this.annotateSheet(worksheet, columns, results, opts);
    this.logger.log(
      `Feedback on "${worksheet.name}": ${summary.annotatedRows} annotated, ${summary.okRows} ok` +
      (summary.unmatchedResults > 0 ? `, ${summary.unmatchedResults} result(s) past the data` : ''),
    );
    return Buffer.from(await workbook.xlsx.writeBuffer());
  }

  /**
   * Rows below the header are processed until the first blank one that has no
   * result. Prior notes and fills are cleared first; the marker goes in the
   * column after the last matched one.
   */
  annotateSheet(
    worksheet: ExcelJS.Worksheet,
    columns: readonly ImportColumnConfig[],
    results: readonly ValidationResult[],
    opts: FeedbackOptions,
  ): FeedbackSummary {
    if (columns.length === 0) {
      throw new ConfigurationError('At least one column is required');
    }
    const headerRow = worksheet.getRow(opts.headerRow);
    const match = matchColumns(headerRow, columns, opts.startColumn);
    const matched = [...match.byColumn.keys()];
    const lastColumn = matched.length > 0 ? Math.max(...matched) : Math.max(headerRow.cellCount, opts.startColumn - 1);
    const markerColumn = lastColumn + 1;

    const header = headerRow.getCell(markerColumn);
    header.value = opts.markerTitle;
    const base: Partial<ExcelJS.Style> = lastColumn > 0 ? headerRow.getCell(lastColumn).style : {};
    header.style = { ...base, font: { ...base.font, bold: true } };

    const byRow = new Map<number, ValidationResult[]>();
    for (const result of results) {
      const list = byRow.get(result.row) ?? [];
      list.push(result);
      byRow.set(result.row, list);
    }

    const summary: FeedbackSummary = { markerColumn, annotatedRows: 0, okRows: 0, unmatchedResults: 0 };
    let rowNumber = opts.headerRow + 1;
    for (; rowNumber <= worksheet.rowCount; rowNumber++) {
      const row = worksheet.getRow(rowNumber);
      const rowResults = byRow.get(rowNumber);
      if (!rowResults && isBlankRow(row, opts.startColumn, lastColumn)) break;

      clearMarkup(row);
      if (!rowResults) {
        writeMarker(row.getCell(markerColumn), opts.okMarker, 'ok');
        summary.okRows++;
        continue;
      }

      for (const result of rowResults) {
        if (result.column === undefined) continue;
        const col = findColumn(match, result.column);
        if (col === undefined) {
          this.logger.debug(`Row ${rowNumber}: column "${result.column}" not found in the header`);
          continue;
        }
        markCell(row.getCell(col), result);
      }
      const text = rowResults.map((r) => r.message ?? defaultMessage(r.status, opts)).join('; ');
      writeMarker(row.getCell(markerColumn), text, worstStatus(rowResults));
      summary.annotatedRows++;
    }

    for (const [row, list] of byRow) {
      if (row <= opts.headerRow || row >= rowNumber) summary.unmatchedResults += list.length;
    }

    const column = worksheet.getColumn(markerColumn);
    const longest = Math.max(opts.markerTitle.length, opts.okMarker.length);
    column.width = Math.min(COLUMN_WIDTHS.MAX, Math.max(column.width ?? 0, longest + COLUMN_WIDTHS.PADDING));
    return summary;
  }
}

/** A result names its column by configured field or by title */
function findColumn(match: ColumnMatch, name: string): number | undefined {
  const wanted = normalizeText(name).toLowerCase();
  for (const [col, config] of match.byColumn) {
    if (config.field?.toLowerCase() === wanted || normalizeText(config.title).toLowerCase() === wanted) {
      return col;
    }
  }
  return undefined;
}

function isBlankRow(row: ExcelJS.Row, firstColumn: number, lastColumn: number): boolean {
  for (let col = firstColumn; col <= lastColumn; col++) {
    if (readCellValue(row.getCell(col)) !== null) return false;
  }
  return true;
}

/**
 * Drop notes and fills left by an earlier pass. Notes can only be removed by
 * recreating the row's cells, so values and styles are captured and restored.
 */
function clearMarkup(row: ExcelJS.Row): void {
  const cells: { cell: ExcelJS.Cell; col: number }[] = [];
  row.eachCell((cell, col) => cells.push({ cell, col }));

  if (cells.some(({ cell }) => cell.note !== undefined)) {
    const values: ExcelJS.CellValue[] = [];
    const styles = new Map<number, Partial<ExcelJS.Style>>();
    for (const { cell, col } of cells) {
      values[col] = cell.value;
      styles.set(col, cell.style);
    }
    row.values = values;
    row.eachCell((cell, col) => {
      const style = styles.get(col);
      if (style) cell.style = style;
    });
  }

  row.eachCell((cell) => {
    if (cell.style.fill && !isNoFill(cell.style.fill)) {
      cell.style = { ...cell.style, fill: NO_FILL };
    }
  });
}

function isNoFill(fill: ExcelJS.Fill): boolean {
  return fill.type === 'pattern' && fill.pattern === 'none';
}

/** Warning fill plus the message as a note; the style object is replaced, never mutated */
function markCell(cell: ExcelJS.Cell, result: ValidationResult): void {
  cell.style = { ...cell.style, fill: solidFill(FEEDBACK_COLORS.WARNING) };
  if (result.message) cell.note = result.message;
}

function writeMarker(cell: ExcelJS.Cell, text: string, status: ValidationStatus): void {
  cell.value = text;
  cell.style = {
    font: { bold: status !== 'ok' },
    fill: solidFill(STATUS_COLORS[status]),
    alignment: { vertical: 'middle', wrapText: true },
  };
}

function worstStatus(results: readonly ValidationResult[]): ValidationStatus {
  return results.reduce<ValidationStatus>(
    (worst, r) => (SEVERITY[r.status] > SEVERITY[worst] ? r.status : worst),
    'ok',
  );
}

function defaultMessage(status: ValidationStatus, opts: FeedbackOptions): string {
  return status === 'ok' ? opts.okMarker : status.toUpperCase();
}
