import type ExcelJS from 'exceljs';
import type { ExportOptions } from '@sheetmap/shared';
import { COLUMN_WIDTHS, ConfigurationError, sanitizeSheetName } from '@sheetmap/shared';

/** Write position of one sheet. Row numbers are 1-based, columns 0-based. */
export interface LayoutCursor {
  /** Last row handed out; 0 on an empty sheet */
  rowPointer: number;
  /** First column of the table being written */
  columnOffset: number;
  /** First row of the table being written */
  tableStartRow: number;
  /** Horizontal: first row after the title of the band's first table */
  bandStartRow: number;
  /** Horizontal: title row shared by every table of the band, 0 until reserved */
  bandTitleRow: number;
  /** Horizontal: next row to reuse while writing a later table of the band */
  bandRowPointer: number;
  isFirstTableOnSheet: boolean;
  /** Widest column written so far */
  maxColumn: number;
}

function emptyCursor(): LayoutCursor {
  return {
    rowPointer: 0,
    columnOffset: 0,
    tableStartRow: 1,
    bandStartRow: 0,
    bandTitleRow: 0,
    bandRowPointer: 0,
    isFirstTableOnSheet: true,
    maxColumn: 0,
  };
}

/**
 * Hands out rows to the writers according to the orientation.
 * Vertical tables stack with `distanceTable` blank rows between them; horizontal
 * tables share one row band, each starting `distanceTable` columns after the
 * previous one. Each sheet keeps its own cursor, saved and restored on switch.
 */
export class SheetLayout {
  private readonly cursors = new Map<string, LayoutCursor>();
  private current: ExcelJS.Worksheet | null = null;
  private cursor: LayoutCursor = emptyCursor();

  constructor(
    private readonly workbook: ExcelJS.Workbook,
    private readonly options: ExportOptions,
  ) {}

  get sheet(): ExcelJS.Worksheet {
    if (!this.current) {
      throw new ConfigurationError('No sheet selected');
    }
    return this.current;
  }

  get sheetName(): string {
    return this.sheet.name;
  }

  get columnOffset(): number {
    return this.cursor.columnOffset;
  }

  get rowPointer(): number {
    return this.cursor.rowPointer;
  }

  private get reusesBand(): boolean {
    return this.options.orientation === 'horizontal' && !this.cursor.isFirstTableOnSheet;
  }

  /** Select (creating if needed) a sheet, restoring its saved cursor */
  switchSheet(name: string): ExcelJS.Worksheet {
    const safeName = sanitizeSheetName(name);
    if (this.current?.name === safeName) return this.current;

    if (this.current) {
      this.cursors.set(this.current.name, { ...this.cursor });
    }
    this.current = this.workbook.getWorksheet(safeName) ?? this.workbook.addWorksheet(safeName);
    const saved = this.cursors.get(safeName);
    this.cursor = saved ? { ...saved } : emptyCursor();
    return this.current;
  }

  /** Prepare the cursor for a new table on the current sheet */
  beginTable(): void {
    if (this.reusesBand) {
      this.cursor.bandRowPointer = this.cursor.bandStartRow;
    }
  }

  /** Row for a table title; later horizontal tables share the band's title row */
  titleRow(): ExcelJS.Row {
    if (this.reusesBand && this.cursor.bandTitleRow > 0) {
      return this.sheet.getRow(this.cursor.bandTitleRow);
    }
    const row = this.nextRow(true);
    if (this.options.orientation === 'horizontal' && this.cursor.isFirstTableOnSheet) {
      this.cursor.bandTitleRow = row.number;
    }
    return row;
  }

  /**
   * Mark where the table body (labels, header, data) starts. The first table of
   * a horizontal band reserves the band's title row, titled or not.
   */
  beginBody(): void {
    if (this.reusesBand) {
      this.cursor.tableStartRow = this.cursor.bandRowPointer;
      return;
    }
    if (this.options.orientation === 'horizontal') {
      if (this.cursor.bandTitleRow === 0) {
        this.cursor.bandTitleRow = this.nextRow().number;
      }
      this.cursor.bandStartRow = this.cursor.rowPointer + 1;
    }
    this.cursor.tableStartRow = this.cursor.rowPointer + 1;
  }

  /**
   * Next row to write. With `reuseExistingRow`, a later table of a horizontal
   * band takes the band's rows in sequence instead of appending.
   */
  nextRow(reuseExistingRow = false): ExcelJS.Row {
    if (reuseExistingRow && this.reusesBand) {
      const number = this.cursor.bandRowPointer++;
      this.cursor.rowPointer = Math.max(this.cursor.rowPointer, number);
      return this.sheet.getRow(number);
    }
    this.cursor.rowPointer += 1;
    return this.sheet.getRow(this.cursor.rowPointer);
  }

  emptyRows(count: number): void {
    if (count <= 0) return;
    if (this.reusesBand) {
      this.cursor.bandRowPointer += count;
      this.cursor.rowPointer = Math.max(this.cursor.rowPointer, this.cursor.bandRowPointer - 1);
      return;
    }
    this.cursor.rowPointer += count;
  }

  /** Record the widest 0-based column touched */
  touchColumn(column: number): void {
    this.cursor.maxColumn = Math.max(this.cursor.maxColumn, column);
  }

  /** Close the current table and move past it */
  endTable(width: number): void {
    if (this.options.orientation === 'horizontal') {
      this.cursor.columnOffset += width + this.options.distanceTable;
    } else {
      this.emptyRows(this.options.distanceTable);
    }
    this.cursor.isFirstTableOnSheet = false;
  }

  freezePanes(column: number, row: number): void {
    if (column > 0 || row > 0) {
      this.sheet.views = [{ state: 'frozen', xSplit: column, ySplit: row }];
    }
  }

  /** Size columns 0..upToColumn to their longest unmerged value */
  autosize(upToColumn = this.cursor.maxColumn): void {
    const ws = this.sheet;
    for (let c = 1; c <= upToColumn + 1; c++) {
      let longest = 0;
      ws.getColumn(c).eachCell({ includeEmpty: false }, (cell) => {
        if (cell.isMerged) return;
        longest = Math.max(longest, displayLength(cell.value));
      });
      ws.getColumn(c).width = Math.min(
        COLUMN_WIDTHS.MAX,
        Math.max(COLUMN_WIDTHS.MIN, longest + COLUMN_WIDTHS.PADDING),
      );
    }
  }

  /** Apply freeze panes and widths to every sheet touched */
  finalize(): void {
    if (this.current) {
      this.cursors.set(this.current.name, { ...this.cursor });
    }
    for (const [name, cursor] of this.cursors) {
      this.switchSheet(name);
      this.freezePanes(this.options.freezeColumn, this.options.freezeRow);
      this.autosize(cursor.maxColumn);
    }
  }
}

function displayLength(value: ExcelJS.CellValue): number {
  if (value === null || value === undefined) return 0;
  if (value instanceof Date) return COLUMN_WIDTHS.DATE;
  if (typeof value === 'object') {
    if ('formula' in value || 'sharedFormula' in value) return COLUMN_WIDTHS.FORMULA;
    if ('richText' in value) return value.richText.reduce((n, part) => n + part.text.length, 0);
    if ('text' in value) return String(value.text).length;
    return 0;
  }
  return String(value).length;
}
