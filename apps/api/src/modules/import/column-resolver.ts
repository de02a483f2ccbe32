import type ExcelJS from 'exceljs';
import type { ImportColumnConfig } from '@sheetmap/shared';
import { normalizeText } from '@sheetmap/shared';
import { readCellText } from './cell-reader';

export interface ColumnMatch {
  /** 1-based sheet column → matched configuration */
  byColumn: Map<number, ImportColumnConfig>;
  unmatched: ImportColumnConfig[];
}

/** True when the header text contains the configured title, ignoring case */
export function headerMatches(headerText: string, config: ImportColumnConfig): boolean {
  const title = normalizeText(config.title).toLowerCase();
  return title !== '' && normalizeText(headerText).toLowerCase().includes(title);
}

/**
 * Match header cells, left to right from `startColumn`, against the configured
 * columns. Each header takes the first remaining configuration it matches and
 * each configuration is used at most once.
 */
export function matchColumns(
  headerRow: ExcelJS.Row,
  configs: readonly ImportColumnConfig[],
  startColumn: number,
): ColumnMatch {
  const remaining = [...configs];
  const byColumn = new Map<number, ImportColumnConfig>();

  for (let col = startColumn; col <= headerRow.cellCount; col++) {
    const text = readCellText(headerRow.getCell(col));
    if (!text) continue;
    const index = remaining.findIndex((config) => headerMatches(text, config));
    if (index === -1) continue;
    const [config] = remaining.splice(index, 1);
    if (config) byColumn.set(col, config);
  }

  return { byColumn, unmatched: remaining };
}
