import type ExcelJS from 'exceljs';
import type { DataCategory, ExportOptions } from '@sheetmap/shared';
import { STYLE_DEFAULTS, toArgb } from '@sheetmap/shared';

export type CellStyle = Partial<ExcelJS.Style>;

const ALIGNMENT: Record<DataCategory, 'left' | 'center' | 'right'> = {
  text: 'left',
  number: 'right',
  currency: 'right',
  date: 'center',
  percentage: 'right',
  formula: 'right',
};

const THIN_EDGE: Partial<ExcelJS.Border> = {
  style: 'thin',
  color: { argb: toArgb(STYLE_DEFAULTS.BORDER_COLOR) },
};

const THIN_BORDER: Partial<ExcelJS.Borders> = {
  top: THIN_EDGE,
  left: THIN_EDGE,
  bottom: THIN_EDGE,
  right: THIN_EDGE,
};

export function solidFill(color: string): ExcelJS.Fill {
  return { type: 'pattern', pattern: 'solid', fgColor: { argb: toArgb(color) } };
}

/**
 * Document-scoped style registry. Cells receive shared style objects, so the
 * number of styles grows with the distinct (kind, category, color) keys used,
 * never with the number of cells.
 */
export class StyleCache {
  private readonly styles = new Map<string, CellStyle>();

  constructor(private readonly options: ExportOptions) {}

  get size(): number {
    return this.styles.size;
  }

  styleFor(category: DataCategory, color?: string): CellStyle {
    return this.getOrCreate(`cell:${category}:${color ?? ''}`, () => this.categoryStyle(category, color, category === 'formula'));
  }

  /** Bold variant for computed cells */
  formulaStyleFor(category: DataCategory, color?: string): CellStyle {
    return this.getOrCreate(`formula:${category}:${color ?? ''}`, () => this.categoryStyle(category, color, true));
  }

  headerStyle(): CellStyle {
    return this.getOrCreate('header', () => ({
      font: this.font(STYLE_DEFAULTS.HEADER_FONT_SIZE, true),
      fill: solidFill(this.options.headerColor),
      alignment: { horizontal: 'center', vertical: 'middle', wrapText: true },
      border: THIN_BORDER,
    }));
  }

  titleStyle(): CellStyle {
    return this.getOrCreate('title', () => ({
      font: this.font(STYLE_DEFAULTS.TITLE_FONT_SIZE, true),
      alignment: { horizontal: 'center', vertical: 'middle' },
    }));
  }

  referenceLabelStyle(bold: boolean): CellStyle {
    return this.getOrCreate(`label:${bold ? 'bold' : 'plain'}`, () => ({
      font: this.font(STYLE_DEFAULTS.BODY_FONT_SIZE, bold),
      alignment: { horizontal: 'left', vertical: 'middle', wrapText: true },
    }));
  }

  private getOrCreate(key: string, create: () => CellStyle): CellStyle {
    let style = this.styles.get(key);
    if (!style) {
      style = create();
      this.styles.set(key, style);
    }
    return style;
  }

  private categoryStyle(category: DataCategory, color: string | undefined, bold: boolean): CellStyle {
    const style: CellStyle = {
      font: this.font(STYLE_DEFAULTS.BODY_FONT_SIZE, bold),
      alignment: { horizontal: ALIGNMENT[category], vertical: 'middle' },
      border: THIN_BORDER,
    };
    const numFmt = this.numberFormat(category);
    if (numFmt) style.numFmt = numFmt;
    if (color) style.fill = solidFill(color);
    return style;
  }

  private numberFormat(category: DataCategory): string | undefined {
    switch (category) {
      case 'date':
        return this.options.dateFormat;
      case 'currency':
        return this.options.currencyFormat;
      case 'percentage':
        return this.options.percentageFormat;
      default:
        return undefined;
    }
  }

  private font(size: number, bold: boolean): Partial<ExcelJS.Font> {
    return { name: this.options.fontName, size, bold };
  }
}
