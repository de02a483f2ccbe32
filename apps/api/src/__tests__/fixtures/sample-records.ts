import ExcelJS from 'exceljs';
import {
  ImportColumn,
  SheetColumn,
  SheetFormula,
  SheetTable,
} from '../../modules/metadata/sheet-metadata.decorators';

export class LineItem {
  @SheetColumn({ order: 0, label: 'Name' })
  name = '';

  @SheetColumn({ order: 1, label: 'Amount', category: 'number' })
  amount = 0;
}

export function lineItem(name: string, amount: number): LineItem {
  return Object.assign(new LineItem(), { name, amount });
}

@SheetTable({ name: 'Sales' })
export class Sale {
  @SheetColumn({ order: 0, label: 'Region' })
  region = '';

  @SheetColumn({ order: 1, label: 'Product' })
  product = '';

  @SheetColumn({ order: 2, label: 'Amount', category: 'currency' })
  amount = 0;
}

export function sale(region: string, product: string, amount: number): Sale {
  return Object.assign(new Sale(), { region, product, amount });
}

export class Invoice {
  @SheetColumn({ order: 0, label: 'Net', category: 'currency' })
  net = 0;

  @SheetColumn({ order: 1, label: 'Tax', category: 'currency' })
  tax = 0;

  @SheetColumn({ order: 2, label: 'Gross' })
  @SheetFormula({ operation: 'sum', fields: ['net', 'tax'] })
  gross = 0;
}

export function invoice(net: number, tax: number): Invoice {
  return Object.assign(new Invoice(), { net, tax });
}

export class Person {
  @SheetColumn({ order: 0, label: 'Name' })
  @ImportColumn({ aliases: ['fullName'], required: true })
  name = '';

  @SheetColumn({ order: 1, label: 'Age', category: 'number' })
  @ImportColumn({ valueType: 'integer' })
  age: number | null = null;

  @SheetColumn({ order: 2, label: 'Born', category: 'date' })
  @ImportColumn()
  born: Date | null = null;

  @SheetColumn({ order: 3, label: 'Active' })
  @ImportColumn({ valueType: 'boolean' })
  active: boolean | null = null;

  /** Rows starting with TOTAL close the data block */
  @ImportColumn({ aliases: ['TOTAL'], special: true })
  total: number | null = null;
}

export function person(name: string, age: number, born: Date, active: boolean): Person {
  return Object.assign(new Person(), { name, age, born, active });
}

@SheetTable({ name: 'Search' })
export class SearchParams {
  @SheetColumn({ order: 0, label: 'Region' })
  @ImportColumn({ required: true })
  region = '';

  @SheetColumn({ order: 1, label: 'Year', category: 'number' })
  @ImportColumn({ valueType: 'integer' })
  year: number | null = null;
}

/** XLSX with the given rows from A1; an empty array leaves a blank row */
export async function workbookBuffer(rows: ExcelJS.CellValue[][], sheetName = 'Data'): Promise<Buffer> {
  const workbook = new ExcelJS.Workbook();
  const worksheet = workbook.addWorksheet(sheetName);
  rows.forEach((values, i) => {
    if (values.length > 0) worksheet.getRow(i + 1).values = values;
  });
  return Buffer.from(await workbook.xlsx.writeBuffer());
}

export async function loadWorkbook(buffer: Buffer): Promise<ExcelJS.Workbook> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.load(buffer as unknown as ExcelJS.Buffer);
  return workbook;
}
