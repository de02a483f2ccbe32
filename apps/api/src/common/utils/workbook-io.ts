import ExcelJS from 'exceljs';
import { ConfigurationError } from '@sheetmap/shared';

/** Load an XLSX buffer and pick a sheet by name, or the first one */
export async function openWorksheet(
  buffer: Buffer,
  sheetName?: string,
): Promise<{ workbook: ExcelJS.Workbook; worksheet: ExcelJS.Worksheet }> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.load(buffer as unknown as ExcelJS.Buffer);

  const worksheet = sheetName ? workbook.getWorksheet(sheetName) : workbook.worksheets[0];
  if (!worksheet) {
    throw new ConfigurationError(
      sheetName ? `Sheet "${sheetName}" not found` : 'Workbook has no sheets',
      { sheets: workbook.worksheets.map((ws) => ws.name) },
    );
  }
  return { workbook, worksheet };
}
