/**
 * Excel Workbook Exporter
 * Layer: Infrastructure
 * Pattern: Adapter Pattern (implements IWorkbookExporter)
 *
 * Encodes named row collections as an .xlsx workbook with ExcelJS, one
 * worksheet per collection, in the order given.
 *
 * Column rules:
 *   - The header is the union of keys across the sheet's rows, in the order
 *     the keys are first seen (row 1's keys, then any new keys from row 2, ...).
 *   - A row without a given key leaves that cell blank; so do null values.
 *   - Nested objects and arrays are written as JSON text.
 *   - A collection with no rows yields a worksheet with no rows at all, not
 *     even a header, since there are no keys to derive one from.
 */
import type { IWorkbookExporter, SheetData, SheetRow } from '@domain/interfaces/IWorkbookExporter';
import { toCell } from '@shared/utils/json';
import { Workbook } from 'exceljs';
import { injectable } from 'tsyringe';

export function collectColumns(rows: readonly SheetRow[]): string[] {
  const columns = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) columns.add(key);
  }
  return [...columns];
}

@injectable()
export class ExcelWorkbookExporter implements IWorkbookExporter {
  async export(sheets: readonly SheetData[]): Promise<Buffer> {
    const workbook = new Workbook();

    for (const sheet of sheets) {
      const worksheet = workbook.addWorksheet(sheet.name);
      if (sheet.rows.length === 0) continue;

      const columns = collectColumns(sheet.rows);
      worksheet.addRow(columns).font = { bold: true };

      for (const row of sheet.rows) {
        worksheet.addRow(columns.map((column) => toCell(row[column])));
      }
    }

    const data = await workbook.xlsx.writeBuffer();
    return Buffer.from(data);
  }
}
