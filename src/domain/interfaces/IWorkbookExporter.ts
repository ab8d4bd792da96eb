/**
 * Workbook Exporter Interface
 * Layer: Domain
 * Pattern: Adapter Pattern
 *
 * Both phases hand over named row collections and get spreadsheet bytes back;
 * neither knows which library does the encoding. Columns are never declared
 * up front: each sheet's header is the union of keys across its rows, in the
 * order they are first seen.
 */

/** A value the exporter writes natively into a cell. */
export type CellValue = string | number | boolean | Date | null;

export type SheetRow = Readonly<Record<string, unknown>>;

export interface SheetData {
  name: string;
  rows: readonly SheetRow[];
}

export interface IWorkbookExporter {
  export(sheets: readonly SheetData[]): Promise<Buffer>;
}
