/**
 * Company Detail — The Full Register Entry and Its Two Row Shapes
 * Layer: Domain
 *
 * A detail response carries one registry item at
 * `Data.DIFCData.PublicRegistry[0]`. That item is turned into two rows:
 *
 *   RawDetailRow        — ID plus every top-level field, nested values as JSON text.
 *   NormalizedDetailRow — the fixed, operator-facing column set.
 */
import type { CellValue } from '@domain/interfaces/IWorkbookExporter';

export type DetailRecord = Record<string, unknown>;

export type RawDetailRow = { ID: string } & Record<string, CellValue>;

export type NormalizedDetailRow = {
  ID: string;
  Name: string;
  RegisteredNumber: CellValue;
  Type: CellValue;
  Status: CellValue;
  Location: string;
  Website: CellValue;
  'Contact 1': string;
  'Contact 2': string;
  'Contact 3': string;
  'Contact 4': string;
  URL: string;
};

/** Number of director slots on a normalized row. */
export const CONTACT_SLOTS = 4;
