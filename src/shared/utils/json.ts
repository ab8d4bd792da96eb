/**
 * Narrowing helpers for the register's untyped JSON.
 *
 * Payload fields are read as `unknown` and narrowed at the point of use; a
 * field of the wrong shape reads as absent rather than throwing.
 */
import type { CellValue } from '@domain/interfaces/IWorkbookExporter';

export function asRecord(value: unknown): Record<string, unknown> | undefined {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return undefined;
  return Object.fromEntries(Object.entries(value));
}

export function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

/** Empty in the truthiness sense the register's own page uses: no value, "", 0, false, [] or {}. */
export function isEmptyValue(value: unknown): boolean {
  if (value === undefined || value === null) return true;
  if (Array.isArray(value)) return value.length === 0;
  if (typeof value === 'object') return Object.keys(value).length === 0;
  return !value;
}

/** Scalars pass through; objects and arrays become their JSON text. */
export function toCell(value: unknown): CellValue {
  if (value === undefined || value === null) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (value instanceof Date) return value;
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

/** Text for a field that must be a string cell; absent reads as "". */
export function toText(value: unknown): string {
  const cell = toCell(value);
  if (cell === null) return '';
  return cell instanceof Date ? cell.toISOString() : String(cell);
}
