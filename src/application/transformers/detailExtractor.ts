/**
 * Detail Extractor — Register Entry → Raw and Normalized Rows
 * Layer: Application (Transformers)
 *
 * A detail payload is only usable when it carries a registry item at
 * `Data.DIFCData.PublicRegistry[0]`; `locateRegistryItem()` checks that path
 * with Zod and ignores everything else in the envelope.
 *
 * From the item two rows are derived:
 *
 *   Raw row        — ID followed by every top-level field; nested objects and
 *                    arrays become JSON text, scalars are kept as they are.
 *                    An upstream field named ID is kept as "Upstream ID".
 *   Normalized row — the operator's column set:
 *       Name      EntityName[0].Name, else TradingName[0].TradeName, else "".
 *                 A non-empty EntityName wins even when its first entry has
 *                 no Name.
 *       Location  JSON text of MarketingFields.BuildingCoordinates, or
 *                 "DIFC, Dubai" when there are none.
 *       Contact n The first four DirectorName values, blank-padded.
 */
import { companyPageUrl } from '@application/transformers/summaryFlattener';
import {
  CONTACT_SLOTS,
  type DetailRecord,
  type NormalizedDetailRow,
  type RawDetailRow,
} from '@domain/entities/CompanyDetail';
import type { CellValue } from '@domain/interfaces/IWorkbookExporter';
import { DEFAULT_LOCATION } from '@shared/constants';
import { asArray, asRecord, isEmptyValue, toCell, toText } from '@shared/utils/json';
import { z } from 'zod';

const detailEnvelopeSchema = z.object({
  Data: z.object({
    DIFCData: z.object({
      PublicRegistry: z.array(z.unknown()).min(1),
    }),
  }),
});

export function locateRegistryItem(payload: unknown): DetailRecord | null {
  const parsed = detailEnvelopeSchema.safeParse(payload);
  if (!parsed.success) return null;
  // Only the first entry is read; later entries may be any shape.
  return asRecord(parsed.data.Data.DIFCData.PublicRegistry[0]) ?? null;
}

/** Column an upstream `ID` field is moved to, so the record id keeps the `ID` column. */
export const UPSTREAM_ID_COLUMN = 'Upstream ID';

export function extractRawRow(item: DetailRecord, recordId: string): RawDetailRow {
  const cells: Record<string, CellValue> = {};
  for (const [key, value] of Object.entries(item)) {
    cells[key === 'ID' ? UPSTREAM_ID_COLUMN : key] = toCell(value);
  }
  return { ID: recordId, ...cells };
}

export function extractName(item: DetailRecord): string {
  const entityNames = asArray(item.EntityName);
  if (entityNames.length > 0) return toText(asRecord(entityNames[0])?.Name);

  const tradingNames = asArray(item.TradingName);
  if (tradingNames.length > 0) return toText(asRecord(tradingNames[0])?.TradeName);

  return '';
}

export function extractLocation(item: DetailRecord): string {
  const coordinates = asRecord(item.MarketingFields)?.BuildingCoordinates;
  return isEmptyValue(coordinates) ? DEFAULT_LOCATION : JSON.stringify(coordinates);
}

export function extractContacts(item: DetailRecord): string[] {
  const contacts = asArray(item.Director)
    .slice(0, CONTACT_SLOTS)
    .map((director) => toText(asRecord(director)?.DirectorName));

  while (contacts.length < CONTACT_SLOTS) contacts.push('');
  return contacts;
}

/** Absent fields read as ""; present ones keep their value. */
function passThrough(value: unknown): CellValue {
  return value === undefined ? '' : toCell(value);
}

export function extractNormalizedRow(
  item: DetailRecord,
  recordId: string,
  detailsPageUrl: string,
): NormalizedDetailRow {
  const [contact1 = '', contact2 = '', contact3 = '', contact4 = ''] = extractContacts(item);

  return {
    ID: recordId,
    Name: extractName(item),
    RegisteredNumber: passThrough(item.RegisteredNumber),
    Type: passThrough(item.TypeOfEntity),
    Status: passThrough(item.EntityStatus),
    Location: extractLocation(item),
    Website: passThrough(asRecord(item.MarketingFields)?.Website),
    'Contact 1': contact1,
    'Contact 2': contact2,
    'Contact 3': contact3,
    'Contact 4': contact4,
    URL: companyPageUrl(detailsPageUrl, recordId),
  };
}
