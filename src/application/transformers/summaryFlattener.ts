/**
 * Summary Flattener — Listing Record → Spreadsheet Row
 * Layer: Application (Transformers)
 *
 * A listing record nests its licence activities two levels deep
 * (License_Activities__r.records[].Activity__r.Name), which does not fit in
 * a cell. Flattening copies the record and appends two derived columns:
 *
 *   License_Activities — the activity names joined with "; ", in record order;
 *                        blank names are dropped.
 *   DIFC_URL           — the company's public register page.
 *
 * The source record is never mutated: the RawData sheet shows it exactly as
 * the register returned it.
 */
import {
  type FlattenedSummaryRecord,
  SUMMARY_FIELDS,
  type SummaryRecord,
} from '@domain/entities/CompanySummary';
import { ALL_COMPANY_TYPES, type CompanyType } from '@shared/constants';
import { asArray, asRecord } from '@shared/utils/json';

export function getLicenseActivities(company: SummaryRecord): string {
  const licences = asRecord(company[SUMMARY_FIELDS.LICENSE_ACTIVITIES]);
  const names: string[] = [];

  for (const entry of asArray(licences?.records)) {
    const name = asRecord(asRecord(entry)?.Activity__r)?.Name;
    if (typeof name === 'string' && name) names.push(name);
  }

  return names.join('; ');
}

/** The record's identifier, or null when it has none usable. */
export function readRecordId(record: SummaryRecord): string | null {
  const id = record[SUMMARY_FIELDS.ID];
  if (typeof id === 'string') return id || null;
  if (typeof id === 'number') return String(id);
  return null;
}

export function companyPageUrl(detailsPageUrl: string, recordId: string): string {
  return `${detailsPageUrl}?companyId=${encodeURIComponent(recordId)}`;
}

export function flattenCompany(
  company: SummaryRecord,
  detailsPageUrl: string,
): FlattenedSummaryRecord {
  return {
    ...company,
    License_Activities: getLicenseActivities(company),
    DIFC_URL: companyPageUrl(detailsPageUrl, readRecordId(company) ?? ''),
  };
}

/** "All" keeps every record; any other type keeps exact Company_Type__c matches. */
export function filterByCompanyType<T extends SummaryRecord>(
  records: readonly T[],
  companyType: CompanyType,
): T[] {
  if (companyType === ALL_COMPANY_TYPES) return [...records];
  return records.filter((record) => record[SUMMARY_FIELDS.COMPANY_TYPE] === companyType);
}
