/**
 * Company Summary — One Entry From the Register's Listing
 * Layer: Domain
 *
 * The listing endpoint returns loosely structured records whose schema the
 * register never publishes, so a summary stays an open map: every field is
 * carried through to the RawData sheet untouched. Only the few fields the
 * flattening rules read are named here.
 *
 *   SummaryRecord           — as returned by the listing endpoint.
 *   FlattenedSummaryRecord  — a copy with the two derived columns appended.
 */
export type SummaryRecord = Record<string, unknown>;

export type DerivedSummaryFields = {
  /** Activity names from License_Activities__r.records, joined with "; ". */
  License_Activities: string;
  /** Public register page for the company. */
  DIFC_URL: string;
};

export type FlattenedSummaryRecord = SummaryRecord & DerivedSummaryFields;

/** Field names the listing and filtering rules depend on. */
export const SUMMARY_FIELDS = {
  ID: 'Id',
  COMPANY_TYPE: 'Company_Type__c',
  LICENSE_ACTIVITIES: 'License_Activities__r',
} as const;
