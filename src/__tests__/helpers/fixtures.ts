/**
 * Test Fixtures — Reusable Sample Data
 * Layer: Test Helpers
 *
 * Register records are built by small factories so each test states only
 * the fields it cares about. Identifiers, names and URLs are made up.
 */
import type { DetailRecord } from '@domain/entities/CompanyDetail';
import type { SummaryRecord } from '@domain/entities/CompanySummary';
import type { ScraperOptions } from '@shared/types';

/** Options with no delay between requests, so service tests run instantly. */
export const testOptions: ScraperOptions = {
  apiUrl: 'https://registry.test/api/handleRequest',
  detailsPageUrl: 'https://registry.test/company',
  pageSize: 200,
  requestDelayMs: 0,
};

/** A listing record shaped like the register's companyList entries. */
export function makeCompany(
  id: string,
  companyType = 'Non - financial',
  activities: string[] = [],
): SummaryRecord {
  return {
    Id: id,
    Name: `Company ${id}`,
    Company_Type__c: companyType,
    License_Activities__r: {
      totalSize: activities.length,
      records: activities.map((name) => ({ Activity__r: { Name: name } })),
    },
  };
}

/** `count` listing records with ids `<prefix>0`, `<prefix>1`, ... */
export function makePage(count: number, prefix = 'C'): SummaryRecord[] {
  return Array.from({ length: count }, (_, i) => makeCompany(`${prefix}${i}`));
}

/** Wraps a registry item the way the detail endpoint does. */
export function detailPayload(item: DetailRecord): unknown {
  return { Data: { DIFCData: { PublicRegistry: [item] } } };
}

/** A complete registry item with one director and no building coordinates. */
export const acmeDetailItem: DetailRecord = {
  EntityName: [{ Name: 'Acme' }],
  TradingName: [{ TradeName: 'Acme Trading' }],
  RegisteredNumber: '0001',
  TypeOfEntity: 'Private Company',
  EntityStatus: 'Active',
  MarketingFields: { Website: 'https://acme.test', BuildingCoordinates: [] },
  Director: [{ DirectorName: 'X' }],
};
