/** Company types the register's listing can be filtered by; "All" disables filtering. */
export const COMPANY_TYPES = [
  'All',
  'Financial - related',
  'Wealth & Asset Management',
  'Non - financial',
] as const;

export type CompanyType = (typeof COMPANY_TYPES)[number];

export const ALL_COMPANY_TYPES: CompanyType = 'All';

/** Upstream path the listing and detail requests are routed through. */
export const REGISTRY_SLUG = '/CRM/public-register';

/** Location written when a company publishes no building coordinates. */
export const DEFAULT_LOCATION = 'DIFC, Dubai';

export const SHEET_NAMES = {
  RAW: 'RawData',
  FILTERED: 'FilteredData',
} as const;

export const EXPORT_STEPS = ['step1', 'step2'] as const;

export type ExportStep = (typeof EXPORT_STEPS)[number];

/** Download names, one per phase. */
export const EXPORT_FILE_NAMES: Record<ExportStep, string> = {
  step1: 'Step1_DIFC_Companies.xlsx',
  step2: 'Step2_DIFC_Details.xlsx',
};

export const XLSX_MIME_TYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';
