import type { Result } from 'neverthrow';

import type { SummaryRecord } from '@domain/entities/CompanySummary';

/**
 * Registry Client Interface
 * Layer: Domain
 *
 * The upstream register is a collaborator we do not own and it fails in
 * ordinary ways: connection errors, non-2xx answers, HTML error pages where
 * JSON was expected. None of these are exceptional for a best-effort
 * collector, so the client returns them as values and each phase decides
 * what a failure means (the lister stops, the detail fetcher skips).
 */
export type RegistryFailure =
  | { kind: 'transport'; message: string }
  | { kind: 'http'; status: number; message: string }
  | { kind: 'malformed'; message: string };

export interface IRegistryClient {
  /** One page of the listing, starting at `offset`. An empty array means the listing is exhausted. */
  listCompanies(offset: number): Promise<Result<SummaryRecord[], RegistryFailure>>;

  /** The parsed detail payload for one company; locating the registry item is left to the caller. */
  fetchCompanyDetail(recordId: string): Promise<Result<unknown, RegistryFailure>>;
}

export function describeFailure(failure: RegistryFailure): string {
  switch (failure.kind) {
    case 'transport':
      return `request failed: ${failure.message}`;
    case 'http':
      return `HTTP ${failure.status}: ${failure.message}`;
    case 'malformed':
      return `unexpected response: ${failure.message}`;
  }
}
