/**
 * Shared Type Definitions
 * Layer: Shared (cross-cutting, used by every layer)
 *
 * ScraperOptions is what the services and the registry client are built with
 * (derived from config in the container, overridden in tests). ListingResult
 * and DetailResult are what the two phases hand back. RunSnapshot is the
 * public view of a background run started over HTTP.
 */
import type { FlattenedSummaryRecord } from '@domain/entities/CompanySummary';
import type { NormalizedDetailRow, RawDetailRow } from '@domain/entities/CompanyDetail';

import type { ExportStep } from './constants';
import type { ScrapeRequest } from './schemas';

export interface ScraperOptions {
  /** Upstream POST endpoint. */
  apiUrl: string;
  /** Public company page; `?companyId=<Id>` is appended for the URL columns. */
  detailsPageUrl: string;
  /** Offset increment between listing pages. */
  pageSize: number;
  /** Fixed pause between consecutive upstream requests. */
  requestDelayMs: number;
}

export interface RunRetentionOptions {
  /** A finished run is dropped this long after it finished. */
  retentionMs: number;
  /** Above this many runs, the oldest finished ones are dropped first. */
  maxRetained: number;
}

export interface ListingResult {
  /** Flattened records that passed the company-type filter, in fetch order. */
  records: FlattenedSummaryRecord[];
  /** Records kept after truncating to the target count, before filtering. */
  fetchedCount: number;
  workbook: Buffer;
}

export interface DetailResult {
  rawRows: RawDetailRow[];
  normalizedRows: NormalizedDetailRow[];
  /** Identifiers whose detail request failed or carried no registry item. */
  skippedIds: string[];
  workbook: Buffer;
}

export type RunPhase = 'queued' | 'listing' | 'details' | 'completed' | 'failed';

export interface RunSnapshot {
  id: string;
  request: ScrapeRequest;
  phase: RunPhase;
  /** Fraction complete for the current phase. */
  progress: number;
  status: string;
  warnings: string[];
  counts: {
    fetched: number;
    filtered: number;
    detailed: number;
    skipped: number;
  };
  /** Steps whose workbook can be downloaded. */
  files: ExportStep[];
  error?: string;
  startedAt: string;
  finishedAt?: string;
}
