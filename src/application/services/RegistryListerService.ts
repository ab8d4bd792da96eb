/**
 * Registry Lister — Step 1 of a Scrape
 * Layer: Application
 *
 * Pages through the register's listing until it has `targetCount` records
 * or the register stops giving any, then flattens, filters and exports them.
 *
 * Paging loop:
 *   offset starts at 0 and grows by the page size after every page that
 *   returned records. The loop ends when
 *     (a) the accumulated count reaches the target,
 *     (b) a request fails in any way — the phase keeps what it has and
 *         reports a warning naming the offset, or
 *     (c) a page comes back empty.
 *   After each page that returned records the sink gets
 *   min(accumulated / target, 1). The fixed request delay separates pages.
 *
 * The accumulated list is cut to exactly `targetCount` before anything else
 * happens, so the RawData sheet never holds more than the operator asked for.
 * Filtering by a company type that matches nothing is a valid, empty result.
 */
import { TOKENS } from '@core/types';
import type { Logger } from '@core/logger';
import {
  filterByCompanyType,
  flattenCompany,
} from '@application/transformers/summaryFlattener';
import type { SummaryRecord } from '@domain/entities/CompanySummary';
import type { IProgressSink } from '@domain/interfaces/IProgressSink';
import { describeFailure, type IRegistryClient } from '@domain/interfaces/IRegistryClient';
import type { IWorkbookExporter } from '@domain/interfaces/IWorkbookExporter';
import { type CompanyType, SHEET_NAMES } from '@shared/constants';
import { ValidationError } from '@shared/errors/AppError';
import type { ListingResult, ScraperOptions } from '@shared/types';
import { delay } from '@shared/utils/delay';
import { inject, injectable } from 'tsyringe';

@injectable()
export class RegistryListerService {
  constructor(
    @inject(TOKENS.RegistryClient) private client: IRegistryClient,
    @inject(TOKENS.WorkbookExporter) private exporter: IWorkbookExporter,
    @inject(TOKENS.ScraperOptions) private options: ScraperOptions,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  async list(
    targetCount: number,
    companyType: CompanyType,
    sink: IProgressSink,
  ): Promise<ListingResult> {
    if (!Number.isInteger(targetCount) || targetCount < 1) {
      throw new ValidationError('targetCount must be a positive whole number');
    }

    const fetched = await this.fetchUntil(targetCount, sink);
    const records = fetched.slice(0, targetCount);

    const flattened = records.map((record) => flattenCompany(record, this.options.detailsPageUrl));
    const filtered = filterByCompanyType(flattened, companyType);

    this.log.info(
      { fetched: records.length, filtered: filtered.length, companyType },
      'Registry listing complete',
    );

    const workbook = await this.exporter.export([
      { name: SHEET_NAMES.RAW, rows: records },
      { name: SHEET_NAMES.FILTERED, rows: filtered },
    ]);

    return { records: filtered, fetchedCount: records.length, workbook };
  }

  private async fetchUntil(targetCount: number, sink: IProgressSink): Promise<SummaryRecord[]> {
    const accumulated: SummaryRecord[] = [];
    let offset = 0;

    sink.status('Step 1 — fetching the register listing');

    while (accumulated.length < targetCount) {
      sink.status(`Fetching records starting from offset ${offset}`);
      const page = await this.client.listCompanies(offset);

      if (page.isErr()) {
        this.log.warn({ offset, failure: page.error }, 'Listing page failed; stopping early');
        sink.warning(`No data returned for offset ${offset} (${describeFailure(page.error)})`);
        break;
      }

      if (page.value.length === 0) {
        this.log.info({ offset }, 'Listing exhausted');
        sink.warning(`No companies returned at offset ${offset}; stopping fetch`);
        break;
      }

      accumulated.push(...page.value);
      sink.progress(Math.min(accumulated.length / targetCount, 1));

      if (accumulated.length >= targetCount) break;

      offset += this.options.pageSize;
      await delay(this.options.requestDelayMs);
    }

    return accumulated;
  }
}
