/**
 * Detail Fetcher — Step 2 of a Scrape
 * Layer: Application
 *
 * Walks the filtered listing in order and fetches each company's full
 * register entry:
 *
 *   - A record without an `Id` is skipped silently.
 *   - A failed request, or a payload without Data.DIFCData.PublicRegistry[0],
 *     skips the company in BOTH sheets and produces a warning naming it. No
 *     partial row is ever written.
 *   - Otherwise one raw row and one normalized row are appended.
 *
 * Progress is (index + 1) / total after every input record, skipped or not,
 * so the bar always reaches 1 for a non-empty input. Consecutive detail
 * requests are separated by the fixed request delay.
 */
import { TOKENS } from '@core/types';
import type { Logger } from '@core/logger';
import {
  extractNormalizedRow,
  extractRawRow,
  locateRegistryItem,
} from '@application/transformers/detailExtractor';
import { readRecordId } from '@application/transformers/summaryFlattener';
import type { NormalizedDetailRow, RawDetailRow } from '@domain/entities/CompanyDetail';
import type { SummaryRecord } from '@domain/entities/CompanySummary';
import type { IProgressSink } from '@domain/interfaces/IProgressSink';
import { describeFailure, type IRegistryClient } from '@domain/interfaces/IRegistryClient';
import type { IWorkbookExporter } from '@domain/interfaces/IWorkbookExporter';
import { SHEET_NAMES } from '@shared/constants';
import type { DetailResult, ScraperOptions } from '@shared/types';
import { delay } from '@shared/utils/delay';
import { inject, injectable } from 'tsyringe';

@injectable()
export class DetailFetcherService {
  constructor(
    @inject(TOKENS.RegistryClient) private client: IRegistryClient,
    @inject(TOKENS.WorkbookExporter) private exporter: IWorkbookExporter,
    @inject(TOKENS.ScraperOptions) private options: ScraperOptions,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  async fetchDetails(
    records: readonly SummaryRecord[],
    sink: IProgressSink,
  ): Promise<DetailResult> {
    const rawRows: RawDetailRow[] = [];
    const normalizedRows: NormalizedDetailRow[] = [];
    const skippedIds: string[] = [];
    const total = records.length;
    let requested = false;

    sink.status('Step 2 — fetching company details');

    for (const [index, record] of records.entries()) {
      const recordId = readRecordId(record);

      if (recordId) {
        if (requested) await delay(this.options.requestDelayMs);
        requested = true;

        sink.status(`Fetching details: ${recordId}`);
        const payload = await this.client.fetchCompanyDetail(recordId);
        const item = payload.isOk() ? locateRegistryItem(payload.value) : null;

        if (item) {
          rawRows.push(extractRawRow(item, recordId));
          normalizedRows.push(extractNormalizedRow(item, recordId, this.options.detailsPageUrl));
        } else {
          const reason = payload.isErr()
            ? describeFailure(payload.error)
            : 'no PublicRegistry entry in the response';
          this.log.warn({ recordId, reason }, 'Skipping company detail');
          sink.warning(`Skipped ${recordId}: ${reason}`);
          skippedIds.push(recordId);
        }
      }

      sink.progress((index + 1) / total);
    }

    this.log.info(
      { total, detailed: normalizedRows.length, skipped: skippedIds.length },
      'Detail fetch complete',
    );

    const workbook = await this.exporter.export([
      { name: SHEET_NAMES.RAW, rows: rawRows },
      { name: SHEET_NAMES.FILTERED, rows: normalizedRows },
    ]);

    return { rawRows, normalizedRows, skippedIds, workbook };
  }
}
