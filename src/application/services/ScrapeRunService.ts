/**
 * Scrape Run Service — Background Runs for the HTTP Surface
 * Layer: Application
 * Pattern: Facade Pattern
 *
 * A full scrape takes minutes (one request per 800 ms), far longer than an
 * HTTP request should stay open. `start()` registers a run, queues both
 * phases in the background and returns straight away; the client then polls
 * `get()` and downloads each workbook once its phase has produced it.
 *
 * Runs execute one at a time, in the order they were started: each run's
 * work is chained onto the previous run's completion, so the register only
 * ever sees one request in flight and the fixed delay holds across runs.
 *
 * Lifecycle of a run:
 *   queued → listing → details → completed
 *                    ↘ completed (no company matched; Step 2 skipped)
 *   any phase → failed (only on an unexpected error; upstream failures are
 *                       handled inside the phases and never fail a run)
 *
 * Each run gets its own progress sink that writes onto the run's snapshot.
 * Runs and their workbooks live in this process's memory only. Finished runs
 * are dropped once they are older than the retention period, and the oldest
 * finished runs go first whenever the store holds `maxRetained` runs; queued
 * and active runs are never dropped.
 */
import { randomUUID } from 'node:crypto';

import { DetailFetcherService } from '@application/services/DetailFetcherService';
import { RegistryListerService } from '@application/services/RegistryListerService';
import { TOKENS } from '@core/types';
import type { Logger } from '@core/logger';
import type { IProgressSink } from '@domain/interfaces/IProgressSink';
import { EXPORT_FILE_NAMES, type ExportStep } from '@shared/constants';
import { NotFoundError } from '@shared/errors/AppError';
import type { ScrapeRequest } from '@shared/schemas';
import type { RunRetentionOptions, RunSnapshot } from '@shared/types';
import { inject, injectable } from 'tsyringe';

interface RunRecord {
  snapshot: RunSnapshot;
  files: Partial<Record<ExportStep, Buffer>>;
  done: Promise<void>;
  finishedAtMs?: number;
}

export interface RunFile {
  fileName: string;
  content: Buffer;
}

@injectable()
export class ScrapeRunService {
  private runs = new Map<string, RunRecord>();
  /** Settles when the most recently started run has finished. */
  private tail: Promise<void> = Promise.resolve();

  constructor(
    @inject(TOKENS.RegistryListerService) private lister: RegistryListerService,
    @inject(TOKENS.DetailFetcherService) private fetcher: DetailFetcherService,
    @inject(TOKENS.RunRetention) private retention: RunRetentionOptions,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  /** Number of runs currently held, finished or not. */
  get size(): number {
    return this.runs.size;
  }

  start(request: ScrapeRequest): RunSnapshot {
    this.prune();

    const snapshot: RunSnapshot = {
      id: randomUUID(),
      request,
      phase: 'queued',
      progress: 0,
      status: 'Queued',
      warnings: [],
      counts: { fetched: 0, filtered: 0, detailed: 0, skipped: 0 },
      files: [],
      startedAt: new Date().toISOString(),
    };
    const run: RunRecord = { snapshot, files: {}, done: Promise.resolve() };
    this.runs.set(snapshot.id, run);

    this.log.info({ runId: snapshot.id, ...request }, 'Scrape run started');

    run.done = this.tail
      .then(() => this.execute(run))
      .catch((error: unknown) => {
        snapshot.phase = 'failed';
        snapshot.error = error instanceof Error ? error.message : String(error);
        snapshot.status = 'Run failed';
        this.markFinished(run);
        this.log.error({ err: error, runId: snapshot.id }, 'Scrape run failed');
      });
    this.tail = run.done;

    return copySnapshot(snapshot);
  }

  get(id: string): RunSnapshot {
    return copySnapshot(this.find(id).snapshot);
  }

  getFile(id: string, step: ExportStep): RunFile {
    const content = this.find(id).files[step];
    if (!content) throw new NotFoundError(`Export ${step} for run`, id);
    return { fileName: EXPORT_FILE_NAMES[step], content };
  }

  /** Resolves once the run has completed or failed. */
  async waitForCompletion(id: string): Promise<RunSnapshot> {
    const run = this.find(id);
    await run.done;
    return copySnapshot(run.snapshot);
  }

  private markFinished(run: RunRecord): void {
    run.finishedAtMs = Date.now();
    run.snapshot.finishedAt = new Date(run.finishedAtMs).toISOString();
  }

  /** Drops expired finished runs, then the oldest finished ones while the store is full. */
  private prune(): void {
    const now = Date.now();

    for (const run of [...this.runs.values()]) {
      if (run.finishedAtMs === undefined) continue;

      const expired = now - run.finishedAtMs >= this.retention.retentionMs;
      const crowded = this.runs.size >= this.retention.maxRetained;
      if (!expired && !crowded) continue;

      this.runs.delete(run.snapshot.id);
      this.log.debug({ runId: run.snapshot.id, expired }, 'Dropped finished run');
    }
  }

  private find(id: string): RunRecord {
    const run = this.runs.get(id);
    if (!run) throw new NotFoundError('Run', id);
    return run;
  }

  private async execute(run: RunRecord): Promise<void> {
    const { snapshot } = run;
    const sink = sinkFor(snapshot);

    snapshot.phase = 'listing';
    const listing = await this.lister.list(
      snapshot.request.targetCount,
      snapshot.request.companyType,
      sink,
    );
    run.files.step1 = listing.workbook;
    snapshot.files.push('step1');
    snapshot.counts.fetched = listing.fetchedCount;
    snapshot.counts.filtered = listing.records.length;
    snapshot.status = `Step 1 done: ${listing.records.length} companies filtered by '${snapshot.request.companyType}'`;

    if (listing.records.length > 0) {
      snapshot.phase = 'details';
      snapshot.progress = 0;
      const details = await this.fetcher.fetchDetails(listing.records, sink);
      run.files.step2 = details.workbook;
      snapshot.files.push('step2');
      snapshot.counts.detailed = details.normalizedRows.length;
      snapshot.counts.skipped = details.skippedIds.length;
      snapshot.status = `Step 2 done: ${details.normalizedRows.length} company details saved`;
    }

    snapshot.phase = 'completed';
    this.markFinished(run);
    this.log.info({ runId: snapshot.id, counts: snapshot.counts }, 'Scrape run complete');
  }
}

function sinkFor(snapshot: RunSnapshot): IProgressSink {
  return {
    progress: (fraction) => {
      snapshot.progress = fraction;
    },
    status: (message) => {
      snapshot.status = message;
    },
    warning: (message) => {
      snapshot.warnings.push(message);
    },
  };
}

function copySnapshot(snapshot: RunSnapshot): RunSnapshot {
  return {
    ...snapshot,
    request: { ...snapshot.request },
    warnings: [...snapshot.warnings],
    counts: { ...snapshot.counts },
    files: [...snapshot.files],
  };
}
