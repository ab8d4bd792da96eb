/**
 * Scrape CLI — Both Phases From the Terminal
 * Layer: Entry Point (CLI, not HTTP)
 *
 *   npm run scrape -- [--count 200] [--type "Non - financial"] [--out ./output]
 *
 * Runs Step 1 (listing → Step1_DIFC_Companies.xlsx) and, when any company
 * matched the type filter, Step 2 (details → Step2_DIFC_Details.xlsx), printing
 * progress and status lines as it goes. Upstream failures only shorten the
 * run; the process exits non-zero for invalid arguments or a crash.
 */
import { container } from '@core/container';
import { config } from '@core/config';
import { TOKENS } from '@core/types';
import type { DetailFetcherService } from '@application/services/DetailFetcherService';
import type { RegistryListerService } from '@application/services/RegistryListerService';
import type { IProgressSink } from '@domain/interfaces/IProgressSink';
import { EXPORT_FILE_NAMES, type ExportStep } from '@shared/constants';
import { scrapeRequestSchema } from '@shared/schemas';
import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

// CLI argument parsing

const args = process.argv.slice(2);

function getArg(flag: string): string | undefined {
  const idx = args.indexOf(flag);
  return idx !== -1 ? args[idx + 1] : undefined;
}

// eslint-disable-next-line no-console
const log = console.log;

function progressBar(fraction: number): string {
  const width = 30;
  const filled = Math.round(fraction * width);
  return `[${'#'.repeat(filled)}${'.'.repeat(width - filled)}] ${(fraction * 100).toFixed(0).padStart(3)}%`;
}

const consoleSink: IProgressSink = {
  progress: (fraction) => log(`  ${progressBar(fraction)}`),
  status: (message) => log(`  ${message}`),
  warning: (message) => log(`  WARNING: ${message}`),
};

async function save(outputDir: string, step: ExportStep, content: Buffer): Promise<string> {
  const filePath = path.join(outputDir, EXPORT_FILE_NAMES[step]);
  await writeFile(filePath, content);
  return filePath;
}

// Main

async function main(): Promise<void> {
  const parsed = scrapeRequestSchema.safeParse({
    targetCount: getArg('--count'),
    companyType: getArg('--type'),
  });

  if (!parsed.success) {
    log(`  ERROR: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`);
    process.exit(1);
  }

  const { targetCount, companyType } = parsed.data;
  const outputDir = path.resolve(getArg('--out') ?? config.export.outputDir);

  log('');
  log('  Public register export');
  log(`  Register:     ${config.registry.apiUrl}`);
  log(`  Target count: ${targetCount}`);
  log(`  Company type: ${companyType}`);
  log(`  Output:       ${outputDir}`);
  log('');

  await mkdir(outputDir, { recursive: true });

  const lister = container.resolve<RegistryListerService>(TOKENS.RegistryListerService);
  const fetcher = container.resolve<DetailFetcherService>(TOKENS.DetailFetcherService);

  const listing = await lister.list(targetCount, companyType, consoleSink);
  const step1Path = await save(outputDir, 'step1', listing.workbook);

  log('');
  log(`  ✓ Step 1 done: ${listing.records.length} companies filtered by '${companyType}'`);
  log(`    Fetched:  ${listing.fetchedCount}`);
  log(`    Saved:    ${step1Path}`);
  log('');

  if (listing.records.length === 0) {
    log('  No companies to detail; Step 2 skipped.');
    return;
  }

  const details = await fetcher.fetchDetails(listing.records, consoleSink);
  const step2Path = await save(outputDir, 'step2', details.workbook);

  log('');
  log(`  ✓ Step 2 done: ${details.normalizedRows.length} company details saved`);
  log(`    Skipped:  ${details.skippedIds.length}`);
  log(`    Saved:    ${step2Path}`);
  log('');
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error('Scrape failed:', err);
  process.exit(1);
});
