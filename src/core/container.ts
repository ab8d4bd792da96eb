/**
 * Dependency Injection Container
 * Layer: Core
 *
 * The single place where every dependency is wired. Each token in
 * `./types` is mapped to a concrete implementation, and any class that asks
 * for a token through `@inject()` gets that implementation.
 *
 *   - `reflect-metadata` must load first: tsyringe reads constructor
 *     parameter metadata emitted by the decorators.
 *   - `useValue` registers pre-built objects (logger, axios instance, options).
 *   - `useClass` builds the class on resolve, injecting its own dependencies.
 *   - ScrapeRunService is a singleton: it owns the in-memory runs that the
 *     HTTP controller reads back between requests.
 *
 * Tests re-register RegistryClient and ScraperOptions before resolving
 * anything, which swaps the upstream register for an in-process stand-in.
 */
import 'reflect-metadata';
import { container } from 'tsyringe';

import { config } from './config';
import { logger } from './logger';
import { TOKENS } from './types';

import { DetailFetcherService } from '@application/services/DetailFetcherService';
import { RegistryListerService } from '@application/services/RegistryListerService';
import { ScrapeRunService } from '@application/services/ScrapeRunService';
import { ExcelWorkbookExporter } from '@infrastructure/export/ExcelWorkbookExporter';
import { createRegistryHttpClient } from '@infrastructure/http/httpClient';
import { PublicRegisterClient } from '@infrastructure/http/PublicRegisterClient';
import type { RunRetentionOptions, ScraperOptions } from '@shared/types';

const scraperOptions: ScraperOptions = {
  apiUrl: config.registry.apiUrl,
  detailsPageUrl: config.registry.detailsPageUrl,
  pageSize: config.registry.pageSize,
  requestDelayMs: config.registry.requestDelayMs,
};

const runRetention: RunRetentionOptions = { ...config.runs };

container.register(TOKENS.Logger, { useValue: logger });
container.register(TOKENS.ScraperOptions, { useValue: scraperOptions });
container.register(TOKENS.RunRetention, { useValue: runRetention });
container.register(TOKENS.HttpClient, {
  useValue: createRegistryHttpClient({
    ...config.registry.headers,
    timeoutMs: config.registry.requestTimeoutMs,
  }),
});
container.register(TOKENS.RegistryClient, { useClass: PublicRegisterClient });
container.register(TOKENS.WorkbookExporter, { useClass: ExcelWorkbookExporter });
container.register(TOKENS.RegistryListerService, { useClass: RegistryListerService });
container.register(TOKENS.DetailFetcherService, { useClass: DetailFetcherService });
container.registerSingleton(TOKENS.ScrapeRunService, ScrapeRunService);

export { container };
