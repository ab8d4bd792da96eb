/**
 * Test Doubles — Registry Client, Exporter, Progress Sink, Logger
 * Layer: Test Helpers
 *
 * Factory functions so every test gets fresh jest.fn() instances and no call
 * history leaks between tests:
 *
 *   const client = createMockRegistryClient();
 *   client.listCompanies.mockResolvedValueOnce(ok([makeCompany('A')]));
 *
 * The recording sink keeps every progress value, status and warning in
 * order, so tests can assert the exact sequence a phase reported.
 */
import type { IProgressSink } from '@domain/interfaces/IProgressSink';
import type { IRegistryClient } from '@domain/interfaces/IRegistryClient';
import type { IWorkbookExporter } from '@domain/interfaces/IWorkbookExporter';
import pino from 'pino';

export type MockRegistryClient = {
  [K in keyof IRegistryClient]: jest.Mock;
};

export function createMockRegistryClient(): MockRegistryClient {
  return {
    listCompanies: jest.fn(),
    fetchCompanyDetail: jest.fn(),
  };
}

export type MockWorkbookExporter = {
  [K in keyof IWorkbookExporter]: jest.Mock;
};

export function createMockExporter(content = 'xlsx-bytes'): MockWorkbookExporter {
  return {
    export: jest.fn().mockResolvedValue(Buffer.from(content)),
  };
}

export interface RecordingSink extends IProgressSink {
  progressValues: number[];
  statuses: string[];
  warnings: string[];
}

export function createRecordingSink(): RecordingSink {
  const progressValues: number[] = [];
  const statuses: string[] = [];
  const warnings: string[] = [];

  return {
    progressValues,
    statuses,
    warnings,
    progress: (fraction) => progressValues.push(fraction),
    status: (message) => statuses.push(message),
    warning: (message) => warnings.push(message),
  };
}

export const silentLogger = pino({ level: 'silent' });
