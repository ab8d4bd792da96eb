/**
 * Dependency Injection Tokens
 * Layer: Core
 *
 * Every injectable dependency is looked up by one of these symbols. A service
 * that needs the registry client holds up TOKENS.RegistryClient and the
 * container hands back whatever is registered under it: the axios-backed
 * client in production, an in-process stand-in in tests.
 *
 * Grouped by architectural layer so new registrations have an obvious home.
 */
export const TOKENS = {
  // Infrastructure — low-level tools the app needs to function
  Logger: Symbol.for('Logger'),
  HttpClient: Symbol.for('HttpClient'),
  ScraperOptions: Symbol.for('ScraperOptions'),
  RunRetention: Symbol.for('RunRetention'),

  // Adapters — bridges to the upstream register and the spreadsheet format
  RegistryClient: Symbol.for('RegistryClient'),
  WorkbookExporter: Symbol.for('WorkbookExporter'),

  // Services — application-level orchestrators
  RegistryListerService: Symbol.for('RegistryListerService'),
  DetailFetcherService: Symbol.for('DetailFetcherService'),
  ScrapeRunService: Symbol.for('ScrapeRunService'),
} as const;
