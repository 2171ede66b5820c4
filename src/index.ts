/**
 * Public API of the Trading 212 snapshot client
 */

export { Trading212Client, Trading212ClientOptions } from './client';
export { HttpTransport, HttpTransportOptions } from './transport/HttpTransport';
export { BasicAuthHandler, buildBasicAuthHeader } from './transport/auth';
export { InstrumentService, CacheMaintenanceReport } from './services/instrument.service';
export { ExportService, ExportOptions, renderYahooCsv } from './services/export.service';
export { SnapshotService, SnapshotResult, ReportWriter } from './services/snapshot.service';
export { SnapshotStore, SnapshotPayload } from './storage/snapshot.store';
export { InstrumentCacheStore } from './storage/instrumentCache.store';
export { transformTicker, classifyTicker, SymbolSource } from './transformers/yahooTicker';
export { formatAccountBalance, formatAccountInfo } from './reports/accountReport';
export { formatPortfolio } from './reports/portfolioReport';
export { BASE_URLS, ENDPOINTS, ApiEnvironment } from './config/apiRules';
export { EXCHANGE_SUFFIXES, YAHOO_CSV_HEADERS } from './constants/instruments';
export * from './errors';
export * from './models';
