/**
 * Dependency Container
 * Instantiates and wires the client, stores and services for one CLI run
 *
 * Built on demand rather than at import time: constructing the transport
 * validates credentials, and that failure belongs inside the CLI's error
 * handling.
 */

import { join } from 'path';
import { env } from '@/config/env';
import { Trading212Client } from '@/client';
import { SystemClock } from '@/adapters/clock/SystemClock';
import { SnapshotStore } from '@/storage/snapshot.store';
import { ExportService } from '@/services/export.service';
import { ReportWriter, SnapshotService } from '@/services/snapshot.service';

export interface AppConfig {
  apiKey: string;
  apiSecret: string;
  environment: string;
  accountLabel: string;
  dataDir: string;
  timeoutMs: number;
}

export function loadConfig(): AppConfig {
  return {
    apiKey: env.T212_API_KEY,
    apiSecret: env.T212_API_SECRET,
    environment: env.T212_ENV,
    accountLabel: env.T212_ACCOUNT,
    dataDir: env.DATA_DIR,
    timeoutMs: env.REQUEST_TIMEOUT_MS,
  };
}

export interface Dependencies {
  client: Trading212Client;
  snapshotStore: SnapshotStore;
  exportService: ExportService;
  snapshotService: SnapshotService;
}

export function createDependencies(config: AppConfig, write: ReportWriter): Dependencies {
  const clock = new SystemClock();

  // ============================================================================
  // CLIENT
  // ============================================================================

  /**
   * The instrument cache stays at the data root: the catalog belongs to the
   * environment, not to an account label.
   */
  const client = new Trading212Client({
    apiKey: config.apiKey,
    apiSecret: config.apiSecret,
    environment: config.environment,
    timeoutMs: config.timeoutMs,
    dataDir: config.dataDir,
    clock,
  });

  // ============================================================================
  // STORAGE & SERVICES
  // ============================================================================

  const snapshotRoot = config.accountLabel
    ? join(config.dataDir, config.accountLabel)
    : config.dataDir;
  const snapshotStore = new SnapshotStore(snapshotRoot, clock);

  const exportService = new ExportService(snapshotStore);

  const snapshotService = new SnapshotService(
    client.account,
    client.portfolio,
    client.instruments,
    snapshotStore,
    exportService,
    write
  );

  return { client, snapshotStore, exportService, snapshotService };
}
