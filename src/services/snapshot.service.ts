import { InstrumentIndex, Position } from '@/models';
import { IAccountRepository, IPortfolioRepository } from '@/repositories/interfaces';
import { ILogger } from '@/interfaces/ILogger';
import { AppError } from '@/errors';
import { STORAGE_CATEGORIES } from '@/constants/instruments';
import { SnapshotStore } from '@/storage/snapshot.store';
import { formatAccountBalance, formatAccountInfo } from '@/reports/accountReport';
import { formatPortfolio } from '@/reports/portfolioReport';
import { createLogger } from '@/adapters/logging/LoggerFactory';
import { InstrumentService } from './instrument.service';
import { ExportService } from './export.service';

/**
 * Receives human-readable report lines (stdout in the CLI)
 */
export type ReportWriter = (lines: readonly string[]) => void;

export interface SnapshotResult {
  balancePath: string;
  infoPath: string;
  positionsPath: string;
  /** null when there were no positions to export */
  exportPath: string | null;
  positionCount: number;
}

/**
 * Snapshot Service
 *
 * Fetches balance, account info and positions in sequence, prints each,
 * saves the raw payloads and exports the holdings to Yahoo CSV.
 *
 * Instrument metadata is optional here: if the catalog can't be loaded the
 * report and export go ahead with bare tickers.
 */
export class SnapshotService {
  constructor(
    private accountRepo: IAccountRepository,
    private portfolioRepo: IPortfolioRepository,
    private instrumentService: InstrumentService,
    private snapshotStore: SnapshotStore,
    private exportService: ExportService,
    private write: ReportWriter,
    private logger: ILogger = createLogger('SnapshotService')
  ) {}

  async run(): Promise<SnapshotResult> {
    this.write(['Fetching account balance...']);
    const cash = await this.accountRepo.getCash();
    this.write(formatAccountBalance(cash));
    const balancePath = await this.snapshotStore.save(cash, STORAGE_CATEGORIES.ACCOUNT, 'balance');
    this.write([`✓ Balance saved to: ${balancePath}`]);

    this.write(['', 'Fetching account info...']);
    const info = await this.accountRepo.getInfo();
    this.write(formatAccountInfo(info));
    const infoPath = await this.snapshotStore.save(info, STORAGE_CATEGORIES.ACCOUNT, 'info');
    this.write([`✓ Info saved to: ${infoPath}`]);

    this.write(['', 'Fetching portfolio positions...']);
    const positions = await this.portfolioRepo.getAllPositions();
    const instruments = positions.length > 0 ? await this.loadInstrumentIndex() : undefined;
    this.write(formatPortfolio(positions, instruments));
    const positionsPath = await this.snapshotStore.save(
      positions,
      STORAGE_CATEGORIES.PORTFOLIO,
      'positions'
    );
    this.write([`✓ Portfolio saved to: ${positionsPath}`]);

    const exportPath = await this.exportHoldings(positions, instruments);

    this.logger.info(
      { balancePath, infoPath, positionsPath, exportPath, positionCount: positions.length },
      'Account snapshot complete'
    );

    return {
      balancePath,
      infoPath,
      positionsPath,
      exportPath,
      positionCount: positions.length,
    };
  }

  /**
   * Catalog lookup for the report; undefined when it can't be loaded
   */
  private async loadInstrumentIndex(): Promise<InstrumentIndex | undefined> {
    this.write(['Loading instrument metadata...']);

    try {
      const index = await this.instrumentService.getInstrumentIndex();
      this.write([`✓ Loaded ${index.size} instruments (cached daily)`, '']);
      return index;
    } catch (error) {
      if (!(error instanceof AppError)) {
        throw error;
      }
      this.logger.warn({ code: error.code, err: error }, 'Instrument metadata unavailable');
      this.write([
        `⚠ Could not load instrument metadata: ${error.message}`,
        'Displaying basic ticker information only',
        '',
      ]);
      return undefined;
    }
  }

  private async exportHoldings(
    positions: readonly Position[],
    instruments: InstrumentIndex | undefined
  ): Promise<string | null> {
    if (positions.length === 0) {
      return null;
    }

    const path = await this.exportService.exportPortfolio(positions, instruments);
    this.write([`✓ Yahoo Finance CSV saved to: ${path}`]);
    return path;
  }
}
