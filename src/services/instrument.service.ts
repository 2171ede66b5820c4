import { Exchange, Instrument } from '@/models';
import { IInstrumentRepository } from '@/repositories/interfaces';
import { IClock } from '@/interfaces/IClock';
import { ILogger } from '@/interfaces/ILogger';
import { CacheIOError } from '@/errors';
import { InstrumentCacheStore } from '@/storage/instrumentCache.store';
import { datePartition } from '@/utils/partitions';
import { createLogger } from '@/adapters/logging/LoggerFactory';

interface CatalogSnapshot {
  date: string;
  instruments: readonly Instrument[];
}

interface PendingCatalog {
  date: string;
  promise: Promise<readonly Instrument[]>;
}

/**
 * Outcome of writing the day's cache file and evicting older days.
 * Never thrown: failures here must not cost the caller a successful fetch.
 */
export interface CacheMaintenanceReport {
  saved: boolean;
  evicted: string[];
  failures: CacheIOError[];
}

/**
 * Instrument Service
 *
 * The instruments endpoint allows one request per 50 seconds, so the catalog
 * is fetched at most once per calendar day. Lookup order, first hit wins:
 *
 * 1. in-memory snapshot taken today
 * 2. today's file on disk (unreadable or invalid files count as a miss)
 * 3. the API, after which memory and disk are repopulated and every other
 *    day's partition is evicted
 *
 * Exchanges are cached in memory only.
 */
export class InstrumentService {
  private instrumentsCache: CatalogSnapshot | null = null;
  private pending: PendingCatalog | null = null;
  private exchangesCache: Exchange[] | null = null;
  private lastMaintenance: CacheMaintenanceReport | null = null;

  constructor(
    private instrumentRepo: IInstrumentRepository,
    private cacheStore: InstrumentCacheStore,
    private clock: IClock,
    private logger: ILogger = createLogger('InstrumentService')
  ) {}

  /**
   * All instruments the account can trade
   *
   * The result is frozen and shared by every caller on the same day.
   * Concurrent same-day callers share one lookup, so the API is hit at most once.
   *
   * @param useCache - false skips both cache tiers but still refreshes them
   */
  async getAllInstruments(useCache: boolean = true): Promise<readonly Instrument[]> {
    const today = datePartition(this.clock.now());

    if (useCache && this.instrumentsCache?.date === today) {
      return this.instrumentsCache.instruments;
    }

    if (useCache && this.pending?.date === today) {
      return this.pending.promise;
    }

    const pending = { date: today, promise: this.loadCatalog(today, useCache) };
    this.pending = pending;

    try {
      return await pending.promise;
    } finally {
      if (this.pending === pending) {
        this.pending = null;
      }
    }
  }

  /**
   * Instruments keyed by ticker
   */
  async getInstrumentIndex(useCache: boolean = true): Promise<Map<string, Instrument>> {
    const instruments = await this.getAllInstruments(useCache);
    return new Map(instruments.map((instrument) => [instrument.ticker, instrument]));
  }

  /**
   * Find an instrument by ticker, e.g. 'AAPL_US_EQ'
   * Goes through the cached catalog; fetches it first if needed.
   */
  async findInstrument(ticker: string): Promise<Instrument | null> {
    const instruments = await this.getAllInstruments();
    return instruments.find((instrument) => instrument.ticker === ticker) ?? null;
  }

  /**
   * All exchanges and their working schedules
   */
  async getAllExchanges(useCache: boolean = true): Promise<Exchange[]> {
    if (useCache && this.exchangesCache !== null) {
      return this.exchangesCache;
    }

    const exchanges = await this.instrumentRepo.fetchExchanges();
    this.exchangesCache = exchanges;
    return exchanges;
  }

  /**
   * Disk outcome of the most recent fresh fetch, or null if every call so far
   * was served from cache
   */
  getLastCacheMaintenance(): CacheMaintenanceReport | null {
    return this.lastMaintenance;
  }

  /**
   * Drop the in-memory tiers. Today's file on disk stays until the next
   * successful fetch replaces it.
   */
  clearCache(): void {
    this.instrumentsCache = null;
    this.exchangesCache = null;
  }

  private async loadCatalog(today: string, useCache: boolean): Promise<readonly Instrument[]> {
    if (useCache) {
      const cached = await this.cacheStore.load(today);

      switch (cached.status) {
        case 'hit':
          this.logger.debug(
            { date: today, count: cached.instruments.length },
            'Instrument catalog loaded from disk cache'
          );
          return this.remember(today, cached.instruments);

        case 'unreadable':
          this.logger.warn(
            { path: cached.error.path, err: cached.error.cause },
            'Ignoring unreadable instrument cache file'
          );
          break;

        case 'miss':
          break;
      }
    }

    const fetched = await this.instrumentRepo.fetchInstruments();
    const instruments = this.remember(today, fetched);

    this.logger.info({ date: today, count: instruments.length }, 'Instrument catalog fetched');

    this.lastMaintenance = await this.maintainDiskCache(today, instruments);

    return instruments;
  }

  private remember(date: string, instruments: Instrument[]): readonly Instrument[] {
    const frozen = Object.freeze(instruments);
    this.instrumentsCache = { date, instruments: frozen };
    return frozen;
  }

  private async maintainDiskCache(
    today: string,
    instruments: readonly Instrument[]
  ): Promise<CacheMaintenanceReport> {
    const writeFailure = await this.cacheStore.save(today, instruments);
    const eviction = await this.cacheStore.evictStale(today);

    const report: CacheMaintenanceReport = {
      saved: writeFailure === null,
      evicted: eviction.removed,
      failures: writeFailure ? [writeFailure, ...eviction.failures] : eviction.failures,
    };

    if (report.evicted.length > 0) {
      this.logger.debug({ evicted: report.evicted }, 'Evicted stale date partitions');
    }

    for (const failure of report.failures) {
      this.logger.warn(
        { operation: failure.operation, path: failure.path, err: failure.cause },
        failure.message
      );
    }

    return report;
  }
}
