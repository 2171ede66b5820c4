import { Exchange, Instrument } from '@/models';

/**
 * Instrument Repository Interface
 * Uncached access to the metadata endpoints; caching lives in InstrumentService.
 */
export interface IInstrumentRepository {
  /**
   * Full instrument catalog (documented limit: 1 req / 50s)
   */
  fetchInstruments(): Promise<Instrument[]>;

  /**
   * Exchanges with working schedules (documented limit: 1 req / 30s)
   */
  fetchExchanges(): Promise<Exchange[]>;
}
