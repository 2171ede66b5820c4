import { AxiosAdapter } from 'axios';
import { IClock } from '@/interfaces/IClock';
import { ILogger } from '@/interfaces/ILogger';
import { ApiEnvironment } from '@/config/apiRules';
import { HttpTransport } from '@/transport/HttpTransport';
import { AccountRepository } from '@/repositories/account.repository';
import { PortfolioRepository } from '@/repositories/portfolio.repository';
import { InstrumentRepository } from '@/repositories/instrument.repository';
import { InstrumentCacheStore } from '@/storage/instrumentCache.store';
import { InstrumentService } from '@/services/instrument.service';
import { SystemClock } from '@/adapters/clock/SystemClock';

export interface Trading212ClientOptions {
  apiKey: string;
  apiSecret: string;
  /** 'live' or 'demo' (default: 'demo') */
  environment?: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeoutMs?: number;
  /** Root of the instrument cache (default: 'data') */
  dataDir?: string;
  clock?: IClock;
  logger?: ILogger;
  adapter?: AxiosAdapter;
}

/**
 * Trading 212 API client
 *
 * ```ts
 * const client = new Trading212Client({ apiKey, apiSecret, environment: 'demo' });
 * const cash = await client.account.getCash();
 * const positions = await client.portfolio.getAllPositions();
 * const apple = await client.instruments.findInstrument('AAPL_US_EQ');
 * ```
 *
 * @throws AuthenticationError when the key or secret is empty
 * @throws ValidationError when the environment is not 'live' or 'demo'
 */
export class Trading212Client {
  readonly environment: ApiEnvironment;
  readonly account: AccountRepository;
  readonly portfolio: PortfolioRepository;
  readonly instruments: InstrumentService;

  constructor(options: Trading212ClientOptions) {
    const transport = new HttpTransport({
      apiKey: options.apiKey,
      apiSecret: options.apiSecret,
      environment: options.environment,
      timeoutMs: options.timeoutMs,
      adapter: options.adapter,
      logger: options.logger,
    });

    this.environment = transport.environment;
    this.account = new AccountRepository(transport);
    this.portfolio = new PortfolioRepository(transport);
    this.instruments = new InstrumentService(
      new InstrumentRepository(transport),
      new InstrumentCacheStore(options.dataDir ?? 'data'),
      options.clock ?? new SystemClock(),
      options.logger
    );
  }
}
