import { Position } from '@/models';

/**
 * Portfolio Repository Interface
 */
export interface IPortfolioRepository {
  /**
   * All open positions (documented limit: 1 req / 5s)
   */
  getAllPositions(): Promise<Position[]>;

  /**
   * A single position by instrument ticker (documented limit: 1 req / 1s)
   * @param ticker - e.g. 'AAPL_US_EQ'
   */
  getPosition(ticker: string): Promise<Position>;

  /**
   * Position lookup through the POST search endpoint (documented limit: 1 req / 1s)
   */
  searchPosition(ticker: string): Promise<Position>;
}
