import { AccountCash, AccountInfo } from '@/models';

/**
 * Account Repository Interface
 */
export interface IAccountRepository {
  /**
   * Cash balance (documented limit: 1 req / 2s)
   */
  getCash(): Promise<AccountCash>;

  /**
   * Account id and base currency (documented limit: 1 req / 30s)
   */
  getInfo(): Promise<AccountInfo>;
}
