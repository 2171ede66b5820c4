import { AccountCash, AccountInfo } from '@/models';
import { ITransport } from '@/interfaces/ITransport';
import { ENDPOINTS } from '@/config/apiRules';
import {
  accountCashSchema,
  accountInfoSchema,
  parseApiResponse,
} from '@/validators/api.validator';
import { IAccountRepository } from './interfaces/IAccountRepository';

/**
 * Account Repository
 * Cash balance and account metadata
 */
export class AccountRepository implements IAccountRepository {
  constructor(private transport: ITransport) {}

  async getCash(): Promise<AccountCash> {
    const data = await this.transport.get(ENDPOINTS.ACCOUNT_CASH);
    return parseApiResponse(accountCashSchema, data, ENDPOINTS.ACCOUNT_CASH);
  }

  async getInfo(): Promise<AccountInfo> {
    const data = await this.transport.get(ENDPOINTS.ACCOUNT_INFO);
    return parseApiResponse(accountInfoSchema, data, ENDPOINTS.ACCOUNT_INFO);
  }
}
