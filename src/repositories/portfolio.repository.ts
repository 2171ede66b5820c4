import { Position } from '@/models';
import { ITransport } from '@/interfaces/ITransport';
import { ENDPOINTS } from '@/config/apiRules';
import { ValidationError } from '@/errors';
import {
  parseApiResponse,
  positionListSchema,
  positionSchema,
  positionSearchSchema,
} from '@/validators/api.validator';
import { IPortfolioRepository } from './interfaces/IPortfolioRepository';

/**
 * Portfolio Repository
 * Open positions, quantities, average price and unrealised P/L
 */
export class PortfolioRepository implements IPortfolioRepository {
  constructor(private transport: ITransport) {}

  async getAllPositions(): Promise<Position[]> {
    const data = await this.transport.get(ENDPOINTS.PORTFOLIO);
    return parseApiResponse(positionListSchema, data, ENDPOINTS.PORTFOLIO);
  }

  async getPosition(ticker: string): Promise<Position> {
    const { ticker: normalized } = this.validateTicker(ticker);
    const endpoint = `${ENDPOINTS.PORTFOLIO}/${encodeURIComponent(normalized)}`;

    const data = await this.transport.get(endpoint);
    return parseApiResponse(positionSchema, data, endpoint);
  }

  async searchPosition(ticker: string): Promise<Position> {
    const body = this.validateTicker(ticker);

    const data = await this.transport.post(ENDPOINTS.PORTFOLIO_SEARCH, body);
    return parseApiResponse(positionSchema, data, ENDPOINTS.PORTFOLIO_SEARCH);
  }

  private validateTicker(ticker: string): { ticker: string } {
    const result = positionSearchSchema.safeParse({ ticker });
    if (!result.success) {
      throw new ValidationError('Invalid ticker', result.error.issues);
    }
    return result.data;
  }
}
