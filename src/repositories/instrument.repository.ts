import { Exchange, Instrument } from '@/models';
import { ITransport } from '@/interfaces/ITransport';
import { ENDPOINTS } from '@/config/apiRules';
import {
  exchangeListSchema,
  instrumentListSchema,
  parseApiResponse,
} from '@/validators/api.validator';
import { IInstrumentRepository } from './interfaces/IInstrumentRepository';

/**
 * Instrument Repository
 * Raw access to the metadata endpoints
 */
export class InstrumentRepository implements IInstrumentRepository {
  constructor(private transport: ITransport) {}

  async fetchInstruments(): Promise<Instrument[]> {
    const data = await this.transport.get(ENDPOINTS.INSTRUMENTS);
    return parseApiResponse(instrumentListSchema, data, ENDPOINTS.INSTRUMENTS);
  }

  async fetchExchanges(): Promise<Exchange[]> {
    const data = await this.transport.get(ENDPOINTS.EXCHANGES);
    return parseApiResponse(exchangeListSchema, data, ENDPOINTS.EXCHANGES);
  }
}
