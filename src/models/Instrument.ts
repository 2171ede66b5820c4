import { z } from 'zod';
import { instrumentSchema, exchangeSchema } from '@/validators/api.validator';

/**
 * Tradable instrument from GET /equity/metadata/instruments
 *
 * Identity is `ticker` (e.g. 'AAPL_US_EQ', 'VUSAl_EQ'). Fields beyond the
 * declared ones are kept as-is.
 */
export type Instrument = z.infer<typeof instrumentSchema>;

/**
 * Instruments keyed by ticker
 */
export type InstrumentIndex = ReadonlyMap<string, Instrument>;

/**
 * Exchange and its working schedules from GET /equity/metadata/exchanges
 */
export type Exchange = z.infer<typeof exchangeSchema>;
