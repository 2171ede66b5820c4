import { z } from 'zod';
import { TransportError } from '@/errors';

/**
 * Response schemas for the Trading 212 endpoints this client reads
 *
 * Only the fields the code touches are declared. `.passthrough()` keeps every
 * other field so that persisted snapshots contain the full API payload.
 */

export const instrumentSchema = z
  .object({
    ticker: z.string().min(1),
    name: z.string().optional(),
    shortName: z.string().optional(),
    isin: z.string().optional(),
    type: z.string().optional(),
    currencyCode: z.string().optional(),
  })
  .passthrough();

export const instrumentListSchema = z.array(instrumentSchema);

export const positionSchema = z
  .object({
    ticker: z.string().min(1),
    quantity: z.number(),
    averagePrice: z.number(),
    currentPrice: z.number(),
    ppl: z.number(),
    fxPpl: z.number().nullable().optional(),
    initialFillDate: z.string().optional(),
    frontend: z.string().optional(),
  })
  .passthrough();

export const positionListSchema = z.array(positionSchema);

export const accountCashSchema = z
  .object({
    free: z.number(),
    total: z.number(),
    ppl: z.number(),
    result: z.number(),
    invested: z.number().optional(),
    pieCash: z.number().optional(),
    blocked: z.number().nullable().optional(),
  })
  .passthrough();

export const accountInfoSchema = z
  .object({
    id: z.number(),
    currencyCode: z.string(),
  })
  .passthrough();

export const exchangeSchema = z
  .object({
    id: z.number(),
    name: z.string(),
    workingSchedules: z.array(z.object({ id: z.number() }).passthrough()).optional(),
  })
  .passthrough();

export const exchangeListSchema = z.array(exchangeSchema);

export const positionSearchSchema = z.object({
  ticker: z.string().trim().min(1, { message: 'Ticker must not be empty' }),
});

/**
 * Validate a response body against its schema
 * A body of the wrong shape is a transport-level failure, not a caller error.
 */
export function parseApiResponse<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown,
  endpoint: string
): z.infer<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new TransportError(`Unexpected response shape from ${endpoint}`, {
      endpoint,
      cause: result.error,
    });
  }
  return result.data;
}
