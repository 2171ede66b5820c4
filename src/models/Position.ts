import { z } from 'zod';
import { positionSchema } from '@/validators/api.validator';

/**
 * Open position from GET /equity/portfolio
 *
 * `ticker` refers to an Instrument by string only; the instrument may be
 * missing from the catalog.
 */
export type Position = z.infer<typeof positionSchema>;
