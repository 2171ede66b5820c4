import { z } from 'zod';
import { accountCashSchema, accountInfoSchema } from '@/validators/api.validator';

/**
 * Cash balance from GET /equity/account/cash
 * - free: available for trading
 * - total: total account value
 * - ppl: unrealised profit and loss
 * - result: realised profit and loss
 */
export type AccountCash = z.infer<typeof accountCashSchema>;

/**
 * Account metadata from GET /equity/account/info
 */
export type AccountInfo = z.infer<typeof accountInfoSchema>;
