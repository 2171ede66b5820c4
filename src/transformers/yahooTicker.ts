import { Instrument } from '@/models';
import { ILogger } from '@/interfaces/ILogger';
import { EXCHANGE_SUFFIXES } from '@/constants/instruments';
import { createLogger } from '@/adapters/logging/LoggerFactory';

/**
 * Which rule produced a Yahoo symbol
 */
export type SymbolSource = 'exchange' | 'shortName' | 'prefix';

type ShortNameSource = Pick<Instrument, 'shortName'> | null | undefined;

const defaultLogger = createLogger('YahooTicker');

/**
 * Segment before the first underscore: 'VUSAl_EQ' -> 'VUSAl'
 */
function tickerPrefix(ticker: string): string {
  return ticker.split('_')[0] ?? '';
}

/**
 * Trailing lowercase letter of the prefix, which Trading 212 uses as an
 * exchange marker ('VUSAl' -> 'l')
 */
function exchangeCode(prefix: string): string | null {
  const last = prefix.slice(-1);
  if (last === '' || last === last.toUpperCase() || last !== last.toLowerCase()) {
    return null;
  }
  return last;
}

/**
 * Rule that transformTicker applies to this ticker
 * Unrecognized exchange codes still count as 'exchange'.
 */
export function classifyTicker(ticker: string, instrument?: ShortNameSource): SymbolSource {
  if (exchangeCode(tickerPrefix(ticker)) !== null) {
    return 'exchange';
  }
  if (instrument?.shortName) {
    return 'shortName';
  }
  return 'prefix';
}

/**
 * Convert a Trading 212 ticker to a Yahoo Finance symbol
 *
 * 1. A prefix ending in a known lowercase exchange code maps to the exchange's
 *    suffix: 'VUSAl_EQ' -> 'VUSA.L', 'ADYENa_EQ' -> 'ADYEN.AS'
 * 2. An unknown lowercase code is upper-cased after a dot, with a warning:
 *    'FOOq_EQ' -> 'FOO.Q'
 * 3. Otherwise the instrument's shortName, when present: 'NVDA_US_EQ' -> 'NVDA'
 * 4. Otherwise the prefix: 'XYZ_US_EQ' -> 'XYZ'
 *
 * Never throws.
 */
export function transformTicker(
  ticker: string,
  instrument?: ShortNameSource,
  logger: ILogger = defaultLogger
): string {
  const prefix = tickerPrefix(ticker);
  const code = exchangeCode(prefix);

  if (code !== null) {
    const base = prefix.slice(0, -1);
    const suffix = EXCHANGE_SUFFIXES[code];

    if (suffix !== undefined) {
      return base + suffix;
    }

    const fallback = `.${code.toUpperCase()}`;
    logger.warn(
      { ticker, exchangeCode: code },
      `Unrecognized exchange code '${code}' in ticker '${ticker}'. Using ${fallback} fallback.`
    );
    return base + fallback;
  }

  if (instrument?.shortName) {
    return instrument.shortName;
  }

  return prefix;
}
