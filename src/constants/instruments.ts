/**
 * Instrument types reported by the instruments metadata endpoint
 */
export const INSTRUMENT_TYPES = {
  STOCK: 'STOCK',
  ETF: 'ETF',
  CRYPTOCURRENCY: 'CRYPTOCURRENCY',
  CVEP: 'CVEP',
  FOREX: 'FOREX',
  FUTURES: 'FUTURES',
  INDEX: 'INDEX',
  WARRANT: 'WARRANT',
  CORPACT: 'CORPACT',
} as const;

export type InstrumentType = (typeof INSTRUMENT_TYPES)[keyof typeof INSTRUMENT_TYPES];

/**
 * Single-letter exchange codes that Trading 212 appends to a ticker prefix
 * (e.g. VUSAl_EQ), mapped to the Yahoo Finance symbol suffix.
 */
export const EXCHANGE_SUFFIXES: Readonly<Record<string, string>> = {
  a: '.AS', // Euronext Amsterdam
  b: '.BR', // Euronext Brussels
  f: '.F', // Frankfurt (Xetra)
  g: '.PA', // Euronext Paris
  h: '.HK', // Hong Kong
  l: '.L', // London Stock Exchange
  m: '.MC', // Madrid Stock Exchange
  n: '.N', // New York Stock Exchange
  o: '.O', // NASDAQ
  s: '.ST', // Stockholm (Nasdaq OMX)
  t: '.T', // Tokyo Stock Exchange
  v: '.VI', // Vienna Stock Exchange
  z: '.SW', // SIX Swiss Exchange (Zurich)
};

/**
 * Yahoo Finance portfolio import columns
 * Order and spelling must match exactly or the import rejects the file.
 */
export const YAHOO_CSV_HEADERS = [
  'Symbol',
  'Current Price',
  'Date',
  'Time',
  'Change',
  'Open',
  'High',
  'Low',
  'Volume',
  'Trade Date',
  'Purchase Price',
  'Quantity',
  'Commission',
  'High Limit',
  'Low Limit',
  'Comment',
  'Transaction Type',
] as const;

export type YahooCsvColumn = (typeof YAHOO_CSV_HEADERS)[number];

/**
 * Storage categories under each date partition
 */
export const STORAGE_CATEGORIES = {
  ACCOUNT: 'account',
  PORTFOLIO: 'portfolio',
  INSTRUMENTS: 'instruments',
  YAHOO: 'yahoo',
} as const;
