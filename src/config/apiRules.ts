/**
 * API Rules Configuration
 *
 * Centralized constants describing the Trading 212 public API.
 * The client never enforces these limits; callers are expected to respect them.
 */

/**
 * Base URLs per environment
 */
export const BASE_URLS = {
  live: 'https://live.trading212.com/api/v0',
  demo: 'https://demo.trading212.com/api/v0',
} as const;

export type ApiEnvironment = keyof typeof BASE_URLS;

export function isApiEnvironment(value: string): value is ApiEnvironment {
  return Object.prototype.hasOwnProperty.call(BASE_URLS, value);
}

/**
 * Request defaults
 */
export const REQUEST_DEFAULTS = {
  /**
   * Per-request timeout, fixed when the transport is built
   */
  TIMEOUT_MS: 30_000,
} as const;

/**
 * API endpoints consumed by this client
 */
export const ENDPOINTS = {
  ACCOUNT_CASH: '/equity/account/cash',
  ACCOUNT_INFO: '/equity/account/info',
  PORTFOLIO: '/equity/portfolio',
  PORTFOLIO_SEARCH: '/equity/portfolio/ticker',
  INSTRUMENTS: '/equity/metadata/instruments',
  EXCHANGES: '/equity/metadata/exchanges',
} as const;

/**
 * Documented rate limits, as "one request per N seconds"
 *
 * Informational only: surfaced in RateLimitError messages so the caller knows
 * how long to back off.
 */
export const DOCUMENTED_RATE_LIMITS: Readonly<Record<string, number>> = {
  [ENDPOINTS.ACCOUNT_CASH]: 2,
  [ENDPOINTS.ACCOUNT_INFO]: 30,
  [ENDPOINTS.PORTFOLIO]: 5,
  [ENDPOINTS.PORTFOLIO_SEARCH]: 1,
  [ENDPOINTS.INSTRUMENTS]: 50,
  [ENDPOINTS.EXCHANGES]: 30,
};

/**
 * Look up the documented limit for an endpoint
 * Position lookups by ticker share the 1 req/s limit of the search endpoint.
 */
export function documentedRateLimitSeconds(endpoint: string): number | undefined {
  const exact = DOCUMENTED_RATE_LIMITS[endpoint];
  if (exact !== undefined) {
    return exact;
  }
  if (endpoint.startsWith(`${ENDPOINTS.PORTFOLIO}/`)) {
    return 1;
  }
  return undefined;
}
