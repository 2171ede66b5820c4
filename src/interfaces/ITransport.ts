/**
 * Transport Interface
 *
 * Authenticated JSON requests against the API base URL. Implementations map
 * HTTP failures to AuthenticationError, RateLimitError or TransportError.
 * Bodies are returned unparsed by schema; repositories validate them.
 */
export interface ITransport {
  get(endpoint: string, params?: Record<string, string | number>): Promise<unknown>;
  post(endpoint: string, body: unknown): Promise<unknown>;
  delete(endpoint: string): Promise<unknown>;
}
