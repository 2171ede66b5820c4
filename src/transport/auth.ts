import { AuthenticationError } from '@/errors';

/**
 * Build the Authorization header value for HTTP Basic Auth
 * The API key is the username and the API secret the password.
 */
export function buildBasicAuthHeader(apiKey: string, apiSecret: string): string {
  const encoded = Buffer.from(`${apiKey}:${apiSecret}`, 'utf-8').toString('base64');
  return `Basic ${encoded}`;
}

/**
 * Holds the pre-built Authorization header for the lifetime of a client
 */
export class BasicAuthHandler {
  private readonly authHeader: string;

  constructor(apiKey: string, apiSecret: string) {
    if (!apiKey || !apiSecret) {
      throw new AuthenticationError('Both API key and secret are required');
    }
    this.authHeader = buildBasicAuthHeader(apiKey, apiSecret);
  }

  getAuthHeader(): string {
    return this.authHeader;
  }

  getHeaders(): Record<'Authorization' | 'Content-Type', string> {
    return {
      Authorization: this.authHeader,
      'Content-Type': 'application/json',
    };
  }
}
