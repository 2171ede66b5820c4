import axios, { AxiosAdapter, AxiosInstance, Method } from 'axios';
import { ITransport } from '@/interfaces/ITransport';
import { ILogger } from '@/interfaces/ILogger';
import {
  ApiEnvironment,
  BASE_URLS,
  REQUEST_DEFAULTS,
  documentedRateLimitSeconds,
  isApiEnvironment,
} from '@/config/apiRules';
import {
  AppError,
  AuthenticationError,
  RateLimitError,
  TransportError,
  ValidationError,
} from '@/errors';
import { createLogger } from '@/adapters/logging/LoggerFactory';
import { BasicAuthHandler } from './auth';

export interface HttpTransportOptions {
  apiKey: string;
  apiSecret: string;
  /** 'live' or 'demo' (default: 'demo') */
  environment?: string;
  /** Per-request timeout, fixed for the lifetime of the transport */
  timeoutMs?: number;
  /** Replaces axios' network adapter; tests use it to answer requests in-process */
  adapter?: AxiosAdapter;
  logger?: ILogger;
}

/**
 * HTTP Transport
 *
 * Issues authenticated JSON requests with axios and translates failures into
 * the client's error taxonomy. Nothing is retried: a 429 is handed back to the
 * caller as a RateLimitError.
 */
export class HttpTransport implements ITransport {
  readonly environment: ApiEnvironment;
  readonly baseUrl: string;
  readonly timeoutMs: number;

  private readonly http: AxiosInstance;
  private readonly logger: ILogger;

  constructor(options: HttpTransportOptions) {
    const environment = options.environment ?? 'demo';
    if (!isApiEnvironment(environment)) {
      throw new ValidationError(
        `Invalid environment. Must be 'live' or 'demo', got: ${environment}`
      );
    }

    const auth = new BasicAuthHandler(options.apiKey, options.apiSecret);

    this.environment = environment;
    this.baseUrl = BASE_URLS[environment];
    this.timeoutMs = options.timeoutMs ?? REQUEST_DEFAULTS.TIMEOUT_MS;
    this.logger = options.logger ?? createLogger('HttpTransport');

    this.http = axios.create({
      baseURL: this.baseUrl,
      timeout: this.timeoutMs,
      headers: auth.getHeaders(),
      adapter: options.adapter,
    });
  }

  async get(endpoint: string, params?: Record<string, string | number>): Promise<unknown> {
    return this.request('GET', endpoint, { params });
  }

  async post(endpoint: string, body: unknown): Promise<unknown> {
    return this.request('POST', endpoint, { data: body });
  }

  async delete(endpoint: string): Promise<unknown> {
    return this.request('DELETE', endpoint);
  }

  private async request(
    method: Method,
    endpoint: string,
    options: { params?: Record<string, string | number>; data?: unknown } = {}
  ): Promise<unknown> {
    const startedAt = Date.now();

    try {
      const response = await this.http.request<unknown>({
        method,
        url: endpoint,
        params: options.params,
        data: options.data,
      });

      this.logger.debug(
        { method, endpoint, status: response.status, durationMs: Date.now() - startedAt },
        'API request completed'
      );

      return response.data;
    } catch (error) {
      const mapped = this.mapError(error, endpoint);
      this.logger.warn(
        {
          method,
          endpoint,
          code: mapped.code,
          durationMs: Date.now() - startedAt,
        },
        `API request failed: ${mapped.message}`
      );
      throw mapped;
    }
  }

  private mapError(error: unknown, endpoint: string): AppError {
    if (!axios.isAxiosError(error)) {
      const reason = error instanceof Error ? error.message : String(error);
      return new TransportError(`Request failed: ${reason}`, { endpoint, cause: error });
    }

    const response = error.response;
    if (!response) {
      // Timeout, DNS failure, connection refused
      return new TransportError(`Request failed: ${error.message}`, {
        endpoint,
        cause: error,
      });
    }

    const status = response.status;

    switch (status) {
      case 401:
        return new AuthenticationError(
          'Authentication failed. Check your API key and secret.',
          { status, cause: error }
        );

      case 403:
        return new AuthenticationError('Access forbidden. Verify API key permissions.', {
          status,
          cause: error,
        });

      case 429: {
        const resetAt = parseRateLimitReset(response.headers['x-ratelimit-reset']);
        return new RateLimitError(rateLimitMessage(endpoint, resetAt), {
          endpoint,
          resetAt,
          cause: error,
        });
      }

      default:
        return new TransportError(`Request to ${endpoint} failed with HTTP ${status}`, {
          endpoint,
          status,
          cause: error,
        });
    }
  }
}

/**
 * `x-ratelimit-reset` carries a unix timestamp in seconds
 */
function parseRateLimitReset(raw: unknown): Date | undefined {
  if (typeof raw !== 'string' && typeof raw !== 'number') {
    return undefined;
  }
  const seconds = Number(raw);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    return undefined;
  }
  return new Date(seconds * 1000);
}

function rateLimitMessage(endpoint: string, resetAt: Date | undefined): string {
  const parts = [`Rate limit exceeded for ${endpoint}.`];

  const limit = documentedRateLimitSeconds(endpoint);
  if (limit !== undefined) {
    parts.push(`Documented limit: 1 request per ${limit}s.`);
  }
  if (resetAt) {
    parts.push(`Resets at ${resetAt.toISOString()}.`);
  }

  return parts.join(' ');
}
