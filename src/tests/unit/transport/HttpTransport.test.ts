import { AxiosError, InternalAxiosRequestConfig } from 'axios';
import { HttpTransport } from '@/transport/HttpTransport';
import {
  AuthenticationError,
  RateLimitError,
  TransportError,
  ValidationError,
} from '@/errors';
import { ILogger } from '@/interfaces/ILogger';
import { createMockLogger } from '@/tests/utils/mockRepositories';
import { StubHandler, createStubAdapter } from '@/tests/utils/fakes';

describe('HttpTransport', () => {
  let logger: jest.Mocked<ILogger>;

  const createTransport = (handler: StubHandler, environment?: string) => {
    const adapter = createStubAdapter(handler);
    const transport = new HttpTransport({
      apiKey: 'test-key',
      apiSecret: 'test-secret',
      environment,
      adapter,
      logger,
    });
    return { transport, adapter };
  };

  const lastConfig = (
    adapter: ReturnType<typeof createStubAdapter>
  ): InternalAxiosRequestConfig => {
    const [config] = adapter.mock.calls[adapter.mock.calls.length - 1] ?? [];
    if (!config) {
      throw new Error('adapter was not called');
    }
    return config;
  };

  beforeEach(() => {
    logger = createMockLogger();
  });

  describe('constructor', () => {
    it('should default to the demo environment', () => {
      const { transport } = createTransport(() => ({ status: 200 }));

      expect(transport.environment).toBe('demo');
      expect(transport.baseUrl).toBe('https://demo.trading212.com/api/v0');
      expect(transport.timeoutMs).toBe(30000);
    });

    it('should select the live base URL', () => {
      const { transport } = createTransport(() => ({ status: 200 }), 'live');

      expect(transport.baseUrl).toBe('https://live.trading212.com/api/v0');
    });

    it('should reject an unknown environment', () => {
      expect(() => createTransport(() => ({ status: 200 }), 'staging')).toThrow(
        new ValidationError("Invalid environment. Must be 'live' or 'demo', got: staging")
      );
    });

    it('should reject missing credentials', () => {
      expect(
        () => new HttpTransport({ apiKey: '', apiSecret: 'test-secret', logger })
      ).toThrow(AuthenticationError);
    });
  });

  describe('requests', () => {
    it('should send an authenticated GET and return the parsed body', async () => {
      const { transport, adapter } = createTransport(() => ({
        status: 200,
        data: { free: 100 },
      }));

      const body = await transport.get('/equity/account/cash');
      const config = lastConfig(adapter);

      expect(body).toEqual({ free: 100 });
      expect(config.method).toBe('get');
      expect(config.baseURL).toBe('https://demo.trading212.com/api/v0');
      expect(config.url).toBe('/equity/account/cash');
      expect(config.timeout).toBe(30000);
      expect(config.headers.get('Authorization')).toBe('Basic dGVzdC1rZXk6dGVzdC1zZWNyZXQ=');
    });

    it('should pass query parameters through', async () => {
      const { transport, adapter } = createTransport(() => ({ status: 200, data: [] }));

      await transport.get('/equity/portfolio', { limit: 20 });

      expect(lastConfig(adapter).params).toEqual({ limit: 20 });
    });

    it('should send a JSON body on POST', async () => {
      const { transport, adapter } = createTransport(() => ({ status: 200, data: {} }));

      await transport.post('/equity/portfolio/ticker', { ticker: 'AAPL_US_EQ' });
      const config = lastConfig(adapter);

      expect(config.method).toBe('post');
      expect(config.data).toBe('{"ticker":"AAPL_US_EQ"}');
    });

    it('should send DELETE requests', async () => {
      const { transport, adapter } = createTransport(() => ({ status: 200, data: null }));

      await transport.delete('/equity/orders/1');

      expect(lastConfig(adapter).method).toBe('delete');
    });

    it('should log completed requests at debug level', async () => {
      const { transport } = createTransport(() => ({ status: 200, data: [] }));

      await transport.get('/equity/portfolio');

      expect(logger.debug).toHaveBeenCalledWith(
        expect.objectContaining({ method: 'GET', endpoint: '/equity/portfolio', status: 200 }),
        'API request completed'
      );
    });
  });

  describe('error mapping', () => {
    it('should map 401 to AuthenticationError', async () => {
      const { transport } = createTransport(() => ({ status: 401, data: {} }));

      const error = await transport.get('/equity/account/cash').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AuthenticationError);
      expect(error).toMatchObject({
        message: 'Authentication failed. Check your API key and secret.',
        status: 401,
        code: 'AUTHENTICATION_FAILED',
      });
    });

    it('should map 403 to AuthenticationError', async () => {
      const { transport } = createTransport(() => ({ status: 403, data: {} }));

      await expect(transport.get('/equity/account/cash')).rejects.toThrow(
        new AuthenticationError('Access forbidden. Verify API key permissions.')
      );
    });

    it('should map 429 to RateLimitError with the documented limit and reset time', async () => {
      const { transport } = createTransport(() => ({
        status: 429,
        headers: { 'x-ratelimit-reset': '1767225600' },
      }));

      const error = await transport.get('/equity/metadata/instruments').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RateLimitError);
      if (error instanceof RateLimitError) {
        expect(error.message).toBe(
          'Rate limit exceeded for /equity/metadata/instruments. ' +
            'Documented limit: 1 request per 50s. Resets at 2026-01-01T00:00:00.000Z.'
        );
        expect(error.endpoint).toBe('/equity/metadata/instruments');
        expect(error.resetAt).toEqual(new Date('2026-01-01T00:00:00.000Z'));
      }
    });

    it('should omit the reset time when the header is missing', async () => {
      const { transport } = createTransport(() => ({ status: 429 }));

      await expect(transport.get('/equity/portfolio/AAPL_US_EQ')).rejects.toThrow(
        new RateLimitError(
          'Rate limit exceeded for /equity/portfolio/AAPL_US_EQ. Documented limit: 1 request per 1s.',
          { endpoint: '/equity/portfolio/AAPL_US_EQ' }
        )
      );
    });

    it('should not retry a rate-limited request', async () => {
      const { transport, adapter } = createTransport(() => ({ status: 429 }));

      await expect(transport.get('/equity/account/cash')).rejects.toThrow(RateLimitError);
      expect(adapter).toHaveBeenCalledTimes(1);
    });

    it('should map other HTTP errors to TransportError with the status', async () => {
      const { transport } = createTransport(() => ({ status: 500, data: 'oops' }));

      const error = await transport.get('/equity/portfolio').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportError);
      expect(error).toMatchObject({
        message: 'Request to /equity/portfolio failed with HTTP 500',
        status: 500,
        endpoint: '/equity/portfolio',
      });
    });

    it('should map a network failure to TransportError', async () => {
      const { transport } = createTransport(
        (config) => new AxiosError('timeout of 30000ms exceeded', AxiosError.ECONNABORTED, config)
      );

      await expect(transport.get('/equity/portfolio')).rejects.toThrow(
        new TransportError('Request failed: timeout of 30000ms exceeded')
      );
    });

    it('should wrap non-axios errors with the original as cause', async () => {
      const original = new Error('socket hang up');
      const { transport } = createTransport(() => original);

      const error = await transport.get('/equity/portfolio').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportError);
      expect(error).toMatchObject({ message: 'Request failed: socket hang up', cause: original });
    });

    it('should log failures at warn level', async () => {
      const { transport } = createTransport(() => ({ status: 500 }));

      await expect(transport.get('/equity/portfolio')).rejects.toThrow(TransportError);

      expect(logger.warn).toHaveBeenCalledWith(
        expect.objectContaining({
          method: 'GET',
          endpoint: '/equity/portfolio',
          code: 'TRANSPORT_FAILED',
        }),
        'API request failed: Request to /equity/portfolio failed with HTTP 500'
      );
    });
  });
});
