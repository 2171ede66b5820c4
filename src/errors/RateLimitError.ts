import { AppError } from './AppError';

/**
 * Rate Limit Error (HTTP 429)
 * Fatal to the call only; the caller decides whether and how long to back off.
 */
export class RateLimitError extends AppError {
  public readonly endpoint: string;
  public readonly resetAt?: Date;

  constructor(
    message: string,
    options: { endpoint: string; resetAt?: Date; cause?: unknown }
  ) {
    super(message, 'RATE_LIMITED', { cause: options.cause });
    this.endpoint = options.endpoint;
    this.resetAt = options.resetAt;
    Object.setPrototypeOf(this, RateLimitError.prototype);
  }
}
