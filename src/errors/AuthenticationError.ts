import { AppError } from './AppError';

/**
 * Authentication Error
 * Credentials are missing or were rejected (HTTP 401/403).
 * Fatal to the invocation, never retried.
 */
export class AuthenticationError extends AppError {
  public readonly status?: number;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super(message, 'AUTHENTICATION_FAILED', { cause: options?.cause });
    this.status = options?.status;
    Object.setPrototypeOf(this, AuthenticationError.prototype);
  }
}
