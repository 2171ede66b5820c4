import { AppError } from './AppError';

/**
 * Transport Error
 * Any other network or HTTP failure, or a response body of an unexpected shape.
 * The underlying error is attached as `cause`.
 */
export class TransportError extends AppError {
  public readonly endpoint?: string;
  public readonly status?: number;

  constructor(
    message: string,
    options?: { endpoint?: string; status?: number; cause?: unknown }
  ) {
    super(message, 'TRANSPORT_FAILED', { cause: options?.cause });
    this.endpoint = options?.endpoint;
    this.status = options?.status;
    Object.setPrototypeOf(this, TransportError.prototype);
  }
}
