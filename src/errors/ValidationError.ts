import { AppError } from './AppError';

/**
 * Validation Error
 * Thrown when input to an operation is invalid (e.g. exporting an empty portfolio)
 */
export class ValidationError extends AppError {
  public readonly errors?: unknown;

  constructor(message: string, errors?: unknown) {
    super(message, 'VALIDATION_FAILED');
    this.errors = errors;
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}
