/**
 * Base class for every error this client raises on purpose
 *
 * `code` is a stable identifier callers can switch on without relying on
 * `instanceof` across package boundaries.
 */
export class AppError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    Object.setPrototypeOf(this, AppError.prototype);
  }
}
