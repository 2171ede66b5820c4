import { AppError, RateLimitError, TransportError } from '@/errors';

export interface FailureReport {
  exitCode: number;
  /** Prefix printed before the message on stderr */
  label: 'ERROR' | 'API ERROR' | 'UNEXPECTED ERROR';
  message: string;
}

/**
 * Map an error that reached the CLI to what the user sees and the exit code
 *
 * - configuration, credentials, bad input: ERROR
 * - the API refused or could not be reached: API ERROR
 * - anything else is a bug: UNEXPECTED ERROR
 */
export function describeFailure(error: unknown): FailureReport {
  if (error instanceof RateLimitError || error instanceof TransportError) {
    return { exitCode: 1, label: 'API ERROR', message: error.message };
  }

  if (error instanceof AppError) {
    return { exitCode: 1, label: 'ERROR', message: error.message };
  }

  const message = error instanceof Error ? error.message : String(error);
  return { exitCode: 1, label: 'UNEXPECTED ERROR', message };
}
