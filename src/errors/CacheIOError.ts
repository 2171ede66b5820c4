import { AppError } from './AppError';

export type CacheOperation = 'read' | 'write' | 'evict';

/**
 * Cache I/O Error
 * Disk failure inside the instrument cache. Reported as a value on the
 * cache's non-fatal channel; never thrown to callers of the cache.
 */
export class CacheIOError extends AppError {
  public readonly operation: CacheOperation;
  public readonly path: string;

  constructor(operation: CacheOperation, path: string, cause: unknown) {
    super(`Instrument cache ${operation} failed for ${path}`, 'CACHE_IO', { cause });
    this.operation = operation;
    this.path = path;
    Object.setPrototypeOf(this, CacheIOError.prototype);
  }
}
