import { mkdir, readFile, readdir, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { Instrument } from '@/models';
import { CacheIOError } from '@/errors';
import { STORAGE_CATEGORIES } from '@/constants/instruments';
import { instrumentListSchema } from '@/validators/api.validator';
import { DATE_PARTITION_PATTERN, isErrnoException } from '@/utils/partitions';

const CACHE_FILE = 'instruments.json';

export type CacheLoadResult =
  | { status: 'hit'; instruments: Instrument[] }
  | { status: 'miss' }
  | { status: 'unreadable'; error: CacheIOError };

export interface EvictionResult {
  removed: string[];
  failures: CacheIOError[];
}

/**
 * Instrument Cache Store
 *
 * On-disk tier of the instrument cache: one JSON array per day at
 * `<root>/<YYYY-MM-DD>/instruments/instruments.json`.
 *
 * No method throws. Disk failures come back as CacheIOError values so the
 * caller can log them without ever turning a cache problem into a failed fetch.
 */
export class InstrumentCacheStore {
  constructor(private readonly rootDir: string) {}

  filePath(date: string): string {
    return join(this.rootDir, date, STORAGE_CATEGORIES.INSTRUMENTS, CACHE_FILE);
  }

  async load(date: string): Promise<CacheLoadResult> {
    const path = this.filePath(date);

    let raw: string;
    try {
      raw = await readFile(path, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return { status: 'miss' };
      }
      return { status: 'unreadable', error: new CacheIOError('read', path, error) };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      return { status: 'unreadable', error: new CacheIOError('read', path, error) };
    }

    const result = instrumentListSchema.safeParse(parsed);
    if (!result.success) {
      return { status: 'unreadable', error: new CacheIOError('read', path, result.error) };
    }

    return { status: 'hit', instruments: result.data };
  }

  /**
   * Overwrites the day's file; one valid snapshot per date
   */
  async save(date: string, instruments: readonly Instrument[]): Promise<CacheIOError | null> {
    const path = this.filePath(date);

    try {
      await mkdir(join(this.rootDir, date, STORAGE_CATEGORIES.INSTRUMENTS), {
        recursive: true,
      });
      await writeFile(path, JSON.stringify(instruments, null, 2), 'utf-8');
      return null;
    } catch (error) {
      return new CacheIOError('write', path, error);
    }
  }

  /**
   * Remove every date partition except `today`
   * Directories whose names are not dates (account labels, etc.) are left alone.
   */
  async evictStale(today: string): Promise<EvictionResult> {
    const result: EvictionResult = { removed: [], failures: [] };

    let names: string[];
    try {
      const entries = await readdir(this.rootDir, { withFileTypes: true });
      names = entries
        .filter((entry) => entry.isDirectory() && DATE_PARTITION_PATTERN.test(entry.name))
        .map((entry) => entry.name);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return result;
      }
      result.failures.push(new CacheIOError('evict', this.rootDir, error));
      return result;
    }

    for (const name of names.sort()) {
      if (name === today) {
        continue;
      }
      const path = join(this.rootDir, name);
      try {
        await rm(path, { recursive: true, force: true });
        result.removed.push(name);
      } catch (error) {
        result.failures.push(new CacheIOError('evict', path, error));
      }
    }

    return result;
  }
}
