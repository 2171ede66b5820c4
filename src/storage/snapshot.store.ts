import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { IClock } from '@/interfaces/IClock';
import { ValidationError } from '@/errors';
import { datePartition, isErrnoException, isPathSegment, timeStamp } from '@/utils/partitions';

/**
 * Anything JSON-serializable at the top level: a mapping or an ordered sequence
 */
export type SnapshotPayload = Readonly<Record<string, unknown>> | readonly unknown[];

/**
 * Snapshot Store
 *
 * Writes files under `<root>/<YYYY-MM-DD>/<category>/<name>_<HH-mm-ss>.<ext>`.
 *
 * Existing files are never overwritten: when two writes land in the same
 * second the later one gets a counter (`_2`, `_3`, ...) after the timestamp.
 * Write failures propagate.
 */
export class SnapshotStore {
  constructor(
    readonly rootDir: string,
    private readonly clock: IClock
  ) {}

  /**
   * Persist a payload as pretty-printed JSON
   * @returns Path of the file written
   */
  async save(payload: SnapshotPayload, category: string, name: string): Promise<string> {
    return this.write(category, name, 'json', `${JSON.stringify(payload, null, 2)}\n`);
  }

  /**
   * Persist arbitrary text under the same layout
   * @returns Path of the file written
   */
  async write(
    category: string,
    name: string,
    extension: string,
    content: string
  ): Promise<string> {
    assertSegment('category', category);
    assertSegment('name', name);
    assertSegment('extension', extension);

    const now = this.clock.now();
    const directory = join(this.rootDir, datePartition(now), category);
    await mkdir(directory, { recursive: true });

    const stamp = timeStamp(now);
    for (let attempt = 1; ; attempt++) {
      const suffix = attempt === 1 ? '' : `_${attempt}`;
      const path = join(directory, `${name}_${stamp}${suffix}.${extension}`);

      try {
        await writeFile(path, content, { encoding: 'utf-8', flag: 'wx' });
        return path;
      } catch (error) {
        if (isErrnoException(error) && error.code === 'EEXIST') {
          continue;
        }
        throw error;
      }
    }
  }
}

function assertSegment(field: string, value: string): void {
  if (!isPathSegment(value)) {
    throw new ValidationError(`Invalid snapshot ${field}: "${value}"`);
  }
}
