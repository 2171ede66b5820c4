import { IClock } from '@/interfaces/IClock';

/**
 * Wall-clock time in the local timezone, which is what date partitions use
 */
export class SystemClock implements IClock {
  now(): Date {
    return new Date();
  }
}
