/**
 * Clock abstraction
 * Injected wherever "today" matters so tests can simulate a date rollover.
 */
export interface IClock {
  now(): Date;
}
