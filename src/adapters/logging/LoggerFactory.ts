/**
 * Logger Factory
 *
 * Creates named pino-backed loggers. Every service gets its own context name
 * so log lines show where they came from.
 */

import { ILogger, ILoggerFactory } from '@/interfaces/ILogger';
import { PinoLogger } from './PinoLogger';

export class LoggerFactory implements ILoggerFactory {
  createLogger(context?: string): ILogger {
    return new PinoLogger(context);
  }
}

/**
 * Default logger instance for application use
 */
const factory = new LoggerFactory();
export const logger = factory.createLogger('t212');

/**
 * Create named loggers for specific contexts
 */
export function createLogger(context: string): ILogger {
  return factory.createLogger(context);
}
