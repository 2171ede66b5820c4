/**
 * Pino Logger Adapter
 *
 * Structured logging through pino. Output goes to stderr so that the CLI's
 * report on stdout can be piped without log lines mixed in.
 *
 * - development + LOG_PRETTY: colorized, human-readable via pino-pretty
 * - otherwise: one JSON object per line
 */

import pino from 'pino';
import { ILogger, LogMetadata } from '@/interfaces/ILogger';
import { env } from '@/config/env';

const STDERR = 2;

function createPinoInstance(context: string): pino.Logger {
  const pretty = env.NODE_ENV === 'development' && env.LOG_PRETTY;

  const options: pino.LoggerOptions = {
    name: context,
    level: env.LOG_LEVEL,
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (pretty) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: STDERR,
        },
      },
    });
  }

  return pino(options, pino.destination(STDERR));
}

export class PinoLogger implements ILogger {
  private logger: pino.Logger;

  constructor(context?: string) {
    this.logger = createPinoInstance(context || 'app');
  }

  debug(messageOrMetadata: string | LogMetadata, message?: string): void {
    if (typeof messageOrMetadata === 'string') {
      this.logger.debug(messageOrMetadata);
    } else {
      this.logger.debug(messageOrMetadata, message);
    }
  }

  info(messageOrMetadata: string | LogMetadata, message?: string): void {
    if (typeof messageOrMetadata === 'string') {
      this.logger.info(messageOrMetadata);
    } else {
      this.logger.info(messageOrMetadata, message);
    }
  }

  warn(messageOrMetadata: string | LogMetadata, message?: string): void {
    if (typeof messageOrMetadata === 'string') {
      this.logger.warn(messageOrMetadata);
    } else {
      this.logger.warn(messageOrMetadata, message);
    }
  }

  error(messageOrMetadata: string | LogMetadata, message?: string): void {
    if (typeof messageOrMetadata === 'string') {
      this.logger.error(messageOrMetadata);
    } else {
      this.logger.error(messageOrMetadata, message);
    }
  }

  fatal(messageOrMetadata: string | LogMetadata, message?: string): void {
    if (typeof messageOrMetadata === 'string') {
      this.logger.fatal(messageOrMetadata);
    } else {
      this.logger.fatal(messageOrMetadata, message);
    }
  }
}
