import { cleanEnv, str, num, bool, makeValidator, EnvError } from 'envalid';
import dotenv from 'dotenv';
import { DATE_PARTITION_PATTERN } from '@/utils/partitions';

// Load .env file
dotenv.config();

/**
 * Account labels become a directory beside the date partitions under DATA_DIR:
 * one flat path segment that is not itself a YYYY-MM-DD name.
 */
export function parseAccountLabel(input: string): string {
  if (!/^[A-Za-z0-9_-]*$/.test(input)) {
    throw new EnvError(`Invalid account label "${input}": use letters, digits, "_" or "-"`);
  }
  if (DATE_PARTITION_PATTERN.test(input)) {
    throw new EnvError(`Invalid account label "${input}": must not look like a date (YYYY-MM-DD)`);
  }
  return input;
}

const accountLabel = makeValidator<string>(parseAccountLabel);

/**
 * Validated environment variables
 *
 * Using envalid for runtime validation and type safety:
 * - Validates types (string, number, boolean)
 * - Enforces choices for enums
 * - Provides defaults for development/test
 *
 * Credentials default to empty strings so that a missing key surfaces as an
 * AuthenticationError from the client instead of a bare process exit.
 */
export const env = cleanEnv(process.env, {
  // ==========================================
  // Runtime
  // ==========================================
  NODE_ENV: str({
    choices: ['development', 'test', 'production'],
    default: 'development',
    desc: 'Application environment (affects log formatting)',
  }),

  // ==========================================
  // Trading 212 API
  // ==========================================
  T212_API_KEY: str({
    default: '',
    desc: 'Trading 212 API key (Basic Auth username)',
  }),
  T212_API_SECRET: str({
    default: '',
    desc: 'Trading 212 API secret (Basic Auth password)',
  }),
  T212_ENV: str({
    choices: ['live', 'demo'],
    default: 'demo',
    desc: 'Which Trading 212 environment to call',
  }),
  T212_ACCOUNT: accountLabel({
    default: '',
    desc: 'Optional account label used to partition snapshots on disk',
    example: 'isa',
  }),
  REQUEST_TIMEOUT_MS: num({
    default: 30_000,
    desc: 'HTTP request timeout in milliseconds',
  }),

  // ==========================================
  // Storage
  // ==========================================
  DATA_DIR: str({
    default: 'data',
    desc: 'Root directory for snapshots, exports and the instrument cache',
  }),

  // ==========================================
  // Logging Configuration
  // ==========================================
  LOG_LEVEL: str({
    choices: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'],
    default: 'info',
    desc: 'Minimum log level to output',
  }),
  LOG_PRETTY: bool({
    default: true,
    desc: 'Pretty-print logs (false for JSON logs)',
  }),
});

export type Env = typeof env;
