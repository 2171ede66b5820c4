#!/usr/bin/env node
import { env } from '@/config/env';
import { createDependencies, loadConfig } from '@/config/dependencies';
import { logger } from '@/adapters/logging/LoggerFactory';
import { describeFailure } from '@/utils/exitStatus';

const BANNER_WIDTH = 60;

function print(lines: readonly string[]): void {
  process.stdout.write(`${lines.join('\n')}\n`);
}

function printError(text: string): void {
  process.stderr.write(`${text}\n`);
}

/**
 * Snapshot the configured account: balance, info, positions, Yahoo CSV
 */
async function main(): Promise<number> {
  const config = loadConfig();

  if (!config.apiKey || !config.apiSecret) {
    printError('ERROR: T212_API_KEY and T212_API_SECRET required');
    printError('Copy .env.example to .env and set your credentials');
    return 1;
  }

  const rule = '='.repeat(BANNER_WIDTH);
  print([
    '',
    rule,
    `Trading 212 Snapshot - ${config.environment.toUpperCase()} Environment`,
    ...(config.accountLabel ? [`Account: ${config.accountLabel}`] : []),
    rule,
    '',
  ]);

  try {
    const { snapshotService } = createDependencies(config, print);
    await snapshotService.run();

    print(['', rule, 'SUCCESS', rule, '']);
    return 0;
  } catch (error) {
    const failure = describeFailure(error);
    logger.error(
      { err: error, environment: env.T212_ENV },
      `Snapshot failed: ${failure.message}`
    );
    printError(`\n${failure.label}: ${failure.message}`);
    return failure.exitCode;
  }
}

/**
 * Process event handlers
 */
process.on('SIGINT', () => {
  print(['', '', 'Interrupted by user']);
  process.exit(0);
});

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled Promise Rejection');
  process.exit(1);
});

main()
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    logger.fatal({ err: error }, 'Uncaught error');
    process.exitCode = 1;
  });
