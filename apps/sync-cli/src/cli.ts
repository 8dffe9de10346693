import { ConfigInvalidError, loadEnv, type SyncEnv } from '@pricesync/config';
import { createLogger, type Logger } from '@pricesync/logger';
import {
  EXIT_CODES,
  exitCodeFor,
  formatRunSummary,
  runReconciliation,
  type RunSettings,
} from '@pricesync/reconciliation';
import type { DestinationStream } from 'pino';

import { USAGE, parseCliArgs, type CliOptions } from './args.js';
import { createPlatforms, type PlatformPair } from './platforms.js';

const SERVICE_NAME = 'catalog-price-sync';

export type CliIo = Readonly<{
  argv: readonly string[];
  env: Record<string, string | undefined>;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  signal?: AbortSignal;
  /** Log sink override; defaults to stdout or LOG_FILE. */
  logDestination?: DestinationStream;
  createPlatforms?: (env: SyncEnv) => PlatformPair;
}>;

export function toRunSettings(env: SyncEnv, cli: CliOptions): RunSettings {
  return {
    tolerance: env.tolerance,
    absoluteFloor: env.absoluteFloor,
    perPage: env.perPage,
    maxPages: env.maxPages,
    dryRun: cli.dryRun ?? env.dryRun,
    concurrency: cli.concurrency ?? env.concurrency,
    includeInactive: env.includeInactive,
    priceRule: {
      commissionPercent: env.commissionPercent,
      roundDigits: env.priceRoundDigits,
    },
  };
}

function buildLogger(env: SyncEnv, cli: CliOptions, io: CliIo): Logger {
  return createLogger({
    service: SERVICE_NAME,
    env: env.nodeEnv,
    level: cli.debug ? 'debug' : env.logLevel,
    ...(env.logFile ? { logFile: env.logFile } : {}),
    ...(io.logDestination ? { destination: io.logDestination } : {}),
  });
}

/**
 * One CLI invocation. Resolves to the process exit code; only unexpected errors reject.
 */
export async function runCli(io: CliIo): Promise<number> {
  let cli: CliOptions;
  let env: SyncEnv;
  try {
    cli = parseCliArgs(io.argv);
    if (cli.help) {
      io.stdout(USAGE);
      return EXIT_CODES.OK;
    }
    env = loadEnv(io.env);
  } catch (error) {
    if (!(error instanceof ConfigInvalidError)) throw error;
    io.stderr(`Configuration error (${error.variable}): ${error.message}`);
    return EXIT_CODES.CONFIG_INVALID;
  }

  const logger = buildLogger(env, cli, io);
  let platforms: PlatformPair;
  try {
    platforms = (io.createPlatforms ?? createPlatforms)(env);
  } catch (error) {
    if (!(error instanceof ConfigInvalidError)) throw error;
    logger.fatal({ variable: error.variable, error }, 'Invalid platform configuration');
    return EXIT_CODES.CONFIG_INVALID;
  }

  const outcome = await runReconciliation({
    source: platforms.source,
    target: platforms.target,
    settings: toRunSettings(env, cli),
    logger,
    ...(io.signal ? { signal: io.signal } : {}),
  });

  if (outcome.status === 'aborted') {
    io.stderr(`Run aborted: ${outcome.error.message}`);
  } else {
    io.stdout(formatRunSummary(outcome.report));
  }
  return exitCodeFor(outcome);
}
