import { parseArgs } from 'node:util';

import { CONCURRENCY_MAX, ConfigInvalidError } from '@pricesync/config';

export type CliOptions = Readonly<{
  help: boolean;
  /** Overrides SYNC_DRY_RUN when the flag is given. */
  dryRun: boolean | undefined;
  /** Overrides SYNC_CONCURRENCY when the flag is given. */
  concurrency: number | undefined;
  /** Forces LOG_LEVEL=debug. */
  debug: boolean;
}>;

export const USAGE = `Usage: catalog-price-sync [--dry-run] [--concurrency N] [--debug] [--help]

Reconciles target platform prices against the source platform catalog.
Configuration is read from the environment (and a .env file when present).

Options:
  --dry-run          plan and report without writing any price
  --concurrency N    parallel price updates, 1..${CONCURRENCY_MAX}
  --debug            log at debug level, overriding LOG_LEVEL
  -h, --help         show this help`;

const OPTIONS = {
  'dry-run': { type: 'boolean' },
  concurrency: { type: 'string' },
  debug: { type: 'boolean' },
  help: { type: 'boolean', short: 'h' },
} as const;

function readFlags(argv: readonly string[]) {
  try {
    return parseArgs({ args: [...argv], options: OPTIONS, strict: true, allowPositionals: false })
      .values;
  } catch (error) {
    throw new ConfigInvalidError('argv', error instanceof Error ? error.message : String(error));
  }
}

/** Unknown flags and a malformed --concurrency are configuration errors. */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  const values = readFlags(argv);

  let concurrency: number | undefined;
  if (values.concurrency !== undefined) {
    concurrency = Number(values.concurrency);
    if (!Number.isInteger(concurrency) || concurrency < 1 || concurrency > CONCURRENCY_MAX) {
      throw new ConfigInvalidError(
        '--concurrency',
        `Invalid --concurrency: ${values.concurrency} (expected an integer in [1, ${CONCURRENCY_MAX}])`
      );
    }
  }

  return {
    help: values.help ?? false,
    dryRun: values['dry-run'],
    concurrency,
    debug: values.debug ?? false,
  };
}
