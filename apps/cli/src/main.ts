import { ConfigurationError, PersistenceError } from '@jobsieve/filtering';
import type { Logger } from 'pino';
import { createCliLogger } from './observability/logger.js';
import { serializeError } from './observability/serialize-error.js';
import { runFilter } from './run.js';
import type { CliSettings } from './settings.js';

export function describeFailure(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  if (error instanceof ConfigurationError) return `Configuration error: ${message}`;
  if (error instanceof PersistenceError) return `Dedup store error: ${message}`;
  return `Fatal error: ${message}`;
}

/**
 * Run the CLI once and return its exit code. Every failure, including one
 * opening the log file, ends in a single stderr line.
 */
export async function main(settings: CliSettings): Promise<number> {
  let logger: Logger | undefined;

  try {
    logger = createCliLogger(settings);
    const document = await runFilter({ settings, logger });
    process.stdout.write(
      `Filtered ${document.stats.filtered} of ${document.stats.total_scraped} jobs. See '${settings.outputPath}' for results.\n`,
    );
    return 0;
  } catch (error) {
    logger?.error({ event: 'filter_failed', error: serializeError(error) }, 'Filtering failed');
    process.stderr.write(`${describeFailure(error)}\n`);
    return 1;
  }
}
