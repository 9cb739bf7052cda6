import {
  FileDedupCache,
  filterJobs,
  isKnownTimeZone,
  loadFilterConfig,
  writeRunDocument,
  type FilterConfig,
  type RunDocument,
} from '@jobsieve/filtering';
import { validateJobRecords, type Parser } from '@jobsieve/parser-sdk';
import { createSnapshotParser } from '@jobsieve/parser-snapshot';
import type { Logger } from 'pino';
import { createFilterLogger } from './observability/filter-logger.js';
import { serializeError } from './observability/serialize-error.js';
import type { CliSettings } from './settings.js';

export interface RunFilterOptions {
  settings: CliSettings;
  logger: Logger;
  /** Source of scraped jobs. Defaults to the snapshot at `settings.jobsPath`. */
  parser?: Parser;
}

/**
 * One filtering run: config → dedup store → jobs → filter → output document.
 * Config problems surface before the store is touched. The store lock is
 * released whatever happens after it is taken; a failure to release it only
 * fails a run that otherwise succeeded.
 */
export async function runFilter({ settings, logger, parser }: RunFilterOptions): Promise<RunDocument> {
  const startedAt = Date.now();
  const config = await loadFilterConfig(settings.configPath);

  if (!isKnownTimeZone(config.timezone)) {
    logger.warn(
      { event: 'unknown_timezone', timezone: config.timezone },
      'Timezone cannot be resolved; expiry dates will be reported as N/A',
    );
  }

  const source = parser ?? createSnapshotParser(settings.jobsPath);
  const cache = FileDedupCache.open(settings.cachePath);

  let document: RunDocument;
  try {
    document = await filterSnapshot(source, cache, config, settings, logger, startedAt);
  } catch (error) {
    releaseAfterFailure(cache, logger);
    throw error;
  }

  cache.close();
  return document;
}

// The run has already failed; a lock that will not release is logged, not thrown over it.
function releaseAfterFailure(cache: FileDedupCache, logger: Logger): void {
  try {
    cache.close();
  } catch (error) {
    logger.error(
      { event: 'lock_release_failed', lockPath: cache.lockPath, error: serializeError(error) },
      'Could not release dedup store lock',
    );
  }
}

async function filterSnapshot(
  source: Parser,
  cache: FileDedupCache,
  config: FilterConfig,
  settings: CliSettings,
  logger: Logger,
  startedAt: number,
): Promise<RunDocument> {
  const { jobs: rawJobs } = await source.parse();
  const jobs = validateJobRecords(rawJobs, {
    onInvalid: (issues, _job, index) =>
      logger.warn(
        { event: 'job_dropped', index, issues: issues.map((issue) => issue.message) },
        'Dropped invalid job',
      ),
  });

  logger.info(
    {
      event: 'filter_started',
      parserId: source.manifest.id,
      received: rawJobs.length,
      valid: jobs.length,
      cachedIds: cache.size,
    },
    'Filtering started',
  );

  const result = filterJobs(jobs, {
    config,
    cache,
    logger: createFilterLogger(logger),
    dropped: rawJobs.length - jobs.length,
  });
  const document = await writeRunDocument(settings.outputPath, result);

  logger.info(
    {
      event: 'filter_completed',
      totalScraped: result.stats.totalScraped,
      filtered: result.stats.filtered,
      matchRate: result.stats.matchRate,
      skipped: result.stats.skipped,
      outputPath: settings.outputPath,
      durationMs: Date.now() - startedAt,
    },
    'Filtering completed',
  );

  return document;
}
