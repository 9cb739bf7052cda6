import type { JobRecord } from '@jobsieve/parser-sdk';
import type { DedupCache } from './dedup-cache.js';
import { isPriority, isWithinRadius, isWithinSalary, MIN_SKILL_MATCH, skillMatch } from './scoring.js';
import { convertTime } from './time.js';
import type { FilterConfig, FilterDecision, FilterLogger, RunResult, SkipReason } from './types.js';

const defaultLogger: FilterLogger = {
  info: (msg) => console.log(msg),
  warn: (msg) => console.warn(msg),
  error: (msg) => console.error(msg),
};

export interface FilterOptions {
  config: FilterConfig;
  cache: DedupCache;
  logger?: FilterLogger;
  /** Records rejected before filtering. They count toward `totalScraped`. */
  dropped?: number;
}

function skip(job: JobRecord, reason: SkipReason, detail: string): FilterDecision {
  return { action: 'skip', job, reason, detail };
}

/**
 * Run one job through the filters in fixed order, stopping at the first that
 * rejects it: blocklist → dedup → salary → location → skill match.
 * Pure apart from reading the cache.
 */
export function evaluateJob(job: JobRecord, config: FilterConfig, cache: DedupCache): FilterDecision {
  if (config.blockedCompanies.has(job.company)) {
    return skip(job, 'blocked', `company ${job.company} blocked`);
  }

  if (cache.contains(job.id)) {
    return skip(job, 'duplicate', 'already processed');
  }

  if (!isWithinSalary(job.salary, config.salaryRange)) {
    return skip(job, 'salary', `salary ${job.salary ?? 'missing'} out of range`);
  }

  if (!isWithinRadius(job.location, config.locations)) {
    return skip(job, 'location', `location ${job.location || 'missing'} not desired`);
  }

  const score = skillMatch(job.skills, config.requiredSkills);
  if (score < MIN_SKILL_MATCH) {
    return skip(job, 'skills', `low skill match ${score}%`);
  }

  return {
    action: 'accept',
    job,
    filtered: {
      title: job.title,
      matchScore: score,
      salaryCompliance: true,
      priority: isPriority(job.description) ? 'high' : 'normal',
      validUntil: convertTime(job.validUntil, config.timezone),
    },
  };
}

export function formatMatchRate(filtered: number, total: number): string {
  if (total === 0) {
    return '0%';
  }

  return `${Math.floor((filtered * 100) / total)}%`;
}

/**
 * Filter a scraped batch in input order. Each accepted job is written to the
 * dedup cache before the next one is looked at, so a repeat later in the same
 * batch is dropped as a duplicate. Cache failures propagate.
 */
export function filterJobs(jobs: readonly JobRecord[], options: FilterOptions): RunResult {
  const { config, cache, logger = defaultLogger, dropped = 0 } = options;
  const matchedJobs: RunResult['matchedJobs'] = [];
  const skipped: Record<SkipReason, number> = {
    blocked: 0,
    duplicate: 0,
    salary: 0,
    location: 0,
    skills: 0,
  };

  for (const job of jobs) {
    const decision = evaluateJob(job, config, cache);

    if (decision.action === 'skip') {
      skipped[decision.reason] += 1;
      logger.info(`[filter] Skip ${job.id}: ${decision.detail}`);
      continue;
    }

    cache.record(job.id);
    matchedJobs.push(decision.filtered);
    logger.info(
      `[filter] Accept ${job.id}: skill match ${decision.filtered.matchScore}%, priority ${decision.filtered.priority}`,
    );
  }

  const totalScraped = jobs.length + dropped;
  const stats = {
    totalScraped,
    filtered: matchedJobs.length,
    matchRate: formatMatchRate(matchedJobs.length, totalScraped),
    skipped,
  };

  logger.info(`[filter] Done. ${stats.filtered} of ${stats.totalScraped} jobs matched (${stats.matchRate}).`);

  return { matchedJobs, stats };
}
