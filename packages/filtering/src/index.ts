// Pipeline
export { filterJobs, evaluateJob, formatMatchRate } from './pipeline.js';
export type { FilterOptions } from './pipeline.js';

// Individual stages
export { skillMatch, isWithinSalary, isWithinRadius, isPriority, MIN_SKILL_MATCH, PRIORITY_KEYWORDS } from './scoring.js';
export { convertTime, resolveLocalDate, parseUtcTimestamp, isKnownTimeZone, NOT_AVAILABLE } from './time.js';
export type { LocalDateResult } from './time.js';
export { FileDedupCache, InMemoryDedupCache } from './dedup-cache.js';
export type { DedupCache, OpenDedupCacheOptions } from './dedup-cache.js';

// Configuration, output and errors
export { filterConfigSchema, parseFilterConfig, loadFilterConfig } from './config.js';
export { serializeRunResult, writeRunDocument } from './output.js';
export type { RunDocument, FilteredJobDocument } from './output.js';
export { ConfigurationError, PersistenceError } from './errors.js';

// Types
export type {
  FilterConfig,
  SalaryRange,
  FilteredJob,
  Priority,
  SkipReason,
  FilterDecision,
  RunStats,
  RunResult,
  FilterLogger,
} from './types.js';
