import type { JobRecord } from '@jobsieve/parser-sdk';

export interface SalaryRange {
  min: number;
  max: number;
}

/**
 * Validated filter settings, fixed for the duration of a run.
 */
export interface FilterConfig {
  readonly salaryRange: SalaryRange;
  readonly locations: readonly string[];
  readonly requiredSkills: readonly string[];
  readonly blockedCompanies: ReadonlySet<string>;
  readonly timezone: string;
}

export type Priority = 'high' | 'normal';

/**
 * A job that survived every filter, annotated for output.
 */
export interface FilteredJob {
  title: string;
  matchScore: number;
  // Compliance is a precondition for acceptance, so this is always true.
  salaryCompliance: true;
  priority: Priority;
  validUntil: string;
}

/**
 * Why a job was dropped, in the order the filters run.
 */
export type SkipReason = 'blocked' | 'duplicate' | 'salary' | 'location' | 'skills';

export type FilterDecision =
  | { action: 'accept'; job: JobRecord; filtered: FilteredJob }
  | { action: 'skip'; job: JobRecord; reason: SkipReason; detail: string };

export interface RunStats {
  totalScraped: number;
  filtered: number;
  matchRate: string;
  skipped: Record<SkipReason, number>;
}

export interface RunResult {
  matchedJobs: FilteredJob[];
  stats: RunStats;
}

/**
 * Minimal logger interface. The pipeline falls back to console.
 */
export interface FilterLogger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}
