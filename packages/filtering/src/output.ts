import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { Priority, RunResult } from './types.js';

export interface FilteredJobDocument {
  title: string;
  match_score: number;
  salary_compliance: boolean;
  priority: Priority;
  valid_until: string;
}

/**
 * Flat output document consumed downstream.
 */
export interface RunDocument {
  matched_jobs: FilteredJobDocument[];
  stats: {
    total_scraped: number;
    filtered: number;
    match_rate: string;
  };
}

export function serializeRunResult(result: RunResult): RunDocument {
  return {
    matched_jobs: result.matchedJobs.map((job) => ({
      title: job.title,
      match_score: job.matchScore,
      salary_compliance: job.salaryCompliance,
      priority: job.priority,
      valid_until: job.validUntil,
    })),
    stats: {
      total_scraped: result.stats.totalScraped,
      filtered: result.stats.filtered,
      match_rate: result.stats.matchRate,
    },
  };
}

export async function writeRunDocument(path: string, result: RunResult): Promise<RunDocument> {
  const document = serializeRunResult(result);
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, `${JSON.stringify(document, null, 2)}\n`, 'utf8');
  return document;
}
