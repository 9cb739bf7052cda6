import { readFile } from 'node:fs/promises';
import { normalizeWhitespace } from '@jobsieve/parser-sdk';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import type { FilterConfig } from './types.js';

const salaryRangeSchema = z
  .object({
    min: z.number().int(),
    max: z.number().int(),
  })
  .refine((range) => range.min <= range.max, {
    message: 'min must not exceed max',
  });

/**
 * On-disk shape of the filter settings. Keys the scrapers read (job_titles and
 * friends) are stripped rather than rejected.
 */
export const filterConfigSchema = z
  .object({
    salary_range: salaryRangeSchema,
    locations: z.array(z.string()),
    // Skill match divides by this list's length.
    required_skills: z.array(z.string().trim().min(1)).min(1, 'must list at least one skill'),
    // Compared against company names, which are whitespace-normalized on input.
    blocklist_companies: z.array(z.string().transform(normalizeWhitespace)).default([]),
    timezone: z.string().trim().min(1),
  })
  .transform(
    (raw): FilterConfig => ({
      salaryRange: { min: raw.salary_range.min, max: raw.salary_range.max },
      locations: raw.locations,
      requiredSkills: raw.required_skills,
      blockedCompanies: new Set(raw.blocklist_companies),
      timezone: raw.timezone,
    }),
  );

function formatIssue(issue: z.ZodIssue): string {
  const path = issue.path.join('.') || '(root)';
  return `${path}: ${issue.message}`;
}

export function parseFilterConfig(value: unknown): FilterConfig {
  const result = filterConfigSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map(formatIssue);
    throw new ConfigurationError(`Invalid filter configuration: ${issues.join('; ')}`, issues);
  }

  return result.data;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export async function loadFilterConfig(path: string): Promise<FilterConfig> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (error) {
    const message = isMissingFile(error)
      ? `Filter configuration not found: ${path}`
      : `Could not read filter configuration ${path}: ${error instanceof Error ? error.message : String(error)}`;
    throw new ConfigurationError(message, [], { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Filter configuration ${path} is not valid JSON`, [], { cause: error });
  }

  return parseFilterConfig(parsed);
}
