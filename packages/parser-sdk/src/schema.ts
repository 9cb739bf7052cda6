import { z } from 'zod';
import type { JobRecord } from './types.js';

/**
 * Trim whitespace and collapse runs (including line breaks) to one space.
 */
export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

// Field-level fallbacks: a malformed value degrades to its empty form instead of
// dropping the whole listing.
const plainText = z.string().catch('');
const cleanText = z.string().transform(normalizeWhitespace).catch('');

const skillList = z
  .array(z.unknown())
  .transform((values) =>
    values
      .filter((value): value is string => typeof value === 'string')
      .map(normalizeWhitespace)
      .filter((value) => value.length > 0),
  )
  .catch([]);

export const jobRecordSchema = z
  .object({
    // Kept verbatim: two ids that differ only in spacing are two listings.
    id: z
      .union([z.string(), z.number().finite()])
      .transform((value) => String(value))
      .nullish()
      .catch(undefined),
    title: cleanText,
    company: cleanText,
    salary: z.number().finite().nullish().catch(undefined),
    location: cleanText,
    skills: skillList,
    description: plainText,
    valid_until: z.string().trim().catch(''),
  })
  .transform((job, ctx): JobRecord => {
    const id = job.id || job.title;
    if (!id) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['id'],
        message: 'job has neither an id nor a title',
      });
      return z.NEVER;
    }

    // The dedup store holds one id per line.
    if (/[\r\n]/.test(id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['id'],
        message: 'job id contains a line break',
      });
      return z.NEVER;
    }

    return {
      id,
      title: job.title,
      company: job.company,
      salary: job.salary ?? undefined,
      location: job.location,
      skills: job.skills,
      description: job.description,
      validUntil: job.valid_until,
    };
  });

export interface ValidateJobRecordsOptions {
  onInvalid?: (issues: z.ZodIssue[], job: unknown, index: number) => void;
}

export function validateJobRecords(jobs: readonly unknown[], options?: ValidateJobRecordsOptions): JobRecord[] {
  const valid: JobRecord[] = [];

  jobs.forEach((job, index) => {
    const result = jobRecordSchema.safeParse(job);
    if (result.success) {
      valid.push(result.data);
    } else {
      options?.onInvalid?.(result.error.issues, job, index);
    }
  });

  return valid;
}
