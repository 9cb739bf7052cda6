import type { SalaryRange } from './types.js';

/** Jobs scoring below this skill match are dropped. */
export const MIN_SKILL_MATCH = 60;

/** Description phrases that flag a listing as high priority. */
export const PRIORITY_KEYWORDS = ['urgent', 'immediate joiner', 'priority'] as const;

/**
 * Percentage of required skills present in the job's skill list, case-insensitive,
 * floored to an integer. Divides by the configured list length, so the caller
 * must never pass an empty `requiredSkills`.
 */
export function skillMatch(jobSkills: readonly string[], requiredSkills: readonly string[]): number {
  if (jobSkills.length === 0) {
    return 0;
  }

  const offered = new Set(jobSkills.map((skill) => skill.toLowerCase()));
  const matched = new Set(requiredSkills.map((skill) => skill.toLowerCase()).filter((skill) => offered.has(skill)));
  return Math.floor((matched.size * 100) / requiredSkills.length);
}

export function isWithinSalary(salary: number | undefined, range: SalaryRange): boolean {
  if (salary === undefined) {
    return false;
  }

  return range.min <= salary && salary <= range.max;
}

/**
 * Substring match of any target city against the job location.
 */
export function isWithinRadius(location: string, targets: readonly string[]): boolean {
  const haystack = location.toLowerCase();
  return targets.some((target) => haystack.includes(target.toLowerCase()));
}

export function isPriority(description: string): boolean {
  const text = description.toLowerCase();
  return PRIORITY_KEYWORDS.some((keyword) => text.includes(keyword));
}
