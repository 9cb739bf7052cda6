import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { defineParser, type Parser, type ParseResult } from '@jobsieve/parser-sdk';

/**
 * The snapshot file exists but does not hold a job list.
 */
export class SnapshotFormatError extends Error {
  readonly filePath: string;

  constructor(filePath: string, detail: string, options?: ErrorOptions) {
    super(`Job snapshot ${filePath} ${detail}`, options);
    this.name = 'SnapshotFormatError';
    this.filePath = filePath;
  }
}

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null;
}

/**
 * Accepts either a bare array or `{ "jobs": [...] }`.
 */
export function extractJobs(document: unknown): unknown[] | null {
  if (Array.isArray(document)) {
    return document;
  }

  if (isRecord(document) && Array.isArray(document.jobs)) {
    return document.jobs;
  }

  return null;
}

/**
 * Replays the JSON a scraping run left on disk. Field-level validation is the
 * parser SDK's job; this only checks the outer shape.
 */
export function createSnapshotParser(filePath: string): Parser {
  return defineParser({
    manifest: {
      id: 'snapshot',
      name: `Snapshot ${basename(filePath)}`,
      version: '0.1.0',
    },
    async parse(): Promise<ParseResult> {
      const raw = await readFile(filePath, 'utf8');

      let document: unknown;
      try {
        document = JSON.parse(raw);
      } catch (error) {
        throw new SnapshotFormatError(filePath, 'is not valid JSON', { cause: error });
      }

      const jobs = extractJobs(document);
      if (!jobs) {
        throw new SnapshotFormatError(filePath, 'must be an array of jobs or an object with a "jobs" array');
      }

      return { jobs };
    },
  });
}
