import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { Logger } from 'pino';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConfigurationError } from '@jobsieve/filtering';
import { defineParser, type RawJobRecord } from '@jobsieve/parser-sdk';
import { runFilter } from '../src/run.js';
import type { CliSettings } from '../src/settings.js';

function createLoggerMock(): Logger {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  } as unknown as Logger;
}

const baseConfig = {
  salary_range: { min: 50000, max: 100000 },
  locations: ['Pune'],
  required_skills: ['python', 'sql'],
  blocklist_companies: ['Initech'],
  timezone: 'Asia/Kolkata',
};

const scrapedJobs: RawJobRecord[] = [
  {
    id: 'j1',
    title: 'Data Engineer',
    company: 'Acme',
    salary: 75000,
    location: 'Pune, MH',
    skills: ['Python', 'SQL', 'AWS'],
    description: 'urgent hire',
    valid_until: '2024-06-01T00:00:00Z',
  },
  { id: 'j2', title: 'Analyst', company: 'Acme', salary: 40000, location: 'Pune', skills: ['python', 'sql'] },
  { company: 'Nameless' },
  { id: 'j3', title: 'BI Developer', company: 'Initech', salary: 80000, location: 'Pune', skills: ['python', 'sql'] },
];

describe('runFilter', () => {
  let dir: string;
  let settings: CliSettings;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'jobsieve-cli-'));
    settings = {
      configPath: join(dir, 'config.json'),
      jobsPath: join(dir, 'jobs.json'),
      outputPath: join(dir, 'output.json'),
      cachePath: join(dir, 'cache.txt'),
      logFile: null,
      logLevel: 'silent',
      serviceName: 'jobsieve-test',
    };
    writeFileSync(settings.configPath, JSON.stringify(baseConfig));
    writeFileSync(settings.jobsPath, JSON.stringify(scrapedJobs));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('filters the snapshot and writes the output document', async () => {
    const logger = createLoggerMock();

    const document = await runFilter({ settings, logger });

    const expected = {
      matched_jobs: [
        {
          title: 'Data Engineer',
          match_score: 100,
          salary_compliance: true,
          priority: 'high',
          valid_until: '2024-06-01',
        },
      ],
      stats: { total_scraped: 4, filtered: 1, match_rate: '25%' },
    };
    expect(document).toEqual(expected);
    expect(JSON.parse(readFileSync(settings.outputPath, 'utf8'))).toEqual(expected);
    expect(readFileSync(settings.cachePath, 'utf8')).toBe('j1\n');
    expect(existsSync(`${settings.cachePath}.lock`)).toBe(false);
  });

  it('reports dropped jobs and logs decisions', async () => {
    const logger = createLoggerMock();

    await runFilter({ settings, logger });

    expect(vi.mocked(logger.warn)).toHaveBeenCalledWith(
      expect.objectContaining({ event: 'job_dropped', index: 2 }),
      'Dropped invalid job',
    );
    expect(vi.mocked(logger.info)).toHaveBeenCalledWith(
      { event: 'filter_decision' },
      '[filter] Skip j2: salary 40000 out of range',
    );
    expect(vi.mocked(logger.info)).toHaveBeenCalledWith(
      expect.objectContaining({ event: 'filter_completed', totalScraped: 4, filtered: 1, matchRate: '25%' }),
      'Filtering completed',
    );
  });

  it('matches nothing new on a second run over the same store', async () => {
    await runFilter({ settings, logger: createLoggerMock() });
    const second = await runFilter({ settings, logger: createLoggerMock() });

    expect(second).toEqual({
      matched_jobs: [],
      stats: { total_scraped: 4, filtered: 0, match_rate: '0%' },
    });
    expect(readFileSync(settings.cachePath, 'utf8')).toBe('j1\n');
  });

  it('fails on configuration before touching the dedup store', async () => {
    rmSync(settings.configPath);

    await expect(runFilter({ settings, logger: createLoggerMock() })).rejects.toBeInstanceOf(ConfigurationError);
    expect(existsSync(settings.cachePath)).toBe(false);
  });

  it('warns when the timezone cannot be resolved', async () => {
    writeFileSync(settings.configPath, JSON.stringify({ ...baseConfig, timezone: 'Nowhere/City' }));
    const logger = createLoggerMock();

    const document = await runFilter({ settings, logger });

    expect(vi.mocked(logger.warn)).toHaveBeenCalledWith(
      { event: 'unknown_timezone', timezone: 'Nowhere/City' },
      'Timezone cannot be resolved; expiry dates will be reported as N/A',
    );
    expect(document.matched_jobs[0]!.valid_until).toBe('N/A');
  });

  it('accepts an injected parser', async () => {
    const parser = defineParser({
      manifest: { id: 'fixture', name: 'Fixture', version: '0.0.1' },
      parse: async () => ({
        jobs: [{ id: 'x1', title: 'SQL Developer', company: 'Globex', salary: 60000, location: 'Pune', skills: ['SQL', 'Python'] }],
      }),
    });

    const document = await runFilter({ settings, logger: createLoggerMock(), parser });

    expect(document.matched_jobs).toEqual([
      { title: 'SQL Developer', match_score: 100, salary_compliance: true, priority: 'normal', valid_until: 'N/A' },
    ]);
  });

  it('releases the store lock when the parser fails', async () => {
    const parser = defineParser({
      manifest: { id: 'broken', name: 'Broken', version: '0.0.1' },
      parse: async () => {
        throw new Error('boom');
      },
    });

    await expect(runFilter({ settings, logger: createLoggerMock(), parser })).rejects.toThrow('boom');
    expect(existsSync(`${settings.cachePath}.lock`)).toBe(false);
  });

  it('keeps the parser error when the lock cannot be released', async () => {
    const lockPath = `${settings.cachePath}.lock`;
    const parser = defineParser({
      manifest: { id: 'broken', name: 'Broken', version: '0.0.1' },
      parse: async () => {
        rmSync(lockPath);
        mkdirSync(lockPath);
        writeFileSync(join(lockPath, 'pinned'), '');
        throw new Error('boom');
      },
    });
    const logger = createLoggerMock();

    await expect(runFilter({ settings, logger, parser })).rejects.toThrow('boom');
    expect(vi.mocked(logger.error)).toHaveBeenCalledWith(
      expect.objectContaining({ event: 'lock_release_failed', lockPath }),
      'Could not release dedup store lock',
    );
  });
});
