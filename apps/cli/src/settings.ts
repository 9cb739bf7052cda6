import type { LevelWithSilent } from 'pino';

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const satisfies readonly LevelWithSilent[];

const DEFAULT_LOG_LEVEL: LevelWithSilent = 'info';
const DEFAULT_SERVICE_NAME = 'jobsieve-cli';
const DEFAULT_LOG_FILE = 'logs/filter.log';

export interface CliSettings {
  configPath: string;
  jobsPath: string;
  outputPath: string;
  cachePath: string;
  /** Null sends logs to stdout. */
  logFile: string | null;
  logLevel: LevelWithSilent;
  serviceName: string;
}

type Env = Record<string, string | undefined>;

function readPathEnv(env: Env, name: string, fallback: string): string {
  const value = env[name]?.trim();
  return value ? value : fallback;
}

function readLogLevel(env: Env): LevelWithSilent {
  const raw = env.LOG_LEVEL?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === raw) ?? DEFAULT_LOG_LEVEL;
}

function readLogFile(env: Env): string | null {
  const raw = env.LOG_FILE;
  if (raw === undefined) {
    return DEFAULT_LOG_FILE;
  }

  return raw.trim() || null;
}

export function readCliSettings(env: Env = process.env): CliSettings {
  return {
    configPath: readPathEnv(env, 'FILTER_CONFIG_PATH', 'config.json'),
    jobsPath: readPathEnv(env, 'JOBS_PATH', 'jobs.json'),
    outputPath: readPathEnv(env, 'OUTPUT_PATH', 'output.json'),
    cachePath: readPathEnv(env, 'DEDUP_CACHE_PATH', 'cache.txt'),
    logFile: readLogFile(env),
    logLevel: readLogLevel(env),
    serviceName: env.LOG_SERVICE_NAME?.trim() || DEFAULT_SERVICE_NAME,
  };
}
