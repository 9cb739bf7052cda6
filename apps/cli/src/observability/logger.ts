import pino, { type Logger, type LoggerOptions } from 'pino';
import type { CliSettings } from '../settings.js';

export type LoggerSettings = Pick<CliSettings, 'logFile' | 'logLevel' | 'serviceName'>;

export function createCliLogger(settings: LoggerSettings): Logger {
  const options: LoggerOptions = {
    level: settings.logLevel,
    base: { service: settings.serviceName },
    timestamp: () => `,"ts":"${new Date().toISOString()}"`,
    formatters: {
      level: (label) => ({ level: label }),
    },
    messageKey: 'message',
  };

  if (!settings.logFile) {
    return pino(options);
  }

  // Synchronous so every decision is on disk before the process exits.
  return pino(options, pino.destination({ dest: settings.logFile, mkdir: true, append: true, sync: true }));
}
