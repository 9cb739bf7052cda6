import type { FilterLogger } from '@jobsieve/filtering';
import type { Logger } from 'pino';

export function createFilterLogger(logger: Logger): FilterLogger {
  return {
    info: (message) => logger.info({ event: 'filter_decision' }, message),
    warn: (message) => logger.warn({ event: 'filter_decision' }, message),
    error: (message) => logger.error({ event: 'filter_decision' }, message),
  };
}
