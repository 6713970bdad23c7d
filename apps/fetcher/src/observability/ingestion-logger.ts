import type { IngestionLogger } from '@breachfeed/ingestion';
import type { StoreLogger } from '@breachfeed/store';
import type { Logger } from 'pino';

export function createIngestionLogger(logger: Logger): IngestionLogger {
  return {
    debug: (message) => logger.trace({ event: 'ingestion_stage' }, message),
    info: (message) => logger.debug({ event: 'ingestion_stage' }, message),
    warn: (message) => logger.warn({ event: 'ingestion_stage' }, message),
    error: (message) => logger.error({ event: 'ingestion_stage' }, message),
  };
}

export function createStoreLogger(logger: Logger): StoreLogger {
  return {
    info: (message) => logger.debug({ event: 'store' }, message),
    warn: (message) => logger.warn({ event: 'store' }, message),
    error: (message) => logger.error({ event: 'store' }, message),
  };
}
