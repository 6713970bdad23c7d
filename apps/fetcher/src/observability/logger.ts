import pino, { type DestinationStream, type LevelWithSilent, type Logger } from 'pino';

const DEFAULT_LOG_LEVEL: LevelWithSilent = 'info';
const DEFAULT_SERVICE_NAME = 'breachfeed-fetcher';
const VALID_LOG_LEVELS: readonly LevelWithSilent[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function readLogLevel(): LevelWithSilent {
  const raw = process.env.LOG_LEVEL?.trim().toLowerCase();
  return VALID_LOG_LEVELS.find((level) => level === raw) ?? DEFAULT_LOG_LEVEL;
}

export function createFetcherLogger(destination?: DestinationStream): Logger {
  const service = process.env.LOG_SERVICE_NAME?.trim() || DEFAULT_SERVICE_NAME;
  const options = {
    level: readLogLevel(),
    base: { service },
    timestamp: () => `,"ts":"${new Date().toISOString()}"`,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    messageKey: 'message',
  };

  return destination ? pino(options, destination) : pino(options);
}
