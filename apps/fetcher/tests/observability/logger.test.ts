import { afterEach, describe, expect, it, vi } from 'vitest';
import { createFetcherLogger } from '../../src/observability/logger.js';

function collect() {
  const lines: string[] = [];
  return {
    destination: {
      write: (line: string) => {
        lines.push(line);
      },
    },
    parsed: (): unknown[] => lines.map((line): unknown => JSON.parse(line)),
  };
}

describe('createFetcherLogger', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('writes labelled JSON lines with the service name', () => {
    vi.stubEnv('LOG_LEVEL', 'info');
    vi.stubEnv('LOG_SERVICE_NAME', '');
    const { destination, parsed } = collect();
    const logger = createFetcherLogger(destination);

    logger.info({ event: 'run_started' }, 'Run started');

    const [entry] = parsed();
    expect(entry).toMatchObject({
      level: 'info',
      service: 'breachfeed-fetcher',
      event: 'run_started',
      message: 'Run started',
    });
    expect(entry).toHaveProperty('ts');
  });

  it('honours LOG_LEVEL and LOG_SERVICE_NAME', () => {
    vi.stubEnv('LOG_LEVEL', 'WARN');
    vi.stubEnv('LOG_SERVICE_NAME', 'leak-fetcher');
    const { destination, parsed } = collect();
    const logger = createFetcherLogger(destination);

    logger.info('hidden');
    logger.warn('shown');

    expect(parsed()).toEqual([expect.objectContaining({ level: 'warn', service: 'leak-fetcher', message: 'shown' })]);
  });

  it('falls back to info for unknown levels', () => {
    vi.stubEnv('LOG_LEVEL', 'verbose');
    const { destination } = collect();

    expect(createFetcherLogger(destination).level).toBe('info');
  });
});
