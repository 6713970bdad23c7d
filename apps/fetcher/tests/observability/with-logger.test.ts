import { describe, expect, it } from 'vitest';
import { resolveTraceId, withRunLogger } from '../../src/observability/with-logger.js';
import { captureLogger } from '../test-helpers.js';

describe('resolveTraceId', () => {
  it('keeps a supplied trace id without surrounding whitespace', () => {
    expect(resolveTraceId('  cron-2024-06-01 \n')).toBe('cron-2024-06-01');
  });

  it('caps overly long trace ids', () => {
    expect(resolveTraceId('x'.repeat(300))).toBe('x'.repeat(128));
  });

  it('generates a UUID for missing or blank values', () => {
    expect(resolveTraceId()).toMatch(/^[0-9a-f-]{36}$/i);
    expect(resolveTraceId('   ')).toMatch(/^[0-9a-f-]{36}$/i);
    expect(resolveTraceId('')).not.toBe(resolveTraceId(''));
  });
});

describe('withRunLogger', () => {
  it('logs start/completion and returns handler result', async () => {
    const { logger, entries } = captureLogger();

    const result = await withRunLogger({
      logger,
      name: 'fetch-channel',
      traceId: 'trace-1',
      context: () => ({ sourceId: 'telegram-export:breachdetector' }),
      summary: (value: { added: number }) => ({ added: value.added }),
      run: async () => ({ added: 5 }),
    });

    expect(result).toEqual({ added: 5 });
    const logged = entries();
    expect(logged).toHaveLength(2);
    expect(logged[0]).toMatchObject({
      event: 'run_started',
      run: 'fetch-channel',
      traceId: 'trace-1',
      sourceId: 'telegram-export:breachdetector',
      message: 'Run started',
    });
    expect(logged[1]).toMatchObject({
      event: 'run_completed',
      traceId: 'trace-1',
      added: 5,
      message: 'Run completed',
    });
  });

  it('logs the trimmed trace id from the environment', async () => {
    const { logger, entries } = captureLogger();

    const traceId = await withRunLogger({ logger, name: 'fetch-channel', traceId: ' nightly-7 ', run: async (id) => id });

    expect(traceId).toBe('nightly-7');
    expect(entries()[0]).toMatchObject({ event: 'run_started', traceId: 'nightly-7' });
  });

  it('passes a generated trace id to the handler', async () => {
    const { logger, entries } = captureLogger();

    const traceId = await withRunLogger({ logger, name: 'fetch-channel', run: async (id) => id });

    expect(traceId).toMatch(/^[0-9a-f-]{36}$/i);
    expect(entries()[0]).toMatchObject({ traceId });
  });

  it('logs failure and rethrows', async () => {
    const { logger, entries } = captureLogger();

    await expect(
      withRunLogger({
        logger,
        name: 'fetch-channel',
        run: async () => {
          throw new Error('boom');
        },
      }),
    ).rejects.toThrow('boom');

    const logged = entries();
    expect(logged).toHaveLength(2);
    expect(logged[1]).toMatchObject({
      level: 50,
      event: 'run_failed',
      run: 'fetch-channel',
      error: { name: 'Error', message: 'boom' },
    });
  });
});
