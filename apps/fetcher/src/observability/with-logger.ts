import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';

const MAX_TRACE_ID_LENGTH = 128;

interface SerializedError {
  name?: string;
  message: string;
  stack?: string;
}

/**
 * Trace id for a run: the caller's value (usually `TRACE_ID` from the
 * scheduler) trimmed and capped, or a fresh UUID when blank.
 */
export function resolveTraceId(candidate?: string): string {
  const trimmed = candidate?.trim().slice(0, MAX_TRACE_ID_LENGTH);
  return trimmed ? trimmed : randomUUID();
}

export function serializeError(error: unknown): SerializedError {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return {
    message: String(error),
  };
}

export interface WithRunLoggerOptions<TResult> {
  logger: Logger;
  /** Run name, e.g. `fetch-channel`. */
  name: string;
  traceId?: string;
  context?: (traceId: string) => Record<string, unknown>;
  summary?: (result: TResult) => Record<string, unknown>;
  run: (traceId: string) => Promise<TResult>;
}

export async function withRunLogger<TResult>({
  logger,
  name,
  traceId: incomingTraceId,
  context,
  summary,
  run,
}: WithRunLoggerOptions<TResult>): Promise<TResult> {
  const traceId = resolveTraceId(incomingTraceId);
  const startedAt = Date.now();
  const common = {
    run: name,
    traceId,
    ...(context ? context(traceId) : {}),
  };

  logger.info(
    {
      event: 'run_started',
      ...common,
    },
    'Run started',
  );

  try {
    const result = await run(traceId);
    logger.info(
      {
        event: 'run_completed',
        ...common,
        durationMs: Date.now() - startedAt,
        ...(summary ? summary(result) : {}),
      },
      'Run completed',
    );
    return result;
  } catch (error) {
    logger.error(
      {
        event: 'run_failed',
        ...common,
        durationMs: Date.now() - startedAt,
        error: serializeError(error),
      },
      'Run failed',
    );
    throw error;
  }
}
