import type { Logger } from 'pino';
import { ensureTraceId } from './trace.js';

interface SerializedError {
  name?: string;
  message: string;
  stack?: string;
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

export interface WithLoggerOptions<TResult> {
  logger: Logger;
  tool: string;
  requestId?: string | number;
  context?: (requestId: string) => Record<string, unknown>;
  summary?: (result: TResult) => Record<string, unknown>;
  run: () => Promise<TResult>;
}

export async function withLogger<TResult>({
  logger,
  tool,
  requestId: rawRequestId,
  context,
  summary,
  run,
}: WithLoggerOptions<TResult>): Promise<TResult> {
  const requestId = ensureTraceId(rawRequestId);
  const startedAt = Date.now();
  const common = {
    tool,
    requestId,
    ...(context ? context(requestId) : {}),
  };

  logger.info(
    {
      event: 'tool_started',
      ...common,
    },
    'Tool call started',
  );

  try {
    const result = await run();
    logger.info(
      {
        event: 'tool_completed',
        ...common,
        durationMs: Date.now() - startedAt,
        ...(summary ? summary(result) : {}),
      },
      'Tool call completed',
    );
    return result;
  } catch (error) {
    logger.error(
      {
        event: 'tool_failed',
        ...common,
        durationMs: Date.now() - startedAt,
        error: serializeError(error),
      },
      'Tool call failed',
    );
    throw error;
  }
}
