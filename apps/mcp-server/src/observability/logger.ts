import pino, { type DestinationStream, type Logger } from 'pino';
import type { ServerConfig } from '../config.js';

const STDERR_FD = 2;

/**
 * stdout belongs to the MCP stdio transport, so logs go to stderr by default.
 */
export function createServerLogger(
  config: Pick<ServerConfig, 'logLevel' | 'serviceName'>,
  destination: DestinationStream = pino.destination(STDERR_FD),
): Logger {
  return pino(
    {
      level: config.logLevel,
      base: { service: config.serviceName },
      timestamp: () => `,"ts":"${new Date().toISOString()}"`,
      formatters: {
        level: (label) => ({ level: label }),
      },
      messageKey: 'message',
    },
    destination,
  );
}
