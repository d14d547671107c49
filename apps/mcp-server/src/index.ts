import { config as loadDotenv } from 'dotenv';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { AdzunaClient, AdzunaJobSearch } from '@jobdesk/provider-adzuna';
import type { Logger } from 'pino';
import { hasCredentials, loadConfig } from './config.js';
import { createServerLogger } from './observability/logger.js';
import { serializeError } from './observability/with-logger.js';
import { createJobServer } from './server.js';
import { getAllTools } from './tools/catalog.js';

interface RuntimeState {
  logger: Logger | null;
  client: AdzunaClient | null;
  server: McpServer | null;
}

const runtimeState: RuntimeState = {
  logger: null,
  client: null,
  server: null,
};

async function cleanupRuntimeState(state: RuntimeState): Promise<void> {
  state.client?.close();

  if (state.server) {
    await Promise.allSettled([state.server.close()]);
  }
}

async function run(): Promise<void> {
  loadDotenv();
  const config = loadConfig();
  const logger = createServerLogger(config);
  runtimeState.logger = logger;

  if (!hasCredentials(config.adzuna)) {
    logger.warn(
      {
        event: 'credentials_missing',
      },
      'ADZUNA_APP_ID or ADZUNA_APP_KEY is not set; upstream requests will be rejected',
    );
  }

  const client = new AdzunaClient(config.adzuna);
  runtimeState.client = client;

  const provider = new AdzunaJobSearch({ client, logger });
  const server = createJobServer({ provider, logger });
  runtimeState.server = server;

  let shuttingDown = false;
  const shutdown = async (reason: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }

    shuttingDown = true;
    logger.info(
      {
        event: 'shutdown_requested',
        reason,
      },
      'Shutdown requested',
    );

    await cleanupRuntimeState(runtimeState);

    logger.info(
      {
        event: 'shutdown_completed',
        reason,
      },
      'Shutdown completed',
    );

    process.exit(0);
  };

  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });

  process.stdin.on('end', () => {
    void shutdown('stdin_closed');
  });

  await server.connect(new StdioServerTransport());

  logger.info(
    {
      event: 'server_started',
      tools: getAllTools().map((tool) => tool.name),
      baseUrl: config.adzuna.baseUrl,
      timeoutMs: config.adzuna.timeoutMs,
    },
    'MCP server started',
  );
}

run().catch(async (error) => {
  await cleanupRuntimeState(runtimeState);
  const logger = runtimeState.logger ?? createServerLogger(loadConfig());
  logger.error(
    {
      event: 'server_fatal_error',
      error: serializeError(error),
    },
    'Server fatal error',
  );
  process.exit(1);
});
