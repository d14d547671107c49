import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { JobSearchProvider } from '@jobdesk/listing-sdk';
import type { Logger } from 'pino';
import { withLogger } from './observability/with-logger.js';
import { getAllTools } from './tools/catalog.js';
import type { JobTool, ToolContext } from './tools/types.js';

export const SERVER_NAME = 'jobs-internships-server';
export const SERVER_VERSION = '0.1.0';

export interface CreateJobServerOptions {
  provider: JobSearchProvider;
  logger: Logger;
  now?: () => Date;
  tools?: JobTool[];
}

export function createJobServer({ provider, logger, now, tools }: CreateJobServerOptions): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });
  const context: ToolContext = {
    provider,
    now: now ?? (() => new Date()),
  };

  for (const tool of tools ?? getAllTools()) {
    server.registerTool(
      tool.name,
      {
        title: tool.title,
        description: tool.description,
        inputSchema: tool.inputShape,
      },
      async (args, extra) => {
        const execution = await withLogger({
          logger,
          tool: tool.name,
          requestId: extra.requestId,
          context: () => ({ source: provider.sourceName }),
          summary: (result) => result.summary,
          run: () => tool.execute(args, context),
        });

        return {
          content: [
            {
              type: 'text' as const,
              text: JSON.stringify(execution.payload, null, 2),
            },
          ],
        };
      },
    );
  }

  return server;
}
