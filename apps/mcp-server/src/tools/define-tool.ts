import { z } from 'zod';
import type { JobTool, ToolDefinition, ToolEnvelope } from './types.js';

/**
 * Typed helper for tool definitions; erases the input shape for the catalog.
 */
export function defineTool<TShape extends z.ZodRawShape, TResult extends ToolEnvelope>(
  definition: ToolDefinition<TShape, TResult>,
): JobTool {
  const schema = z.object(definition.inputShape);

  return {
    name: definition.name,
    title: definition.title,
    description: definition.description,
    inputShape: definition.inputShape,
    async execute(input, context) {
      const args = schema.parse(input);
      const payload = await definition.run(args, context);

      return {
        payload,
        summary: { totalFound: payload.total_found },
      };
    },
  };
}
