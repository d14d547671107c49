import type { z } from 'zod';
import type { JobSearchProvider } from '@jobdesk/listing-sdk';

export interface ToolContext {
  provider: JobSearchProvider;
  now: () => Date;
}

export type ToolInput<TShape extends z.ZodRawShape> = z.objectOutputType<TShape, z.ZodTypeAny, 'strip'>;

export interface ToolEnvelope {
  total_found: number;
}

export interface ToolDefinition<TShape extends z.ZodRawShape, TResult extends ToolEnvelope> {
  name: string;
  title: string;
  description: string;
  inputShape: TShape;
  run(input: ToolInput<TShape>, context: ToolContext): Promise<TResult>;
}

export interface ToolExecution {
  payload: ToolEnvelope;
  summary: Record<string, unknown>;
}

/**
 * Type-erased tool as seen by the catalog and the MCP wiring.
 * `execute` validates raw arguments against `inputShape` itself.
 */
export interface JobTool {
  name: string;
  title: string;
  description: string;
  inputShape: z.ZodRawShape;
  execute(input: unknown, context: ToolContext): Promise<ToolExecution>;
}
