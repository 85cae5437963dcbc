import { type z, ZodError } from "zod";
import { formatJsonResponse } from "../utils/timestamps.js";
import type { McpToolResponse, McpToolContext, McpTool } from "./types.js";

type ToolHandler<A> = (args: A, context: McpToolContext) => Promise<McpToolResponse> | McpToolResponse;

/**
 * Describes a failed call for the error payload: `summary` prefixes the cause
 * ("Failed to get work items for issue DEMO-1: <cause>") and `details` echoes the
 * inputs the call was attempted with.
 */
export interface FailureContext {
  summary: string;
  details: Record<string, unknown>;
}

/** Success payloads get `<field>_iso8601` companions for epoch timestamps. */
export function mcpSuccess(data: unknown): McpToolResponse {
  return {
    content: [{ type: "text", text: formatJsonResponse(data) }],
  };
}

export function mcpError(errorMessage: string, details?: Record<string, unknown>): McpToolResponse {
  return {
    content: [{ type: "text", text: JSON.stringify({ success: false, error: errorMessage, ...details }, null, 2) }],
    isError: true,
  };
}

export function withErrorHandling<A>(
  handler: ToolHandler<A>,
  describeFailure?: (args: A, context: McpToolContext) => FailureContext,
): ToolHandler<A> {
  return async (args: A, context: McpToolContext): Promise<McpToolResponse> => {
    try {
      return await handler(args, context);
    } catch (error) {
      if (error instanceof ZodError) {
        const details = error.issues.map(i => `${i.path.join(".")}: ${i.message}`).join("; ");
        return mcpError(`Validation failed: ${details}`);
      }
      const cause = error instanceof Error ? error.message : "Unknown error occurred";
      const failure = describeFailure?.(args, context);
      const errorMessage = failure ? `${failure.summary}: ${cause}` : cause;
      context.logger.error("Tool handler error", {
        error: errorMessage,
        stack: error instanceof Error ? error.stack : undefined,
      });
      return mcpError(errorMessage, failure?.details);
    }
  };
}

export function defineTool<T extends z.ZodType>(def: {
  name: string;
  description: string;
  schema: T;
  handler: ToolHandler<z.infer<T>>;
  describeFailure?: (args: z.infer<T>, context: McpToolContext) => FailureContext;
}): McpTool {
  const guarded = withErrorHandling(def.handler, def.describeFailure);

  return {
    name: def.name,
    description: def.description,
    schema: def.schema,
    handler: withErrorHandling((args: unknown, context: McpToolContext) => {
      const validated = def.schema.parse(args);
      return guarded(validated, context);
    }),
  };
}
