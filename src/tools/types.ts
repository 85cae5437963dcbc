import type { z } from "zod";
import type { IYouTrackService } from "../services/types.js";
import type { Logger } from "../logger.js";

export type McpToolResponse = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

export interface McpToolContext {
  services: {
    youtrack: IYouTrackService;
  };
  /** Qualifies bare issue numbers ("123" -> "DEMO-123"); unset disables it. */
  defaultProjectKey?: string;
  logger: Logger;
}

export interface McpTool {
  name: string;
  description: string;
  schema: z.ZodType;
  handler: (args: unknown, context: McpToolContext) => Promise<McpToolResponse> | McpToolResponse;
}
