import { z } from "zod";
import { normalizeQueryParameter } from "../utils/identifiers.js";
import { defineTool, mcpSuccess } from "./tool-utils.js";

const SearchIssuesInputSchema = z.object({
  query: z
    .string()
    .trim()
    .min(1, "Query is required")
    .describe("YouTrack search query (e.g., 'project: DEMO #Unresolved', 'for: me', '123')"),
  limit: z
    .number()
    .int()
    .min(1)
    .max(100)
    .optional()
    .default(10)
    .describe("Maximum number of issues to return"),
});

export const searchIssuesTool = defineTool({
  name: "search_issues",
  description:
    "Search YouTrack issues with the YouTrack query language. Bare issue numbers are qualified with the default project key.",
  schema: SearchIssuesInputSchema,
  handler: async (args, context) => {
    const query = normalizeQueryParameter(args.query, context.defaultProjectKey);
    context.logger.info(`Searching issues: ${query}`);

    const issues = await context.services.youtrack.searchIssues(query, args.limit);

    return mcpSuccess({
      success: true,
      query,
      issues,
      summary: { total_found: issues.length },
    });
  },
  describeFailure: (args, context) => {
    const query = normalizeQueryParameter(args.query, context.defaultProjectKey);
    return {
      summary: `Failed to search issues with query '${query}'`,
      details: { query },
    };
  },
});
