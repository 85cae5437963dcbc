import { z } from "zod";
import { normalizeIssueId } from "../utils/identifiers.js";
import { defineTool, mcpSuccess } from "./tool-utils.js";
import { issueIdField } from "./work-item-logging.js";

const GetIssueInputSchema = z.object({
  issue_id: issueIdField,
});

export const getIssueTool = defineTool({
  name: "get_issue",
  description:
    "Get a YouTrack issue by ID: summary, description, project, reporter, custom fields and created/updated times.",
  schema: GetIssueInputSchema,
  handler: async (args, context) => {
    const issueId = normalizeIssueId(args.issue_id, context.defaultProjectKey);
    const issue = await context.services.youtrack.getIssue(issueId);
    return mcpSuccess({ success: true, issue });
  },
  describeFailure: (args, context) => {
    const issueId = normalizeIssueId(args.issue_id, context.defaultProjectKey);
    return {
      summary: `Failed to get issue ${issueId}`,
      details: { issue_id: issueId },
    };
  },
});
