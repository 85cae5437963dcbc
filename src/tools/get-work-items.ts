import { z } from "zod";
import { normalizeIssueId } from "../utils/identifiers.js";
import { defineTool, mcpSuccess } from "./tool-utils.js";
import { issueIdField } from "./work-item-logging.js";
import type { WorkItem } from "../services/types.js";

const GetWorkItemsInputSchema = z.object({
  issue_id: issueIdField,
});

export function summarizeWorkItems(workItems: WorkItem[]) {
  const totalMinutes = workItems.reduce((sum, item) => sum + (item.duration?.minutes ?? 0), 0);
  return {
    total_entries: workItems.length,
    total_time_minutes: totalMinutes,
    total_time_hours: totalMinutes > 0 ? Math.round((totalMinutes / 60) * 100) / 100 : 0,
  };
}

export const getWorkItemsTool = defineTool({
  name: "get_work_items",
  description:
    "List all work items (time logs) on a YouTrack issue: who logged time, when, how much and why, with totals.",
  schema: GetWorkItemsInputSchema,
  handler: async (args, context) => {
    const issueId = normalizeIssueId(args.issue_id, context.defaultProjectKey);
    context.logger.info(`Retrieving work items for issue ${issueId}`);

    const workItems = await context.services.youtrack.getWorkItems(issueId);

    return mcpSuccess({
      success: true,
      issue_id: issueId,
      work_items: workItems,
      summary: summarizeWorkItems(workItems),
    });
  },
  describeFailure: (args, context) => {
    const issueId = normalizeIssueId(args.issue_id, context.defaultProjectKey);
    return {
      summary: `Failed to get work items for issue ${issueId}`,
      details: { issue_id: issueId },
    };
  },
});
