import { z } from "zod";
import { normalizeIssueId } from "../utils/identifiers.js";
import { defineTool, mcpSuccess } from "./tool-utils.js";
import { descriptionField, issueIdField, logWorkItem, workDateField, workTypeField } from "./work-item-logging.js";

const AddWorkItemInputSchema = z.object({
  issue_id: issueIdField,
  duration_minutes: z
    .number()
    .int("Duration must be a whole number of minutes")
    .positive("Duration must be positive")
    .max(Number.MAX_SAFE_INTEGER, "Duration is too large")
    .describe("Duration in minutes (e.g., 30 for 30 minutes, 120 for 2 hours)"),
  description: descriptionField,
  work_date: workDateField,
  work_type: workTypeField,
});

export const addWorkItemTool = defineTool({
  name: "add_work_item",
  description:
    "Log time spent on a YouTrack issue as a work item. The logged time is reflected in the issue's Spent time field.",
  schema: AddWorkItemInputSchema,
  handler: async (args, context) => {
    const issueId = normalizeIssueId(args.issue_id, context.defaultProjectKey);
    const result = await logWorkItem(
      {
        issueId,
        durationMinutes: args.duration_minutes,
        description: args.description,
        workDate: args.work_date,
        workType: args.work_type,
      },
      context,
    );
    return mcpSuccess(result);
  },
  describeFailure: (args, context) => {
    const issueId = normalizeIssueId(args.issue_id, context.defaultProjectKey);
    return {
      summary: `Failed to add work item to issue ${issueId}`,
      details: {
        issue_id: issueId,
        attempted_duration: `${args.duration_minutes} minutes`,
      },
    };
  },
});
