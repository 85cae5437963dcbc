import { z } from "zod";
import { normalizeIssueId } from "../utils/identifiers.js";
import { parseDuration } from "../utils/duration.js";
import { defineTool } from "./tool-utils.js";
import { addWorkItemTool } from "./add-work-item.js";
import { descriptionField, issueIdField, workDateField, workTypeField } from "./work-item-logging.js";

const AddSpentTimeInputSchema = z.object({
  issue_id: issueIdField,
  time_string: z
    .string()
    .min(1, "Time string is required")
    .describe("Time spent in natural format (e.g., '1h', '30m', '2h 15m', '90 minutes', '90')"),
  description: descriptionField,
  work_date: workDateField,
  work_type: workTypeField,
});

/**
 * Only a parse failure is reported as this tool's own error; once the duration is
 * known, the result (success or failure) is whatever `add_work_item` returns.
 */
export const addSpentTimeTool = defineTool({
  name: "add_spent_time",
  description:
    "Log time spent on a YouTrack issue using a natural duration such as '1h', '30m' or '2h 15m'. Plain numbers are minutes.",
  schema: AddSpentTimeInputSchema,
  handler: async (args, context) => {
    const issueId = normalizeIssueId(args.issue_id, context.defaultProjectKey);
    const durationMinutes = parseDuration(args.time_string);
    context.logger.info(`Adding spent time to issue ${issueId}: ${args.time_string} (${durationMinutes} minutes)`);

    return addWorkItemTool.handler(
      {
        issue_id: issueId,
        duration_minutes: durationMinutes,
        description: args.description,
        work_date: args.work_date,
        work_type: args.work_type,
      },
      context,
    );
  },
  describeFailure: (args, context) => {
    const issueId = normalizeIssueId(args.issue_id, context.defaultProjectKey);
    return {
      summary: `Failed to add spent time to issue ${issueId}`,
      details: {
        issue_id: issueId,
        attempted_time: args.time_string,
      },
    };
  },
});
