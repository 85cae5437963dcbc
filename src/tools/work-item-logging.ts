import { z } from "zod";
import { parseWorkDate } from "../utils/dates.js";
import { projectKeyOf } from "../utils/identifiers.js";
import type { McpToolContext } from "./types.js";

/** YouTrack entity ids look like "49-3". */
const ENTITY_ID_RE = /^\d+-\d+$/;

export const issueIdField = z
  .string()
  .trim()
  .min(1, "Issue ID is required")
  .describe("YouTrack issue ID (e.g., 'DEMO-123'), or a bare number qualified with the default project key");

export const descriptionField = z
  .string()
  .max(10000, "Description must be at most 10000 characters")
  .optional()
  .default("")
  .describe("Description of the work performed");

export const workDateField = z
  .string()
  .optional()
  .describe("Date the work was done in YYYY-MM-DD format. Defaults to today.");

export const workTypeField = z
  .string()
  .trim()
  .min(1, "Work type must not be empty")
  .optional()
  .describe("Work type name (e.g., 'Development', 'Testing') or ID. Defaults to the project's default type.");

export interface LogWorkItemInput {
  issueId: string;
  durationMinutes: number;
  description: string;
  workDate?: string;
  workType?: string;
}

async function resolveWorkTypeId(
  issueId: string,
  workType: string,
  context: McpToolContext,
): Promise<string> {
  const projectKey = projectKeyOf(issueId);
  if (ENTITY_ID_RE.test(workType) || !projectKey) return workType;

  const workTypes = await context.services.youtrack.getWorkTypes(projectKey);
  const wanted = workType.toLowerCase();
  const match = workTypes.find((wt) => wt.id === workType || wt.name?.toLowerCase() === wanted);
  if (!match) {
    const available = workTypes.map((wt) => wt.name ?? wt.id).join(", ") || "none";
    throw new Error(`Unknown work type '${workType}' for project ${projectKey}. Available: ${available}`);
  }
  return match.id;
}

/** Creates the work item and shapes the tool response around it. */
export async function logWorkItem(input: LogWorkItemInput, context: McpToolContext) {
  const date = input.workDate ? parseWorkDate(input.workDate) : undefined;
  const workTypeId = input.workType
    ? await resolveWorkTypeId(input.issueId, input.workType, context)
    : undefined;

  context.logger.info(`Adding work item to issue ${input.issueId}: ${input.durationMinutes} minutes`);

  const workItem = await context.services.youtrack.addWorkItem({
    issueId: input.issueId,
    durationMinutes: input.durationMinutes,
    description: input.description,
    date,
    workTypeId,
  });

  return {
    success: true,
    work_item: workItem,
    summary: {
      issue_id: input.issueId,
      duration_logged: `${input.durationMinutes} minutes`,
      description: input.description || "(no description)",
      date: input.workDate ?? "today",
    },
  };
}
