import { z } from "zod";
import { defineTool, mcpSuccess } from "./tool-utils.js";

const GetWorkTypesInputSchema = z.object({
  project_id: z
    .string()
    .trim()
    .min(1, "Project ID is required")
    .optional()
    .describe("Project short name (e.g., 'DEMO'). Defaults to the configured default project."),
});

export const getWorkTypesTool = defineTool({
  name: "get_work_types",
  description: "List the work item types (e.g., Development, Testing) available for time tracking in a YouTrack project.",
  schema: GetWorkTypesInputSchema,
  handler: async (args, context) => {
    const projectId = args.project_id ?? context.defaultProjectKey;
    if (!projectId) {
      throw new Error("project_id is required when no default project key is configured");
    }
    context.logger.info(`Getting work types for project ${projectId}`);

    const workTypes = await context.services.youtrack.getWorkTypes(projectId);

    return mcpSuccess({
      success: true,
      project_id: projectId,
      work_types: workTypes,
      summary: {
        total_types: workTypes.length,
        available_types: workTypes.map((wt) => wt.name ?? "Unknown"),
      },
    });
  },
  describeFailure: (args, context) => {
    const projectId = args.project_id ?? context.defaultProjectKey;
    return {
      summary: `Failed to get work types for project ${projectId ?? "(none)"}`,
      details: { project_id: projectId ?? null },
    };
  },
});
