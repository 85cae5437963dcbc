import type { McpTool } from "./types.js";
import { addWorkItemTool } from "./add-work-item.js";
import { addSpentTimeTool } from "./add-spent-time.js";
import { getWorkItemsTool } from "./get-work-items.js";
import { getWorkTypesTool } from "./get-work-types.js";
import { getIssueTool } from "./get-issue.js";
import { searchIssuesTool } from "./search-issues.js";

export function createDefaultTools(): McpTool[] {
  return [
    addWorkItemTool,
    addSpentTimeTool,
    getWorkItemsTool,
    getWorkTypesTool,
    getIssueTool,
    searchIssuesTool,
  ];
}
