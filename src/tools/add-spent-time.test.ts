import { describe, it, expect, beforeEach } from "vitest";
import { parseResponseText, createMockContext, getYouTrackMocks } from "../test-utils.js";
import type { McpToolContext } from "./types.js";
import { addSpentTimeTool } from "./add-spent-time.js";

describe("addSpentTimeTool", () => {
  let context: McpToolContext;
  let youtrack: ReturnType<typeof getYouTrackMocks>;

  beforeEach(() => {
    context = createMockContext({ defaultProjectKey: "DEMO" });
    youtrack = getYouTrackMocks(context);
  });

  it.each([
    ["1h", 60],
    ["30m", 30],
    ["2h 15m", 135],
    ["90 minutes", 90],
    ["90", 90],
  ])('logs "%s" as %d minutes', async (timeString, minutes) => {
    await addSpentTimeTool.handler({ issue_id: "DEMO-1", time_string: timeString }, context);

    expect(youtrack.addWorkItem).toHaveBeenCalledWith(expect.objectContaining({ durationMinutes: minutes }));
  });

  it("normalizes the issue ID and forwards description, date and type", async () => {
    await addSpentTimeTool.handler(
      {
        issue_id: "789",
        time_string: "2h 15m",
        description: "Implementation work",
        work_date: "2024-01-15",
        work_type: "Development",
      },
      context,
    );

    expect(youtrack.addWorkItem).toHaveBeenCalledWith({
      issueId: "DEMO-789",
      durationMinutes: 135,
      description: "Implementation work",
      date: 1705276800000,
      workTypeId: "49-0",
    });
  });

  it("returns the same summary shape as add_work_item", async () => {
    const result = await addSpentTimeTool.handler(
      { issue_id: "DEMO-1", time_string: "1h", description: "Code review" },
      context,
    );

    expect(parseResponseText(result).summary).toEqual({
      issue_id: "DEMO-1",
      duration_logged: "60 minutes",
      description: "Code review",
      date: "today",
    });
  });

  describe("error handling", () => {
    it("returns a structured error with the attempted time when parsing fails", async () => {
      const result = await addSpentTimeTool.handler({ issue_id: "DEMO-1", time_string: "code review" }, context);

      expect(result.isError).toBe(true);
      expect(parseResponseText(result)).toEqual({
        success: false,
        error:
          "Failed to add spent time to issue DEMO-1: Could not parse time string: 'code review'. Use formats like '1h', '30m', '2h 15m', or plain minutes.",
        issue_id: "DEMO-1",
        attempted_time: "code review",
      });
      expect(youtrack.addWorkItem).not.toHaveBeenCalled();
    });

    it("returns the add_work_item error once the duration is parsed", async () => {
      youtrack.addWorkItem.mockRejectedValue(new Error("YouTrack API error 403: Forbidden"));

      const result = await addSpentTimeTool.handler({ issue_id: "5", time_string: "30m" }, context);

      expect(result.isError).toBe(true);
      expect(parseResponseText(result)).toEqual({
        success: false,
        error: "Failed to add work item to issue DEMO-5: YouTrack API error 403: Forbidden",
        issue_id: "DEMO-5",
        attempted_duration: "30 minutes",
      });
    });

    it("reports an invalid work date through add_work_item", async () => {
      const result = await addSpentTimeTool.handler(
        { issue_id: "DEMO-1", time_string: "1h", work_date: "15/01/2024" },
        context,
      );

      expect(parseResponseText(result)).toEqual({
        success: false,
        error: "Failed to add work item to issue DEMO-1: Invalid date format '15/01/2024'. Use YYYY-MM-DD format.",
        issue_id: "DEMO-1",
        attempted_duration: "60 minutes",
      });
      expect(youtrack.addWorkItem).not.toHaveBeenCalled();
    });

    it("rejects an empty time string", async () => {
      const result = await addSpentTimeTool.handler({ issue_id: "DEMO-1", time_string: "" }, context);

      expect(parseResponseText(result).error).toBe("Validation failed: time_string: Time string is required");
    });
  });
});
