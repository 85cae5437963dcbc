import { vi } from "vitest";
import type { IYouTrackService, WorkItem } from "./services/types.js";
import type { McpToolContext, McpToolResponse } from "./tools/types.js";

export function parseResponseText(result: McpToolResponse) {
  return JSON.parse(result.content[0].text);
}

export function sampleWorkItem(overrides?: Partial<WorkItem>): WorkItem {
  return {
    id: "120-1",
    author: { id: "1-1", login: "jdoe", name: "Jane Doe" },
    date: 1705276800000,
    created: 1705312800000,
    updated: 1705312800000,
    duration: { minutes: 60, presentation: "1h" },
    text: "Fixed authentication bug",
    type: { id: "49-0", name: "Development" },
    ...overrides,
  };
}

export function createMockYouTrackService(
  overrides?: Partial<Record<keyof IYouTrackService, ReturnType<typeof vi.fn>>>,
): IYouTrackService {
  return {
    checkConnection: vi.fn().mockResolvedValue(undefined),
    getIssue: vi.fn().mockResolvedValue({
      id: "2-123",
      idReadable: "DEMO-123",
      summary: "Login fails on Safari",
      description: "Steps to reproduce...",
      created: 0,
      updated: 1705312800000,
      project: { id: "0-1", name: "Demo", shortName: "DEMO" },
      reporter: { id: "1-1", login: "jdoe", name: "Jane Doe" },
    }),
    searchIssues: vi.fn().mockResolvedValue([]),
    getWorkItems: vi.fn().mockResolvedValue([sampleWorkItem()]),
    addWorkItem: vi.fn().mockResolvedValue(sampleWorkItem()),
    getWorkTypes: vi.fn().mockResolvedValue([
      { id: "49-0", name: "Development", autoAttached: true },
      { id: "49-1", name: "Testing", autoAttached: false },
    ]),
    ...overrides,
  } as IYouTrackService;
}

export function createMockLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

export function createMockContext(overrides?: {
  youtrack?: Partial<Record<keyof IYouTrackService, ReturnType<typeof vi.fn>>>;
  defaultProjectKey?: string;
}): McpToolContext {
  return {
    services: {
      youtrack: createMockYouTrackService(overrides?.youtrack),
    },
    defaultProjectKey: overrides?.defaultProjectKey,
    logger: createMockLogger(),
  };
}

export function getYouTrackMocks(context: McpToolContext) {
  const { youtrack } = context.services;
  return {
    getIssue: youtrack.getIssue as ReturnType<typeof vi.fn>,
    searchIssues: youtrack.searchIssues as ReturnType<typeof vi.fn>,
    getWorkItems: youtrack.getWorkItems as ReturnType<typeof vi.fn>,
    addWorkItem: youtrack.addWorkItem as ReturnType<typeof vi.fn>,
    getWorkTypes: youtrack.getWorkTypes as ReturnType<typeof vi.fn>,
    checkConnection: youtrack.checkConnection as ReturnType<typeof vi.fn>,
  };
}
