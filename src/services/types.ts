import type { Issue, WorkItem, WorkItemType } from "./schemas.js";

export type { Issue, WorkItem, WorkItemType };

/** Narrow subset of the global fetch used by YouTrackService. */
export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface AddWorkItemInput {
  issueId: string;
  durationMinutes: number;
  description?: string;
  /** Epoch milliseconds; YouTrack uses today when omitted. */
  date?: number;
  workTypeId?: string;
}

export interface YouTrackServiceOptions {
  baseUrl: string;
  token: string;
  fetch?: FetchLike;
  timeoutMs?: number;
}

export interface IYouTrackService {
  checkConnection(): Promise<void>;
  getIssue(issueId: string): Promise<Issue>;
  searchIssues(query: string, limit: number): Promise<Issue[]>;
  getWorkItems(issueId: string): Promise<WorkItem[]>;
  addWorkItem(input: AddWorkItemInput): Promise<WorkItem>;
  getWorkTypes(projectId: string): Promise<WorkItemType[]>;
}
