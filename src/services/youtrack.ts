import type { z } from "zod";
import { YouTrackApiError } from "../errors.js";
import { createLogger } from "../logger.js";
import {
  CurrentUserSchema,
  IssueListSchema,
  IssueSchema,
  WorkItemListSchema,
  WorkItemSchema,
  WorkItemTypeListSchema,
} from "./schemas.js";
import type {
  AddWorkItemInput,
  FetchLike,
  Issue,
  IYouTrackService,
  WorkItem,
  WorkItemType,
  YouTrackServiceOptions,
} from "./types.js";

const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * YouTrack only returns the attributes named in `fields`.
 * @see https://www.jetbrains.com/help/youtrack/devportal/api-fields-syntax.html
 */
const WORK_ITEM_FIELDS =
  "id,author(id,login,name),date,created,updated,duration(minutes,presentation),text,type(id,name)";
const WORK_ITEM_TYPE_FIELDS = "id,name,autoAttached";
const ISSUE_FIELDS =
  "id,idReadable,summary,description,created,updated,resolved," +
  "project(id,name,shortName),reporter(id,login,name),customFields(name,value(name,presentation))";

const log = createLogger("youtrack");

export class YouTrackService implements IYouTrackService {
  private baseUrl: string;
  private token: string;
  private fetch: FetchLike;
  private timeoutMs: number;

  constructor(options: YouTrackServiceOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.token = options.token;
    this.fetch = options.fetch ?? ((url, init) => fetch(url, init));
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /** Fails unless the token is accepted by YouTrack. */
  async checkConnection(): Promise<void> {
    await this.request(CurrentUserSchema, "GET", "/api/users/me", { fields: "id,login" });
  }

  async getIssue(issueId: string): Promise<Issue> {
    return this.request(IssueSchema, "GET", `/api/issues/${encodeURIComponent(issueId)}`, {
      fields: ISSUE_FIELDS,
    });
  }

  async searchIssues(query: string, limit: number): Promise<Issue[]> {
    return this.request(IssueListSchema, "GET", "/api/issues", {
      query,
      $top: String(limit),
      fields: ISSUE_FIELDS,
    });
  }

  async getWorkItems(issueId: string): Promise<WorkItem[]> {
    return this.request(
      WorkItemListSchema,
      "GET",
      `/api/issues/${encodeURIComponent(issueId)}/timeTracking/workItems`,
      { fields: WORK_ITEM_FIELDS },
    );
  }

  async addWorkItem(input: AddWorkItemInput): Promise<WorkItem> {
    const body = {
      duration: { minutes: input.durationMinutes },
      text: input.description ?? "",
      ...(input.date !== undefined && { date: input.date }),
      ...(input.workTypeId && { type: { id: input.workTypeId } }),
    };

    return this.request(
      WorkItemSchema,
      "POST",
      `/api/issues/${encodeURIComponent(input.issueId)}/timeTracking/workItems`,
      { fields: WORK_ITEM_FIELDS },
      body,
    );
  }

  async getWorkTypes(projectId: string): Promise<WorkItemType[]> {
    return this.request(
      WorkItemTypeListSchema,
      "GET",
      `/api/admin/projects/${encodeURIComponent(projectId)}/timeTrackingSettings/workItemTypes`,
      { fields: WORK_ITEM_TYPE_FIELDS },
    );
  }

  private async request<T extends z.ZodTypeAny>(
    schema: T,
    method: "GET" | "POST",
    path: string,
    params: Record<string, string>,
    body?: unknown,
  ): Promise<z.output<T>> {
    const url = `${this.baseUrl}${path}?${new URLSearchParams(params).toString()}`;
    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.token}`,
      Accept: "application/json",
    };
    if (body !== undefined) {
      headers["Content-Type"] = "application/json";
    }

    const start = performance.now();
    const response = await this.fetch(url, {
      method,
      headers,
      ...(body !== undefined && { body: JSON.stringify(body) }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    const durationMs = Math.round(performance.now() - start);
    log.debug("YouTrack request", { method, path, status: response.status, durationMs });

    if (!response.ok) {
      const text = await response.text();
      throw new YouTrackApiError(response.status, response.statusText, text);
    }

    const parsed = schema.safeParse(await response.json());
    if (!parsed.success) {
      const details = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
      throw new Error(`Unexpected YouTrack response for ${method} ${path}: ${details}`);
    }
    return parsed.data;
  }
}
