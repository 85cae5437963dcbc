import { z } from "zod";

const UserSchema = z
  .object({
    id: z.string().optional(),
    login: z.string().optional(),
    name: z.string().optional(),
  })
  .passthrough();

export const CurrentUserSchema = UserSchema;

export const WorkItemTypeSchema = z
  .object({
    id: z.string(),
    name: z.string().optional(),
    autoAttached: z.boolean().optional(),
  })
  .passthrough();

export const WorkItemSchema = z
  .object({
    id: z.string().optional(),
    author: UserSchema.nullish(),
    date: z.number().nullish(),
    created: z.number().nullish(),
    updated: z.number().nullish(),
    duration: z
      .object({
        minutes: z.number().optional(),
        presentation: z.string().optional(),
      })
      .passthrough()
      .nullish(),
    text: z.string().nullish(),
    type: WorkItemTypeSchema.nullish(),
  })
  .passthrough();

export const IssueSchema = z
  .object({
    id: z.string(),
    idReadable: z.string().optional(),
    summary: z.string().nullish(),
    description: z.string().nullish(),
    created: z.number().nullish(),
    updated: z.number().nullish(),
    resolved: z.number().nullish(),
    project: z
      .object({
        id: z.string().optional(),
        name: z.string().optional(),
        shortName: z.string().optional(),
      })
      .passthrough()
      .nullish(),
    reporter: UserSchema.nullish(),
    customFields: z.array(z.object({ name: z.string().optional() }).passthrough()).optional(),
  })
  .passthrough();

export const WorkItemListSchema = z.array(WorkItemSchema);
export const WorkItemTypeListSchema = z.array(WorkItemTypeSchema);
export const IssueListSchema = z.array(IssueSchema);

export type WorkItem = z.infer<typeof WorkItemSchema>;
export type WorkItemType = z.infer<typeof WorkItemTypeSchema>;
export type Issue = z.infer<typeof IssueSchema>;
