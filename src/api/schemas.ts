import { z } from 'zod';

const idSchema = z.union([z.string(), z.number()]).transform(value => String(value));

const pagingNumberSchema = z.number().int().nonnegative().optional().catch(undefined);

export const jiraStatusSchema = z.object({
  id: idSchema,
  name: z.string(),
  statusCategory: z.object({
    key: z.string(),
  }),
});

export const jiraPrioritySchema = z.object({
  id: idSchema.optional().catch(undefined),
  name: z.string().optional().catch(undefined),
});

export const jiraUserSchema = z.object({
  accountId: z.string(),
  displayName: z.string().nullish().catch(undefined),
  emailAddress: z.string().nullish().catch(undefined),
});

export const jiraIssueFieldsSchema = z.object({
  summary: z.string(),
  status: jiraStatusSchema,
  priority: jiraPrioritySchema.nullish().catch(null),
  assignee: jiraUserSchema.nullish(),
  issuetype: z.object({ name: z.string() }),
  project: z.object({ key: z.string() }),
  description: z.unknown().optional(),
  created: z.string(),
  updated: z.string(),
});

export const jiraIssueSchema = z.object({
  id: idSchema,
  key: z.string(),
  fields: jiraIssueFieldsSchema,
});

export const jiraCommentSchema = z.object({
  id: idSchema,
  author: jiraUserSchema,
  body: z.unknown().optional(),
  created: z.string(),
  updated: z.string().nullish(),
});

export const jiraCommentsResponseSchema = z.union([
  z.array(z.unknown()),
  z.object({ comments: z.array(z.unknown()) }).transform(response => response.comments),
]);

export const jiraSearchPageSchema = z.object({
  startAt: pagingNumberSchema,
  maxResults: pagingNumberSchema,
  total: pagingNumberSchema,
  isLast: z.boolean().optional().catch(undefined),
  issues: z.array(z.unknown()).optional().catch(undefined),
  values: z.array(z.unknown()).optional().catch(undefined),
});

export const jiraIssueReferenceSchema = z
  .object({
    id: idSchema.optional(),
    key: z.string().optional(),
  })
  .refine(reference => reference.id !== undefined || reference.key !== undefined, 'Issue reference needs an id or a key');

export const jiraTransitionSchema = z.object({
  id: idSchema,
  name: z.string(),
  to: z.object({ name: z.string() }),
});

export const jiraTransitionsResponseSchema = z.object({
  transitions: z.array(z.unknown()),
});

export const jiraCreatedIssueSchema = z.object({
  id: idSchema,
  key: z.string(),
});

export type JiraUserResponse = z.infer<typeof jiraUserSchema>;
export type JiraPriorityResponse = z.infer<typeof jiraPrioritySchema>;
