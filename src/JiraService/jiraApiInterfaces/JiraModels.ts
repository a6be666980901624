import { z } from 'zod';

/**
 * Schémas des objets Jira consommés (API REST v2, Server / Data Center).
 * Seuls les champs utilisés sont décrits ; le reste passe sans contrôle.
 */
export const JiraUserSchema = z
  .object({
    name: z.string(),
    key: z.string().optional(),
    displayName: z.string().optional().default(''),
    emailAddress: z.string().optional(),
    active: z.boolean().optional(),
  })
  .passthrough();

export type JiraUser = z.infer<typeof JiraUserSchema>;

const NamedValueSchema = z.object({ name: z.string() }).passthrough();

export const JiraIssueSchema = z
  .object({
    id: z.string().optional(),
    key: z.string(),
    fields: z
      .object({
        summary: z.string().nullable().optional(),
        issuetype: NamedValueSchema.nullable().optional(),
        priority: NamedValueSchema.nullable().optional(),
        reporter: JiraUserSchema.nullable().optional(),
        assignee: JiraUserSchema.nullable().optional(),
        created: z.string().optional(),
      })
      .passthrough()
      .default({}),
  })
  .passthrough();

export type JiraIssue = z.infer<typeof JiraIssueSchema>;

export const SearchResultSchema = z.object({
  startAt: z.number().int().nonnegative().default(0),
  maxResults: z.number().int().nonnegative().optional(),
  total: z.number().int().nonnegative(),
  issues: z.array(JiraIssueSchema),
});

/** Une page de résultat de l'endpoint search. */
export type SearchPage = z.infer<typeof SearchResultSchema>;

export const JiraCommentSchema = z
  .object({
    id: z.string().optional(),
    body: z.string().default(''),
    author: JiraUserSchema.partial().nullable().optional(),
    created: z.string(),
    updated: z.string().optional(),
  })
  .passthrough();

export type JiraComment = z.infer<typeof JiraCommentSchema>;

export const CommentListSchema = z.object({
  startAt: z.number().optional(),
  maxResults: z.number().optional(),
  total: z.number().optional(),
  comments: z.array(JiraCommentSchema),
});
