import { z } from 'zod';

export const pullRequestStates = ['OPEN', 'CLOSED', 'MERGED'] as const;
export type PullRequestState = (typeof pullRequestStates)[number];

const actorSchema = z.object({ login: z.string().nullish() }).passthrough();

const statusCheckRollupSchema = z
  .object({
    state: z.string().nullish(),
    contexts: z
      .object({
        totalCount: z.number().int().nullish(),
        nodes: z.array(z.unknown()).nullish(),
      })
      .passthrough()
      .nullish(),
  })
  .passthrough();

const commitSchema = z
  .object({
    oid: z.string().nullish(),
    statusCheckRollup: statusCheckRollupSchema.nullish(),
  })
  .passthrough();

const totalCountSchema = z.object({ totalCount: z.number().int().nullish() }).passthrough();

const reviewRequestSchema = z
  .object({
    requestedReviewer: z
      .object({
        login: z.string().optional(),
        slug: z.string().optional(),
      })
      .passthrough()
      .nullish(),
  })
  .passthrough();

const reviewSchema = z
  .object({
    author: actorSchema.nullish(),
    state: z.string().nullish(),
  })
  .passthrough();

/**
 * One pull request node as returned by the GraphQL list and single-item queries.
 *
 * Only `number`, `title`, `url`, `state` and `updatedAt` are required; everything the
 * derivations read is optional so a partial node still yields a record.
 */
export const rawPullRequestNodeSchema = z
  .object({
    number: z.number().int().positive(),
    title: z.string(),
    url: z.string(),
    state: z.enum(pullRequestStates),
    updatedAt: z.string(),
    body: z.string().nullish(),
    headRefName: z.string().nullish(),
    author: actorSchema.nullish(),
    isDraft: z.boolean().nullish(),
    additions: z.number().nullish(),
    deletions: z.number().nullish(),
    changedFiles: z.number().nullish(),
    commitTotals: totalCountSchema.nullish(),
    commits: totalCountSchema.nullish(),
    mergeStateStatus: z.string().nullish(),
    mergedAt: z.string().nullish(),
    reviewRequests: z.object({ nodes: z.array(reviewRequestSchema.nullable()).nullish() }).passthrough().nullish(),
    reviews: z.object({ nodes: z.array(reviewSchema.nullable()).nullish() }).passthrough().nullish(),
    commitsWithStatus: z
      .object({
        nodes: z.array(z.object({ commit: commitSchema.nullish() }).passthrough().nullable()).nullish(),
      })
      .passthrough()
      .nullish(),
    mergeCommit: commitSchema.nullish(),
  })
  .passthrough();

export type RawPullRequestNode = z.infer<typeof rawPullRequestNodeSchema>;
export type RawStatusCheckRollup = z.infer<typeof statusCheckRollupSchema>;

export type ParsedNode = { ok: true; node: RawPullRequestNode } | { ok: false; error: string };

export function parseRawPullRequestNode(value: unknown): ParsedNode {
  const parsed = rawPullRequestNodeSchema.safeParse(value);
  if (parsed.success) return { ok: true, node: parsed.data };
  const issue = parsed.error.issues[0];
  const where = issue && issue.path.length > 0 ? issue.path.join('.') : 'node';
  return { ok: false, error: `${where}: ${issue?.message ?? 'invalid pull request node'}` };
}

/** Fields computed from one raw node; no I/O involved. */
export type DerivedPullRequest = Readonly<{
  owner: string;
  repo: string;
  number: number;
  title: string;
  author: string;
  url: string;
  state: PullRequestState;
  isDraft: boolean;
  reviewStatus: string;
  ciSummary: string;
  mergeCiSummary: string | null;
  lastCommitSha: string | null;
  mergeCommitSha: string | null;
  hasConflicts: boolean;
  sizeTier: number;
  updatedAt: string;
  mergedAt: string | null;
  requestedReviewers: readonly string[];
  requestedReviewTeams: readonly string[];
  issueKeys: readonly string[];
  raw: Readonly<Record<string, unknown>>;
}>;

/** Correlation block copied onto each record from the issue tracker. */
export type JiraCorrelation = Readonly<{
  jiraKey: string | null;
  jiraKeys: readonly string[];
  jiraStatus: string | null;
  jiraSummary: string | null;
  jiraUrl: string | null;
  jiraLastSyncedAt: string | null;
  jiraComponents: readonly string[];
  jiraComponentsMatch: boolean | null;
  jiraAssignee: string | null;
  jiraAssigneeMatch: boolean | null;
}>;

export function emptyCorrelation(keys: readonly string[] = []): JiraCorrelation {
  return {
    jiraKey: keys[0] ?? null,
    jiraKeys: [...keys],
    jiraStatus: null,
    jiraSummary: null,
    jiraUrl: null,
    jiraLastSyncedAt: null,
    jiraComponents: [],
    jiraComponentsMatch: null,
    jiraAssignee: null,
    jiraAssigneeMatch: null,
  };
}
