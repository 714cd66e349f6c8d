/**
 * GitHub GraphQL fetcher.
 *
 * Returns raw pull-request nodes exactly as the API shaped them; validation and
 * derivation happen downstream so one malformed node never fails a whole page.
 * Every request carries its own timeout and is never retried here.
 */

import { DashboardError, DEFAULT_REMOTE_TIMEOUT_MS } from '@prdash/core';
import { ClientError, GraphQLClient, gql } from 'graphql-request';
import { z } from 'zod';

export const GITHUB_GRAPHQL_URL = 'https://api.github.com/graphql';
export const DEFAULT_PULL_REQUEST_PAGE = 20;

/** The slice of the code host the poller needs. */
export interface PullRequestSource {
  fetchRepoPullRequests(owner: string, name: string, limit?: number): Promise<unknown[]>;
  fetchSinglePullRequest(owner: string, name: string, number: number): Promise<unknown | null>;
}

const ROLLUP_FIELDS = `
  state
  contexts(first: 10) {
    totalCount
    nodes {
      __typename
      ... on CheckRun {
        name
        status
        conclusion
      }
      ... on StatusContext {
        context
        state
      }
    }
  }
`;

const PULL_REQUEST_FIELDS = `
  number
  title
  body
  headRefName
  url
  author { login }
  isDraft
  state
  additions
  deletions
  changedFiles
  commitTotals: commits { totalCount }
  mergeStateStatus
  updatedAt
  mergedAt
  reviewRequests(first: 10) {
    nodes {
      requestedReviewer {
        ... on User { login }
        ... on Team { slug }
      }
    }
  }
  reviews(last: 10) {
    nodes {
      author { login }
      state
    }
  }
  commitsWithStatus: commits(last: 1) {
    nodes {
      commit {
        oid
        statusCheckRollup {
          ${ROLLUP_FIELDS}
        }
      }
    }
  }
  mergeCommit {
    oid
    statusCheckRollup {
      ${ROLLUP_FIELDS}
    }
  }
`;

export const REPO_PULL_REQUESTS_QUERY = gql`
  query RepoPullRequests($owner: String!, $name: String!, $first: Int!) {
    repository(owner: $owner, name: $name) {
      pullRequests(first: $first, states: [OPEN, MERGED], orderBy: { field: UPDATED_AT, direction: DESC }) {
        nodes {
          ${PULL_REQUEST_FIELDS}
        }
      }
    }
  }
`;

export const SINGLE_PULL_REQUEST_QUERY = gql`
  query SinglePullRequest($owner: String!, $name: String!, $number: Int!) {
    repository(owner: $owner, name: $name) {
      pullRequest(number: $number) {
        ${PULL_REQUEST_FIELDS}
      }
    }
  }
`;

const repoPullRequestsSchema = z.object({
  repository: z
    .object({
      pullRequests: z.object({ nodes: z.array(z.unknown()).nullish() }).nullish(),
    })
    .nullish(),
});

const singlePullRequestSchema = z.object({
  repository: z.object({ pullRequest: z.unknown() }).nullish(),
});

export type GitHubClientOptions = Readonly<{
  token: string;
  endpoint?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function responseErrors(error: ClientError): Record<string, unknown>[] {
  const entries: unknown[] = error.response.errors ?? [];
  return entries.filter(isRecord);
}

function isNotFoundError(error: unknown): boolean {
  if (!(error instanceof ClientError)) return false;
  return responseErrors(error).some((entry) => {
    const extensions = entry.extensions;
    return entry.type === 'NOT_FOUND' || (isRecord(extensions) && extensions.code === 'NOT_FOUND');
  });
}

function isTimeoutError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

export class GitHubClient implements PullRequestSource {
  private readonly client: GraphQLClient;
  private readonly timeoutMs: number;

  constructor(options: GitHubClientOptions) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REMOTE_TIMEOUT_MS;
    this.client = new GraphQLClient(options.endpoint ?? GITHUB_GRAPHQL_URL, {
      headers: {
        Authorization: `Bearer ${options.token}`,
        'User-Agent': 'prdash',
      },
      ...(options.fetchImpl ? { fetch: options.fetchImpl } : {}),
    });
  }

  async fetchRepoPullRequests(owner: string, name: string, limit = DEFAULT_PULL_REQUEST_PAGE): Promise<unknown[]> {
    const data = await this.request(
      REPO_PULL_REQUESTS_QUERY,
      { owner, name, first: limit },
      `pull requests for ${owner}/${name}`,
    );
    const parsed = repoPullRequestsSchema.safeParse(data);
    if (!parsed.success) {
      throw new DashboardError({
        code: 'remote_unavailable',
        message: `github: unexpected response shape for ${owner}/${name}`,
      });
    }
    return parsed.data.repository?.pullRequests?.nodes ?? [];
  }

  async fetchSinglePullRequest(owner: string, name: string, number: number): Promise<unknown | null> {
    let data: unknown;
    try {
      data = await this.request(SINGLE_PULL_REQUEST_QUERY, { owner, name, number }, `${owner}/${name}#${number}`);
    } catch (err) {
      if (err instanceof DashboardError && err.code === 'not_found') return null;
      throw err;
    }
    const parsed = singlePullRequestSchema.safeParse(data);
    if (!parsed.success) {
      throw new DashboardError({
        code: 'remote_unavailable',
        message: `github: unexpected response shape for ${owner}/${name}#${number}`,
      });
    }
    return parsed.data.repository?.pullRequest ?? null;
  }

  private async request(document: string, variables: Record<string, unknown>, context: string): Promise<unknown> {
    try {
      return await this.client.request<unknown>({
        document,
        variables,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw this.mapError(err, context);
    }
  }

  private mapError(err: unknown, context: string): DashboardError {
    if (isNotFoundError(err)) {
      return new DashboardError({ code: 'not_found', message: `github: ${context} not found`, cause: err });
    }
    if (err instanceof ClientError) {
      const status = err.response.status;
      if (status === 401 || status === 403) {
        return new DashboardError({
          code: 'remote_unavailable',
          message: `github: ${context}: authentication failed (HTTP ${status}); check PRDASH_GITHUB_TOKEN`,
          cause: err,
        });
      }
      const messages = responseErrors(err)
        .map((entry) => (typeof entry.message === 'string' ? entry.message.trim() : ''))
        .filter((message) => message.length > 0);
      const details = messages.length > 0 ? messages.join('; ') : `HTTP ${status}`;
      return new DashboardError({ code: 'remote_unavailable', message: `github: ${context}: ${details}`, cause: err });
    }
    if (isTimeoutError(err)) {
      return new DashboardError({
        code: 'remote_unavailable',
        message: `github: ${context}: timed out after ${this.timeoutMs}ms`,
        cause: err,
      });
    }
    const message = err instanceof Error ? err.message : String(err);
    return new DashboardError({ code: 'remote_unavailable', message: `github: ${context}: ${message}`, cause: err });
  }
}
