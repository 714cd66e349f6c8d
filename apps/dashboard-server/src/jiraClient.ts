/**
 * Jira Cloud REST (v3) fetcher and mutator.
 *
 * Uses Basic auth with the configured email/API-token pair. A missing issue is a
 * value (`notFoundSnapshot`), every other fault is a `remote_unavailable` error.
 * Credentials never appear in error messages.
 */

import {
  DashboardError,
  DEFAULT_REMOTE_TIMEOUT_MS,
  notFoundSnapshot,
  type IssueSnapshot,
  type JiraConnection,
  type TransitionStep,
  type TransitionTracker,
} from '@prdash/core';
import { z } from 'zod';

import { consoleLogger, type Logger } from './logger.js';

export type ProjectComponent = Readonly<{ id: string; name: string }>;

export interface IssueSource {
  fetchIssue(key: string): Promise<IssueSnapshot>;
}

/** Everything the poller and the issue-action service call on the tracker. */
export interface IssueTrackerClient extends IssueSource, TransitionTracker {
  fetchProjectComponents(projectKey: string): Promise<ProjectComponent[]>;
  addComponents(key: string, componentIds: readonly string[]): Promise<boolean>;
  resolveAccountId(): Promise<string | null>;
  assignIssue(key: string): Promise<boolean>;
}

export type JiraClientOptions = Readonly<{
  connection: JiraConnection;
  /** Display name used when the email search finds no account. */
  username?: string | null;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
  logger?: Logger;
}>;

const issueSchema = z.object({
  key: z.string().optional(),
  fields: z
    .object({
      summary: z.string().nullish(),
      status: z.object({ name: z.string() }).passthrough().nullish(),
      components: z.array(z.object({ name: z.string() }).passthrough()).nullish(),
      assignee: z
        .object({
          displayName: z.string().nullish(),
          emailAddress: z.string().nullish(),
          accountId: z.string().nullish(),
        })
        .passthrough()
        .nullish(),
    })
    .passthrough(),
});

const transitionsSchema = z.object({
  transitions: z.array(
    z
      .object({
        id: z.union([z.string(), z.number()]),
        name: z.string(),
        to: z.object({ name: z.string().nullish() }).passthrough().nullish(),
      })
      .passthrough(),
  ),
});

const componentsSchema = z.array(
  z.object({ id: z.union([z.string(), z.number()]), name: z.string() }).passthrough(),
);

const userSearchSchema = z.array(z.object({ accountId: z.string().nullish() }).passthrough());

/** Status codes a mutation may answer with when Jira refuses it; anything else is a fault. */
const REJECTED_MUTATION_STATUSES = [400, 404, 409, 422] as const;

type JiraResponse = Readonly<{ status: number; body: unknown }>;

function describeFailure(err: unknown, timeoutMs: number): string {
  if (err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError')) {
    return `timed out after ${timeoutMs}ms`;
  }
  return err instanceof Error ? err.message : String(err);
}

export class JiraClient implements IssueTrackerClient {
  private readonly baseUrl: string;
  private readonly authorization: string;
  private readonly email: string;
  private readonly username: string | null;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;
  private accountId: string | null = null;

  constructor(options: JiraClientOptions) {
    this.baseUrl = options.connection.baseUrl.replace(/\/+$/, '');
    this.email = options.connection.email;
    this.authorization = `Basic ${Buffer.from(`${options.connection.email}:${options.connection.apiToken}`).toString('base64')}`;
    this.username = options.username?.trim() || null;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REMOTE_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.logger = options.logger ?? consoleLogger;
  }

  browseUrl(key: string): string {
    return `${this.baseUrl}/browse/${encodeURIComponent(key)}`;
  }

  async fetchIssue(key: string): Promise<IssueSnapshot> {
    const res = await this.send('GET', `/rest/api/3/issue/${encodeURIComponent(key)}?fields=summary,status,components,assignee`, {
      accept: [404],
    });
    if (res.status === 404) return notFoundSnapshot(key, this.browseUrl(key));

    const parsed = issueSchema.safeParse(res.body);
    if (!parsed.success) throw this.malformed(`issue ${key}`);
    const fields = parsed.data.fields;
    const assignee = fields.assignee
      ? {
          displayName: fields.assignee.displayName ?? null,
          emailAddress: fields.assignee.emailAddress ?? null,
          accountId: fields.assignee.accountId ?? null,
        }
      : null;

    return {
      key: parsed.data.key ?? key,
      status: fields.status?.name ?? null,
      summary: fields.summary ?? null,
      url: this.browseUrl(key),
      components: (fields.components ?? []).map((component) => component.name),
      assignee,
      found: true,
    };
  }

  async fetchStatus(key: string): Promise<string | null> {
    const snapshot = await this.fetchIssue(key);
    if (!snapshot.found) {
      throw new DashboardError({ code: 'not_found', message: `jira: issue ${key} not found` });
    }
    return snapshot.status;
  }

  async fetchTransitions(key: string): Promise<TransitionStep[]> {
    const res = await this.send('GET', `/rest/api/3/issue/${encodeURIComponent(key)}/transitions`);
    const parsed = transitionsSchema.safeParse(res.body);
    if (!parsed.success) throw this.malformed(`transitions of ${key}`);
    return parsed.data.transitions.map((t) => ({ id: String(t.id), name: t.name, to: t.to?.name ?? null }));
  }

  async applyTransition(key: string, transitionId: string): Promise<boolean> {
    const res = await this.send('POST', `/rest/api/3/issue/${encodeURIComponent(key)}/transitions`, {
      body: { transition: { id: transitionId } },
      accept: REJECTED_MUTATION_STATUSES,
    });
    const ok = res.status >= 200 && res.status < 300;
    if (!ok) this.logger.warn(`[jira] transition #${transitionId} on ${key} rejected (HTTP ${res.status})`);
    return ok;
  }

  async fetchProjectComponents(projectKey: string): Promise<ProjectComponent[]> {
    const res = await this.send('GET', `/rest/api/3/project/${encodeURIComponent(projectKey)}/components`);
    const parsed = componentsSchema.safeParse(res.body);
    if (!parsed.success) throw this.malformed(`components of project ${projectKey}`);
    return parsed.data.map((component) => ({ id: String(component.id), name: component.name }));
  }

  async addComponents(key: string, componentIds: readonly string[]): Promise<boolean> {
    if (componentIds.length === 0) return true;
    const res = await this.send('PUT', `/rest/api/3/issue/${encodeURIComponent(key)}`, {
      body: { update: { components: componentIds.map((id) => ({ add: { id } })) } },
      accept: REJECTED_MUTATION_STATUSES,
    });
    return res.status >= 200 && res.status < 300;
  }

  /** Account id of the configured identity: email search first, then the username. Cached once found. */
  async resolveAccountId(): Promise<string | null> {
    if (this.accountId) return this.accountId;

    for (const query of [this.email, this.username]) {
      if (!query) continue;
      const res = await this.send('GET', `/rest/api/3/user/search?query=${encodeURIComponent(query)}`);
      const parsed = userSearchSchema.safeParse(res.body);
      if (!parsed.success) throw this.malformed('user search');
      const found = parsed.data.find((user) => typeof user.accountId === 'string' && user.accountId.length > 0);
      if (found?.accountId) {
        this.accountId = found.accountId;
        return found.accountId;
      }
    }
    return null;
  }

  async assignIssue(key: string): Promise<boolean> {
    const accountId = await this.resolveAccountId();
    if (!accountId) {
      throw new DashboardError({
        code: 'configuration_gap',
        message: 'jira: no account matches PRDASH_JIRA_EMAIL or PRDASH_JIRA_USERNAME',
      });
    }
    const res = await this.send('PUT', `/rest/api/3/issue/${encodeURIComponent(key)}/assignee`, {
      body: { accountId },
      accept: REJECTED_MUTATION_STATUSES,
    });
    return res.status >= 200 && res.status < 300;
  }

  private malformed(what: string): DashboardError {
    return new DashboardError({ code: 'remote_unavailable', message: `jira: unexpected response for ${what}` });
  }

  private async send(
    method: 'GET' | 'POST' | 'PUT',
    resourcePath: string,
    options: { body?: unknown; accept?: readonly number[] } = {},
  ): Promise<JiraResponse> {
    const label = `${method} ${resourcePath.split('?')[0]}`;

    let res: Response;
    try {
      res = await this.fetchImpl(`${this.baseUrl}${resourcePath}`, {
        method,
        headers: {
          Authorization: this.authorization,
          Accept: 'application/json',
          'Content-Type': 'application/json',
        },
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new DashboardError({
        code: 'remote_unavailable',
        message: `jira: ${label} failed: ${describeFailure(err, this.timeoutMs)}`,
        cause: err,
      });
    }

    if (res.status === 401 || res.status === 403) {
      throw new DashboardError({
        code: 'remote_unavailable',
        message: `jira: ${label} was refused (HTTP ${res.status}); check PRDASH_JIRA_EMAIL and PRDASH_JIRA_API_TOKEN`,
      });
    }
    if (!res.ok && !(options.accept ?? []).includes(res.status)) {
      throw new DashboardError({ code: 'remote_unavailable', message: `jira: ${label} returned HTTP ${res.status}` });
    }

    let text: string;
    try {
      text = await res.text();
    } catch (err) {
      throw new DashboardError({
        code: 'remote_unavailable',
        message: `jira: ${label} failed: ${describeFailure(err, this.timeoutMs)}`,
        cause: err,
      });
    }
    if (!text.trim()) return { status: res.status, body: null };
    try {
      return { status: res.status, body: JSON.parse(text) as unknown };
    } catch (err) {
      if (!res.ok) return { status: res.status, body: null };
      throw new DashboardError({ code: 'remote_unavailable', message: `jira: ${label} returned invalid JSON`, cause: err });
    }
  }
}
