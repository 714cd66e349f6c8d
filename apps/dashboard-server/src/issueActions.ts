import {
  candidateStepsFor,
  componentMatchesRepo,
  DashboardError,
  loadTransitionPathTable,
  projectKeyOf,
  resolveLaneTargets,
  resolveTransition,
  type DashboardConfig,
  type LaneName,
  type TransitionOutcome,
} from '@prdash/core';
import { listPullRequestsByJiraKeyFromDb, updateJiraStatusInDb, type StoredPullRequest } from '@prdash/state-db';

import type { IssueTrackerClient } from './jiraClient.js';
import { consoleLogger, type Logger } from './logger.js';

export type IssueActionConfig = Pick<
  DashboardConfig,
  'dataDir' | 'jiraStatuses' | 'componentRepoMap' | 'transitionPathsFile'
>;

export type IssueActionOptions = Readonly<{
  config: IssueActionConfig;
  /** `null` when the issue tracker is not configured. */
  tracker: IssueTrackerClient | null;
  logger?: Logger;
  now?: () => Date;
}>;

export type ComponentFixResult = Readonly<{ key: string; added: readonly string[] }>;
export type AssignResult = Readonly<{ key: string; accountId: string }>;

const ISSUE_KEY_RE = /^[A-Z][A-Z0-9]*-\d+$/;

export function normalizeIssueKey(raw: string): string {
  const key = raw.trim().toUpperCase();
  if (!ISSUE_KEY_RE.test(key)) {
    throw new DashboardError({ code: 'invalid_request', message: `invalid issue key: ${raw}` });
  }
  return key;
}

/**
 * Operator-triggered mutations on the issue tracker. Each action checks that the tracker
 * is configured and that the issue belongs to one of the account's own pull requests
 * before it makes any remote call.
 */
export class IssueActionService {
  private readonly config: IssueActionConfig;
  private readonly tracker: IssueTrackerClient | null;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: IssueActionOptions) {
    this.config = options.config;
    this.tracker = options.tracker;
    this.logger = options.logger ?? consoleLogger;
    this.now = options.now ?? (() => new Date());
  }

  get enabled(): boolean {
    return this.tracker !== null;
  }

  async transitionForLane(rawKey: string, lane: LaneName, draft?: boolean): Promise<TransitionOutcome> {
    const key = normalizeIssueKey(rawKey);
    const tracker = this.requireTracker();
    const owned = this.requireOwnership(key);

    const isDraft = draft ?? owned.some((pr) => pr.isDraft);
    const targets = resolveLaneTargets(this.config.jiraStatuses, lane, isDraft);
    if (targets.length === 0) {
      throw new DashboardError({
        code: 'configuration_gap',
        message: `no target statuses configured for lane ${lane}${lane === 'needs_review' && isDraft ? ' (draft)' : ''}`,
      });
    }

    const table = await loadTransitionPathTable(this.config.transitionPathsFile);
    const outcome = await resolveTransition({
      key,
      targets,
      tracker,
      candidates: candidateStepsFor(targets, table),
    });

    for (const step of outcome.steps) {
      this.logger.info(`[issue-actions] ${key}: applied "${step.name}" (#${step.id}) ${step.from ?? '?'} -> ${step.to ?? '?'}`);
    }
    if (outcome.ok) {
      updateJiraStatusInDb(this.config.dataDir, key, outcome.finalStatus, this.now());
    } else {
      this.logger.warn(`[issue-actions] ${key}: ${outcome.code}: ${outcome.reason}`);
      if (outcome.steps.length > 0) {
        updateJiraStatusInDb(this.config.dataDir, key, outcome.lastStatus, this.now());
      }
    }
    return outcome;
  }

  /** Adds the project components that belong to the issue's linked repositories. */
  async fixComponents(rawKey: string): Promise<ComponentFixResult> {
    const key = normalizeIssueKey(rawKey);
    const tracker = this.requireTracker();
    const owned = this.requireOwnership(key);
    const repos = [...new Set(owned.map((pr) => pr.repo))];

    const issue = await tracker.fetchIssue(key);
    if (!issue.found) {
      throw new DashboardError({ code: 'not_found', message: `issue ${key} not found` });
    }
    const present = new Set(issue.components.map((name) => name.toLowerCase()));
    const available = await tracker.fetchProjectComponents(projectKeyOf(key));
    const missing = available.filter(
      (component) =>
        !present.has(component.name.toLowerCase()) &&
        repos.some((repo) => componentMatchesRepo(component.name, repo, this.config.componentRepoMap)),
    );
    if (missing.length === 0) return { key, added: [] };

    const applied = await tracker.addComponents(
      key,
      missing.map((component) => component.id),
    );
    if (!applied) {
      throw new DashboardError({ code: 'remote_unavailable', message: `jira rejected the component update for ${key}` });
    }
    const added = missing.map((component) => component.name);
    this.logger.info(`[issue-actions] ${key}: added components ${added.join(', ')}`);
    return { key, added };
  }

  async assignToMe(rawKey: string): Promise<AssignResult> {
    const key = normalizeIssueKey(rawKey);
    const tracker = this.requireTracker();
    this.requireOwnership(key);

    const accountId = await tracker.resolveAccountId();
    if (!accountId) {
      throw new DashboardError({
        code: 'configuration_gap',
        message: 'no issue tracker account matches the configured email or username',
      });
    }
    const assigned = await tracker.assignIssue(key);
    if (!assigned) {
      throw new DashboardError({ code: 'remote_unavailable', message: `jira rejected the assignment of ${key}` });
    }
    this.logger.info(`[issue-actions] ${key}: assigned to ${accountId}`);
    return { key, accountId };
  }

  private requireTracker(): IssueTrackerClient {
    if (!this.tracker) {
      throw new DashboardError({ code: 'configuration_gap', message: 'issue tracker integration is not enabled' });
    }
    return this.tracker;
  }

  private requireOwnership(key: string): StoredPullRequest[] {
    const owned = listPullRequestsByJiraKeyFromDb(this.config.dataDir, key).filter((pr) => pr.isMine);
    if (owned.length === 0) {
      throw new DashboardError({
        code: 'authorization_denied',
        message: `${key} is not linked to any of your pull requests`,
      });
    }
    return owned;
  }
}
