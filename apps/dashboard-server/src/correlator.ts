import {
  buildCorrelation,
  emptyCorrelation,
  errorMessage,
  type ComponentRepoMap,
  type DerivedPullRequest,
  type IdentityConfig,
  type JiraCorrelation,
} from '@prdash/core';

import type { IssueSource } from './jiraClient.js';
import { consoleLogger, type Logger } from './logger.js';

export type CorrelatorOptions = Readonly<{
  /** `null` when the issue tracker is not configured. */
  issues: IssueSource | null;
  componentRepoMap: ComponentRepoMap;
  identity: IdentityConfig;
  logger?: Logger;
  now?: () => Date;
}>;

/**
 * Fills a pull request's correlation block from its primary issue key. Never throws:
 * a failed lookup leaves the keys recorded and the tracker fields empty.
 */
export class Correlator {
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(private readonly options: CorrelatorOptions) {
    this.logger = options.logger ?? consoleLogger;
    this.now = options.now ?? (() => new Date());
  }

  get enabled(): boolean {
    return this.options.issues !== null;
  }

  async correlate(pr: DerivedPullRequest): Promise<JiraCorrelation> {
    const keys = pr.issueKeys;
    const primary = keys[0];
    const issues = this.options.issues;
    if (!primary || !issues) return emptyCorrelation(keys);

    try {
      const snapshot = await issues.fetchIssue(primary);
      return buildCorrelation(keys, snapshot, {
        repoName: pr.repo,
        componentRepoMap: this.options.componentRepoMap,
        identity: this.options.identity,
        syncedAt: this.now().toISOString(),
      });
    } catch (err) {
      this.logger.warn(`[correlator] ${pr.owner}/${pr.repo}#${pr.number}: lookup of ${primary} failed: ${errorMessage(err)}`);
      return emptyCorrelation(keys);
    }
  }
}
