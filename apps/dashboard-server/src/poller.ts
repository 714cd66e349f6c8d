import {
  derivePullRequest,
  errorMessage,
  parseRawPullRequestNode,
  type DashboardConfig,
  type DerivedPullRequest,
  type PullRequestRef,
  type RepoSpec,
} from '@prdash/core';
import { upsertPullRequestsInDb, type PullRequestRecordInput } from '@prdash/state-db';

import type { Correlator } from './correlator.js';
import type { PullRequestSource } from './githubClient.js';
import { consoleLogger, type Logger } from './logger.js';

export type PollFailure = Readonly<{ scope: string; error: string }>;

export type PollPassSummary = Readonly<{
  cycle: number;
  startedAt: string;
  finishedAt: string;
  upserted: number;
  skipped: number;
  failures: readonly PollFailure[];
}>;

export type PollerConfig = Pick<
  DashboardConfig,
  | 'githubUsername'
  | 'trackedRepos'
  | 'watchedPullRequests'
  | 'pollIntervalSeconds'
  | 'pullRequestLimit'
  | 'allowedKeyPrefixes'
  | 'dataDir'
>;

export type PollerOptions = Readonly<{
  config: PollerConfig;
  github: PullRequestSource;
  correlator: Correlator;
  logger?: Logger;
  now?: () => Date;
}>;

/** Authored by the account, awaiting its review, or awaiting any team review. */
export function isTrackedPullRequest(pr: DerivedPullRequest, accountLogin: string): boolean {
  const login = accountLogin.trim().toLowerCase();
  if (pr.author.toLowerCase() === login) return true;
  if (pr.requestedReviewers.some((reviewer) => reviewer.toLowerCase() === login)) return true;
  return pr.requestedReviewTeams.length > 0;
}

type PassState = { upserted: number; skipped: number; failures: PollFailure[] };

/**
 * Periodic reconciliation loop. A pass walks every tracked repository and then every
 * watched pull request, one at a time; a failure is recorded against its repository or
 * pull request and the pass moves on. Passes never overlap.
 */
export class Poller {
  private readonly config: PollerConfig;
  private readonly github: PullRequestSource;
  private readonly correlator: Correlator;
  private readonly logger: Logger;
  private readonly now: () => Date;

  private cycle = 0;
  private started = false;
  /** Bumped by every start and stop; a pass only reschedules for the run that scheduled it. */
  private generation = 0;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<PollPassSummary> | null = null;
  private lastPass: PollPassSummary | null = null;

  constructor(options: PollerOptions) {
    this.config = options.config;
    this.github = options.github;
    this.correlator = options.correlator;
    this.logger = options.logger ?? consoleLogger;
    this.now = options.now ?? (() => new Date());
  }

  getLastPass(): PollPassSummary | null {
    return this.lastPass;
  }

  isRunning(): boolean {
    return this.started;
  }

  /** Runs a pass right away, then one pass per interval, counted from the end of the previous pass. */
  start(): void {
    if (this.started) return;
    this.started = true;
    this.generation += 1;
    this.logger.info(`[poller] started; interval ${this.config.pollIntervalSeconds}s`);
    this.schedule(0);
  }

  async stop(): Promise<void> {
    this.started = false;
    this.generation += 1;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight) await this.inFlight;
  }

  /** Runs one pass; a caller arriving while a pass is in flight shares its result. */
  runPass(): Promise<PollPassSummary> {
    if (this.inFlight) return this.inFlight;
    const pass = this.executePass().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = pass;
    return pass;
  }

  private schedule(delayMs: number): void {
    const generation = this.generation;
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.runPass()
        .catch((err: unknown) => {
          this.logger.error(`[poller] pass failed: ${errorMessage(err)}`);
        })
        .finally(() => {
          if (this.started && generation === this.generation) this.schedule(this.config.pollIntervalSeconds * 1000);
        });
    }, delayMs);
  }

  private async executePass(): Promise<PollPassSummary> {
    this.cycle += 1;
    const cycle = this.cycle;
    const startedAt = this.now().toISOString();
    const state: PassState = { upserted: 0, skipped: 0, failures: [] };

    for (const repo of this.config.trackedRepos) {
      await this.pollRepository(cycle, repo, state);
    }
    for (const ref of this.config.watchedPullRequests) {
      await this.pollWatched(cycle, ref, state);
    }

    const summary: PollPassSummary = {
      cycle,
      startedAt,
      finishedAt: this.now().toISOString(),
      upserted: state.upserted,
      skipped: state.skipped,
      failures: state.failures,
    };
    this.lastPass = summary;
    if (state.failures.length > 0) {
      this.logger.warn(`[poller] cycle ${cycle}: ${state.upserted} upserted, ${state.failures.length} failed`);
    }
    return summary;
  }

  private async pollRepository(cycle: number, repo: RepoSpec, state: PassState): Promise<void> {
    const scope = `${repo.owner}/${repo.repo}`;
    try {
      const nodes = await this.github.fetchRepoPullRequests(repo.owner, repo.repo, this.config.pullRequestLimit);
      const records: PullRequestRecordInput[] = [];
      for (const node of nodes) {
        const derived = this.derive(cycle, scope, repo, node, state);
        if (!derived || !isTrackedPullRequest(derived, this.config.githubUsername)) continue;
        records.push(await this.correlate(derived));
      }
      state.upserted += this.store(records);
    } catch (err) {
      this.recordFailure(cycle, scope, err, state);
    }
  }

  private async pollWatched(cycle: number, ref: PullRequestRef, state: PassState): Promise<void> {
    const scope = `${ref.owner}/${ref.repo}#${ref.number}`;
    try {
      const node = await this.github.fetchSinglePullRequest(ref.owner, ref.repo, ref.number);
      if (node === null) {
        this.logger.warn(`[poller] cycle ${cycle}: watched pull request ${scope} not found`);
        return;
      }
      const derived = this.derive(cycle, scope, ref, node, state);
      if (!derived) return;
      state.upserted += this.store([await this.correlate(derived)]);
    } catch (err) {
      this.recordFailure(cycle, scope, err, state);
    }
  }

  private derive(
    cycle: number,
    scope: string,
    repo: RepoSpec,
    node: unknown,
    state: PassState,
  ): DerivedPullRequest | null {
    const parsed = parseRawPullRequestNode(node);
    if (!parsed.ok) {
      state.skipped += 1;
      this.logger.warn(`[poller] cycle ${cycle}: skipping malformed pull request in ${scope}: ${parsed.error}`);
      return null;
    }
    return derivePullRequest(repo.owner, repo.repo, parsed.node, { allowedKeyPrefixes: this.config.allowedKeyPrefixes });
  }

  private async correlate(derived: DerivedPullRequest): Promise<PullRequestRecordInput> {
    const correlation = await this.correlator.correlate(derived);
    return { ...derived, ...correlation };
  }

  private store(records: readonly PullRequestRecordInput[]): number {
    return upsertPullRequestsInDb(this.config.dataDir, records, {
      accountLogin: this.config.githubUsername,
      now: this.now(),
    });
  }

  private recordFailure(cycle: number, scope: string, err: unknown, state: PassState): void {
    const message = errorMessage(err);
    state.failures.push({ scope, error: message });
    this.logger.error(`[poller] cycle ${cycle}: ${scope} failed: ${message}`);
  }
}
