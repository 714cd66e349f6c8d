import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { DashboardError, type DerivedPullRequest } from '@prdash/core';
import { listPullRequestsFromDb, readPullRequestFromDb } from '@prdash/state-db';
import { afterEach, describe, expect, it, vi } from 'vitest';

import { Correlator } from './correlator.js';
import type { PullRequestSource } from './githubClient.js';
import { silentLogger, type Logger } from './logger.js';
import { isTrackedPullRequest, Poller, type PollerConfig } from './poller.js';

async function makeDataDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

function rawNode(number: number, overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    number,
    title: 'Refresh the docs',
    url: `https://github.com/acme/rocket/pull/${number}`,
    state: 'OPEN',
    updatedAt: `2026-03-0${number}T09:00:00Z`,
    author: { login: 'someone' },
    headRefName: 'feature/refresh-docs',
    isDraft: false,
    ...overrides,
  };
}

function reviewRequestFor(login: string): Record<string, unknown> {
  return { nodes: [{ requestedReviewer: { login } }] };
}

class FakeSource implements PullRequestSource {
  repoCalls = 0;

  constructor(
    private readonly repos: Record<string, unknown[] | Error>,
    private readonly singles: Record<string, unknown> = {},
  ) {}

  async fetchRepoPullRequests(owner: string, name: string): Promise<unknown[]> {
    this.repoCalls += 1;
    const result = this.repos[`${owner}/${name}`] ?? [];
    if (result instanceof Error) throw result;
    return result;
  }

  async fetchSinglePullRequest(owner: string, name: string, number: number): Promise<unknown | null> {
    return this.singles[`${owner}/${name}#${number}`] ?? null;
  }
}

function makeConfig(dataDir: string, overrides: Partial<PollerConfig> = {}): PollerConfig {
  return {
    githubUsername: 'octo',
    trackedRepos: [{ owner: 'acme', repo: 'rocket' }],
    watchedPullRequests: [],
    pollIntervalSeconds: 30,
    pullRequestLimit: 20,
    allowedKeyPrefixes: [],
    dataDir,
    ...overrides,
  };
}

function makePoller(config: PollerConfig, github: PullRequestSource, logger: Logger = silentLogger): Poller {
  const correlator = new Correlator({ issues: null, componentRepoMap: {}, identity: {}, logger });
  return new Poller({
    config,
    github,
    correlator,
    logger,
    now: () => new Date('2026-03-09T12:00:00.000Z'),
  });
}

function derived(overrides: Partial<DerivedPullRequest> = {}): DerivedPullRequest {
  return {
    owner: 'acme',
    repo: 'rocket',
    number: 1,
    title: 'Refresh the docs',
    author: 'someone',
    url: 'https://github.com/acme/rocket/pull/1',
    state: 'OPEN',
    isDraft: false,
    reviewStatus: 'needs review',
    ciSummary: 'no commits',
    mergeCiSummary: null,
    lastCommitSha: null,
    mergeCommitSha: null,
    hasConflicts: false,
    sizeTier: 0,
    updatedAt: '2026-03-01T09:00:00Z',
    mergedAt: null,
    requestedReviewers: [],
    requestedReviewTeams: [],
    issueKeys: [],
    raw: {},
    ...overrides,
  };
}

describe('isTrackedPullRequest', () => {
  it('tracks authored, review-requested and team-requested pull requests', () => {
    expect(isTrackedPullRequest(derived({ author: 'Octo' }), 'octo')).toBe(true);
    expect(isTrackedPullRequest(derived({ requestedReviewers: ['OCTO'] }), 'octo')).toBe(true);
    expect(isTrackedPullRequest(derived({ requestedReviewTeams: ['platform'] }), 'octo')).toBe(true);
    expect(isTrackedPullRequest(derived(), 'octo')).toBe(false);
  });
});

describe('Poller.runPass', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('stores tracked pull requests and skips malformed nodes', async () => {
    const dataDir = await makeDataDir('prdash-poller-pass-');
    const source = new FakeSource({
      'acme/rocket': [
        rawNode(1, { author: { login: 'octo' }, title: 'ROCK-12 launch checklist' }),
        rawNode(2),
        rawNode(3, { reviewRequests: reviewRequestFor('Octo') }),
        { number: 'four', title: 'broken' },
      ],
    });
    const poller = makePoller(makeConfig(dataDir), source);

    const summary = await poller.runPass();

    expect(summary).toEqual({
      cycle: 1,
      startedAt: '2026-03-09T12:00:00.000Z',
      finishedAt: '2026-03-09T12:00:00.000Z',
      upserted: 2,
      skipped: 1,
      failures: [],
    });
    expect(poller.getLastPass()).toEqual(summary);

    const stored = listPullRequestsFromDb(dataDir);
    expect(stored.map((pr) => pr.number)).toEqual([1, 3]);
    expect(stored[0]?.isMine).toBe(true);
    expect(stored[0]?.jiraKey).toBe('ROCK-12');
    expect(stored[0]?.lastSyncedAt).toBe('2026-03-09T12:00:00.000Z');
    expect(stored[1]?.requestedReviewers).toEqual(['Octo']);
  });

  it('records a failing repository and keeps polling the rest', async () => {
    const dataDir = await makeDataDir('prdash-poller-isolation-');
    const error = vi.fn();
    const logger: Logger = { ...silentLogger, error };
    const source = new FakeSource({
      'acme/broken': new DashboardError({ code: 'remote_unavailable', message: 'github: pull requests for acme/broken: HTTP 502' }),
      'acme/rocket': [rawNode(1, { author: { login: 'octo' } })],
    });
    const poller = makePoller(
      makeConfig(dataDir, {
        trackedRepos: [
          { owner: 'acme', repo: 'broken' },
          { owner: 'acme', repo: 'rocket' },
        ],
      }),
      source,
      logger,
    );

    const summary = await poller.runPass();

    expect(summary.upserted).toBe(1);
    expect(summary.failures).toEqual([
      { scope: 'acme/broken', error: 'github: pull requests for acme/broken: HTTP 502' },
    ]);
    expect(error).toHaveBeenCalledWith('[poller] cycle 1: acme/broken failed: github: pull requests for acme/broken: HTTP 502');
    expect(readPullRequestFromDb(dataDir, { owner: 'acme', repo: 'rocket', number: 1 })?.title).toBe('Refresh the docs');
  });

  it('stores a watched pull request whoever authored it', async () => {
    const dataDir = await makeDataDir('prdash-poller-watched-');
    const source = new FakeSource({}, { 'acme/rocket#5': rawNode(5, { author: { login: 'hubot' } }) });
    const poller = makePoller(
      makeConfig(dataDir, {
        trackedRepos: [],
        watchedPullRequests: [
          { owner: 'acme', repo: 'rocket', number: 5 },
          { owner: 'acme', repo: 'rocket', number: 6 },
        ],
      }),
      source,
    );

    const summary = await poller.runPass();

    expect(summary.upserted).toBe(1);
    expect(summary.failures).toEqual([]);
    const stored = readPullRequestFromDb(dataDir, { owner: 'acme', repo: 'rocket', number: 5 });
    expect(stored?.author).toBe('hubot');
    expect(stored?.isMine).toBe(false);
  });

  it('shares an in-flight pass with concurrent callers', async () => {
    const dataDir = await makeDataDir('prdash-poller-shared-');
    const source = new FakeSource({ 'acme/rocket': [] });
    const poller = makePoller(makeConfig(dataDir), source);

    const first = poller.runPass();
    const second = poller.runPass();

    expect(second).toBe(first);
    expect((await first).cycle).toBe(1);
    expect(source.repoCalls).toBe(1);
    expect((await poller.runPass()).cycle).toBe(2);
  });

  it('runs the first pass on start and then once per interval', async () => {
    vi.useFakeTimers();
    const dataDir = await makeDataDir('prdash-poller-schedule-');
    const source = new FakeSource({ 'acme/rocket': [] });
    const poller = makePoller(makeConfig(dataDir), source);

    poller.start();
    expect(poller.isRunning()).toBe(true);
    expect(source.repoCalls).toBe(0);

    await vi.advanceTimersByTimeAsync(0);
    await vi.waitFor(() => {
      expect(poller.getLastPass()?.cycle).toBe(1);
      expect(vi.getTimerCount()).toBe(1);
    });

    await vi.advanceTimersByTimeAsync(30_000);
    await vi.waitFor(() => {
      expect(poller.getLastPass()?.cycle).toBe(2);
    });

    await poller.stop();
    expect(poller.isRunning()).toBe(false);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('keeps a single timer when restarted while a pass is still running', async () => {
    vi.useFakeTimers();
    const dataDir = await makeDataDir('prdash-poller-restart-');
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    let calls = 0;
    const source: PullRequestSource = {
      fetchRepoPullRequests: async () => {
        calls += 1;
        await gate;
        return [];
      },
      fetchSinglePullRequest: async () => null,
    };
    const poller = makePoller(makeConfig(dataDir), source);

    poller.start();
    await vi.advanceTimersByTimeAsync(0);
    expect(calls).toBe(1);

    const stopping = poller.stop();
    poller.start();
    await vi.advanceTimersByTimeAsync(0);
    expect(calls).toBe(1);

    release();
    await stopping;
    for (let i = 0; i < 20; i += 1) await Promise.resolve();

    expect(poller.getLastPass()?.cycle).toBe(1);
    expect(vi.getTimerCount()).toBe(1);
    await poller.stop();
  });
});
