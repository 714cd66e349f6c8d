import { describe, expect, it } from 'vitest';

import { parseRawPullRequestNode, type RawPullRequestNode } from './pullRequest.js';
import {
  buildSizeSparkline,
  computeSizeTier,
  derivePullRequest,
  hasMergeConflicts,
  sizeTierForScore,
  summarizeCi,
  summarizeMergeCi,
  summarizeReviews,
} from './signals.js';

function makeNode(overrides: Partial<RawPullRequestNode> = {}): RawPullRequestNode {
  return {
    number: 7,
    title: 'Tidy up the launch checklist',
    url: 'https://github.com/acme/rocket/pull/7',
    state: 'OPEN',
    updatedAt: '2026-03-02T09:30:00Z',
    ...overrides,
  };
}

function reviews(...states: string[]): RawPullRequestNode['reviews'] {
  return { nodes: states.map((state) => ({ author: { login: 'reviewer' }, state })) };
}

describe('summarizeReviews', () => {
  it('reports needs review when there are no reviews', () => {
    expect(summarizeReviews(makeNode({ reviews: { nodes: [] } }))).toBe('needs review');
    expect(summarizeReviews(makeNode())).toBe('needs review');
  });

  it('reports needs re-review when every review was dismissed', () => {
    expect(summarizeReviews(makeNode({ reviews: reviews('DISMISSED') }))).toBe('needs re-review');
    expect(summarizeReviews(makeNode({ reviews: reviews('DISMISSED', 'DISMISSED') }))).toBe('needs re-review');
  });

  it('prefers approval, then changes requested', () => {
    expect(summarizeReviews(makeNode({ reviews: reviews('CHANGES_REQUESTED', 'APPROVED') }))).toBe('approved');
    expect(summarizeReviews(makeNode({ reviews: reviews('COMMENTED', 'CHANGES_REQUESTED') }))).toBe('changes requested');
  });

  it('falls back to the most recent remaining state, lower-cased', () => {
    expect(summarizeReviews(makeNode({ reviews: reviews('COMMENTED', 'PENDING') }))).toBe('pending');
    expect(summarizeReviews(makeNode({ reviews: reviews('DISMISSED', 'COMMENTED') }))).toBe('commented');
  });

  it('only looks at the ten most recent reviews', () => {
    const states = ['APPROVED', ...Array.from({ length: 10 }, () => 'COMMENTED')];
    expect(summarizeReviews(makeNode({ reviews: reviews(...states) }))).toBe('commented');
  });
});

describe('CI summaries', () => {
  it('summarizes the latest commit rollup', () => {
    expect(summarizeCi(makeNode({ commitsWithStatus: { nodes: [] } }))).toBe('no commits');
    expect(summarizeCi(makeNode({ commitsWithStatus: { nodes: [{ commit: { oid: 'abc' } }] } }))).toBe('no checks');
    expect(
      summarizeCi(
        makeNode({
          commitsWithStatus: {
            nodes: [{ commit: { oid: 'abc', statusCheckRollup: { state: 'SUCCESS', contexts: { nodes: [{}, {}, {}] } } } }],
          },
        }),
      ),
    ).toBe('SUCCESS (3 checks)');
  });

  it('prefers the context total count over the fetched page', () => {
    const node = makeNode({
      commitsWithStatus: {
        nodes: [{ commit: { statusCheckRollup: { state: 'FAILURE', contexts: { totalCount: 12, nodes: [{}, {}] } } } }],
      },
    });
    expect(summarizeCi(node)).toBe('FAILURE (12 checks)');
  });

  it('reports UNKNOWN when the rollup has no state', () => {
    const node = makeNode({ commitsWithStatus: { nodes: [{ commit: { statusCheckRollup: { state: null } } }] } });
    expect(summarizeCi(node)).toBe('UNKNOWN (0 checks)');
  });

  it('distinguishes no merge commit from a merge commit without checks', () => {
    expect(summarizeMergeCi(makeNode())).toBeNull();
    expect(summarizeMergeCi(makeNode({ mergeCommit: { oid: 'def' } }))).toBe('no merge checks');
    expect(
      summarizeMergeCi(
        makeNode({ mergeCommit: { oid: 'def', statusCheckRollup: { state: 'FAILED', contexts: { nodes: [{}, {}] } } } }),
      ),
    ).toBe('FAILED (2 merge checks)');
  });
});

describe('hasMergeConflicts', () => {
  it('is true only for the DIRTY merge state, in any case', () => {
    expect(hasMergeConflicts(makeNode({ mergeStateStatus: 'DIRTY' }))).toBe(true);
    expect(hasMergeConflicts(makeNode({ mergeStateStatus: 'dirty' }))).toBe(true);
    expect(hasMergeConflicts(makeNode({ mergeStateStatus: 'CLEAN' }))).toBe(false);
    expect(hasMergeConflicts(makeNode({ mergeStateStatus: 'BLOCKED' }))).toBe(false);
    expect(hasMergeConflicts(makeNode({ mergeStateStatus: null }))).toBe(false);
    expect(hasMergeConflicts(makeNode())).toBe(false);
  });
});

describe('size tiers', () => {
  it('puts each threshold into the tier that starts there', () => {
    expect(sizeTierForScore(0)).toBe(0);
    expect(sizeTierForScore(1.99)).toBe(0);
    expect(sizeTierForScore(2)).toBe(1);
    expect(sizeTierForScore(4)).toBe(2);
    expect(sizeTierForScore(7)).toBe(3);
    expect(sizeTierForScore(11)).toBe(4);
    expect(sizeTierForScore(17.99)).toBe(4);
    expect(sizeTierForScore(18)).toBe(5);
    expect(sizeTierForScore(500)).toBe(5);
  });

  it('scores churn, files and commits', () => {
    expect(computeSizeTier(makeNode({ additions: 5, deletions: 5, changedFiles: 1, commits: { totalCount: 1 } }))).toBe(0);
    expect(
      computeSizeTier(makeNode({ additions: 150, deletions: 50, changedFiles: 4, commitTotals: { totalCount: 3 } })),
    ).toBe(1);
    expect(
      computeSizeTier(makeNode({ additions: 2000, deletions: 1600, changedFiles: 18, commits: { totalCount: 12 } })),
    ).toBe(5);
  });

  it('never decreases as churn, files or commits grow', () => {
    let previous = 0;
    for (let step = 0; step < 60; step += 1) {
      const tier = computeSizeTier(
        makeNode({ additions: step * 40, deletions: step * 10, changedFiles: step, commitTotals: { totalCount: step } }),
      );
      expect(tier).toBeGreaterThanOrEqual(previous);
      previous = tier;
    }
    expect(previous).toBe(5);
  });

  it('builds a ten-bar sparkline capped at 2000', () => {
    const bars = buildSizeSparkline(makeNode({ additions: 100, changedFiles: 5 }));
    expect(bars).toHaveLength(10);
    expect(bars[0]).toBeCloseTo(0.01);
    expect(bars[9]).toBeCloseTo(0.1);
    expect(buildSizeSparkline(makeNode({ additions: 9000 }))[9]).toBe(1);
  });
});

describe('derivePullRequest', () => {
  it('maps a full node into derived fields', () => {
    const node = makeNode({
      title: 'ROCK-12: tighten fuel valve checks',
      headRefName: 'feature/rock-14-valves',
      body: 'Follow-up to ROCK-12.',
      author: { login: 'octo' },
      isDraft: true,
      additions: 10,
      deletions: 4,
      changedFiles: 2,
      mergeStateStatus: 'DIRTY',
      reviews: reviews('APPROVED'),
      reviewRequests: {
        nodes: [{ requestedReviewer: { login: 'hubot' } }, { requestedReviewer: { slug: 'platform' } }, null],
      },
      commitsWithStatus: { nodes: [{ commit: { oid: 'sha-head', statusCheckRollup: { state: 'PENDING', contexts: { nodes: [{}] } } } }] },
    });

    const derived = derivePullRequest('acme', 'rocket', node, { allowedKeyPrefixes: [] });

    expect(derived).toMatchObject({
      owner: 'acme',
      repo: 'rocket',
      number: 7,
      author: 'octo',
      state: 'OPEN',
      isDraft: true,
      reviewStatus: 'approved',
      ciSummary: 'PENDING (1 checks)',
      mergeCiSummary: null,
      lastCommitSha: 'sha-head',
      mergeCommitSha: null,
      hasConflicts: true,
      sizeTier: 0,
      mergedAt: null,
    });
    expect(derived.requestedReviewers).toEqual(['hubot']);
    expect(derived.requestedReviewTeams).toEqual(['platform']);
    expect(derived.issueKeys).toEqual(['ROCK-12', 'ROCK-14']);
    expect(derived.raw['size_sparkline']).toHaveLength(10);
    expect(derived.raw['headRefName']).toBe('feature/rock-14-valves');
  });

  it('takes the primary key from the body when the branch starts with a number', () => {
    const node = makeNode({ title: 'Fix login', headRefName: '42-fix-login', body: 'Closes ABC-7' });
    expect(derivePullRequest('acme', 'rocket', node).issueKeys).toEqual(['ABC-7']);
  });

  it('falls back to unknown author when the account is gone', () => {
    expect(derivePullRequest('acme', 'rocket', makeNode({ author: null })).author).toBe('unknown');
  });
});

describe('parseRawPullRequestNode', () => {
  it('rejects nodes without identity fields', () => {
    const result = parseRawPullRequestNode({ number: 3, url: 'u', state: 'OPEN', updatedAt: 'x' });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toMatch(/^title: /);
  });

  it('keeps unknown fields on the node', () => {
    const result = parseRawPullRequestNode({ ...makeNode(), labels: { nodes: [] } });
    expect(result.ok).toBe(true);
    if (result.ok) expect(result.node['labels']).toEqual({ nodes: [] });
  });
});
