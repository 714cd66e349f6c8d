import { extractIssueKeysFromTexts } from './issueKeys.js';
import type { DerivedPullRequest, RawPullRequestNode, RawStatusCheckRollup } from './pullRequest.js';

export const REVIEW_WINDOW = 10;

/** Review status when the node carries no reviews at all. */
export const NO_REVIEWS_STATUS = 'needs review';
export const DISMISSED_ONLY_STATUS = 'needs re-review';

/** Upper bounds (exclusive) of size tiers 0..4; anything at or above the last is tier 5. */
export const SIZE_TIER_THRESHOLDS = [2, 4, 7, 11, 18] as const;

const SPARKLINE_CAP = 2000;

export function summarizeReviews(node: RawPullRequestNode): string {
  const reviews = (node.reviews?.nodes ?? []).slice(-REVIEW_WINDOW);
  let dismissedPresent = false;
  const states: string[] = [];
  for (const review of reviews) {
    const state = review?.state;
    if (!state) continue;
    if (state === 'DISMISSED') {
      dismissedPresent = true;
      continue;
    }
    states.push(state);
  }

  if (states.length === 0) {
    return dismissedPresent ? DISMISSED_ONLY_STATUS : NO_REVIEWS_STATUS;
  }
  if (states.includes('APPROVED')) return 'approved';
  if (states.includes('CHANGES_REQUESTED')) return 'changes requested';

  const latest = states[states.length - 1] ?? '';
  return latest.toLowerCase();
}

export function summarizeRollup(rollup: RawStatusCheckRollup | null | undefined, label = 'checks'): string {
  if (!rollup) return `no ${label}`;
  const state = rollup.state || 'UNKNOWN';
  const count = rollup.contexts?.totalCount ?? rollup.contexts?.nodes?.length ?? 0;
  return `${state} (${count} ${label})`;
}

export function summarizeCi(node: RawPullRequestNode): string {
  const commits = node.commitsWithStatus?.nodes ?? [];
  const latest = commits[0];
  if (!latest) return 'no commits';
  return summarizeRollup(latest.commit?.statusCheckRollup);
}

/** `null` when there is no merge commit, which is different from a merge commit without checks. */
export function summarizeMergeCi(node: RawPullRequestNode): string | null {
  const mergeCommit = node.mergeCommit;
  if (!mergeCommit) return null;
  return summarizeRollup(mergeCommit.statusCheckRollup, 'merge checks');
}

export function hasMergeConflicts(node: RawPullRequestNode): boolean {
  return (node.mergeStateStatus ?? '').toUpperCase() === 'DIRTY';
}

function commitCount(node: RawPullRequestNode): number {
  return node.commitTotals?.totalCount || node.commits?.totalCount || 0;
}

export function computeSizeScore(node: RawPullRequestNode): number {
  const churn = (node.additions ?? 0) + (node.deletions ?? 0);
  const files = node.changedFiles ?? 0;
  return churn * 0.01 + files * 0.2 + commitCount(node) * 0.05;
}

export function sizeTierForScore(score: number): number {
  const idx = SIZE_TIER_THRESHOLDS.findIndex((threshold) => score < threshold);
  return idx === -1 ? SIZE_TIER_THRESHOLDS.length : idx;
}

export function computeSizeTier(node: RawPullRequestNode): number {
  return sizeTierForScore(computeSizeScore(node));
}

/** Ten rising bars scaled by churn plus 20 per changed file, capped at 2000. */
export function buildSizeSparkline(node: RawPullRequestNode): number[] {
  const churn = (node.additions ?? 0) + (node.deletions ?? 0);
  const signal = churn + (node.changedFiles ?? 0) * 20;
  const norm = Math.min(signal, SPARKLINE_CAP) / SPARKLINE_CAP;
  return Array.from({ length: 10 }, (_, i) => norm * ((i + 1) / 10));
}

export function requestedReviewersOf(node: RawPullRequestNode): { users: string[]; teams: string[] } {
  const users: string[] = [];
  const teams: string[] = [];
  for (const request of node.reviewRequests?.nodes ?? []) {
    const reviewer = request?.requestedReviewer;
    if (!reviewer) continue;
    if (typeof reviewer.login === 'string') users.push(reviewer.login);
    if (typeof reviewer.slug === 'string') teams.push(reviewer.slug);
  }
  return { users, teams };
}

export type DeriveOptions = Readonly<{
  allowedKeyPrefixes?: readonly string[];
}>;

export function derivePullRequest(
  owner: string,
  repo: string,
  node: RawPullRequestNode,
  options: DeriveOptions = {},
): DerivedPullRequest {
  const { users, teams } = requestedReviewersOf(node);
  const latestCommit = node.commitsWithStatus?.nodes?.[0]?.commit;

  return {
    owner,
    repo,
    number: node.number,
    title: node.title,
    author: node.author?.login || 'unknown',
    url: node.url,
    state: node.state,
    isDraft: node.isDraft ?? false,
    reviewStatus: summarizeReviews(node),
    ciSummary: summarizeCi(node),
    mergeCiSummary: summarizeMergeCi(node),
    lastCommitSha: latestCommit?.oid ?? null,
    mergeCommitSha: node.mergeCommit?.oid ?? null,
    hasConflicts: hasMergeConflicts(node),
    sizeTier: computeSizeTier(node),
    updatedAt: node.updatedAt,
    mergedAt: node.mergedAt ?? null,
    requestedReviewers: users,
    requestedReviewTeams: teams,
    issueKeys: extractIssueKeysFromTexts([node.title, node.headRefName, node.body], options.allowedKeyPrefixes ?? []),
    raw: { ...node, size_sparkline: buildSizeSparkline(node) },
  };
}
