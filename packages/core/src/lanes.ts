export const laneNames = ['needs_review', 'reviewed', 'merged'] as const;
export type LaneName = (typeof laneNames)[number];

export function isLaneName(value: unknown): value is LaneName {
  return typeof value === 'string' && (laneNames as readonly string[]).includes(value);
}

/** Accepted issue-tracker statuses per lane; an empty list disables transitions for that lane. */
export type JiraStatusLists = Readonly<{
  draft: readonly string[];
  needsReview: readonly string[];
  reviewed: readonly string[];
  merged: readonly string[];
}>;

export const DEFAULT_JIRA_STATUSES: JiraStatusLists = {
  draft: ['In Development'],
  needsReview: ['In Review'],
  reviewed: ['In Review'],
  merged: ['Ready for QA', 'QA', 'In QA', 'Released', 'Done', 'Closed', 'Production'],
};

export function resolveLaneTargets(statuses: JiraStatusLists, lane: LaneName, isDraft: boolean): string[] {
  switch (lane) {
    case 'needs_review':
      return [...(isDraft ? statuses.draft : statuses.needsReview)];
    case 'reviewed':
      return [...statuses.reviewed];
    case 'merged':
      return [...statuses.merged];
  }
}

export const dashboardGroups = ['review_requested', 'needs_review', 'reviewed', 'merged'] as const;
export type DashboardGroup = (typeof dashboardGroups)[number];

export const dashboardGroupTitles: Readonly<Record<DashboardGroup, string>> = {
  review_requested: 'PRs I need to review',
  needs_review: 'My PRs that need review',
  reviewed: 'My PRs that have been reviewed',
  merged: 'Merged PRs (today)',
};

const REVIEWED_STATUSES = new Set(['approved', 'changes requested', 'reviewed']);

export function isReviewed(reviewStatus: string | null | undefined): boolean {
  if (!reviewStatus) return false;
  return REVIEWED_STATUSES.has(reviewStatus.toLowerCase());
}

type Categorizable = Readonly<{ state: string; isMine: boolean; reviewStatus: string | null }>;

export type LaneGroup<T> = Readonly<{ lane: DashboardGroup; title: string; pullRequests: T[] }>;

export function categorizePullRequests<T extends Categorizable>(records: readonly T[]): LaneGroup<T>[] {
  const buckets: Record<DashboardGroup, T[]> = {
    review_requested: [],
    needs_review: [],
    reviewed: [],
    merged: [],
  };

  for (const record of records) {
    if (record.state === 'MERGED') {
      buckets.merged.push(record);
    } else if (!record.isMine) {
      buckets.review_requested.push(record);
    } else if (isReviewed(record.reviewStatus)) {
      buckets.reviewed.push(record);
    } else {
      buckets.needs_review.push(record);
    }
  }

  return dashboardGroups.map((lane) => ({ lane, title: dashboardGroupTitles[lane], pullRequests: buckets[lane] }));
}

export function startOfUtcDay(now: Date): Date {
  return new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate()));
}
