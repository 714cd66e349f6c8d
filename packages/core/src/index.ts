export {
  parsePullRequestRef,
  parseRepoSpec,
  resolveDataDir,
  splitList,
  type PullRequestRef,
  type RepoSpec,
} from './paths.js';

export { DashboardError, errorMessage, isDashboardError, type DashboardErrorCode } from './errors.js';

export {
  emptyCorrelation,
  parseRawPullRequestNode,
  pullRequestStates,
  rawPullRequestNodeSchema,
  type DerivedPullRequest,
  type JiraCorrelation,
  type ParsedNode,
  type PullRequestState,
  type RawPullRequestNode,
  type RawStatusCheckRollup,
} from './pullRequest.js';

export {
  buildSizeSparkline,
  computeSizeScore,
  computeSizeTier,
  derivePullRequest,
  DISMISSED_ONLY_STATUS,
  hasMergeConflicts,
  NO_REVIEWS_STATUS,
  requestedReviewersOf,
  SIZE_TIER_THRESHOLDS,
  sizeTierForScore,
  summarizeCi,
  summarizeMergeCi,
  summarizeReviews,
  summarizeRollup,
  type DeriveOptions,
} from './signals.js';

export { extractIssueKeys, extractIssueKeysFromTexts, projectKeyOf } from './issueKeys.js';

export {
  assigneeMatches,
  buildAssigneeAllowSet,
  buildCorrelation,
  componentMatchesRepo,
  componentsMatchRepo,
  normalizeComponentName,
  notFoundSnapshot,
  NOT_FOUND_STATUS,
  type ComponentRepoMap,
  type CorrelationContext,
  type IdentityConfig,
  type IssueAssignee,
  type IssueSnapshot,
} from './correlation.js';

export {
  categorizePullRequests,
  DEFAULT_JIRA_STATUSES,
  dashboardGroups,
  isLaneName,
  isReviewed,
  laneNames,
  resolveLaneTargets,
  startOfUtcDay,
  type DashboardGroup,
  type JiraStatusLists,
  type LaneGroup,
  type LaneName,
} from './lanes.js';

export {
  BUILT_IN_STATUS_CHAIN,
  builtInPathFor,
  candidateStepsFor,
  describeStep,
  loadTransitionPathTable,
  parseTransitionPathTable,
  type PathStep,
  type TransitionPath,
  type TransitionPathTable,
} from './transitionPaths.js';

export {
  MAX_TRANSITION_STEPS,
  matchTransitionByName,
  pickTransition,
  resolveTransition,
  type AppliedTransition,
  type ResolveTransitionParams,
  type TransitionFailureCode,
  type TransitionOutcome,
  type TransitionStep,
  type TransitionTracker,
} from './transitionResolver.js';

export {
  buildConfig,
  DEFAULT_POLL_INTERVAL_SECONDS,
  DEFAULT_PULL_REQUEST_LIMIT,
  DEFAULT_REMOTE_TIMEOUT_MS,
  isJiraEnabled,
  loadConfig,
  parseConfigFile,
  type ConfigFile,
  type DashboardConfig,
  type JiraConnection,
} from './config.js';
