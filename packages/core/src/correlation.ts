import { emptyCorrelation, type JiraCorrelation } from './pullRequest.js';

export type IssueAssignee = Readonly<{
  displayName: string | null;
  emailAddress: string | null;
  accountId: string | null;
}>;

/** Issue-tracker record as seen by the correlator; only selected fields reach the store. */
export type IssueSnapshot = Readonly<{
  key: string;
  status: string | null;
  summary: string | null;
  url: string;
  components: readonly string[];
  assignee: IssueAssignee | null;
  found: boolean;
}>;

export const NOT_FOUND_STATUS = 'not found';

export function notFoundSnapshot(key: string, url: string): IssueSnapshot {
  return {
    key,
    status: NOT_FOUND_STATUS,
    summary: null,
    url,
    components: [],
    assignee: null,
    found: false,
  };
}

/** Component name -> repository name(s) it stands for. */
export type ComponentRepoMap = Readonly<Record<string, string | readonly string[]>>;

export type IdentityConfig = Readonly<{
  jiraUsername?: string | null;
  jiraEmail?: string | null;
  githubUsername?: string | null;
}>;

export function normalizeComponentName(value: string): string {
  return value.toLowerCase().replace(/[^a-z0-9]/g, '');
}

function mappedReposFor(componentName: string, mapping: ComponentRepoMap): string[] {
  const normalized = normalizeComponentName(componentName);
  const repos: string[] = [];
  for (const [component, target] of Object.entries(mapping)) {
    if (normalizeComponentName(component) !== normalized) continue;
    const targets = typeof target === 'string' ? [target] : target;
    for (const repo of targets) repos.push(normalizeComponentName(repo));
  }
  return repos;
}

export function componentMatchesRepo(componentName: string, repoName: string, mapping: ComponentRepoMap = {}): boolean {
  const repo = normalizeComponentName(repoName);
  if (!repo) return false;
  if (mappedReposFor(componentName, mapping).includes(repo)) return true;
  return normalizeComponentName(componentName).includes(repo);
}

/**
 * `null` when the issue carries no components, otherwise whether any component belongs to
 * the repository (explicit mapping first, then a normalized substring test).
 */
export function componentsMatchRepo(
  components: readonly string[],
  repoName: string,
  mapping: ComponentRepoMap = {},
): boolean | null {
  if (components.length === 0) return null;
  return components.some((component) => componentMatchesRepo(component, repoName, mapping));
}

function identityVariants(value: string | null | undefined): string[] {
  const trimmed = (value ?? '').trim().toLowerCase();
  if (!trimmed) return [];
  const compact = trimmed.replace(/\s+/g, '');
  return compact === trimmed ? [trimmed] : [trimmed, compact];
}

export function buildAssigneeAllowSet(identity: IdentityConfig): Set<string> {
  return new Set([
    ...identityVariants(identity.jiraUsername),
    ...identityVariants(identity.jiraEmail),
    ...identityVariants(identity.githubUsername),
  ]);
}

export function assigneeMatches(assignee: IssueAssignee | null, allowSet: ReadonlySet<string>): boolean | null {
  if (!assignee) return false;
  if (allowSet.size === 0) return null;
  const candidates = [...identityVariants(assignee.displayName), ...identityVariants(assignee.emailAddress)];
  return candidates.some((candidate) => allowSet.has(candidate));
}

export type CorrelationContext = Readonly<{
  repoName: string;
  componentRepoMap: ComponentRepoMap;
  identity: IdentityConfig;
  syncedAt: string;
}>;

/** Copies the snapshot's fields into a correlation block and computes both match flags. */
export function buildCorrelation(
  keys: readonly string[],
  snapshot: IssueSnapshot,
  context: CorrelationContext,
): JiraCorrelation {
  const assignee = snapshot.assignee;
  return {
    ...emptyCorrelation(keys),
    jiraKey: snapshot.key,
    jiraStatus: snapshot.status,
    jiraSummary: snapshot.summary,
    jiraUrl: snapshot.url,
    jiraLastSyncedAt: context.syncedAt,
    jiraComponents: [...snapshot.components],
    jiraComponentsMatch: componentsMatchRepo(snapshot.components, context.repoName, context.componentRepoMap),
    jiraAssignee: assignee?.displayName ?? assignee?.emailAddress ?? null,
    jiraAssigneeMatch: assigneeMatches(assignee, buildAssigneeAllowSet(context.identity)),
  };
}
