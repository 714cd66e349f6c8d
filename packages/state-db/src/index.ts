import fs from 'node:fs';
import path from 'node:path';

import type { DerivedPullRequest, JiraCorrelation, PullRequestRef, PullRequestState } from '@prdash/core';
import Database from 'better-sqlite3';

type JsonRecord = Record<string, unknown>;
type JsonValue = unknown;

type DbHandle = Database.Database;

/** What the poller hands to the store: derived fields plus the correlation block. */
export type PullRequestRecordInput = Omit<DerivedPullRequest, 'issueKeys'> & JiraCorrelation;

export type StoredPullRequest = PullRequestRecordInput &
  Readonly<{
    isMine: boolean;
    lastSyncedAt: string;
  }>;

export type UpsertOptions = Readonly<{
  /** Account whose pull requests count as "mine"; compared case-insensitively. */
  accountLogin: string;
  now?: Date;
}>;

export type ListPullRequestsFilter = Readonly<{
  /** Merged records older than this ISO timestamp are left out; open and closed ones are kept. */
  mergedSince?: string | null;
  states?: readonly PullRequestState[];
}>;

export function dbPathForDataDir(dataDir: string): string {
  return path.join(path.resolve(dataDir), 'prdash.db');
}

function withDb<T>(dataDir: string, fn: (db: DbHandle) => T): T {
  const dbPath = dbPathForDataDir(dataDir);
  fs.mkdirSync(path.dirname(dbPath), { recursive: true });

  const db = new Database(dbPath);
  try {
    db.pragma('journal_mode = WAL');
    db.pragma('busy_timeout = 5000');
    db.pragma('synchronous = NORMAL');
    ensureSchema(db);
    return fn(db);
  } finally {
    db.close();
  }
}

function tryParseJson(raw: string): { ok: true; value: JsonValue } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(raw) as JsonValue };
  } catch {
    return { ok: false };
  }
}

function parseJsonRecord(raw: string): JsonRecord | null {
  const parsed = tryParseJson(raw);
  if (!parsed.ok) return null;
  const value = parsed.value;
  return value && typeof value === 'object' && !Array.isArray(value)
    ? (value as JsonRecord)
    : null;
}

function parseStringArray(raw: string): string[] {
  const parsed = tryParseJson(raw);
  if (!parsed.ok || !Array.isArray(parsed.value)) return [];
  return parsed.value.filter((item): item is string => typeof item === 'string');
}

function toFlag(value: boolean): 0 | 1 {
  return value ? 1 : 0;
}

function toTriState(value: boolean | null): 0 | 1 | null {
  if (value === null) return null;
  return value ? 1 : 0;
}

function fromTriState(value: number | null): boolean | null {
  if (value === null) return null;
  return value === 1;
}

export function ensureSchema(db: DbHandle): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS pull_requests (
      id INTEGER PRIMARY KEY,
      repo_owner TEXT NOT NULL,
      repo_name TEXT NOT NULL,
      number INTEGER NOT NULL CHECK (number > 0),
      title TEXT NOT NULL DEFAULT '',
      author TEXT NOT NULL DEFAULT '',
      url TEXT NOT NULL DEFAULT '',
      state TEXT NOT NULL CHECK (state IN ('OPEN', 'CLOSED', 'MERGED')),
      is_draft INTEGER NOT NULL DEFAULT 0 CHECK (is_draft IN (0, 1)),
      review_status TEXT NOT NULL DEFAULT '',
      ci_summary TEXT NOT NULL DEFAULT '',
      merge_ci_summary TEXT,
      last_commit_sha TEXT,
      merge_commit_sha TEXT,
      has_conflicts INTEGER NOT NULL DEFAULT 0 CHECK (has_conflicts IN (0, 1)),
      size_tier INTEGER NOT NULL DEFAULT 0 CHECK (size_tier BETWEEN 0 AND 5),
      is_mine INTEGER NOT NULL DEFAULT 0 CHECK (is_mine IN (0, 1)),
      updated_at TEXT NOT NULL,
      merged_at TEXT,
      last_synced_at TEXT NOT NULL,
      requested_reviewers TEXT NOT NULL DEFAULT '[]',
      requested_review_teams TEXT NOT NULL DEFAULT '[]',
      raw_json TEXT NOT NULL DEFAULT '{}',
      jira_key TEXT,
      jira_keys TEXT NOT NULL DEFAULT '[]',
      jira_status TEXT,
      jira_summary TEXT,
      jira_url TEXT,
      jira_last_synced_at TEXT,
      jira_components TEXT NOT NULL DEFAULT '[]',
      jira_components_match INTEGER CHECK (jira_components_match IN (0, 1)),
      jira_assignee TEXT,
      jira_assignee_match INTEGER CHECK (jira_assignee_match IN (0, 1)),
      UNIQUE(repo_owner, repo_name, number)
    );

    CREATE INDEX IF NOT EXISTS idx_pull_requests_jira_key
      ON pull_requests(jira_key);

    CREATE INDEX IF NOT EXISTS idx_pull_requests_mine_updated
      ON pull_requests(is_mine, updated_at);
  `);
}

type PullRequestRow = {
  repo_owner: string;
  repo_name: string;
  number: number;
  title: string;
  author: string;
  url: string;
  state: PullRequestState;
  is_draft: number;
  review_status: string;
  ci_summary: string;
  merge_ci_summary: string | null;
  last_commit_sha: string | null;
  merge_commit_sha: string | null;
  has_conflicts: number;
  size_tier: number;
  is_mine: number;
  updated_at: string;
  merged_at: string | null;
  last_synced_at: string;
  requested_reviewers: string;
  requested_review_teams: string;
  raw_json: string;
  jira_key: string | null;
  jira_keys: string;
  jira_status: string | null;
  jira_summary: string | null;
  jira_url: string | null;
  jira_last_synced_at: string | null;
  jira_components: string;
  jira_components_match: number | null;
  jira_assignee: string | null;
  jira_assignee_match: number | null;
};

const SELECT_COLUMNS = `
  repo_owner, repo_name, number, title, author, url, state, is_draft, review_status,
  ci_summary, merge_ci_summary, last_commit_sha, merge_commit_sha, has_conflicts,
  size_tier, is_mine, updated_at, merged_at, last_synced_at, requested_reviewers,
  requested_review_teams, raw_json, jira_key, jira_keys, jira_status, jira_summary,
  jira_url, jira_last_synced_at, jira_components, jira_components_match, jira_assignee,
  jira_assignee_match
`;

function rowToRecord(row: PullRequestRow): StoredPullRequest {
  return {
    owner: row.repo_owner,
    repo: row.repo_name,
    number: row.number,
    title: row.title,
    author: row.author,
    url: row.url,
    state: row.state,
    isDraft: row.is_draft === 1,
    reviewStatus: row.review_status,
    ciSummary: row.ci_summary,
    mergeCiSummary: row.merge_ci_summary,
    lastCommitSha: row.last_commit_sha,
    mergeCommitSha: row.merge_commit_sha,
    hasConflicts: row.has_conflicts === 1,
    sizeTier: row.size_tier,
    isMine: row.is_mine === 1,
    updatedAt: row.updated_at,
    mergedAt: row.merged_at,
    lastSyncedAt: row.last_synced_at,
    requestedReviewers: parseStringArray(row.requested_reviewers),
    requestedReviewTeams: parseStringArray(row.requested_review_teams),
    raw: parseJsonRecord(row.raw_json) ?? {},
    jiraKey: row.jira_key,
    jiraKeys: parseStringArray(row.jira_keys),
    jiraStatus: row.jira_status,
    jiraSummary: row.jira_summary,
    jiraUrl: row.jira_url,
    jiraLastSyncedAt: row.jira_last_synced_at,
    jiraComponents: parseStringArray(row.jira_components),
    jiraComponentsMatch: fromTriState(row.jira_components_match),
    jiraAssignee: row.jira_assignee,
    jiraAssigneeMatch: fromTriState(row.jira_assignee_match),
  };
}

function isMineFor(author: string, accountLogin: string): boolean {
  const account = accountLogin.trim().toLowerCase();
  return account.length > 0 && author.trim().toLowerCase() === account;
}

/**
 * Inserts or fully replaces each record, keyed by owner/repo/number, inside one
 * transaction. Returns the number of records written.
 */
export function upsertPullRequestsInDb(
  dataDir: string,
  records: readonly PullRequestRecordInput[],
  options: UpsertOptions,
): number {
  if (records.length === 0) return 0;
  const lastSyncedAt = (options.now ?? new Date()).toISOString();

  return withDb(dataDir, (db) => {
    const stmt = db.prepare(
      `
      INSERT INTO pull_requests (
        repo_owner, repo_name, number, title, author, url, state, is_draft, review_status,
        ci_summary, merge_ci_summary, last_commit_sha, merge_commit_sha, has_conflicts,
        size_tier, is_mine, updated_at, merged_at, last_synced_at, requested_reviewers,
        requested_review_teams, raw_json, jira_key, jira_keys, jira_status, jira_summary,
        jira_url, jira_last_synced_at, jira_components, jira_components_match, jira_assignee,
        jira_assignee_match
      )
      VALUES (
        @repo_owner, @repo_name, @number, @title, @author, @url, @state, @is_draft, @review_status,
        @ci_summary, @merge_ci_summary, @last_commit_sha, @merge_commit_sha, @has_conflicts,
        @size_tier, @is_mine, @updated_at, @merged_at, @last_synced_at, @requested_reviewers,
        @requested_review_teams, @raw_json, @jira_key, @jira_keys, @jira_status, @jira_summary,
        @jira_url, @jira_last_synced_at, @jira_components, @jira_components_match, @jira_assignee,
        @jira_assignee_match
      )
      ON CONFLICT(repo_owner, repo_name, number) DO UPDATE SET
        title = excluded.title,
        author = excluded.author,
        url = excluded.url,
        state = excluded.state,
        is_draft = excluded.is_draft,
        review_status = excluded.review_status,
        ci_summary = excluded.ci_summary,
        merge_ci_summary = excluded.merge_ci_summary,
        last_commit_sha = excluded.last_commit_sha,
        merge_commit_sha = excluded.merge_commit_sha,
        has_conflicts = excluded.has_conflicts,
        size_tier = excluded.size_tier,
        is_mine = excluded.is_mine,
        updated_at = excluded.updated_at,
        merged_at = excluded.merged_at,
        last_synced_at = excluded.last_synced_at,
        requested_reviewers = excluded.requested_reviewers,
        requested_review_teams = excluded.requested_review_teams,
        raw_json = excluded.raw_json,
        jira_key = excluded.jira_key,
        jira_keys = excluded.jira_keys,
        jira_status = excluded.jira_status,
        jira_summary = excluded.jira_summary,
        jira_url = excluded.jira_url,
        jira_last_synced_at = excluded.jira_last_synced_at,
        jira_components = excluded.jira_components,
        jira_components_match = excluded.jira_components_match,
        jira_assignee = excluded.jira_assignee,
        jira_assignee_match = excluded.jira_assignee_match
      `,
    );

    const writeAll = db.transaction((items: readonly PullRequestRecordInput[]) => {
      for (const record of items) {
        stmt.run({
          repo_owner: record.owner,
          repo_name: record.repo,
          number: record.number,
          title: record.title,
          author: record.author,
          url: record.url,
          state: record.state,
          is_draft: toFlag(record.isDraft),
          review_status: record.reviewStatus,
          ci_summary: record.ciSummary,
          merge_ci_summary: record.mergeCiSummary,
          last_commit_sha: record.lastCommitSha,
          merge_commit_sha: record.mergeCommitSha,
          has_conflicts: toFlag(record.hasConflicts),
          size_tier: record.sizeTier,
          is_mine: toFlag(isMineFor(record.author, options.accountLogin)),
          updated_at: record.updatedAt,
          merged_at: record.mergedAt,
          last_synced_at: lastSyncedAt,
          requested_reviewers: JSON.stringify(record.requestedReviewers),
          requested_review_teams: JSON.stringify(record.requestedReviewTeams),
          raw_json: JSON.stringify(record.raw),
          jira_key: record.jiraKey,
          jira_keys: JSON.stringify(record.jiraKeys),
          jira_status: record.jiraStatus,
          jira_summary: record.jiraSummary,
          jira_url: record.jiraUrl,
          jira_last_synced_at: record.jiraLastSyncedAt,
          jira_components: JSON.stringify(record.jiraComponents),
          jira_components_match: toTriState(record.jiraComponentsMatch),
          jira_assignee: record.jiraAssignee,
          jira_assignee_match: toTriState(record.jiraAssigneeMatch),
        });
      }
      return items.length;
    });

    return writeAll(records);
  });
}

export function readPullRequestFromDb(dataDir: string, ref: PullRequestRef): StoredPullRequest | null {
  return withDb(dataDir, (db) => {
    const row = db
      .prepare(`SELECT ${SELECT_COLUMNS} FROM pull_requests WHERE repo_owner = ? AND repo_name = ? AND number = ?`)
      .get(ref.owner, ref.repo, ref.number) as PullRequestRow | undefined;
    return row ? rowToRecord(row) : null;
  });
}

/** Records ordered with the account's own pull requests first, then most recently updated. */
export function listPullRequestsFromDb(dataDir: string, filter: ListPullRequestsFilter = {}): StoredPullRequest[] {
  const clauses: string[] = [];
  const params: (string | number)[] = [];

  if (filter.mergedSince) {
    clauses.push(`(state <> 'MERGED' OR (merged_at IS NOT NULL AND merged_at >= ?))`);
    params.push(filter.mergedSince);
  }
  if (filter.states && filter.states.length > 0) {
    clauses.push(`state IN (${filter.states.map(() => '?').join(', ')})`);
    params.push(...filter.states);
  }
  const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';

  return withDb(dataDir, (db) => {
    const rows = db
      .prepare(`SELECT ${SELECT_COLUMNS} FROM pull_requests ${where} ORDER BY is_mine DESC, updated_at DESC, id ASC`)
      .all(...params) as PullRequestRow[];
    return rows.map(rowToRecord);
  });
}

/** Records whose primary key or any extracted key equals `jiraKey` (case-insensitive). */
export function listPullRequestsByJiraKeyFromDb(dataDir: string, jiraKey: string): StoredPullRequest[] {
  const key = jiraKey.trim().toUpperCase();
  if (!key) return [];
  return withDb(dataDir, (db) => {
    const rows = db
      .prepare(
        `
        SELECT ${SELECT_COLUMNS}
        FROM pull_requests
        WHERE jira_key = ?
           OR EXISTS (SELECT 1 FROM json_each(pull_requests.jira_keys) WHERE json_each.value = ?)
        ORDER BY is_mine DESC, updated_at DESC, id ASC
        `,
      )
      .all(key, key) as PullRequestRow[];
    return rows.map(rowToRecord);
  });
}

/** Records the issue status observed after an issue action, ahead of the next poll. */
export function updateJiraStatusInDb(dataDir: string, jiraKey: string, status: string | null, syncedAt: Date): number {
  const key = jiraKey.trim().toUpperCase();
  if (!key) return 0;
  return withDb(dataDir, (db) => {
    const result = db
      .prepare('UPDATE pull_requests SET jira_status = ?, jira_last_synced_at = ? WHERE jira_key = ?')
      .run(status, syncedAt.toISOString(), key);
    return result.changes;
  });
}

export function countPullRequestsInDb(dataDir: string): number {
  return withDb(dataDir, (db) => {
    const row = db.prepare('SELECT COUNT(*) as count FROM pull_requests').get() as { count: number };
    return row.count;
  });
}

/** Removes the database file and its WAL side files. */
export function resetDb(dataDir: string): void {
  const dbPath = dbPathForDataDir(dataDir);
  for (const suffix of ['', '-wal', '-shm']) {
    fs.rmSync(`${dbPath}${suffix}`, { force: true });
  }
}
