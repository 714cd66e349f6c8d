import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { emptyCorrelation } from '@prdash/core';
import Database from 'better-sqlite3';
import { describe, expect, it } from 'vitest';

import {
  countPullRequestsInDb,
  dbPathForDataDir,
  listPullRequestsByJiraKeyFromDb,
  listPullRequestsFromDb,
  readPullRequestFromDb,
  resetDb,
  updateJiraStatusInDb,
  upsertPullRequestsInDb,
  type PullRequestRecordInput,
} from './index.js';

async function makeDataDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

function makeRecord(overrides: Partial<PullRequestRecordInput> = {}): PullRequestRecordInput {
  return {
    owner: 'acme',
    repo: 'rocket',
    number: 7,
    title: 'Tidy up the launch checklist',
    author: 'octo',
    url: 'https://github.com/acme/rocket/pull/7',
    state: 'OPEN',
    isDraft: false,
    reviewStatus: 'needs review',
    ciSummary: 'SUCCESS (3 checks)',
    mergeCiSummary: null,
    lastCommitSha: 'sha-1',
    mergeCommitSha: null,
    hasConflicts: false,
    sizeTier: 1,
    updatedAt: '2026-03-02T09:30:00Z',
    mergedAt: null,
    requestedReviewers: [],
    requestedReviewTeams: [],
    raw: { number: 7 },
    ...emptyCorrelation(['ROCK-12']),
    ...overrides,
  };
}

describe('upsertPullRequestsInDb', () => {
  it('keeps a single row per pull request and advances last_synced_at', async () => {
    const dataDir = await makeDataDir('prdash-state-db-upsert-');
    const ref = { owner: 'acme', repo: 'rocket', number: 7 };

    upsertPullRequestsInDb(dataDir, [makeRecord()], { accountLogin: 'octo', now: new Date('2026-03-02T10:00:00.000Z') });
    upsertPullRequestsInDb(dataDir, [makeRecord()], { accountLogin: 'octo', now: new Date('2026-03-02T10:00:15.000Z') });

    expect(countPullRequestsInDb(dataDir)).toBe(1);
    expect(readPullRequestFromDb(dataDir, ref)?.lastSyncedAt).toBe('2026-03-02T10:00:15.000Z');
  });

  it('replaces every field on update', async () => {
    const dataDir = await makeDataDir('prdash-state-db-overwrite-');
    const ref = { owner: 'acme', repo: 'rocket', number: 7 };

    upsertPullRequestsInDb(
      dataDir,
      [
        makeRecord({
          jiraStatus: 'In Review',
          jiraComponents: ['Rocket'],
          jiraComponentsMatch: true,
          jiraAssignee: 'Ada',
          jiraAssigneeMatch: false,
        }),
      ],
      { accountLogin: 'octo' },
    );
    upsertPullRequestsInDb(
      dataDir,
      [
        makeRecord({
          title: 'Tidy up the launch checklist (v2)',
          state: 'MERGED',
          reviewStatus: 'approved',
          mergedAt: '2026-03-02T11:00:00Z',
          mergeCommitSha: 'sha-merge',
          mergeCiSummary: 'no merge checks',
          hasConflicts: true,
          sizeTier: 3,
          raw: { number: 7, size_sparkline: [0.1] },
        }),
      ],
      { accountLogin: 'octo' },
    );

    const stored = readPullRequestFromDb(dataDir, ref);
    expect(stored).toMatchObject({
      title: 'Tidy up the launch checklist (v2)',
      state: 'MERGED',
      reviewStatus: 'approved',
      mergedAt: '2026-03-02T11:00:00Z',
      mergeCommitSha: 'sha-merge',
      mergeCiSummary: 'no merge checks',
      hasConflicts: true,
      sizeTier: 3,
      raw: { number: 7, size_sparkline: [0.1] },
      jiraKey: 'ROCK-12',
      jiraKeys: ['ROCK-12'],
      jiraStatus: null,
      jiraComponents: [],
      jiraComponentsMatch: null,
      jiraAssignee: null,
      jiraAssigneeMatch: null,
    });
  });

  it('recomputes isMine against the configured account on every write', async () => {
    const dataDir = await makeDataDir('prdash-state-db-mine-');
    const ref = { owner: 'acme', repo: 'rocket', number: 7 };

    upsertPullRequestsInDb(dataDir, [makeRecord({ author: 'Octo' })], { accountLogin: 'octo' });
    expect(readPullRequestFromDb(dataDir, ref)?.isMine).toBe(true);

    upsertPullRequestsInDb(dataDir, [makeRecord({ author: 'Octo' })], { accountLogin: 'hubot' });
    expect(readPullRequestFromDb(dataDir, ref)?.isMine).toBe(false);
  });

  it('round-trips tri-state correlation flags', async () => {
    const dataDir = await makeDataDir('prdash-state-db-flags-');

    upsertPullRequestsInDb(
      dataDir,
      [
        makeRecord({ number: 1, jiraComponentsMatch: true, jiraAssigneeMatch: false }),
        makeRecord({ number: 2, jiraComponentsMatch: null, jiraAssigneeMatch: true }),
      ],
      { accountLogin: 'octo' },
    );

    const first = readPullRequestFromDb(dataDir, { owner: 'acme', repo: 'rocket', number: 1 });
    const second = readPullRequestFromDb(dataDir, { owner: 'acme', repo: 'rocket', number: 2 });
    expect([first?.jiraComponentsMatch, first?.jiraAssigneeMatch]).toEqual([true, false]);
    expect([second?.jiraComponentsMatch, second?.jiraAssigneeMatch]).toEqual([null, true]);
  });

  it('writes nothing for an empty batch', async () => {
    const dataDir = await makeDataDir('prdash-state-db-empty-');
    expect(upsertPullRequestsInDb(dataDir, [], { accountLogin: 'octo' })).toBe(0);
    expect(countPullRequestsInDb(dataDir)).toBe(0);
  });

  it('rolls back the whole batch when one record is rejected', async () => {
    const dataDir = await makeDataDir('prdash-state-db-rollback-');

    expect(() =>
      upsertPullRequestsInDb(dataDir, [makeRecord({ number: 1 }), makeRecord({ number: 2, sizeTier: 9 })], {
        accountLogin: 'octo',
      }),
    ).toThrow(/CHECK constraint failed/);
    expect(countPullRequestsInDb(dataDir)).toBe(0);
  });
});

describe('listPullRequestsFromDb', () => {
  it('orders own pull requests first, then by last update', async () => {
    const dataDir = await makeDataDir('prdash-state-db-list-');

    upsertPullRequestsInDb(
      dataDir,
      [
        makeRecord({ number: 1, author: 'hubot', updatedAt: '2026-03-02T12:00:00Z' }),
        makeRecord({ number: 2, author: 'octo', updatedAt: '2026-03-01T12:00:00Z' }),
        makeRecord({ number: 3, author: 'octo', updatedAt: '2026-03-02T08:00:00Z' }),
      ],
      { accountLogin: 'octo' },
    );

    expect(listPullRequestsFromDb(dataDir).map((record) => record.number)).toEqual([3, 2, 1]);
  });

  it('drops merged records older than the cut-off', async () => {
    const dataDir = await makeDataDir('prdash-state-db-merged-');

    upsertPullRequestsInDb(
      dataDir,
      [
        makeRecord({ number: 1, state: 'MERGED', mergedAt: '2026-03-01T23:59:59Z' }),
        makeRecord({ number: 2, state: 'MERGED', mergedAt: '2026-03-02T00:00:00Z' }),
        makeRecord({ number: 3, state: 'OPEN' }),
        makeRecord({ number: 4, state: 'MERGED', mergedAt: null }),
      ],
      { accountLogin: 'octo' },
    );

    const numbers = listPullRequestsFromDb(dataDir, { mergedSince: '2026-03-02T00:00:00.000Z' })
      .map((record) => record.number)
      .sort((a, b) => a - b);
    expect(numbers).toEqual([2, 3]);
    expect(listPullRequestsFromDb(dataDir, { states: ['OPEN'] }).map((record) => record.number)).toEqual([3]);
  });
});

describe('issue key lookups', () => {
  it('finds records by primary or secondary key and updates the cached status', async () => {
    const dataDir = await makeDataDir('prdash-state-db-keys-');

    upsertPullRequestsInDb(
      dataDir,
      [
        makeRecord({ number: 1, ...emptyCorrelation(['ROCK-1', 'ROCK-2']) }),
        makeRecord({ number: 2, ...emptyCorrelation(['ROCK-2']) }),
        makeRecord({ number: 3, ...emptyCorrelation([]) }),
      ],
      { accountLogin: 'octo' },
    );

    expect(listPullRequestsByJiraKeyFromDb(dataDir, 'rock-2').map((record) => record.number).sort()).toEqual([1, 2]);
    expect(listPullRequestsByJiraKeyFromDb(dataDir, 'ROCK-1').map((record) => record.number)).toEqual([1]);

    expect(updateJiraStatusInDb(dataDir, 'rock-2', 'Done', new Date('2026-03-02T12:00:00.000Z'))).toBe(1);
    expect(readPullRequestFromDb(dataDir, { owner: 'acme', repo: 'rocket', number: 2 })).toMatchObject({
      jiraStatus: 'Done',
      jiraLastSyncedAt: '2026-03-02T12:00:00.000Z',
    });
  });
});

describe('resetDb', () => {
  it('removes the database file', async () => {
    const dataDir = await makeDataDir('prdash-state-db-reset-');
    upsertPullRequestsInDb(dataDir, [makeRecord()], { accountLogin: 'octo' });

    const db = new Database(dbPathForDataDir(dataDir));
    const journalMode = String(db.pragma('journal_mode', { simple: true }));
    db.close();
    expect(journalMode).toBe('wal');

    resetDb(dataDir);
    await expect(fs.stat(dbPathForDataDir(dataDir))).rejects.toMatchObject({ code: 'ENOENT' });
    expect(countPullRequestsInDb(dataDir)).toBe(0);
  });
});
