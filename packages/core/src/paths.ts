import os from 'node:os';
import path from 'node:path';

export type RepoSpec = Readonly<{ owner: string; repo: string }>;
export type PullRequestRef = Readonly<{ owner: string; repo: string; number: number }>;

const APP_DIR_NAME = 'prdash';

function nonBlank(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

function expandHome(inputPath: string, homeDir: string): string {
  if (inputPath === '~') return homeDir;
  return /^~[\\/]/.test(inputPath) ? path.join(homeDir, inputPath.slice(2)) : inputPath;
}

function platformDataHome(env: NodeJS.ProcessEnv, platform: NodeJS.Platform, homeDir: string): string {
  switch (platform) {
    case 'win32':
      return env.LOCALAPPDATA ?? path.join(homeDir, 'AppData', 'Local');
    case 'darwin':
      return path.join(homeDir, 'Library', 'Application Support');
    default:
      return nonBlank(env.XDG_DATA_HOME) ?? path.join(homeDir, '.local', 'share');
  }
}

/** Where the SQLite store lives: `PRDASH_DATA_DIR`, else the platform's per-user data directory. */
export function resolveDataDir(options?: {
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
  homeDir?: string;
}): string {
  const env = options?.env ?? process.env;
  const homeDir = options?.homeDir ?? os.homedir();

  const override = nonBlank(env.PRDASH_DATA_DIR);
  if (override) return path.resolve(expandHome(override, homeDir));
  return path.resolve(platformDataHome(env, options?.platform ?? process.platform, homeDir), APP_DIR_NAME);
}

function ownerAndRepo(segments: readonly string[]): RepoSpec | null {
  const [owner, repo] = segments;
  if (!owner || !repo) return null;
  const name = repo.replace(/\.git$/, '');
  return name ? { owner, repo: name } : null;
}

/** Accepts `owner/repo` (optionally ending in `.git`) or a github.com URL. */
export function parseRepoSpec(spec: string): RepoSpec {
  const cleaned = spec.trim();
  if (!cleaned) throw new Error('repo spec is required');

  if (/^https?:\/\//.test(cleaned)) {
    const marker = cleaned.indexOf('github.com/');
    const parsed =
      marker === -1 ? null : ownerAndRepo(cleaned.slice(marker + 'github.com/'.length).replace(/\/$/, '').split('/'));
    if (parsed) return parsed;
  } else if (!cleaned.includes(':')) {
    const segments = cleaned.split('/');
    const parsed = segments.length === 2 ? ownerAndRepo(segments) : null;
    if (parsed) return parsed;
  }

  throw new Error(`invalid repo spec: ${spec}. expected owner/repo or https://github.com/owner/repo`);
}

export function parsePullRequestRef(ref: string): PullRequestRef {
  const cleaned = ref.trim();
  if (!cleaned) throw new Error('pull request ref is required');

  const match = cleaned.match(/github\.com\/([^/]+)\/([^/]+)\/pull\/(\d+)/);
  if (match) {
    const [, owner, repo, num] = match;
    if (owner && repo && num) return { owner, repo, number: Number(num) };
  }

  const hashIdx = cleaned.indexOf('#');
  if (hashIdx === -1) {
    throw new Error(`invalid pull request ref: ${ref}. expected owner/repo#123`);
  }
  const numberPart = cleaned.slice(hashIdx + 1);
  const num = Number(numberPart);
  if (!/^\d+$/.test(numberPart) || !Number.isInteger(num) || num <= 0) {
    throw new Error(`invalid pull request number: ${numberPart}`);
  }
  const parsed = parseRepoSpec(cleaned.slice(0, hashIdx));
  return { ...parsed, number: num };
}

/** Splits a comma-separated list, trimming entries and dropping blanks. */
export function splitList(value: string | undefined | null): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}
