import fs from 'node:fs/promises';
import path from 'node:path';

import { z } from 'zod';

import type { ComponentRepoMap } from './correlation.js';
import { DashboardError } from './errors.js';
import { DEFAULT_JIRA_STATUSES, type JiraStatusLists } from './lanes.js';
import { parsePullRequestRef, parseRepoSpec, resolveDataDir, splitList, type PullRequestRef, type RepoSpec } from './paths.js';
import { parseConfigDocument } from './transitionPaths.js';

export const DEFAULT_POLL_INTERVAL_SECONDS = 15;
export const DEFAULT_PULL_REQUEST_LIMIT = 20;
export const DEFAULT_REMOTE_TIMEOUT_MS = 8000;

export type JiraConnection = Readonly<{
  baseUrl: string;
  email: string;
  apiToken: string;
}>;

export type DashboardConfig = Readonly<{
  githubToken: string;
  githubUsername: string;
  trackedRepos: readonly RepoSpec[];
  watchedPullRequests: readonly PullRequestRef[];
  pollIntervalSeconds: number;
  pullRequestLimit: number;
  remoteTimeoutMs: number;
  dataDir: string;
  /** `null` unless base URL, email and API token are all configured. */
  jira: JiraConnection | null;
  jiraUsername: string | null;
  allowedKeyPrefixes: readonly string[];
  jiraStatuses: JiraStatusLists;
  componentRepoMap: ComponentRepoMap;
  transitionPathsFile: string | null;
  /** Lets other hosts reach the mutating endpoints; `--allow-remote` also sets it. */
  allowRemote: boolean;
}>;

const statusListSchema = z.array(z.string().min(1));

const configFileSchema = z
  .object({
    component_repo_map: z.record(z.string(), z.union([z.string(), z.array(z.string())])).optional(),
    jira_statuses: z
      .object({
        draft: statusListSchema.optional(),
        needs_review: statusListSchema.optional(),
        reviewed: statusListSchema.optional(),
        merged: statusListSchema.optional(),
      })
      .optional(),
    jira_key_prefixes: z.array(z.string().min(1)).optional(),
    transition_paths_file: z.string().min(1).optional(),
  })
  .passthrough();

export type ConfigFile = z.infer<typeof configFileSchema>;

const positiveInt = (fallback: number) =>
  z
    .string()
    .optional()
    .transform((value, ctx) => {
      const trimmed = (value ?? '').trim();
      if (!trimmed) return fallback;
      const n = Number(trimmed);
      if (!Number.isInteger(n) || n <= 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a positive integer, got '${trimmed}'` });
        return z.NEVER;
      }
      return n;
    });

const optionalString = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = (value ?? '').trim();
    return trimmed ? trimmed : null;
  });

const flag = z
  .string()
  .optional()
  .transform((value) => ['1', 'true', 'yes', 'on'].includes((value ?? '').trim().toLowerCase()));

const envSchema = z.object({
  PRDASH_GITHUB_TOKEN: z.string({ required_error: 'is required' }).trim().min(1, 'is required'),
  PRDASH_GITHUB_USERNAME: z.string({ required_error: 'is required' }).trim().min(1, 'is required'),
  PRDASH_TRACKED_REPOS: optionalString,
  PRDASH_WATCHED_PRS: optionalString,
  PRDASH_POLL_INTERVAL_SECONDS: positiveInt(DEFAULT_POLL_INTERVAL_SECONDS),
  PRDASH_PR_LIMIT: positiveInt(DEFAULT_PULL_REQUEST_LIMIT),
  PRDASH_REMOTE_TIMEOUT_MS: positiveInt(DEFAULT_REMOTE_TIMEOUT_MS),
  PRDASH_JIRA_BASE_URL: optionalString,
  PRDASH_JIRA_EMAIL: optionalString,
  PRDASH_JIRA_API_TOKEN: optionalString,
  PRDASH_JIRA_USERNAME: optionalString,
  PRDASH_JIRA_KEY_PREFIXES: optionalString,
  PRDASH_JIRA_STATUS_DRAFT: optionalString,
  PRDASH_JIRA_STATUS_NEEDS_REVIEW: optionalString,
  PRDASH_JIRA_STATUS_REVIEWED: optionalString,
  PRDASH_JIRA_STATUS_MERGED: optionalString,
  PRDASH_JIRA_TRANSITION_PATHS_FILE: optionalString,
  PRDASH_CONFIG_FILE: optionalString,
  PRDASH_ALLOW_REMOTE: flag,
});

function invalid(source: string, error: z.ZodError): DashboardError {
  const details = error.issues.map((issue) => `${issue.path.join('.') || 'root'} ${issue.message}`).join('; ');
  return new DashboardError({ code: 'configuration_gap', message: `invalid ${source}: ${details}` });
}

function parseEntries<T>(values: readonly string[], parse: (value: string) => T, label: string): T[] {
  return values.map((value) => {
    try {
      return parse(value);
    } catch (err) {
      throw new DashboardError({
        code: 'configuration_gap',
        message: `invalid ${label}: ${err instanceof Error ? err.message : String(err)}`,
        cause: err,
      });
    }
  });
}

function pickStatuses(envValue: string | null, fileValue: readonly string[] | undefined, fallback: readonly string[]): string[] {
  if (envValue !== null) return splitList(envValue);
  if (fileValue !== undefined) return [...fileValue];
  return [...fallback];
}

export function parseConfigFile(raw: unknown, sourceName = 'config file'): ConfigFile {
  const parsed = configFileSchema.safeParse(raw ?? {});
  if (!parsed.success) throw invalid(sourceName, parsed.error);
  return parsed.data;
}

export type BuildConfigOptions = Readonly<{
  env: NodeJS.ProcessEnv;
  file?: ConfigFile;
  cwd?: string;
  platform?: NodeJS.Platform;
  homeDir?: string;
}>;

/** Builds an immutable config from environment variables and an already-parsed config file. */
export function buildConfig(options: BuildConfigOptions): DashboardConfig {
  const parsed = envSchema.safeParse(options.env);
  if (!parsed.success) throw invalid('environment', parsed.error);
  const env = parsed.data;
  const file = options.file ?? {};
  const cwd = options.cwd ?? process.cwd();

  const jira =
    env.PRDASH_JIRA_BASE_URL && env.PRDASH_JIRA_EMAIL && env.PRDASH_JIRA_API_TOKEN
      ? {
          baseUrl: env.PRDASH_JIRA_BASE_URL.replace(/\/+$/, ''),
          email: env.PRDASH_JIRA_EMAIL,
          apiToken: env.PRDASH_JIRA_API_TOKEN,
        }
      : null;

  const pathsFile = env.PRDASH_JIRA_TRANSITION_PATHS_FILE ?? file.transition_paths_file ?? null;

  const config: DashboardConfig = {
    githubToken: env.PRDASH_GITHUB_TOKEN,
    githubUsername: env.PRDASH_GITHUB_USERNAME,
    trackedRepos: parseEntries(splitList(env.PRDASH_TRACKED_REPOS), parseRepoSpec, 'PRDASH_TRACKED_REPOS'),
    watchedPullRequests: parseEntries(splitList(env.PRDASH_WATCHED_PRS), parsePullRequestRef, 'PRDASH_WATCHED_PRS'),
    pollIntervalSeconds: env.PRDASH_POLL_INTERVAL_SECONDS,
    pullRequestLimit: env.PRDASH_PR_LIMIT,
    remoteTimeoutMs: env.PRDASH_REMOTE_TIMEOUT_MS,
    dataDir: resolveDataDir({ env: options.env, platform: options.platform, homeDir: options.homeDir }),
    jira,
    jiraUsername: env.PRDASH_JIRA_USERNAME,
    allowedKeyPrefixes:
      env.PRDASH_JIRA_KEY_PREFIXES !== null ? splitList(env.PRDASH_JIRA_KEY_PREFIXES) : [...(file.jira_key_prefixes ?? [])],
    jiraStatuses: {
      draft: pickStatuses(env.PRDASH_JIRA_STATUS_DRAFT, file.jira_statuses?.draft, DEFAULT_JIRA_STATUSES.draft),
      needsReview: pickStatuses(
        env.PRDASH_JIRA_STATUS_NEEDS_REVIEW,
        file.jira_statuses?.needs_review,
        DEFAULT_JIRA_STATUSES.needsReview,
      ),
      reviewed: pickStatuses(env.PRDASH_JIRA_STATUS_REVIEWED, file.jira_statuses?.reviewed, DEFAULT_JIRA_STATUSES.reviewed),
      merged: pickStatuses(env.PRDASH_JIRA_STATUS_MERGED, file.jira_statuses?.merged, DEFAULT_JIRA_STATUSES.merged),
    },
    componentRepoMap: { ...(file.component_repo_map ?? {}) },
    transitionPathsFile: pathsFile ? path.resolve(cwd, pathsFile) : null,
    allowRemote: env.PRDASH_ALLOW_REMOTE,
  };

  return Object.freeze(config);
}

export async function loadConfig(options: { env?: NodeJS.ProcessEnv; cwd?: string } = {}): Promise<DashboardConfig> {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  const fileSetting = (env.PRDASH_CONFIG_FILE ?? '').trim();
  let file: ConfigFile | undefined;
  if (fileSetting) {
    const filePath = path.resolve(cwd, fileSetting);
    const content = await fs.readFile(filePath, 'utf-8').catch((err: unknown) => {
      throw new DashboardError({
        code: 'configuration_gap',
        message: `cannot read config file ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
        cause: err,
      });
    });
    file = parseConfigFile(parseConfigDocument(content, filePath), filePath);
  }

  return buildConfig({ env, file, cwd });
}

export function isJiraEnabled(config: Pick<DashboardConfig, 'jira'>): boolean {
  return config.jira !== null;
}
