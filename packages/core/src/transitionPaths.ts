import fs from 'node:fs/promises';
import path from 'node:path';

import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

import { DashboardError } from './errors.js';

/** One row of a path table: when the issue sits in `from`, take this transition. */
export type PathStep = Readonly<{
  from: string;
  transitionId?: string;
  transitionName?: string;
  label?: string;
}>;

export type TransitionPath = Readonly<{
  target: string;
  steps: readonly PathStep[];
}>;

export type TransitionPathTable = readonly TransitionPath[];

/** Status chain the built-in paths walk along, in workflow order. */
export const BUILT_IN_STATUS_CHAIN = [
  'Backlog',
  'To Do',
  'In Development',
  'In Review',
  'Ready for QA',
  'In QA',
  'Done',
] as const;

export function builtInPathFor(target: string): PathStep[] {
  const wanted = target.trim().toLowerCase();
  const idx = BUILT_IN_STATUS_CHAIN.findIndex((status) => status.toLowerCase() === wanted);
  if (idx <= 0) return [];

  const steps: PathStep[] = [];
  for (let i = 0; i < idx; i += 1) {
    const from = BUILT_IN_STATUS_CHAIN[i];
    const to = BUILT_IN_STATUS_CHAIN[i + 1];
    if (!from || !to) continue;
    steps.push({ from, transitionName: to, label: `${from} -> ${to}` });
  }
  return steps;
}

const stepSchema = z
  .object({
    from: z.string().min(1),
    transition_id: z.union([z.string().min(1), z.number().int()]).optional(),
    transition: z.string().min(1).optional(),
    label: z.string().optional(),
  })
  .refine((step) => step.transition_id !== undefined || step.transition !== undefined, {
    message: 'step needs transition_id or transition',
  })
  .transform(
    (step): PathStep => ({
      from: step.from,
      transitionId: step.transition_id === undefined ? undefined : String(step.transition_id),
      transitionName: step.transition,
      label: step.label,
    }),
  );

const pathTableSchema = z.object({
  paths: z
    .array(
      z.object({
        target: z.string().min(1),
        steps: z.array(stepSchema).min(1),
      }),
    )
    .default([]),
});

export function parseTransitionPathTable(raw: unknown, sourceName = 'transition paths'): TransitionPathTable {
  const parsed = pathTableSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join('.') : 'root';
    throw new DashboardError({
      code: 'configuration_gap',
      message: `${sourceName}: ${where}: ${issue?.message ?? 'invalid path table'}`,
    });
  }
  return parsed.data.paths;
}

export function parseConfigDocument(content: string, filePath: string): unknown {
  const ext = path.extname(filePath).toLowerCase();
  try {
    if (ext === '.json') return JSON.parse(content) as unknown;
    return parseYaml(content) as unknown;
  } catch (err) {
    throw new DashboardError({
      code: 'configuration_gap',
      message: `failed to parse ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
      cause: err,
    });
  }
}

/** A missing file yields an empty table; a malformed one is a configuration error. */
export async function loadTransitionPathTable(filePath: string | null | undefined): Promise<TransitionPathTable> {
  if (!filePath) return [];
  const content = await fs.readFile(filePath, 'utf-8').catch(() => null);
  if (content === null || !content.trim()) return [];
  return parseTransitionPathTable(parseConfigDocument(content, filePath), filePath);
}

function sameStep(a: PathStep, b: PathStep): boolean {
  return (
    a.from.toLowerCase() === b.from.toLowerCase() &&
    a.transitionId === b.transitionId &&
    (a.transitionName ?? '').toLowerCase() === (b.transitionName ?? '').toLowerCase()
  );
}

/**
 * Candidate steps for reaching any of `targets`: configured paths first, in file order,
 * then the built-in path of each target. Duplicates keep their first position.
 */
export function candidateStepsFor(targets: readonly string[], table: TransitionPathTable): PathStep[] {
  const wanted = new Set(targets.map((target) => target.toLowerCase()));
  const steps: PathStep[] = [];
  const push = (step: PathStep) => {
    if (!steps.some((existing) => sameStep(existing, step))) steps.push(step);
  };

  for (const entry of table) {
    if (!wanted.has(entry.target.toLowerCase())) continue;
    entry.steps.forEach(push);
  }
  for (const target of targets) {
    builtInPathFor(target).forEach(push);
  }
  return steps;
}

export function describeStep(step: PathStep): string {
  const via = step.transitionId ? `#${step.transitionId}` : `"${step.transitionName ?? ''}"`;
  return step.label ? `${step.label} (${step.from} via ${via})` : `${step.from} via ${via}`;
}
