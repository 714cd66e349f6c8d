/**
 * Multi-hop issue-tracker transition search.
 *
 * Moves an issue into one of a lane's accepted statuses. A transition straight into a
 * target status is always preferred; otherwise the resolver walks the candidate path
 * steps one hop at a time, re-reading the issue after every hop, for at most `maxSteps`
 * hops. Applied hops are real mutations on the tracker and are never rolled back, so
 * every outcome (including failures) lists the hops that were taken.
 */

import { errorMessage } from './errors.js';
import { describeStep, type PathStep } from './transitionPaths.js';

export const MAX_TRANSITION_STEPS = 6;

/** A move the tracker currently permits: transition id, its own name and destination status. */
export type TransitionStep = Readonly<{
  id: string;
  name: string;
  to: string | null;
}>;

/** The slice of the issue tracker the resolver needs. */
export interface TransitionTracker {
  fetchStatus(key: string): Promise<string | null>;
  fetchTransitions(key: string): Promise<TransitionStep[]>;
  applyTransition(key: string, transitionId: string): Promise<boolean>;
}

export type AppliedTransition = Readonly<{
  id: string;
  name: string;
  from: string | null;
  to: string | null;
  via: 'direct' | 'path';
  label?: string;
}>;

export type TransitionFailureCode =
  | 'no_matching_transition'
  | 'step_bound_exceeded'
  | 'transition_failed'
  | 'remote_unavailable';

export type TransitionOutcome =
  | Readonly<{
      ok: true;
      key: string;
      targets: readonly string[];
      steps: readonly AppliedTransition[];
      finalStatus: string | null;
    }>
  | Readonly<{
      ok: false;
      key: string;
      targets: readonly string[];
      code: TransitionFailureCode;
      reason: string;
      steps: readonly AppliedTransition[];
      lastStatus: string | null;
      candidates: readonly string[];
    }>;

function lower(value: string | null | undefined): string {
  return (value ?? '').trim().toLowerCase();
}

/** First transition whose destination is a target; failing that, first whose own name is one. */
export function pickTransition(transitions: readonly TransitionStep[], targets: readonly string[]): TransitionStep | null {
  if (transitions.length === 0 || targets.length === 0) return null;
  const wanted = new Set(targets.map(lower));

  const byDestination = transitions.find((t) => t.to !== null && wanted.has(lower(t.to)));
  if (byDestination) return byDestination;

  return transitions.find((t) => wanted.has(lower(t.name))) ?? null;
}

/** Exact match on name or destination first, then substring match, each in listed order. */
export function matchTransitionByName(transitions: readonly TransitionStep[], hint: string): TransitionStep | null {
  const wanted = lower(hint);
  if (!wanted) return null;

  const exact = transitions.find((t) => lower(t.name) === wanted || lower(t.to) === wanted);
  if (exact) return exact;

  return transitions.find((t) => lower(t.name).includes(wanted) || lower(t.to).includes(wanted)) ?? null;
}

export type ResolveTransitionParams = Readonly<{
  key: string;
  targets: readonly string[];
  tracker: TransitionTracker;
  candidates: readonly PathStep[];
  maxSteps?: number;
}>;

export async function resolveTransition(params: ResolveTransitionParams): Promise<TransitionOutcome> {
  const { key, targets, tracker, candidates } = params;
  const maxSteps = params.maxSteps ?? MAX_TRANSITION_STEPS;
  const wanted = new Set(targets.map(lower));
  const steps: AppliedTransition[] = [];
  const candidateLabels = candidates.map(describeStep);
  let status: string | null = null;

  const succeed = (finalStatus: string | null): TransitionOutcome => ({ ok: true, key, targets, steps, finalStatus });
  const fail = (code: TransitionFailureCode, reason: string): TransitionOutcome => ({
    ok: false,
    key,
    targets,
    code,
    reason,
    steps,
    lastStatus: status,
    candidates: candidateLabels,
  });
  const targetList = targets.join(', ');

  const applyDirect = async (transition: TransitionStep): Promise<TransitionOutcome> => {
    const applied = await tracker.applyTransition(key, transition.id);
    if (!applied) {
      return fail('transition_failed', `transition "${transition.name}" (#${transition.id}) was rejected`);
    }
    steps.push({ id: transition.id, name: transition.name, from: status, to: transition.to, via: 'direct' });
    status = transition.to ?? status;
    return succeed(status);
  };

  try {
    status = await tracker.fetchStatus(key);
    if (wanted.has(lower(status))) return succeed(status);

    let transitions = await tracker.fetchTransitions(key);
    const direct = pickTransition(transitions, targets);
    if (direct) return await applyDirect(direct);

    for (let iteration = 0; iteration < maxSteps; iteration += 1) {
      if (iteration > 0) {
        if (wanted.has(lower(status))) return succeed(status);
        transitions = await tracker.fetchTransitions(key);
        const nowDirect = pickTransition(transitions, targets);
        if (nowDirect) return await applyDirect(nowDirect);
      }

      const current = lower(status);
      const step = candidates.find((candidate) => lower(candidate.from) === current);
      if (!step) {
        return fail('no_matching_transition', `no matching transition for target status (${targetList}) from "${status ?? 'unknown'}"`);
      }

      const transition = step.transitionId
        ? transitions.find((t) => t.id === step.transitionId) ?? { id: step.transitionId, name: step.label ?? step.transitionId, to: null }
        : matchTransitionByName(transitions, step.transitionName ?? '');
      if (!transition) {
        return fail(
          'no_matching_transition',
          `no matching transition for target status (${targetList}): step ${describeStep(step)} is not available from "${status ?? 'unknown'}"`,
        );
      }

      const applied = await tracker.applyTransition(key, transition.id);
      if (!applied) {
        return fail('transition_failed', `transition "${transition.name}" (#${transition.id}) was rejected`);
      }
      const from = status;
      status = await tracker.fetchStatus(key);
      steps.push({ id: transition.id, name: transition.name, from, to: status, via: 'path', label: step.label });
    }

    if (wanted.has(lower(status))) return succeed(status);
    return fail(
      'step_bound_exceeded',
      `cannot reach target status (${targetList}) within ${maxSteps} steps; last status "${status ?? 'unknown'}"`,
    );
  } catch (err) {
    return fail('remote_unavailable', `issue tracker request failed: ${errorMessage(err)}`);
  }
}
