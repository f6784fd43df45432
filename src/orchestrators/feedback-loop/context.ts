/**
 * Context selectors: decide which earlier artifacts each agent sees.
 *
 * Every selector is a pure function of the session view and the cycle being
 * executed. Code always comes from the latest committed state; reviews and
 * critiques from the same cycle are read off the open draft, earlier ones
 * off the log. A critique reaches the Reviewer one cycle late.
 */

import { ErrorCode, SessionStateError } from '../../core/errors/index.js';
import { currentCode, previousReview, priorCritique } from './session.js';
import type { CycleDraft } from './session.js';
import type { SessionView } from './types.js';

export interface CreatorInitialInputs {
  readonly task: string;
}

export type ReviewInputs =
  | {
      readonly kind: 'originate';
      readonly task: string;
      readonly cycle: 1;
      readonly code: string;
    }
  | {
      readonly kind: 'update';
      readonly task: string;
      readonly cycle: number;
      readonly code: string;
      readonly previousReview: string;
      readonly priorCritique: string;
    };

export interface CritiqueInputs {
  readonly task: string;
  readonly cycle: number;
  readonly code: string;
  readonly review: string;
  /** The Critic's own critique from the previous cycle */
  readonly ownPriorCritique?: string;
}

export interface RevisionInputs {
  readonly task: string;
  readonly cycle: number;
  readonly code: string;
  readonly review: string;
  readonly critique: string;
}

/**
 * Cycle `index` may only be executed right after cycle `index - 1`
 */
function assertNextCycle(view: SessionView, index: number): void {
  const expected = view.cycles.length + 1;
  if (index !== expected) {
    throw new SessionStateError(
      `Cycle ${index} is not the next cycle (expected ${expected})`,
      ErrorCode.SESSION_OUT_OF_ORDER,
      { cycle: index, expected }
    );
  }
}

function requireCode(view: SessionView): string {
  const code = currentCode(view);
  if (code === null) {
    throw new SessionStateError(
      'No code exists yet; the initial generation has not completed',
      ErrorCode.SESSION_NOT_STARTED
    );
  }
  return code;
}

function requireDraftField(
  draft: CycleDraft,
  field: 'review' | 'critique'
): string {
  const value = draft[field];
  if (value === null) {
    throw new SessionStateError(
      `Cycle ${draft.index} has no ${field} yet`,
      ErrorCode.SESSION_OUT_OF_ORDER,
      { cycle: draft.index, field }
    );
  }
  return value;
}

export function selectCreatorInitialInputs(
  view: SessionView
): CreatorInitialInputs {
  return { task: view.task };
}

export function selectReviewInputs(
  view: SessionView,
  cycle: number
): ReviewInputs {
  assertNextCycle(view, cycle);
  const code = requireCode(view);

  const review = previousReview(view, cycle);
  const critique = priorCritique(view, cycle);
  if (cycle === 1 || review === undefined || critique === undefined) {
    return { kind: 'originate', task: view.task, cycle: 1, code };
  }
  return {
    kind: 'update',
    task: view.task,
    cycle,
    code,
    previousReview: review,
    priorCritique: critique,
  };
}

export function selectCritiqueInputs(
  view: SessionView,
  draft: CycleDraft
): CritiqueInputs {
  assertNextCycle(view, draft.index);
  const inputs: CritiqueInputs = {
    task: view.task,
    cycle: draft.index,
    code: requireCode(view),
    review: requireDraftField(draft, 'review'),
  };
  const own = priorCritique(view, draft.index);
  return own === undefined ? inputs : { ...inputs, ownPriorCritique: own };
}

export function selectRevisionInputs(
  view: SessionView,
  draft: CycleDraft
): RevisionInputs {
  assertNextCycle(view, draft.index);
  return {
    task: view.task,
    cycle: draft.index,
    code: requireCode(view),
    review: requireDraftField(draft, 'review'),
    critique: requireDraftField(draft, 'critique'),
  };
}
