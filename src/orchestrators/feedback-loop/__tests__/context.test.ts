import { describe, it, expect } from 'vitest';
import { FeedbackSession, previousReview, priorCritique } from '../session.js';
import {
  selectCreatorInitialInputs,
  selectCritiqueInputs,
  selectReviewInputs,
  selectRevisionInputs,
} from '../context.js';
import { ErrorCode } from '../../../core/errors/index.js';
import { DEFAULT_ROLES } from '../../../agents/types.js';

function sessionWithCycles(count: number): FeedbackSession {
  const session = new FeedbackSession({
    task: 'parse a CSV line',
    roles: DEFAULT_ROLES,
    plannedCycleCount: 5,
    id: 'session_ctx',
  });
  session.setInitialCode('code 0');
  for (let i = 1; i <= count; i++) {
    const draft = session.beginCycle();
    draft.setReview(`review ${i}`);
    draft.setCritique(`critique ${i}`);
    draft.setRevision(`code ${i}`);
    session.commitCycle(draft);
  }
  return session;
}

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected an error');
}

describe('selectCreatorInitialInputs', () => {
  it('exposes only the task', () => {
    expect(selectCreatorInitialInputs(sessionWithCycles(0))).toEqual({
      task: 'parse a CSV line',
    });
  });
});

describe('selectReviewInputs', () => {
  it('originates a review against the initial code in cycle 1', () => {
    expect(selectReviewInputs(sessionWithCycles(0), 1)).toEqual({
      kind: 'originate',
      task: 'parse a CSV line',
      cycle: 1,
      code: 'code 0',
    });
  });

  it('hands the Reviewer the critique from one cycle back', () => {
    const inputs = selectReviewInputs(sessionWithCycles(2), 3);

    expect(inputs).toEqual({
      kind: 'update',
      task: 'parse a CSV line',
      cycle: 3,
      code: 'code 2',
      previousReview: 'review 2',
      priorCritique: 'critique 2',
    });
  });

  it('agrees with the session accessors for every cycle', () => {
    const session = sessionWithCycles(3);
    const inputs = selectReviewInputs(session, 4);

    expect(inputs.kind).toBe('update');
    if (inputs.kind === 'update') {
      expect(inputs.previousReview).toBe(previousReview(session, 4));
      expect(inputs.priorCritique).toBe(priorCritique(session, 4));
    }
    expect(previousReview(session, 4)).toBe('review 3');
    expect(priorCritique(session, 4)).toBe('critique 3');
  });

  it('never shows the initial code once a revision exists', () => {
    const inputs = selectReviewInputs(sessionWithCycles(1), 2);
    expect(inputs.code).toBe('code 1');
  });

  it('rejects a cycle that is not next', () => {
    const session = sessionWithCycles(1);

    expect(thrownBy(() => selectReviewInputs(session, 1))).toMatchObject({
      code: ErrorCode.SESSION_OUT_OF_ORDER,
    });
    expect(thrownBy(() => selectReviewInputs(session, 3))).toMatchObject({
      code: ErrorCode.SESSION_OUT_OF_ORDER,
    });
  });

  it('rejects a review before any code exists', () => {
    const session = new FeedbackSession({
      task: 'parse a CSV line',
      roles: DEFAULT_ROLES,
      plannedCycleCount: 1,
    });

    expect(thrownBy(() => selectReviewInputs(session, 1))).toMatchObject({
      code: ErrorCode.SESSION_NOT_STARTED,
    });
  });

  it('does not change the session it reads', () => {
    const session = sessionWithCycles(2);
    const before = session.snapshot();

    selectReviewInputs(session, 3);
    selectReviewInputs(session, 3);

    expect(session.snapshot()).toEqual(before);
  });
});

describe('selectCritiqueInputs', () => {
  it('reads the review from the open cycle', () => {
    const session = sessionWithCycles(0);
    const draft = session.beginCycle();
    draft.setReview('review 1');

    expect(selectCritiqueInputs(session, draft)).toEqual({
      task: 'parse a CSV line',
      cycle: 1,
      code: 'code 0',
      review: 'review 1',
    });
  });

  it("passes the Critic's own previous critique from cycle 2 on", () => {
    const session = sessionWithCycles(1);
    const draft = session.beginCycle();
    draft.setReview('review 2');

    expect(selectCritiqueInputs(session, draft)).toEqual({
      task: 'parse a CSV line',
      cycle: 2,
      code: 'code 1',
      review: 'review 2',
      ownPriorCritique: 'critique 1',
    });
  });

  it('rejects a draft without a review', () => {
    const session = sessionWithCycles(0);
    const draft = session.beginCycle();

    expect(thrownBy(() => selectCritiqueInputs(session, draft))).toMatchObject({
      code: ErrorCode.SESSION_OUT_OF_ORDER,
    });
  });
});

describe('selectRevisionInputs', () => {
  it("gives the Creator the current code plus this cycle's review and critique", () => {
    const session = sessionWithCycles(1);
    const draft = session.beginCycle();
    draft.setReview('review 2');
    draft.setCritique('critique 2');

    expect(selectRevisionInputs(session, draft)).toEqual({
      task: 'parse a CSV line',
      cycle: 2,
      code: 'code 1',
      review: 'review 2',
      critique: 'critique 2',
    });
  });

  it('rejects a draft without a critique', () => {
    const session = sessionWithCycles(0);
    const draft = session.beginCycle();
    draft.setReview('review 1');

    expect(thrownBy(() => selectRevisionInputs(session, draft))).toMatchObject({
      code: ErrorCode.SESSION_OUT_OF_ORDER,
    });
  });
});
