import { describe, it, expect } from 'vitest';
import {
  FeedbackSession,
  createSessionId,
  currentCode,
  previousReview,
  priorCritique,
} from '../session.js';
import {
  ErrorCode,
  SessionStateError,
  ValidationError,
} from '../../../core/errors/index.js';
import { DEFAULT_ROLES } from '../../../agents/types.js';

function newSession(plannedCycleCount = 3): FeedbackSession {
  return new FeedbackSession({
    task: 'write a binary search function',
    roles: DEFAULT_ROLES,
    plannedCycleCount,
    id: 'session_test',
    now: () => new Date('2026-03-01T10:00:00.000Z'),
  });
}

function completeCycle(session: FeedbackSession, tag: string): void {
  const draft = session.beginCycle();
  draft.setReview(`review ${tag}`);
  draft.setCritique(`critique ${tag}`);
  draft.setRevision(`code ${tag}`);
  session.commitCycle(draft);
}

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected an error');
}

describe('createSessionId', () => {
  it('formats the local timestamp and an 8-hex suffix', () => {
    const id = createSessionId(new Date(2026, 2, 5, 9, 7, 3));
    expect(id).toMatch(/^session_20260305_090703_[0-9a-f]{8}$/);
  });
});

describe('FeedbackSession', () => {
  it('starts running with no code and no cycles', () => {
    const snapshot = newSession().snapshot();

    expect(snapshot).toMatchObject({
      id: 'session_test',
      status: 'running',
      initialCode: null,
      cycles: [],
      startedAt: '2026-03-01T10:00:00.000Z',
      completedAt: null,
      failure: null,
    });
  });

  it('rejects an empty task and a non-positive cycle count', () => {
    expect(
      () =>
        new FeedbackSession({ task: '  ', roles: DEFAULT_ROLES, plannedCycleCount: 1 })
    ).toThrow(ValidationError);
    expect(
      () =>
        new FeedbackSession({ task: 'x', roles: DEFAULT_ROLES, plannedCycleCount: 0 })
    ).toThrow(ValidationError);
    expect(
      () =>
        new FeedbackSession({ task: 'x', roles: DEFAULT_ROLES, plannedCycleCount: 1.5 })
    ).toThrow(ValidationError);
  });

  it('sets the initial code exactly once', () => {
    const session = newSession();
    session.setInitialCode('v0');

    const error = thrownBy(() => session.setInitialCode('again'));
    expect(error).toBeInstanceOf(SessionStateError);
    expect(error).toMatchObject({ code: ErrorCode.SESSION_WRITE_ONCE });
    expect(session.initialCode).toBe('v0');
  });

  it('refuses to open a cycle before the initial code exists', () => {
    const error = thrownBy(() => newSession().beginCycle());
    expect(error).toMatchObject({ code: ErrorCode.SESSION_NOT_STARTED });
  });

  it('appends cycles in order with 1-based indexes', () => {
    const session = newSession();
    session.setInitialCode('v0');
    completeCycle(session, '1');
    completeCycle(session, '2');

    expect(session.cycles.map((c) => c.index)).toEqual([1, 2]);
    expect(session.cycles[1]).toEqual({
      index: 2,
      review: 'review 2',
      critique: 'critique 2',
      revision: 'code 2',
    });
  });

  it('never exceeds the planned cycle count', () => {
    const session = newSession(1);
    session.setInitialCode('v0');
    completeCycle(session, '1');

    const error = thrownBy(() => session.beginCycle());
    expect(error).toMatchObject({ code: ErrorCode.SESSION_CYCLE_OVERFLOW });
    expect(session.cycles).toHaveLength(1);
  });

  it('allows only one open cycle at a time', () => {
    const session = newSession();
    session.setInitialCode('v0');
    session.beginCycle();

    expect(thrownBy(() => session.beginCycle())).toMatchObject({
      code: ErrorCode.SESSION_OUT_OF_ORDER,
    });
  });

  it('refuses to commit an incomplete cycle', () => {
    const session = newSession();
    session.setInitialCode('v0');
    const draft = session.beginCycle();
    draft.setReview('r');
    draft.setCritique('c');

    expect(() => session.commitCycle(draft)).toThrow(SessionStateError);
    expect(session.cycles).toHaveLength(0);
  });

  it('seals the session on completion', () => {
    const session = newSession();
    session.setInitialCode('v0');
    session.markCompleted();

    expect(session.snapshot()).toMatchObject({
      status: 'completed',
      completedAt: '2026-03-01T10:00:00.000Z',
    });
    expect(thrownBy(() => session.beginCycle())).toMatchObject({
      code: ErrorCode.SESSION_SEALED,
    });
    expect(thrownBy(() => session.markFailed({
      phase: 'review',
      cycle: 1,
      role: 'reviewer',
      tool: 'openai',
      code: 'AGENT_003',
      message: 'late',
    }))).toMatchObject({ code: ErrorCode.SESSION_SEALED });
  });

  it('drops the open cycle when the run fails', () => {
    const session = newSession();
    session.setInitialCode('v0');
    completeCycle(session, '1');
    const draft = session.beginCycle();
    draft.setReview('half-done review');

    session.markFailed({
      phase: 'critique',
      cycle: 2,
      role: 'critic',
      tool: 'gemini',
      code: 'AGENT_003',
      message: 'Critic timed out',
    });

    const snapshot = session.snapshot();
    expect(snapshot.status).toBe('failed');
    expect(snapshot.cycles).toHaveLength(1);
    expect(snapshot.failure).toMatchObject({ phase: 'critique', cycle: 2 });
    expect(() => session.commitCycle(draft)).toThrow(SessionStateError);
  });

  it('returns frozen snapshots that later writes do not change', () => {
    const session = newSession();
    session.setInitialCode('v0');
    const before = session.snapshot();
    completeCycle(session, '1');

    expect(Object.isFrozen(before)).toBe(true);
    expect(Object.isFrozen(before.cycles)).toBe(true);
    expect(before.cycles).toHaveLength(0);
    expect(session.snapshot().cycles).toHaveLength(1);
  });
});

describe('CycleDraft', () => {
  it('enforces review, critique, revision order', () => {
    const session = newSession();
    session.setInitialCode('v0');
    const draft = session.beginCycle();

    expect(thrownBy(() => draft.setCritique('c'))).toMatchObject({
      code: ErrorCode.SESSION_OUT_OF_ORDER,
    });
    expect(thrownBy(() => draft.setRevision('v1'))).toMatchObject({
      code: ErrorCode.SESSION_OUT_OF_ORDER,
    });
    draft.setReview('r');
    expect(thrownBy(() => draft.setRevision('v1'))).toMatchObject({
      code: ErrorCode.SESSION_OUT_OF_ORDER,
    });
  });

  it('makes each field write-once', () => {
    const session = newSession();
    session.setInitialCode('v0');
    const draft = session.beginCycle();
    draft.setReview('r');

    expect(thrownBy(() => draft.setReview('r2'))).toMatchObject({
      code: ErrorCode.SESSION_WRITE_ONCE,
    });
    expect(draft.review).toBe('r');
  });
});

describe('derived views', () => {
  it('currentCode follows the latest revision', () => {
    const session = newSession();
    expect(currentCode(session)).toBeNull();

    session.setInitialCode('v0');
    expect(currentCode(session)).toBe('v0');

    completeCycle(session, '1');
    expect(currentCode(session)).toBe('code 1');

    completeCycle(session, '2');
    expect(currentCode(session)).toBe('code 2');
  });

  it('previousReview and priorCritique read cycle i - 1', () => {
    const session = newSession();
    session.setInitialCode('v0');
    completeCycle(session, '1');
    completeCycle(session, '2');

    expect(previousReview(session, 1)).toBeUndefined();
    expect(priorCritique(session, 1)).toBeUndefined();
    expect(previousReview(session, 2)).toBe('review 1');
    expect(priorCritique(session, 2)).toBe('critique 1');
    expect(priorCritique(session, 3)).toBe('critique 2');
  });
});
