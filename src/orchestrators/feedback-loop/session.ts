/**
 * Session state for one feedback-loop run.
 *
 * The session is an append-only log: the initial code is written once,
 * cycles are appended in order and only when complete, and nothing can be
 * changed after the run is sealed. The loop controller is the only writer;
 * everything else reads snapshots.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  ErrorCode,
  SessionStateError,
  ValidationError,
} from '../../core/errors/index.js';
import type { RoleAssignment } from '../../agents/types.js';
import type {
  CycleRecord,
  RunFailure,
  SessionSnapshot,
  SessionStatus,
  SessionView,
} from './types.js';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * `session_YYYYMMDD_HHMMSS_<8 hex>` in local time
 */
export function createSessionId(now: Date = new Date()): string {
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  const suffix = uuidv4().replace(/-/g, '').slice(0, 8);
  return `session_${date}_${time}_${suffix}`;
}

/**
 * Code the next agent should work on: the latest revision, or the initial
 * code when no cycle has completed yet
 */
export function currentCode(view: SessionView): string | null {
  const last = view.cycles[view.cycles.length - 1];
  return last ? last.revision : view.initialCode;
}

export function cycleAt(
  view: SessionView,
  index: number
): CycleRecord | undefined {
  return view.cycles.find((cycle) => cycle.index === index);
}

/** Review produced in cycle `index - 1`; undefined for the first cycle */
export function previousReview(
  view: SessionView,
  index: number
): string | undefined {
  return cycleAt(view, index - 1)?.review;
}

/** Critique produced in cycle `index - 1`; undefined for the first cycle */
export function priorCritique(
  view: SessionView,
  index: number
): string | undefined {
  return cycleAt(view, index - 1)?.critique;
}

/**
 * A cycle under construction. Fields are filled in phase order and each one
 * exactly once.
 */
export class CycleDraft {
  private reviewText: string | null = null;
  private critiqueText: string | null = null;
  private revisionText: string | null = null;

  constructor(readonly index: number) {}

  get review(): string | null {
    return this.reviewText;
  }

  get critique(): string | null {
    return this.critiqueText;
  }

  get revision(): string | null {
    return this.revisionText;
  }

  setReview(text: string): void {
    this.assertUnset(this.reviewText, 'review');
    this.reviewText = text;
  }

  setCritique(text: string): void {
    this.assertUnset(this.critiqueText, 'critique');
    if (this.reviewText === null) {
      throw this.outOfOrder('critique', 'review');
    }
    this.critiqueText = text;
  }

  setRevision(text: string): void {
    this.assertUnset(this.revisionText, 'revision');
    if (this.critiqueText === null) {
      throw this.outOfOrder('revision', 'critique');
    }
    this.revisionText = text;
  }

  toRecord(): CycleRecord {
    if (
      this.reviewText === null ||
      this.critiqueText === null ||
      this.revisionText === null
    ) {
      throw new SessionStateError(
        `Cycle ${this.index} is incomplete`,
        ErrorCode.SESSION_OUT_OF_ORDER,
        { cycle: this.index }
      );
    }
    return Object.freeze({
      index: this.index,
      review: this.reviewText,
      critique: this.critiqueText,
      revision: this.revisionText,
    });
  }

  private assertUnset(value: string | null, field: string): void {
    if (value !== null) {
      throw new SessionStateError(
        `Cycle ${this.index} ${field} is already set`,
        ErrorCode.SESSION_WRITE_ONCE,
        { cycle: this.index, field }
      );
    }
  }

  private outOfOrder(field: string, missing: string): SessionStateError {
    return new SessionStateError(
      `Cycle ${this.index} ${field} cannot be set before its ${missing}`,
      ErrorCode.SESSION_OUT_OF_ORDER,
      { cycle: this.index, field, missing }
    );
  }
}

export interface FeedbackSessionInit {
  task: string;
  roles: RoleAssignment;
  plannedCycleCount: number;
  id?: string;
  workspacePath?: string | null;
  now?: () => Date;
}

export class FeedbackSession {
  readonly id: string;
  readonly task: string;
  readonly roles: RoleAssignment;
  readonly plannedCycleCount: number;
  readonly startedAt: string;

  private readonly now: () => Date;
  private initial: string | null = null;
  private readonly log: CycleRecord[] = [];
  private draft: CycleDraft | null = null;
  private status: SessionStatus = 'running';
  private completedAt: string | null = null;
  private failure: RunFailure | null = null;
  private workspace: string | null;

  constructor(init: FeedbackSessionInit) {
    if (!init.task.trim()) {
      throw new ValidationError('Task must not be empty', ErrorCode.INVALID_INPUT);
    }
    if (!Number.isInteger(init.plannedCycleCount) || init.plannedCycleCount < 1) {
      throw new ValidationError(
        `Iterations must be a positive integer, got ${init.plannedCycleCount}`,
        ErrorCode.INVALID_INPUT,
        { plannedCycleCount: init.plannedCycleCount }
      );
    }

    this.now = init.now ?? (() => new Date());
    this.id = init.id ?? createSessionId(this.now());
    this.task = init.task;
    this.roles = { ...init.roles };
    this.plannedCycleCount = init.plannedCycleCount;
    this.startedAt = this.now().toISOString();
    this.workspace = init.workspacePath ?? null;
  }

  get initialCode(): string | null {
    return this.initial;
  }

  get cycles(): readonly CycleRecord[] {
    return this.log;
  }

  get isSealed(): boolean {
    return this.status !== 'running';
  }

  setWorkspacePath(path: string): void {
    this.assertOpen();
    this.workspace = path;
  }

  setInitialCode(code: string): void {
    this.assertOpen();
    if (this.initial !== null) {
      throw new SessionStateError(
        'Initial code is already set',
        ErrorCode.SESSION_WRITE_ONCE,
        { field: 'initialCode' }
      );
    }
    this.initial = code;
  }

  /**
   * Open the next cycle. Requires the initial code and no other open cycle.
   */
  beginCycle(): CycleDraft {
    this.assertOpen();
    if (this.initial === null) {
      throw new SessionStateError(
        'Cannot start a cycle before the initial code exists',
        ErrorCode.SESSION_NOT_STARTED
      );
    }
    if (this.draft) {
      throw new SessionStateError(
        `Cycle ${this.draft.index} is still open`,
        ErrorCode.SESSION_OUT_OF_ORDER,
        { cycle: this.draft.index }
      );
    }
    const index = this.log.length + 1;
    if (index > this.plannedCycleCount) {
      throw new SessionStateError(
        `Cycle ${index} exceeds the planned ${this.plannedCycleCount} cycles`,
        ErrorCode.SESSION_CYCLE_OVERFLOW,
        { cycle: index, planned: this.plannedCycleCount }
      );
    }
    this.draft = new CycleDraft(index);
    return this.draft;
  }

  /**
   * Append the open cycle to the log. Only complete cycles are accepted.
   */
  commitCycle(draft: CycleDraft): CycleRecord {
    this.assertOpen();
    if (draft !== this.draft) {
      throw new SessionStateError(
        `Cycle ${draft.index} is not the open cycle`,
        ErrorCode.SESSION_OUT_OF_ORDER,
        { cycle: draft.index }
      );
    }
    const record = draft.toRecord();
    this.log.push(record);
    this.draft = null;
    return record;
  }

  markCompleted(): void {
    this.seal('completed');
  }

  /**
   * Seal the run as failed. An open, incomplete cycle is dropped.
   */
  markFailed(failure: RunFailure): void {
    this.seal('failed');
    this.failure = failure;
  }

  snapshot(): SessionSnapshot {
    return Object.freeze({
      id: this.id,
      task: this.task,
      roles: Object.freeze({ ...this.roles }),
      plannedCycleCount: this.plannedCycleCount,
      startedAt: this.startedAt,
      completedAt: this.completedAt,
      status: this.status,
      failure: this.failure,
      workspacePath: this.workspace,
      initialCode: this.initial,
      cycles: Object.freeze([...this.log]),
    });
  }

  private seal(status: Exclude<SessionStatus, 'running'>): void {
    this.assertOpen();
    this.draft = null;
    this.status = status;
    this.completedAt = this.now().toISOString();
  }

  private assertOpen(): void {
    if (this.isSealed) {
      throw new SessionStateError(
        `Session ${this.id} is sealed (${this.status})`,
        ErrorCode.SESSION_SEALED,
        { sessionId: this.id, status: this.status }
      );
    }
  }
}
