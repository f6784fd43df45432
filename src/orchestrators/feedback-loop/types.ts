import type { Role, RoleAssignment, ToolKey } from '../../agents/types.js';

export type LoopPhase = 'create' | 'review' | 'critique' | 'revise';

export type SessionStatus = 'running' | 'completed' | 'failed';

/**
 * One completed repair cycle. Only complete cycles are ever stored.
 */
export interface CycleRecord {
  readonly index: number;
  readonly review: string;
  readonly critique: string;
  readonly revision: string;
}

export interface RunFailure {
  readonly phase: LoopPhase;
  /** 0 for the initial generation */
  readonly cycle: number;
  readonly role: Role;
  readonly tool: ToolKey;
  readonly code: string;
  readonly message: string;
}

/**
 * The part of a session the context selectors read
 */
export interface SessionView {
  readonly task: string;
  readonly initialCode: string | null;
  readonly cycles: readonly CycleRecord[];
}

export interface SessionSnapshot extends SessionView {
  readonly id: string;
  readonly roles: RoleAssignment;
  readonly plannedCycleCount: number;
  readonly startedAt: string;
  readonly completedAt: string | null;
  readonly status: SessionStatus;
  readonly failure: RunFailure | null;
  readonly workspacePath: string | null;
}
