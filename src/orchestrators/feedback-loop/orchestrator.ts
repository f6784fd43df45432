/**
 * Feedback Loop Orchestrator
 *
 * Runs Phase 0 (the Creator writes the initial code) and then N repair
 * cycles of review, critique and revision. Agent calls are strictly
 * sequential. Each one is built from the session through the context
 * selectors, so the agents never need memory of their own.
 *
 * Any failure, from an agent or from the workspace mirror, aborts the run at
 * the current phase. Completed cycles are kept; the cycle in progress is
 * dropped.
 */

import {
  AgentCallError,
  OrchestrationError,
  ValidationError,
  ErrorCode,
  getErrorMessage,
} from '../../core/errors/index.js';
import {
  MAX_TIMEOUT_MS,
  type ProcessRunner,
} from '../../core/execution/process-runner.js';
import { logger } from '../../core/monitoring/logger.js';
import { stripCodeFences } from '../../agents/parsers.js';
import {
  ROLE_LABELS,
  type AgentInvoker,
  type AgentResponse,
  type Role,
  type RoleAssignment,
  type ToolKey,
} from '../../agents/types.js';
import {
  selectCreatorInitialInputs,
  selectCritiqueInputs,
  selectReviewInputs,
  selectRevisionInputs,
} from './context.js';
import {
  creatorInitialPrompt,
  critiquePrompt,
  reviewPrompt,
  revisionPrompt,
} from './prompts.js';
import { FeedbackSession } from './session.js';
import {
  formatTestLog,
  runTestCommand,
  type TestRunReport,
} from './test-command.js';
import { Workspace } from './workspace.js';
import type { CycleRecord, LoopPhase, SessionSnapshot } from './types.js';

export const DEFAULT_ITERATIONS = 5;
export const DEFAULT_TIMEOUT_MS = 120_000;

const PHASE_ROLES: Readonly<Record<LoopPhase, Role>> = {
  create: 'creator',
  review: 'reviewer',
  critique: 'critic',
  revise: 'creator',
};

export interface AgentStep {
  phase: LoopPhase;
  /** 0 for the initial generation */
  cycle: number;
  role: Role;
  tool: ToolKey;
}

export interface RunStartInfo {
  sessionId: string;
  task: string;
  roles: RoleAssignment;
  plannedCycleCount: number;
  workspacePath: string | null;
}

/**
 * Progress callbacks. All optional; called synchronously in run order.
 */
export interface LoopObserver {
  onRunStart?(info: RunStartInfo): void;
  onCycleStart?(cycle: number, total: number): void;
  onAgentStart?(step: AgentStep): void;
  onAgentOutput?(step: AgentStep, response: AgentResponse): void;
  onAgentError?(step: AgentStep, error: AgentCallError): void;
  onCycleComplete?(record: CycleRecord, total: number): void;
  onTestRun?(report: TestRunReport): void;
  onRunEnd?(result: LoopResult): void;
}

export interface FeedbackLoopOptions {
  invoker: AgentInvoker;
  roles: RoleAssignment;
  iterations?: number;
  timeoutMs?: number;
  /** Root for per-run workspaces; null or omitted disables the mirror */
  workspaceRoot?: string | null;
  observer?: LoopObserver;
  now?: () => Date;
  sessionId?: string;
  /** argv run in the workspace after Phase 0 and after each revision */
  testCommand?: readonly string[] | null;
  testRunner?: ProcessRunner;
}

export interface LoopResult {
  session: SessionSnapshot;
  /** Set when the run stopped early */
  error: OrchestrationError | null;
}

export class FeedbackLoopOrchestrator {
  private readonly invoker: AgentInvoker;
  private readonly roles: RoleAssignment;
  private readonly iterations: number;
  private readonly timeoutMs: number;
  private readonly workspaceRoot: string | null;
  private readonly observer: LoopObserver;
  private readonly now?: () => Date;
  private readonly sessionId?: string;
  private readonly testCommand: readonly string[] | null;
  private readonly testRunner?: ProcessRunner;

  constructor(options: FeedbackLoopOptions) {
    this.invoker = options.invoker;
    this.roles = { ...options.roles };
    this.iterations = options.iterations ?? DEFAULT_ITERATIONS;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.workspaceRoot = options.workspaceRoot ?? null;
    this.observer = options.observer ?? {};
    this.now = options.now;
    this.sessionId = options.sessionId;
    this.testCommand =
      options.testCommand && options.testCommand.length > 0
        ? [...options.testCommand]
        : null;
    this.testRunner = options.testRunner;

    if (
      !Number.isFinite(this.timeoutMs) ||
      this.timeoutMs <= 0 ||
      this.timeoutMs > MAX_TIMEOUT_MS
    ) {
      throw new ValidationError(
        `Timeout must be a positive duration of at most ${MAX_TIMEOUT_MS}ms, got ${this.timeoutMs}ms`,
        ErrorCode.INVALID_INPUT,
        { timeoutMs: this.timeoutMs }
      );
    }
  }

  async run(task: string): Promise<LoopResult> {
    const session = new FeedbackSession({
      task,
      roles: this.roles,
      plannedCycleCount: this.iterations,
      id: this.sessionId,
      now: this.now,
    });

    const workspace = this.workspaceRoot
      ? Workspace.create(this.workspaceRoot, session.id)
      : null;
    if (workspace) {
      session.setWorkspacePath(workspace.dir);
    }
    const cwd = workspace?.dir;

    logger.debug('Feedback loop starting', {
      sessionId: session.id,
      roles: this.roles,
      iterations: this.iterations,
      timeoutMs: this.timeoutMs,
      workspace: cwd,
      testCommand: this.testCommand,
    });
    if (this.testCommand && !workspace) {
      logger.warn('Test command ignored: it runs only inside a workspace');
    }
    this.observer.onRunStart?.({
      sessionId: session.id,
      task: session.task,
      roles: session.roles,
      plannedCycleCount: session.plannedCycleCount,
      workspacePath: workspace?.dir ?? null,
    });

    let step = this.step('create', 0);
    let error: OrchestrationError | null = null;
    try {
      const initial = await this.call(
        step,
        creatorInitialPrompt(selectCreatorInitialInputs(session)),
        cwd
      );
      const initialCode = extractCode(initial.text);
      session.setInitialCode(initialCode);
      if (workspace) {
        workspace.writeInitialCode(initialCode);
        await this.runTests(workspace, 0, workspace.initialCodePath());
      }

      for (let cycle = 1; cycle <= session.plannedCycleCount; cycle++) {
        this.observer.onCycleStart?.(cycle, session.plannedCycleCount);
        const draft = session.beginCycle();

        step = this.step('review', cycle);
        const review = await this.call(
          step,
          reviewPrompt(
            selectReviewInputs(session, cycle),
            workspace?.manifest() ?? []
          ),
          cwd
        );
        draft.setReview(review.text);
        workspace?.writeReview(cycle, review.text);

        step = this.step('critique', cycle);
        const critique = await this.call(
          step,
          critiquePrompt(selectCritiqueInputs(session, draft)),
          cwd
        );
        draft.setCritique(critique.text);
        workspace?.writeCritique(cycle, critique.text);

        step = this.step('revise', cycle);
        const revision = await this.call(
          step,
          revisionPrompt(selectRevisionInputs(session, draft)),
          cwd
        );
        draft.setRevision(extractCode(revision.text));

        const record = session.commitCycle(draft);
        if (workspace) {
          workspace.writeRevision(cycle, record.revision);
          await this.runTests(workspace, cycle, workspace.revisionPath(cycle));
        }
        logger.debug(`Cycle ${cycle} complete`, { sessionId: session.id });
        this.observer.onCycleComplete?.(record, session.plannedCycleCount);
      }

      session.markCompleted();
    } catch (caught: unknown) {
      error = this.abort(session, step, caught);
    }
    return this.finish({ session: session.snapshot(), error });
  }

  private finish(result: LoopResult): LoopResult {
    logger.debug('Feedback loop finished', {
      sessionId: result.session.id,
      status: result.session.status,
      cycles: result.session.cycles.length,
    });
    this.observer.onRunEnd?.(result);
    return result;
  }

  private step(phase: LoopPhase, cycle: number): AgentStep {
    const role = PHASE_ROLES[phase];
    return { phase, cycle, role, tool: this.roles[role] };
  }

  private async call(
    step: AgentStep,
    prompt: string,
    cwd: string | undefined
  ): Promise<AgentResponse> {
    const label = ROLE_LABELS[step.role];
    this.observer.onAgentStart?.(step);
    logger.debug(`${label} ${step.phase} starting`, {
      cycle: step.cycle,
      tool: step.tool,
      promptChars: prompt.length,
    });

    try {
      const response = await this.invoker.invoke({
        role: step.role,
        tool: step.tool,
        prompt,
        timeoutMs: this.timeoutMs,
        cwd,
      });
      this.observer.onAgentOutput?.(step, response);
      return response;
    } catch (error: unknown) {
      if (error instanceof AgentCallError) {
        this.observer.onAgentError?.(step, error);
      }
      throw error;
    }
  }

  /**
   * Seal the session as failed at `step` and describe where the run stopped
   */
  private abort(
    session: FeedbackSession,
    step: AgentStep,
    caught: unknown
  ): OrchestrationError {
    const cause =
      caught instanceof Error ? caught : new Error(getErrorMessage(caught));
    const aborted = new OrchestrationError(
      { ...step, role: ROLE_LABELS[step.role] },
      cause
    );
    logger.debug(`${ROLE_LABELS[step.role]} ${step.phase} failed`, {
      cycle: step.cycle,
      tool: step.tool,
      code: aborted.causeCode,
    });
    session.markFailed({
      ...step,
      code: aborted.causeCode,
      message: aborted.message,
    });
    return aborted;
  }

  private async runTests(
    workspace: Workspace,
    cycle: number,
    codeFile: string
  ): Promise<void> {
    if (!this.testCommand) {
      return;
    }
    const report = await runTestCommand(cycle, {
      command: this.testCommand,
      cwd: workspace.dir,
      codeFile,
      timeoutMs: this.timeoutMs,
      runner: this.testRunner,
    });
    workspace.writeTestLog(cycle, formatTestLog(report));
    this.observer.onTestRun?.(report);
  }
}

/**
 * Creator replies often arrive wrapped in a Markdown fence. Keep the reply
 * as-is when stripping would leave nothing.
 */
function extractCode(text: string): string {
  return stripCodeFences(text) || text;
}
