/**
 * Console rendering for crosscheck runs.
 *
 * Colours: Creator cyan, Reviewer green, Critic magenta, headers yellow,
 * errors red.
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import { DEFAULT_TOOLS } from '../agents/tools.js';
import type { ToolAvailability } from '../agents/availability.js';
import {
  ROLES,
  ROLE_LABELS,
  type AgentResponse,
  type Role,
  type ToolKey,
} from '../agents/types.js';
import type { AgentCallError } from '../core/errors/index.js';
import type {
  AgentStep,
  LoopObserver,
  LoopResult,
  RunStartInfo,
} from '../orchestrators/feedback-loop/orchestrator.js';
import type { TestRunReport } from '../orchestrators/feedback-loop/test-command.js';
import type { LoopPhase } from '../orchestrators/feedback-loop/types.js';

type RoleColor = 'cyan' | 'green' | 'magenta';
type PanelColor = RoleColor | 'yellow';

const ROLE_COLORS: Readonly<Record<Role, RoleColor>> = {
  creator: 'cyan',
  reviewer: 'green',
  critic: 'magenta',
};

const PHASE_LABELS: Readonly<Record<LoopPhase, string>> = {
  create: 'writing initial code',
  review: 'reviewing',
  critique: 'critiquing the review',
  revise: 'revising',
};

const RULE_WIDTH = 60;

export function toolName(tool: ToolKey): string {
  return DEFAULT_TOOLS[tool].displayName;
}

export function rule(label: string): string {
  const text = ` ${label} `;
  const side = Math.max(2, Math.floor((RULE_WIDTH - text.length) / 2));
  return '─'.repeat(side) + text + '─'.repeat(side);
}

export function stepTitle(step: AgentStep): string {
  return `${ROLE_LABELS[step.role]} (${toolName(step.tool)})`;
}

export interface ConsoleDisplayOptions {
  /** Print each agent's full output (default true) */
  showOutput?: boolean;
  /** Animate agent calls with ora; off when stderr is not a terminal */
  spinners?: boolean;
}

export class ConsoleDisplay implements LoopObserver {
  private spinner: Ora | null = null;
  private readonly showOutput: boolean;
  private readonly spinners: boolean;

  constructor(options: ConsoleDisplayOptions = {}) {
    this.showOutput = options.showOutput ?? true;
    this.spinners = options.spinners ?? true;
  }

  onRunStart(info: RunStartInfo): void {
    console.log('');
    console.log(chalk.bold.blue(rule('crosscheck')));
    console.log(`${chalk.dim('Task:')} ${chalk.yellow(info.task)}`);
    console.log(
      `${chalk.dim('Iterations:')} ${chalk.yellow(String(info.plannedCycleCount))}   ` +
        `${chalk.dim('Session:')} ${info.sessionId}`
    );
    for (const role of ROLES) {
      const color = ROLE_COLORS[role];
      console.log(
        `  ${chalk[color](ROLE_LABELS[role].padEnd(9))}${toolName(info.roles[role])}`
      );
    }
    if (info.workspacePath) {
      console.log(`${chalk.dim('Workspace:')} ${info.workspacePath}`);
    }
    console.log('');
    console.log(chalk.yellow(rule('Phase 0: initial code')));
  }

  onCycleStart(cycle: number, total: number): void {
    console.log('');
    console.log(chalk.yellow(rule(`Cycle ${cycle}/${total}`)));
  }

  onAgentStart(step: AgentStep): void {
    const text = chalk[ROLE_COLORS[step.role]](
      `${stepTitle(step)} is ${PHASE_LABELS[step.phase]}...`
    );
    if (this.spinners) {
      this.spinner = ora(text).start();
    } else {
      console.log(text);
    }
  }

  onAgentOutput(step: AgentStep, response: AgentResponse): void {
    const seconds = (response.durationMs / 1000).toFixed(1);
    this.stopSpinner(true, `${stepTitle(step)} finished in ${seconds}s`);
    if (this.showOutput) {
      this.panel(stepTitle(step), response.text, ROLE_COLORS[step.role]);
    }
  }

  onAgentError(step: AgentStep, error: AgentCallError): void {
    this.stopSpinner(false, `${stepTitle(step)} failed`);
    console.log(chalk.red.bold(`Error: ${stepTitle(step)}`));
    console.log(chalk.red(error.message));
  }

  onTestRun(report: TestRunReport): void {
    const subject =
      report.cycle === 0 ? 'the initial code' : `revision ${report.cycle}`;
    if (report.passed) {
      const seconds = (report.durationMs / 1000).toFixed(1);
      console.log(chalk.green(`✓ Tests passed on ${subject} in ${seconds}s`));
    } else {
      const status = report.timedOut
        ? 'timed out'
        : `exit code ${report.exitCode ?? 'none'}`;
      console.log(chalk.red(`✗ Tests failed on ${subject} (${status})`));
    }
    if (this.showOutput && report.output) {
      this.panel('Test output', report.output, 'yellow');
    }
  }

  onRunEnd(result: LoopResult): void {
    const { session, error } = result;
    console.log('');
    if (error) {
      const where = error.cycle === 0 ? 'phase 0' : `cycle ${error.cycle}`;
      console.log(
        chalk.red.bold(
          `Run stopped at ${where} (${error.phase}): ${error.role} failed.`
        )
      );
      console.log(
        chalk.dim(
          `Completed cycles kept: ${session.cycles.length}/${session.plannedCycleCount}`
        )
      );
      return;
    }
    console.log(chalk.bold.green(rule('Final output')));
    console.log(chalk.green(`✓ ${session.cycles.length} cycle(s) completed`));
  }

  finalCode(code: string): void {
    this.panel('Final revised code', code, 'green');
  }

  saved(label: string, file: string): void {
    console.log(`${chalk.green('✓')} ${label}: ${chalk.cyan(file)}`);
  }

  toolStatus(results: readonly ToolAvailability[]): void {
    for (const tool of results) {
      if (tool.path) {
        console.log(
          `  ${chalk.bold.green('FOUND')}    ${tool.displayName} (${chalk.cyan(tool.binary)})  ${chalk.dim(tool.path)}`
        );
      } else {
        console.log(
          `  ${chalk.bold.red('MISSING')}  ${tool.displayName} (${chalk.cyan(tool.binary)})`
        );
        console.log(`           Install: ${chalk.dim(tool.installHint)}`);
      }
    }
  }

  error(message: string, hint?: string): void {
    this.stopSpinner(false);
    console.error(`\n${chalk.red.bold('Error:')} ${message}`);
    if (hint) {
      console.error(chalk.dim(hint));
    }
  }

  private panel(title: string, body: string, color: PanelColor): void {
    console.log(chalk[color].bold(rule(title)));
    console.log(body);
    console.log(chalk[color](rule('end')));
  }

  private stopSpinner(ok: boolean, text?: string): void {
    if (!this.spinner) {
      if (text) {
        console.log(ok ? chalk.green(`✓ ${text}`) : chalk.red(`✗ ${text}`));
      }
      return;
    }
    if (ok) {
      this.spinner.succeed(text);
    } else {
      this.spinner.fail(text);
    }
    this.spinner = null;
  }
}
