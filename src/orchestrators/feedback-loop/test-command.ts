/**
 * Runs a user-configured test command against a code version in the
 * workspace. A failing or missing command is reported in the result and
 * never stops the loop.
 */

import {
  ErrorCode,
  ValidationError,
  getErrorMessage,
} from '../../core/errors/index.js';
import {
  runProcess,
  type ProcessRunner,
} from '../../core/execution/process-runner.js';
import { logger } from '../../core/monitoring/logger.js';

/** Argument token replaced with the absolute path of the code file */
export const CODE_FILE_PLACEHOLDER = '{code}';
/** Variable carrying the same path into the test command's environment */
export const CODE_FILE_ENV = 'CROSSCHECK_CODE_FILE';

export interface TestRunReport {
  /** 0 for the initial code, otherwise the cycle whose revision was tested */
  cycle: number;
  /** argv as run, with the code path substituted */
  command: readonly string[];
  passed: boolean;
  exitCode: number | null;
  timedOut: boolean;
  /** stdout then stderr, trimmed */
  output: string;
  durationMs: number;
}

export interface TestCommandOptions {
  command: readonly string[];
  cwd: string;
  codeFile: string;
  timeoutMs: number;
  runner?: ProcessRunner;
  env?: NodeJS.ProcessEnv;
}

export async function runTestCommand(
  cycle: number,
  options: TestCommandOptions
): Promise<TestRunReport> {
  const argv = options.command.map((arg) =>
    arg.split(CODE_FILE_PLACEHOLDER).join(options.codeFile)
  );
  const [command, ...args] = argv;
  if (command === undefined) {
    throw new ValidationError(
      'Test command must not be empty',
      ErrorCode.INVALID_INPUT
    );
  }

  logger.debug('Running test command', { cycle, argv, cwd: options.cwd });

  const runner = options.runner ?? runProcess;
  try {
    const result = await runner({
      command,
      args,
      cwd: options.cwd,
      env: { ...(options.env ?? process.env), [CODE_FILE_ENV]: options.codeFile },
      timeoutMs: options.timeoutMs,
    });
    const output = [result.stdout.trim(), result.stderr.trim()]
      .filter(Boolean)
      .join('\n');
    return {
      cycle,
      command: argv,
      passed: !result.timedOut && result.exitCode === 0,
      exitCode: result.exitCode,
      timedOut: result.timedOut,
      output: result.timedOut
        ? [output, `(timed out after ${Math.round(options.timeoutMs / 1000)}s)`]
            .filter(Boolean)
            .join('\n')
        : output,
      durationMs: result.durationMs,
    };
  } catch (error: unknown) {
    logger.debug('Test command could not be started', {
      cycle,
      command,
      error: getErrorMessage(error),
    });
    return {
      cycle,
      command: argv,
      passed: false,
      exitCode: null,
      timedOut: false,
      output: `Could not start ${command}: ${getErrorMessage(error)}`,
      durationMs: 0,
    };
  }
}

/**
 * Plain-text log of one test run, as written to the workspace
 */
export function formatTestLog(report: TestRunReport): string {
  const status = report.timedOut
    ? 'timed out'
    : `exit code ${report.exitCode ?? 'none'}`;
  return [
    `$ ${report.command.join(' ')}`,
    `${report.passed ? 'PASSED' : 'FAILED'} (${status})`,
    '',
    report.output,
    '',
  ].join('\n');
}
