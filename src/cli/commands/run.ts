/**
 * Run command for crosscheck CLI
 * Drives one Creator / Reviewer / Critic feedback loop over a task
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import * as fs from 'fs';
import * as path from 'path';
import {
  checkAvailability,
  missingTools,
  requiredTools,
  type BinaryLocator,
} from '../../agents/availability.js';
import { CliAgentInvoker } from '../../agents/invoker.js';
import { TOOL_KEYS, type AgentInvoker } from '../../agents/types.js';
import {
  parsePositiveInt,
  parseTimeoutSeconds,
  resolveConfig,
  type CrosscheckConfig,
} from '../../core/config/crosscheck-config.js';
import {
  ErrorCode,
  ValidationError,
  getErrorMessage,
  getUserFriendlyMessage,
  isCrosscheckError,
} from '../../core/errors/index.js';
import { logger } from '../../core/monitoring/logger.js';
import { FeedbackLoopOrchestrator } from '../../orchestrators/feedback-loop/orchestrator.js';
import { currentCode } from '../../orchestrators/feedback-loop/session.js';
import { saveTranscript } from '../../orchestrators/feedback-loop/transcript.js';
import { ConsoleDisplay } from '../display.js';

interface RunOptions {
  creator?: string;
  reviewer?: string;
  critic?: string;
  iterations?: number;
  timeout?: number;
  output?: string;
  save: boolean;
  workspace: boolean;
  sessionsDir?: string;
  check: boolean;
  quiet?: boolean;
  testCommand?: string;
}

export interface RunCommandDeps {
  createInvoker?: (config: CrosscheckConfig) => AgentInvoker;
  locate?: BinaryLocator;
  display?: ConsoleDisplay;
  cwd?: () => string;
  env?: NodeJS.ProcessEnv;
  /** Whether stderr is a terminal; decides if the display animates spinners */
  interactive?: boolean;
}

/**
 * Adapt a config value parser to commander, which reports
 * InvalidArgumentError as a usage error
 */
function optionParser<T>(
  parse: (value: string, name: string) => T,
  name: string
): (value: string) => T {
  return (value) => {
    try {
      return parse(value, name);
    } catch (error: unknown) {
      throw new InvalidArgumentError(getErrorMessage(error));
    }
  };
}

function defaultInvoker(config: CrosscheckConfig): AgentInvoker {
  return new CliAgentInvoker({
    models: config.models,
    binaries: config.binaries,
    stripEnv: config.strippedEnv,
  });
}

export function createRunCommand(deps: RunCommandDeps = {}): Command {
  const agentOption = (flag: string, description: string): Option =>
    new Option(`--${flag} <agent>`, description).choices(TOOL_KEYS);

  return new Command('run')
    .description('Run the Creator / Reviewer / Critic loop on a coding task')
    .argument('<task...>', 'The coding task, e.g. "write a binary search"')
    .addOption(
      agentOption('creator', 'Agent that writes and revises code (default: claude)')
    )
    .addOption(agentOption('reviewer', 'Agent that reviews code (default: openai)'))
    .addOption(
      agentOption('critic', 'Agent that critiques the review (default: gemini)')
    )
    .option(
      '-n, --iterations <n>',
      'Number of review, critique, revise cycles (default: 5)',
      optionParser(parsePositiveInt, '--iterations')
    )
    .option(
      '--timeout <seconds>',
      'Per-agent call timeout in seconds (default: 120)',
      optionParser(parseTimeoutSeconds, '--timeout')
    )
    .option('-o, --output <file>', 'Write the final code to this file')
    .option('--no-save', 'Do not save the session transcript')
    .option('--no-workspace', 'Do not mirror artifacts into a workspace directory')
    .option(
      '--sessions-dir <dir>',
      'Directory for transcripts and workspaces (default: ./sessions)'
    )
    .option('--no-check', 'Skip the agent CLI availability check')
    .option('-q, --quiet', "Do not print each agent's full output")
    .option(
      '--test-command <command>',
      'Command run in the workspace after each code version; {code} expands to the code file'
    )
    .action(async (taskWords: string[], options: RunOptions, command: Command) => {
      const display =
        deps.display ??
        new ConsoleDisplay({
          showOutput: !options.quiet,
          spinners: deps.interactive ?? process.stderr.isTTY === true,
        });
      const rootDir = (deps.cwd ?? (() => process.cwd()))();

      try {
        const task = taskWords.join(' ').trim();
        if (!task) {
          throw new ValidationError(
            'Task must not be empty',
            ErrorCode.INVALID_INPUT
          );
        }

        const fromCli = (name: string): boolean =>
          command.getOptionValueSource(name) === 'cli';
        const config = resolveConfig({
          rootDir,
          env: deps.env ?? process.env,
          overrides: {
            creator: options.creator,
            reviewer: options.reviewer,
            critic: options.critic,
            iterations: options.iterations,
            timeoutSeconds: options.timeout,
            sessionsDir: options.sessionsDir,
            save: fromCli('save') ? options.save : undefined,
            workspace: fromCli('workspace') ? options.workspace : undefined,
            testCommand: options.testCommand,
          },
        });
        logger.debug('Resolved run config', { ...config });

        if (options.check) {
          const missing = missingTools(
            checkAvailability(requiredTools(config.roles), {
              locate: deps.locate,
              binaries: config.binaries,
            })
          );
          if (missing.length > 0) {
            display.toolStatus(missing);
            display.error(
              `Missing agent CLI(s): ${missing.map((t) => t.binary).join(', ')}`,
              getUserFriendlyMessage(ErrorCode.AGENT_TOOL_NOT_FOUND)
            );
            process.exitCode = 1;
            return;
          }
        }

        const sessionsDir = path.resolve(rootDir, config.sessionsDir);
        const orchestrator = new FeedbackLoopOrchestrator({
          invoker: (deps.createInvoker ?? defaultInvoker)(config),
          roles: config.roles,
          iterations: config.iterations,
          timeoutMs: Math.round(config.timeoutSeconds * 1000),
          workspaceRoot: config.workspace ? sessionsDir : null,
          observer: display,
          testCommand: config.testCommand,
        });

        const result = await orchestrator.run(task);
        const finalCode = currentCode(result.session);

        if (!result.error && finalCode !== null) {
          display.finalCode(finalCode);
          if (options.output) {
            const outputPath = path.resolve(rootDir, options.output);
            fs.writeFileSync(outputPath, finalCode + '\n', 'utf-8');
            display.saved('Final code written to', outputPath);
          }
        }
        if (result.session.workspacePath) {
          display.saved('Workspace files', result.session.workspacePath);
        }
        if (config.save) {
          display.saved(
            'Session saved to',
            saveTranscript(result.session, sessionsDir)
          );
        }

        if (result.error) {
          const cause = result.error.cause;
          display.error(
            result.error.message,
            isCrosscheckError(cause)
              ? getUserFriendlyMessage(cause.code)
              : undefined
          );
          process.exitCode = 1;
        }
      } catch (error: unknown) {
        logger.debug('Run command failed', { error: getErrorMessage(error) });
        display.error(
          getErrorMessage(error),
          isCrosscheckError(error)
            ? getUserFriendlyMessage(error.code)
            : undefined
        );
        process.exitCode = 1;
      }
    });
}
