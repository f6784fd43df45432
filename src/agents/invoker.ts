/**
 * Agent Invoker: runs one external agent CLI per call and classifies how it
 * failed. Holds no state between calls and never retries.
 */

import {
  AgentSpawnError,
  EmptyResponseError,
  InvalidAgentRequestError,
  TimeoutError,
  ToolNotFoundError,
  UnknownAgentError,
  getErrorMessage,
  type AgentCallContext,
} from '../core/errors/index.js';
import {
  MAX_TIMEOUT_MS,
  runProcess,
  type ProcessRunResult,
  type ProcessRunner,
} from '../core/execution/process-runner.js';
import { logger } from '../core/monitoring/logger.js';
import { DEFAULT_TOOLS, buildInvocation, type ToolTable } from './tools.js';
import {
  ROLE_LABELS,
  TOOL_KEYS,
  isToolKey,
  type AgentInvoker,
  type AgentRequest,
  type AgentResponse,
  type ToolKey,
} from './types.js';

/**
 * Set by Claude Code in its own sessions; `claude` refuses to start as a
 * nested subprocess while it is present
 */
export const SESSION_MARKER_ENV = 'CLAUDECODE';

export interface CliAgentInvokerOptions {
  runner?: ProcessRunner;
  tools?: ToolTable;
  models?: Partial<Record<ToolKey, string>>;
  binaries?: Partial<Record<ToolKey, string>>;
  /** Extra variables to remove from the child environment */
  stripEnv?: readonly string[];
  env?: NodeJS.ProcessEnv;
}

export interface SelectedOutput {
  raw: string;
  stream: 'stdout' | 'stderr';
}

/**
 * Prefer stdout; fall back to stderr for tools that write there on success.
 * Returns null when neither stream carries anything.
 */
export function selectOutput(
  result: Pick<ProcessRunResult, 'stdout' | 'stderr'>
): SelectedOutput | null {
  const stdout = result.stdout.trim();
  if (stdout) {
    return { raw: stdout, stream: 'stdout' };
  }
  const stderr = result.stderr.trim();
  if (stderr) {
    return { raw: stderr, stream: 'stderr' };
  }
  return null;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export class CliAgentInvoker implements AgentInvoker {
  private readonly runner: ProcessRunner;
  private readonly tools: ToolTable;
  private readonly models: Partial<Record<ToolKey, string>>;
  private readonly binaries: Partial<Record<ToolKey, string>>;
  private readonly stripEnv: readonly string[];
  private readonly env: NodeJS.ProcessEnv | undefined;

  constructor(options: CliAgentInvokerOptions = {}) {
    this.runner = options.runner ?? runProcess;
    this.tools = options.tools ?? DEFAULT_TOOLS;
    this.models = options.models ?? {};
    this.binaries = options.binaries ?? {};
    this.stripEnv = [SESSION_MARKER_ENV, ...(options.stripEnv ?? [])];
    this.env = options.env;
  }

  async invoke(request: AgentRequest): Promise<AgentResponse> {
    if (!isToolKey(request.tool)) {
      throw new UnknownAgentError(request.tool, TOOL_KEYS);
    }
    const tool = this.tools[request.tool];
    const label = `${ROLE_LABELS[request.role]} (${tool.binary})`;
    const context: AgentCallContext = {
      role: request.role,
      tool: request.tool,
    };

    if (!request.prompt.trim()) {
      throw new InvalidAgentRequestError(`${label}: prompt is empty`, context);
    }
    if (!Number.isFinite(request.timeoutMs) || request.timeoutMs <= 0) {
      throw new InvalidAgentRequestError(
        `${label}: timeout must be a positive duration, got ${request.timeoutMs}`,
        context
      );
    }
    if (request.timeoutMs > MAX_TIMEOUT_MS) {
      throw new InvalidAgentRequestError(
        `${label}: timeout must be at most ${MAX_TIMEOUT_MS}ms, got ${request.timeoutMs}`,
        context
      );
    }

    const { command, args } = buildInvocation(tool, request.role, request.prompt, {
      model: this.models[request.tool],
      binary: this.binaries[request.tool],
    });
    context.binary = command;

    logger.debug(`Spawning ${label}`, {
      command,
      argc: args.length,
      promptChars: request.prompt.length,
      timeoutMs: request.timeoutMs,
      cwd: request.cwd,
    });

    let result: ProcessRunResult;
    try {
      result = await this.runner({
        command,
        args,
        cwd: request.cwd,
        env: this.env,
        stripEnv: this.stripEnv,
        timeoutMs: request.timeoutMs,
      });
    } catch (error: unknown) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        throw new ToolNotFoundError(command, context, error);
      }
      throw new AgentSpawnError(
        `${label} could not be started: ${getErrorMessage(error)}`,
        context,
        error instanceof Error ? error : undefined
      );
    }

    logger.debug(`${label} exited`, {
      exitCode: result.exitCode,
      signal: result.signal,
      timedOut: result.timedOut,
      durationMs: result.durationMs,
      stdoutChars: result.stdout.length,
      stderrChars: result.stderr.length,
    });

    if (result.timedOut) {
      throw new TimeoutError(label, request.timeoutMs, context);
    }

    const selected = selectOutput(result);
    if (!selected) {
      throw new EmptyResponseError(
        `${label} returned an empty response. Exit code: ${result.exitCode}.`,
        { ...context, exitCode: result.exitCode ?? undefined }
      );
    }
    if (selected.stream === 'stderr') {
      logger.debug(`${label} wrote its answer to stderr`, {
        exitCode: result.exitCode,
      });
    }

    const parsed = tool.parse(selected.raw, context);
    const text = parsed.text.trim();
    if (!text) {
      throw new EmptyResponseError(
        `${label} returned an empty response after parsing.`,
        { ...context, exitCode: result.exitCode ?? undefined }
      );
    }

    return {
      text,
      raw: selected.raw,
      stream: selected.stream,
      exitCode: result.exitCode,
      durationMs: result.durationMs,
      sessionRef: parsed.sessionRef,
    };
  }
}
