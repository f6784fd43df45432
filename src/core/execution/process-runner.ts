/**
 * Child process execution with timeout and environment scrubbing
 */

import { spawn } from 'child_process';
import { ErrorCode, ValidationError } from '../errors/index.js';

export interface ProcessRunOptions {
  command: string;
  args: readonly string[];
  cwd?: string;
  /** Full environment for the child; defaults to process.env */
  env?: NodeJS.ProcessEnv;
  /** Variable names removed from the child's environment */
  stripEnv?: readonly string[];
  /** At most MAX_TIMEOUT_MS */
  timeoutMs?: number;
  /** Delay between SIGTERM and SIGKILL once the timeout fires */
  killGraceMs?: number;
}

export interface ProcessRunResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  durationMs: number;
}

/**
 * Signature of the process boundary. The invoker depends on this type rather
 * than on `runProcess` directly so that tests can simulate a process.
 */
export type ProcessRunner = (
  options: ProcessRunOptions
) => Promise<ProcessRunResult>;

const DEFAULT_KILL_GRACE_MS = 2000;

/**
 * Longest delay `setTimeout` honours (2^31 - 1 ms); larger values fire
 * after 1 ms
 */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export function buildChildEnv(
  base: NodeJS.ProcessEnv,
  stripEnv: readonly string[] = []
): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = {};
  for (const [key, value] of Object.entries(base)) {
    if (value !== undefined && !stripEnv.includes(key)) {
      env[key] = value;
    }
  }
  return env;
}

/**
 * Spawn a command, collect both streams, and resolve when it closes.
 * Rejects only when the process cannot be started (e.g. ENOENT); a non-zero
 * exit or a timeout resolves with the collected output.
 */
export const runProcess: ProcessRunner = (options) => {
  const stdoutChunks: Buffer[] = [];
  const stderrChunks: Buffer[] = [];
  const startedAt = Date.now();

  if (options.timeoutMs !== undefined && options.timeoutMs > MAX_TIMEOUT_MS) {
    return Promise.reject(
      new ValidationError(
        `timeoutMs must be at most ${MAX_TIMEOUT_MS}, got ${options.timeoutMs}`,
        ErrorCode.INVALID_INPUT,
        { timeoutMs: options.timeoutMs }
      )
    );
  }

  return new Promise((resolve, reject) => {
    let timeoutId: NodeJS.Timeout | undefined;
    let killId: NodeJS.Timeout | undefined;
    let timedOut = false;

    const child = spawn(options.command, [...options.args], {
      cwd: options.cwd,
      env: buildChildEnv(options.env ?? process.env, options.stripEnv),
      stdio: ['pipe', 'pipe', 'pipe'],
    });

    const clearTimers = () => {
      if (timeoutId) clearTimeout(timeoutId);
      if (killId) clearTimeout(killId);
    };

    if (options.timeoutMs && options.timeoutMs > 0) {
      timeoutId = setTimeout(() => {
        timedOut = true;
        child.kill('SIGTERM');
        killId = setTimeout(() => {
          if (child.exitCode === null && child.signalCode === null) {
            child.kill('SIGKILL');
          }
        }, options.killGraceMs ?? DEFAULT_KILL_GRACE_MS);
      }, options.timeoutMs);
    }

    child.stdout.on('data', (chunk: Buffer) => {
      stdoutChunks.push(chunk);
    });

    child.stderr.on('data', (chunk: Buffer) => {
      stderrChunks.push(chunk);
    });

    child.on('error', (error) => {
      clearTimers();
      reject(error);
    });

    child.on('close', (code, signal) => {
      clearTimers();
      resolve({
        exitCode: code,
        signal,
        stdout: Buffer.concat(stdoutChunks).toString('utf8'),
        stderr: Buffer.concat(stderrChunks).toString('utf8'),
        timedOut,
        durationMs: Date.now() - startedAt,
      });
    });

    // Some CLIs wait on an open stdin before starting, so close it at once
    child.stdin.on('error', (error: NodeJS.ErrnoException) => {
      // EPIPE when the child exits without reading stdin
      if (error.code !== 'EPIPE') {
        clearTimers();
        reject(error);
      }
    });
    child.stdin.end();
  });
};
