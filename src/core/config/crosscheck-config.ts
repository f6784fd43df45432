/**
 * Configuration for crosscheck runs
 *
 * Resolution order, later layers winning:
 *   built-in defaults < .crosscheck/config.json < CROSSCHECK_* env < CLI flags
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import {
  ConfigError,
  ErrorCode,
  ValidationError,
  getErrorMessage,
} from '../errors/index.js';
import {
  DEFAULT_ROLES,
  TOOL_KEYS,
  isToolKey,
  type Role,
  type RoleAssignment,
  type ToolKey,
} from '../../agents/types.js';
import { MAX_TIMEOUT_MS } from '../execution/process-runner.js';

export const CONFIG_DIR = '.crosscheck';
export const CONFIG_FILE = 'config.json';

/** Longest per-call timeout, in seconds */
export const MAX_TIMEOUT_SECONDS = MAX_TIMEOUT_MS / 1000;

const ToolKeySchema = z.enum(TOOL_KEYS);

const PerToolSchema = z
  .object({
    claude: z.string().min(1),
    openai: z.string().min(1),
    gemini: z.string().min(1),
  })
  .partial();

export const ConfigFileSchema = z
  .object({
    roles: z
      .object({
        creator: ToolKeySchema,
        reviewer: ToolKeySchema,
        critic: ToolKeySchema,
      })
      .partial()
      .optional(),
    iterations: z.number().int().positive().optional(),
    timeoutSeconds: z.number().positive().max(MAX_TIMEOUT_SECONDS).optional(),
    sessionsDir: z.string().min(1).optional(),
    workspace: z.boolean().optional(),
    save: z.boolean().optional(),
    models: PerToolSchema.optional(),
    binaries: PerToolSchema.optional(),
    strippedEnv: z.array(z.string().min(1)).optional(),
    /** argv run in the workspace after each code version */
    testCommand: z.array(z.string().min(1)).min(1).optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export interface CrosscheckConfig {
  roles: RoleAssignment;
  iterations: number;
  timeoutSeconds: number;
  sessionsDir: string;
  workspace: boolean;
  save: boolean;
  models: Partial<Record<ToolKey, string>>;
  binaries: Partial<Record<ToolKey, string>>;
  strippedEnv: string[];
  testCommand: string[] | null;
}

export const DEFAULT_CONFIG: Readonly<CrosscheckConfig> = {
  roles: DEFAULT_ROLES,
  iterations: 5,
  timeoutSeconds: 120,
  sessionsDir: './sessions',
  workspace: true,
  save: true,
  models: {},
  binaries: {},
  strippedEnv: [],
  testCommand: null,
};

/** Values coming from command-line flags; unset flags are undefined */
export interface ConfigOverrides {
  creator?: string;
  reviewer?: string;
  critic?: string;
  iterations?: number;
  timeoutSeconds?: number;
  sessionsDir?: string;
  workspace?: boolean;
  save?: boolean;
  testCommand?: string;
}

export function configFilePath(rootDir: string): string {
  return join(rootDir, CONFIG_DIR, CONFIG_FILE);
}

/**
 * Load the project config file. Returns null when there is none.
 */
export function loadConfigFile(rootDir: string): ConfigFile | null {
  const file = configFilePath(rootDir);
  if (!existsSync(file)) {
    return null;
  }

  let data: unknown;
  try {
    data = JSON.parse(readFileSync(file, 'utf-8'));
  } catch (error: unknown) {
    throw new ConfigError(
      `Cannot read ${file}: ${getErrorMessage(error)}`,
      ErrorCode.CONFIG_UNREADABLE,
      { file },
      error instanceof Error ? error : undefined
    );
  }

  const result = ConfigFileSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(
      `Invalid config in ${file}: ${issues}`,
      ErrorCode.CONFIG_INVALID,
      { file }
    );
  }
  return result.data;
}

export function parsePositiveInt(value: string, name: string): number {
  const trimmed = value.trim();
  const parsed = Number(trimmed);
  if (!/^\d+$/.test(trimmed) || !Number.isSafeInteger(parsed) || parsed < 1) {
    throw new ValidationError(
      `${name} must be a positive integer, got '${value}'`,
      ErrorCode.INVALID_INPUT,
      { name, value }
    );
  }
  return parsed;
}

export function parsePositiveNumber(value: string, name: string): number {
  const parsed = Number(value.trim());
  if (!value.trim() || !Number.isFinite(parsed) || parsed <= 0) {
    throw new ValidationError(
      `${name} must be a positive number, got '${value}'`,
      ErrorCode.INVALID_INPUT,
      { name, value }
    );
  }
  return parsed;
}

export function parseTimeoutSeconds(value: string, name: string): number {
  const seconds = parsePositiveNumber(value, name);
  if (seconds > MAX_TIMEOUT_SECONDS) {
    throw new ValidationError(
      `${name} must be at most ${MAX_TIMEOUT_SECONDS} seconds, got '${value}'`,
      ErrorCode.INVALID_INPUT,
      { name, value }
    );
  }
  return seconds;
}

export function parseToolKey(value: string, name: string): ToolKey {
  const key = value.trim().toLowerCase();
  if (!isToolKey(key)) {
    throw new ValidationError(
      `${name} must be one of ${TOOL_KEYS.join(', ')}, got '${value}'`,
      ErrorCode.INVALID_INPUT,
      { name, value }
    );
  }
  return key;
}

/**
 * Split a command line on whitespace. Arguments containing spaces need the
 * config file's array form.
 */
export function parseCommand(value: string, name: string): string[] {
  const argv = value.trim().split(/\s+/).filter(Boolean);
  if (argv.length === 0) {
    throw new ValidationError(
      `${name} must name a command, got '${value}'`,
      ErrorCode.INVALID_INPUT,
      { name, value }
    );
  }
  return argv;
}

function parseBoolean(value: string, name: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  throw new ValidationError(
    `${name} must be true or false, got '${value}'`,
    ErrorCode.INVALID_INPUT,
    { name, value }
  );
}

/**
 * Read CROSSCHECK_* variables. Empty variables count as unset.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): ConfigFile {
  const read = (name: string): string | undefined => {
    const value = env[name];
    return value && value.trim() ? value : undefined;
  };

  const config: ConfigFile = {};
  const roles: Partial<Record<Role, ToolKey>> = {};

  const creator = read('CROSSCHECK_CREATOR');
  if (creator) roles.creator = parseToolKey(creator, 'CROSSCHECK_CREATOR');
  const reviewer = read('CROSSCHECK_REVIEWER');
  if (reviewer) roles.reviewer = parseToolKey(reviewer, 'CROSSCHECK_REVIEWER');
  const critic = read('CROSSCHECK_CRITIC');
  if (critic) roles.critic = parseToolKey(critic, 'CROSSCHECK_CRITIC');
  if (Object.keys(roles).length > 0) config.roles = roles;

  const iterations = read('CROSSCHECK_ITERATIONS');
  if (iterations) {
    config.iterations = parsePositiveInt(iterations, 'CROSSCHECK_ITERATIONS');
  }
  const timeout = read('CROSSCHECK_TIMEOUT');
  if (timeout) {
    config.timeoutSeconds = parseTimeoutSeconds(timeout, 'CROSSCHECK_TIMEOUT');
  }
  const sessionsDir = read('CROSSCHECK_SESSIONS_DIR');
  if (sessionsDir) config.sessionsDir = sessionsDir;
  const workspace = read('CROSSCHECK_WORKSPACE');
  if (workspace) {
    config.workspace = parseBoolean(workspace, 'CROSSCHECK_WORKSPACE');
  }
  const testCommand = read('CROSSCHECK_TEST_COMMAND');
  if (testCommand) {
    config.testCommand = parseCommand(testCommand, 'CROSSCHECK_TEST_COMMAND');
  }

  return config;
}

function mergeLayer(base: CrosscheckConfig, layer: ConfigFile): CrosscheckConfig {
  return {
    roles: { ...base.roles, ...layer.roles },
    iterations: layer.iterations ?? base.iterations,
    timeoutSeconds: layer.timeoutSeconds ?? base.timeoutSeconds,
    sessionsDir: layer.sessionsDir ?? base.sessionsDir,
    workspace: layer.workspace ?? base.workspace,
    save: layer.save ?? base.save,
    models: { ...base.models, ...layer.models },
    binaries: { ...base.binaries, ...layer.binaries },
    strippedEnv: layer.strippedEnv ?? base.strippedEnv,
    testCommand: layer.testCommand ?? base.testCommand,
  };
}

function overridesToLayer(overrides: ConfigOverrides): ConfigFile {
  const roles: Partial<Record<Role, ToolKey>> = {};
  if (overrides.creator !== undefined) {
    roles.creator = parseToolKey(overrides.creator, '--creator');
  }
  if (overrides.reviewer !== undefined) {
    roles.reviewer = parseToolKey(overrides.reviewer, '--reviewer');
  }
  if (overrides.critic !== undefined) {
    roles.critic = parseToolKey(overrides.critic, '--critic');
  }
  if (overrides.iterations !== undefined) {
    parsePositiveInt(String(overrides.iterations), '--iterations');
  }
  if (overrides.timeoutSeconds !== undefined) {
    parseTimeoutSeconds(String(overrides.timeoutSeconds), '--timeout');
  }
  return {
    roles,
    iterations: overrides.iterations,
    timeoutSeconds: overrides.timeoutSeconds,
    sessionsDir: overrides.sessionsDir,
    workspace: overrides.workspace,
    save: overrides.save,
    testCommand:
      overrides.testCommand === undefined
        ? undefined
        : parseCommand(overrides.testCommand, '--test-command'),
  };
}

export interface ResolveConfigOptions {
  rootDir?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
}

export function resolveConfig(options: ResolveConfigOptions = {}): CrosscheckConfig {
  const rootDir = options.rootDir ?? process.cwd();
  const env = options.env ?? process.env;

  let config: CrosscheckConfig = {
    ...DEFAULT_CONFIG,
    roles: { ...DEFAULT_CONFIG.roles },
  };
  const file = loadConfigFile(rootDir);
  if (file) {
    config = mergeLayer(config, file);
  }
  config = mergeLayer(config, configFromEnv(env));
  if (options.overrides) {
    config = mergeLayer(config, overridesToLayer(options.overrides));
  }
  return config;
}
