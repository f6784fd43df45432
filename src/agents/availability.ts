/**
 * Verify that the CLIs a run needs are on PATH before starting it
 */

import { execFileSync } from 'child_process';
import { DEFAULT_TOOLS, type ToolTable } from './tools.js';
import type { RoleAssignment, ToolKey } from './types.js';

export interface ToolAvailability {
  key: ToolKey;
  binary: string;
  displayName: string;
  installHint: string;
  path: string | null;
}

export type BinaryLocator = (binary: string) => string | null;

export const whichBinary: BinaryLocator = (binary) => {
  try {
    const resolved = execFileSync('which', [binary], {
      encoding: 'utf8',
      stdio: ['ignore', 'pipe', 'ignore'],
    }).trim();
    return resolved || null;
  } catch {
    // `which` exits non-zero when the binary is missing
    return null;
  }
};

/**
 * Tools needed by a role assignment, deduplicated (roles may share a tool)
 */
export function requiredTools(roles: RoleAssignment): ToolKey[] {
  return [...new Set([roles.creator, roles.reviewer, roles.critic])].sort();
}

export function checkAvailability(
  keys: readonly ToolKey[],
  options: {
    locate?: BinaryLocator;
    tools?: ToolTable;
    binaries?: Partial<Record<ToolKey, string>>;
  } = {}
): ToolAvailability[] {
  const locate = options.locate ?? whichBinary;
  const tools = options.tools ?? DEFAULT_TOOLS;

  return keys.map((key) => {
    const tool = tools[key];
    const binary = options.binaries?.[key] ?? tool.binary;
    return {
      key,
      binary,
      displayName: tool.displayName,
      installHint: tool.installHint,
      path: locate(binary),
    };
  });
}

export function missingTools(
  results: readonly ToolAvailability[]
): ToolAvailability[] {
  return results.filter((r) => r.path === null);
}
