/**
 * Closed table of supported agent CLIs. Each variant carries its binary,
 * a per-role argv builder and an output parser; roles pass different flags
 * to the same tool (the Critic, for instance, never gets write tools).
 */

import type { AgentCallContext } from '../core/errors/index.js';
import { parseClaudeJson, parseCodexJsonl, parseGeminiJson } from './parsers.js';
import type { ParsedOutput, Role, ToolKey } from './types.js';

export interface ArgvOptions {
  model?: string;
}

export type ArgvBuilder = (prompt: string, options: ArgvOptions) => string[];

interface ToolVariant<K extends ToolKey> {
  readonly key: K;
  readonly binary: string;
  readonly displayName: string;
  readonly installHint: string;
  readonly argv: Readonly<Record<Role, ArgvBuilder>>;
  parse(raw: string, context?: AgentCallContext): ParsedOutput;
}

export type ClaudeTool = ToolVariant<'claude'>;
export type CodexTool = ToolVariant<'openai'>;
export type GeminiTool = ToolVariant<'gemini'>;
export type AgentTool = ClaudeTool | CodexTool | GeminiTool;

export type ToolTable = {
  readonly [K in ToolKey]: ToolVariant<K>;
};

const CLAUDE_WRITE_TOOLS = 'Bash,Write,Read,Edit,Glob,Grep,Task';
const CLAUDE_READ_TOOLS = 'Bash,Read,Glob,Grep';

function claudeArgs(allowedTools: string): ArgvBuilder {
  return (prompt, { model }) => [
    '--output-format',
    'json',
    ...(model ? ['--model', model] : []),
    '-p',
    prompt,
    '--allowedTools',
    allowedTools,
  ];
}

const codexArgs: ArgvBuilder = (prompt, { model }) => [
  ...(model ? ['-m', model] : []),
  'exec',
  '--json',
  '--skip-git-repo-check',
  prompt,
];

function geminiArgs(autoApprove: boolean): ArgvBuilder {
  return (prompt, { model }) => [
    ...(autoApprove ? ['--approval-mode', 'yolo'] : []),
    '--output-format',
    'json',
    ...(model ? ['--model', model] : []),
    '-p',
    prompt,
  ];
}

export const claudeTool: ClaudeTool = {
  key: 'claude',
  binary: 'claude',
  displayName: 'Claude Code CLI',
  installHint: 'npm install -g @anthropic-ai/claude-code',
  argv: {
    creator: claudeArgs(CLAUDE_WRITE_TOOLS),
    reviewer: claudeArgs(CLAUDE_WRITE_TOOLS),
    critic: claudeArgs(CLAUDE_READ_TOOLS),
  },
  parse: parseClaudeJson,
};

export const codexTool: CodexTool = {
  key: 'openai',
  binary: 'codex',
  displayName: 'OpenAI Codex CLI',
  installHint: 'npm install -g @openai/codex',
  argv: {
    creator: codexArgs,
    reviewer: codexArgs,
    critic: codexArgs,
  },
  parse: parseCodexJsonl,
};

export const geminiTool: GeminiTool = {
  key: 'gemini',
  binary: 'gemini',
  displayName: 'Google Gemini CLI',
  installHint: 'npm install -g @google/gemini-cli',
  argv: {
    creator: geminiArgs(false),
    reviewer: geminiArgs(true),
    critic: geminiArgs(true),
  },
  parse: (raw) => parseGeminiJson(raw),
};

export const DEFAULT_TOOLS: ToolTable = {
  claude: claudeTool,
  openai: codexTool,
  gemini: geminiTool,
};

/**
 * Build the argv for one call, with the binary overridable per tool
 */
export function buildInvocation(
  tool: AgentTool,
  role: Role,
  prompt: string,
  options: ArgvOptions & { binary?: string } = {}
): { command: string; args: string[] } {
  return {
    command: options.binary ?? tool.binary,
    args: tool.argv[role](prompt, { model: options.model }),
  };
}
