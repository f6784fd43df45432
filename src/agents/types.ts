export const TOOL_KEYS = ['claude', 'openai', 'gemini'] as const;
export type ToolKey = (typeof TOOL_KEYS)[number];

export const ROLES = ['creator', 'reviewer', 'critic'] as const;
export type Role = (typeof ROLES)[number];

export const ROLE_LABELS: Readonly<Record<Role, string>> = {
  creator: 'Creator',
  reviewer: 'Reviewer',
  critic: 'Critic',
};

/** Which tool plays which role; fixed for a run */
export type RoleAssignment = Readonly<Record<Role, ToolKey>>;

export const DEFAULT_ROLES: RoleAssignment = {
  creator: 'claude',
  reviewer: 'openai',
  critic: 'gemini',
};

export function isToolKey(value: string): value is ToolKey {
  return (TOOL_KEYS as readonly string[]).includes(value);
}

/**
 * One self-contained agent call. `tool` is a plain string because requests
 * can be built from user input; the invoker rejects unknown keys.
 */
export interface AgentRequest {
  readonly role: Role;
  readonly tool: string;
  readonly prompt: string;
  readonly timeoutMs: number;
  readonly cwd?: string;
}

export interface AgentResponse {
  /** Parsed response text */
  readonly text: string;
  /** Unparsed output of the stream that was used */
  readonly raw: string;
  readonly stream: 'stdout' | 'stderr';
  readonly exitCode: number | null;
  readonly durationMs: number;
  /** Conversation id reported by the tool, kept for the log only */
  readonly sessionRef?: string;
}

export interface AgentInvoker {
  invoke(request: AgentRequest): Promise<AgentResponse>;
}

export interface ParsedOutput {
  text: string;
  sessionRef?: string;
}
