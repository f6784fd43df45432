/**
 * Parsers for the structured output modes of each agent CLI.
 * Anything that is not the expected JSON falls back to the raw text, which
 * also covers tools that answered on stderr.
 */

import { z } from 'zod';
import {
  EmptyResponseError,
  TokenLimitError,
  type AgentCallContext,
} from '../core/errors/index.js';
import type { ParsedOutput } from './types.js';

const ClaudeEnvelopeSchema = z.object({
  type: z.string().optional(),
  subtype: z.string().optional(),
  is_error: z.boolean().optional(),
  result: z.string().optional(),
  session_id: z.string().optional(),
});

const CodexEventSchema = z
  .object({
    type: z.string(),
    thread_id: z.string().optional(),
    item: z
      .object({
        type: z.string().optional(),
        text: z.string().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

const GeminiEnvelopeSchema = z.object({
  response: z.string().optional(),
  session_id: z.string().optional(),
});

const LIMIT_MARKERS = ['context_length', 'token', 'rate_limit', 'too many'];

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * `claude --output-format json` prints a single result envelope
 */
export function parseClaudeJson(
  raw: string,
  context: AgentCallContext = {}
): ParsedOutput {
  const envelope = ClaudeEnvelopeSchema.safeParse(tryParseJson(raw.trim()));
  if (
    !envelope.success ||
    (envelope.data.type === undefined && envelope.data.result === undefined)
  ) {
    return { text: raw };
  }

  const { subtype = '', is_error: isError = false } = envelope.data;
  const text = envelope.data.result ?? '';
  if (subtype === 'error_max_tokens') {
    throw new TokenLimitError(`Claude token limit: ${text.slice(0, 200)}`, {
      ...context,
      subtype,
    });
  }
  if (isError) {
    throw new EmptyResponseError(
      `Claude error (${subtype}): ${text.slice(0, 200)}`,
      { ...context, subtype }
    );
  }
  return { text, sessionRef: envelope.data.session_id };
}

/**
 * `codex exec --json` prints one JSON event per line; the answer is the
 * concatenation of completed agent messages
 */
export function parseCodexJsonl(
  raw: string,
  context: AgentCallContext = {}
): ParsedOutput {
  let sawEvent = false;
  let threadId: string | undefined;
  const parts: string[] = [];

  for (const line of raw.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed) continue;

    const event = CodexEventSchema.safeParse(tryParseJson(trimmed));
    if (!event.success) continue;
    sawEvent = true;

    const { type } = event.data;
    if (type === 'thread.started') {
      threadId = event.data.thread_id;
    } else if (type === 'item.completed') {
      const item = event.data.item;
      if (item?.type === 'agent_message' && item.text) {
        parts.push(item.text);
      }
    } else if (type.toLowerCase().includes('error')) {
      const message = JSON.stringify(event.data);
      if (LIMIT_MARKERS.some((m) => message.toLowerCase().includes(m))) {
        throw new TokenLimitError(`Codex limit: ${message.slice(0, 200)}`, {
          ...context,
        });
      }
    }
  }

  if (!sawEvent) {
    return { text: raw };
  }

  const text = parts.join('\n').trim();
  if (!text) {
    throw new EmptyResponseError(
      `Codex returned no agent_message. Raw: ${raw.slice(0, 300)}`,
      { ...context }
    );
  }
  return { text, sessionRef: threadId };
}

/**
 * `gemini --output-format json`; stdout may carry a preamble before the JSON
 */
export function parseGeminiJson(raw: string): ParsedOutput {
  const start = raw.indexOf('{');
  if (start === -1) {
    return { text: raw };
  }
  const envelope = GeminiEnvelopeSchema.safeParse(
    tryParseJson(raw.slice(start))
  );
  if (!envelope.success || envelope.data.response === undefined) {
    return { text: raw };
  }
  return {
    text: envelope.data.response,
    sessionRef: envelope.data.session_id,
  };
}

/**
 * Markdown fences that models add around code despite being told not to
 */
const FENCE_PATTERN = /^```[\w+-]*[ \t]*\n?|\n?```[ \t]*$/gm;

export function stripCodeFences(text: string): string {
  return text.replace(FENCE_PATTERN, '').trim();
}
