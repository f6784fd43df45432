/**
 * Transcript Recorder: serialises a finished (or aborted) session to
 * `<sessionsDir>/<id>.json` and loads it back for replay.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import {
  ErrorCode,
  SystemError,
  ValidationError,
} from '../../core/errors/index.js';
import { logger } from '../../core/monitoring/logger.js';
import { currentCode } from './session.js';
import type { SessionSnapshot } from './types.js';

const CycleEntrySchema = z.object({
  number: z.number().int().positive(),
  review: z.string(),
  critique: z.string(),
  revision: z.string(),
});

const FailureSchema = z.object({
  phase: z.enum(['create', 'review', 'critique', 'revise']),
  cycle: z.number().int().nonnegative(),
  role: z.enum(['creator', 'reviewer', 'critic']),
  tool: z.string(),
  code: z.string(),
  message: z.string(),
});

/**
 * Older transcripts carry no status or failure; they were only written for
 * completed runs.
 */
export const TranscriptSchema = z.object({
  id: z.string().min(1),
  task: z.string(),
  started_at: z.string(),
  completed_at: z.string().nullable(),
  status: z.enum(['running', 'completed', 'failed']).default('completed'),
  failure: FailureSchema.nullable().default(null),
  config: z.object({
    creator: z.string(),
    reviewer: z.string(),
    critic: z.string(),
    iterations: z.number().int().positive(),
  }),
  workspace_path: z.string().nullable().default(null),
  initial_code: z.string().nullable(),
  final_code: z.string().nullable(),
  iterations: z.array(CycleEntrySchema),
});

export type Transcript = z.infer<typeof TranscriptSchema>;

export function toTranscript(session: SessionSnapshot): Transcript {
  return {
    id: session.id,
    task: session.task,
    started_at: session.startedAt,
    completed_at: session.completedAt,
    status: session.status,
    failure: session.failure ? { ...session.failure } : null,
    config: {
      creator: session.roles.creator,
      reviewer: session.roles.reviewer,
      critic: session.roles.critic,
      iterations: session.plannedCycleCount,
    },
    workspace_path: session.workspacePath,
    initial_code: session.initialCode,
    final_code: currentCode(session),
    iterations: session.cycles.map((cycle) => ({
      number: cycle.index,
      review: cycle.review,
      critique: cycle.critique,
      revision: cycle.revision,
    })),
  };
}

export function transcriptPath(sessionsDir: string, sessionId: string): string {
  return path.resolve(sessionsDir, `${sessionId}.json`);
}

/**
 * Write the transcript and return its path
 */
export function saveTranscript(
  session: SessionSnapshot,
  sessionsDir: string
): string {
  const file = transcriptPath(sessionsDir, session.id);
  try {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(
      file,
      JSON.stringify(toTranscript(session), null, 2) + '\n',
      'utf8'
    );
  } catch (error: unknown) {
    throw new SystemError(
      `Failed to save transcript to ${file}`,
      ErrorCode.PERMISSION_DENIED,
      { file },
      error instanceof Error ? error : undefined
    );
  }
  logger.debug('Transcript saved', { file, sessionId: session.id });
  return file;
}

export function parseTranscript(data: unknown, source = 'transcript'): Transcript {
  const result = TranscriptSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ValidationError(
      `Invalid transcript ${source}: ${issues}`,
      ErrorCode.VALIDATION_FAILED,
      { source }
    );
  }
  return result.data;
}

export function loadTranscript(file: string): Transcript {
  if (!fs.existsSync(file)) {
    throw new SystemError(
      `Transcript not found: ${file}`,
      ErrorCode.FILE_NOT_FOUND,
      { file }
    );
  }

  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (error: unknown) {
    throw new ValidationError(
      `Transcript ${file} is not valid JSON`,
      ErrorCode.VALIDATION_FAILED,
      { file, cause: error instanceof Error ? error.message : String(error) }
    );
  }
  return parseTranscript(data, file);
}
