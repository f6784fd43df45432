/**
 * Show command for crosscheck CLI
 * Replays a saved session transcript
 */

import { Command } from 'commander';
import chalk from 'chalk';
import {
  loadTranscript,
  type Transcript,
} from '../../orchestrators/feedback-loop/transcript.js';
import {
  getErrorMessage,
  getUserFriendlyMessage,
  isCrosscheckError,
} from '../../core/errors/index.js';

const PREVIEW_CHARS = 80;

export function preview(text: string): string {
  const firstLine =
    text
      .split('\n')
      .map((line) => line.trim())
      .find((line) => line.length > 0) ?? '';
  return firstLine.length > PREVIEW_CHARS
    ? `${firstLine.slice(0, PREVIEW_CHARS - 3)}...`
    : firstLine;
}

function lineCount(text: string): number {
  return text.length === 0 ? 0 : text.split('\n').length;
}

/**
 * Plain summary lines for a transcript, one cycle at a time
 */
export function summarizeTranscript(transcript: Transcript): string[] {
  const { config } = transcript;
  const lines = [
    `Session:  ${transcript.id} (${transcript.status})`,
    `Task:     ${transcript.task}`,
    `Roles:    creator=${config.creator} reviewer=${config.reviewer} critic=${config.critic}`,
    `Cycles:   ${transcript.iterations.length}/${config.iterations}`,
    `Started:  ${transcript.started_at}`,
    `Finished: ${transcript.completed_at ?? '-'}`,
  ];
  if (transcript.workspace_path) {
    lines.push(`Workspace: ${transcript.workspace_path}`);
  }
  if (transcript.initial_code !== null) {
    lines.push('', `Initial code: ${lineCount(transcript.initial_code)} lines`);
  }
  for (const cycle of transcript.iterations) {
    lines.push(
      '',
      `Cycle ${cycle.number}`,
      `  Review:   ${preview(cycle.review)}`,
      `  Critique: ${preview(cycle.critique)}`,
      `  Revision: ${lineCount(cycle.revision)} lines`
    );
  }
  if (transcript.failure) {
    const { failure } = transcript;
    lines.push(
      '',
      `Stopped at ${failure.cycle === 0 ? 'phase 0' : `cycle ${failure.cycle}`} (${failure.phase}), ${failure.role} on ${failure.tool}: ${failure.code}`,
      `  ${failure.message}`
    );
  }
  return lines;
}

export function createShowCommand(): Command {
  return new Command('show')
    .description('Show a saved session transcript')
    .argument('<transcript>', 'Path to a transcript JSON file')
    .option('--code', 'Print only the final code')
    .option('--json', 'Print the validated transcript as JSON', false)
    .action((file: string, options: { code?: boolean; json: boolean }) => {
      try {
        const transcript = loadTranscript(file);

        if (options.code) {
          if (transcript.final_code === null) {
            console.error(chalk.yellow('This session produced no code.'));
            process.exitCode = 1;
            return;
          }
          console.log(transcript.final_code);
          return;
        }
        if (options.json) {
          console.log(JSON.stringify(transcript, null, 2));
          return;
        }
        for (const line of summarizeTranscript(transcript)) {
          console.log(line);
        }
      } catch (error: unknown) {
        console.error(chalk.red(`Error: ${getErrorMessage(error)}`));
        if (isCrosscheckError(error)) {
          console.error(chalk.dim(getUserFriendlyMessage(error.code)));
        }
        process.exitCode = 1;
      }
    });
}
