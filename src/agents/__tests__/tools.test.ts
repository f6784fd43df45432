import { describe, it, expect } from 'vitest';
import {
  DEFAULT_TOOLS,
  buildInvocation,
  claudeTool,
  codexTool,
  geminiTool,
} from '../tools.js';

describe('tool table', () => {
  it('maps tool keys to their binaries', () => {
    expect(DEFAULT_TOOLS.claude.binary).toBe('claude');
    expect(DEFAULT_TOOLS.openai.binary).toBe('codex');
    expect(DEFAULT_TOOLS.gemini.binary).toBe('gemini');
  });

  it('gives the Claude critic read-only tools', () => {
    const critic = buildInvocation(claudeTool, 'critic', 'PROMPT');
    const creator = buildInvocation(claudeTool, 'creator', 'PROMPT');

    expect(critic).toEqual({
      command: 'claude',
      args: [
        '--output-format',
        'json',
        '-p',
        'PROMPT',
        '--allowedTools',
        'Bash,Read,Glob,Grep',
      ],
    });
    expect(creator.args.at(-1)).toBe('Bash,Write,Read,Edit,Glob,Grep,Task');
  });

  it('builds codex exec with JSON events', () => {
    expect(buildInvocation(codexTool, 'reviewer', 'PROMPT')).toEqual({
      command: 'codex',
      args: ['exec', '--json', '--skip-git-repo-check', 'PROMPT'],
    });
  });

  it('auto-approves gemini only for reviewer and critic', () => {
    expect(buildInvocation(geminiTool, 'creator', 'PROMPT').args).toEqual([
      '--output-format',
      'json',
      '-p',
      'PROMPT',
    ]);
    expect(buildInvocation(geminiTool, 'critic', 'PROMPT').args).toEqual([
      '--approval-mode',
      'yolo',
      '--output-format',
      'json',
      '-p',
      'PROMPT',
    ]);
  });

  it('passes the model and binary overrides through', () => {
    expect(
      buildInvocation(codexTool, 'creator', 'PROMPT', {
        model: 'test-model',
        binary: '/opt/bin/codex',
      })
    ).toEqual({
      command: '/opt/bin/codex',
      args: ['-m', 'test-model', 'exec', '--json', '--skip-git-repo-check', 'PROMPT'],
    });
    expect(
      buildInvocation(claudeTool, 'reviewer', 'PROMPT', { model: 'test-model' })
        .args.slice(0, 4)
    ).toEqual(['--output-format', 'json', '--model', 'test-model']);
  });

  it('keeps the prompt as a single argument', () => {
    const prompt = 'line one\nline "two"';
    const { args } = buildInvocation(geminiTool, 'reviewer', prompt);
    expect(args).toContain(prompt);
  });
});
