import { describe, it, expect, vi, beforeEach } from 'vitest';
import { execFileSync } from 'child_process';
import {
  checkAvailability,
  missingTools,
  requiredTools,
  whichBinary,
} from '../availability.js';

vi.mock('child_process', async () => {
  const actual =
    await vi.importActual<typeof import('child_process')>('child_process');
  return {
    ...actual,
    execFileSync: vi.fn(),
  };
});

describe('availability', () => {
  beforeEach(() => {
    vi.mocked(execFileSync).mockReset();
  });

  describe('whichBinary', () => {
    it('returns the resolved path', () => {
      vi.mocked(execFileSync).mockReturnValue('/usr/local/bin/codex\n');

      expect(whichBinary('codex')).toBe('/usr/local/bin/codex');
      expect(execFileSync).toHaveBeenCalledWith(
        'which',
        ['codex'],
        expect.objectContaining({ encoding: 'utf8' })
      );
    });

    it('returns null when which fails', () => {
      vi.mocked(execFileSync).mockImplementation(() => {
        throw new Error('exit 1');
      });

      expect(whichBinary('gemini')).toBeNull();
    });
  });

  describe('requiredTools', () => {
    it('deduplicates tools shared between roles', () => {
      expect(
        requiredTools({ creator: 'claude', reviewer: 'claude', critic: 'gemini' })
      ).toEqual(['claude', 'gemini']);
    });
  });

  describe('checkAvailability', () => {
    it('reports found and missing tools with install hints', () => {
      const locate = vi.fn((binary: string) =>
        binary === 'claude' ? '/usr/bin/claude' : null
      );

      const results = checkAvailability(['claude', 'openai'], { locate });

      expect(results).toEqual([
        {
          key: 'claude',
          binary: 'claude',
          displayName: 'Claude Code CLI',
          installHint: 'npm install -g @anthropic-ai/claude-code',
          path: '/usr/bin/claude',
        },
        {
          key: 'openai',
          binary: 'codex',
          displayName: 'OpenAI Codex CLI',
          installHint: 'npm install -g @openai/codex',
          path: null,
        },
      ]);
      expect(missingTools(results).map((r) => r.key)).toEqual(['openai']);
    });

    it('checks overridden binaries', () => {
      const locate = vi.fn(() => '/opt/gemini-dev');

      const [result] = checkAvailability(['gemini'], {
        locate,
        binaries: { gemini: 'gemini-dev' },
      });

      expect(locate).toHaveBeenCalledWith('gemini-dev');
      expect(result?.binary).toBe('gemini-dev');
    });
  });
});
