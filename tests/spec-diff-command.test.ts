import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, mkdirSync, writeFileSync, readFileSync, existsSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { specDiffCommand } from '../src/cli/spec-diff.js';
import type { SpecDiffDeps } from '../src/cli/spec-diff.js';
import { CONFIG_FILENAME } from '../src/types/config.js';
import { logger } from '../src/utils/logger.js';
import { FakeGitClient } from './helpers/fake-git.js';

const REPORT = 'sdd/memory-bank/core/spec-diff.md';

describe('spec-diff command', () => {
  let testDir: string;
  let git: FakeGitClient;
  let stdout: string[];
  let logs: string[];
  let restoreSink: (line: string) => void;
  let deps: SpecDiffDeps;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'spec-diff-cmd-test-'));
    mkdirSync(join(testDir, '.git'));
    git = new FakeGitClient();
    git.head = { ok: true, output: 'aaa111' };
    stdout = [];
    logs = [];
    restoreSink = logger.setSink(line => logs.push(line));
    deps = {
      createGit: () => git,
      findRepoRoot: cwd => cwd,
      writeStdout: text => stdout.push(text),
      now: () => new Date(Date.UTC(2026, 4, 6, 7, 8, 9)),
    };
  });

  afterEach(() => {
    logger.setSink(restoreSink);
    rmSync(testDir, { recursive: true, force: true });
  });

  const reportText = (): string => readFileSync(join(testDir, REPORT), 'utf-8');

  describe('mode selection', () => {
    it('should fail with exit 2 when no mode is given', () => {
      expect(specDiffCommand({ repo: testDir }, deps)).toBe(2);
      expect(existsSync(join(testDir, REPORT))).toBe(false);
      expect(git.calls).toEqual([]);
    });

    it('should fail with exit 2 when both modes are given', () => {
      expect(specDiffCommand({ repo: testDir, init: true, update: true }, deps)).toBe(2);
      expect(existsSync(join(testDir, REPORT))).toBe(false);
    });
  });

  describe('preconditions', () => {
    it('should fail with exit 2 without a .git marker', () => {
      rmSync(join(testDir, '.git'), { recursive: true });

      expect(specDiffCommand({ repo: testDir, init: true }, deps)).toBe(2);
      expect(existsSync(join(testDir, REPORT))).toBe(false);
    });

    it('should fail with exit 2 when the scope is outside the repo', () => {
      expect(specDiffCommand({ repo: testDir, init: true, scope: tmpdir() }, deps)).toBe(2);
      expect(existsSync(join(testDir, REPORT))).toBe(false);
    });

    it('should fail with exit 2 on an invalid config file', () => {
      writeFileSync(join(testDir, CONFIG_FILENAME), JSON.stringify({ excludes: 'nope' }));

      expect(specDiffCommand({ repo: testDir, init: true }, deps)).toBe(2);
    });

    it('should fail with exit 2 when update has no baseline', () => {
      expect(specDiffCommand({ repo: testDir, update: true }, deps)).toBe(2);
      expect(existsSync(join(testDir, REPORT))).toBe(false);
      expect(logs.some(line => line.includes('--base <git-ref>'))).toBe(true);
    });

    it('should fail with exit 1 when HEAD cannot be resolved', () => {
      git.head = { ok: false, error: 'fatal: ambiguous argument HEAD' };

      expect(specDiffCommand({ repo: testDir, init: true }, deps)).toBe(1);
      expect(existsSync(join(testDir, REPORT))).toBe(false);
    });
  });

  describe('--init', () => {
    it('should create the report with a header and a baseline entry', () => {
      expect(specDiffCommand({ repo: testDir, init: true }, deps)).toBe(0);

      expect(reportText()).toBe(
        [
          '# Spec Diff Report',
          '',
          '> This file is generated/updated by `spec-diff`.',
          '',
          '## 2026-05-06 07:08:09Z',
          '',
          'Base ref: aaa111',
          'Head ref: aaa111',
          'Scope: sdd/memory-bank',
          'Includes worktree: no',
          '',
          '### Summary',
          '- Baseline initialized (no diff).',
          '',
        ].join('\n'),
      );
      expect(git.calls).toEqual(['rev-parse HEAD']);
    });

    it('should append a new baseline entry on every call', () => {
      specDiffCommand({ repo: testDir, init: true }, deps);
      git.head = { ok: true, output: 'bbb222' };
      specDiffCommand({ repo: testDir, init: true }, deps);

      const text = reportText();
      expect(text.match(/Baseline initialized/g)).toHaveLength(2);
      expect(text.endsWith('Head ref: bbb222\nScope: sdd/memory-bank\nIncludes worktree: no\n\n### Summary\n- Baseline initialized (no diff).\n')).toBe(true);
    });

    it('should print to stdout without touching the report', () => {
      expect(specDiffCommand({ repo: testDir, init: true, stdout: true }, deps)).toBe(0);

      expect(stdout).toHaveLength(1);
      expect(stdout[0].startsWith('## 2026-05-06 07:08:09Z\n')).toBe(true);
      expect(existsSync(join(testDir, REPORT))).toBe(false);
    });
  });

  describe('--update', () => {
    it('should report no changes right after init with base equal to the recorded head', () => {
      specDiffCommand({ repo: testDir, init: true }, deps);

      expect(specDiffCommand({ repo: testDir, update: true }, deps)).toBe(0);

      const text = reportText();
      const lastEntry = text.slice(text.lastIndexOf('## 2026'));
      expect(lastEntry).toBe(
        [
          '## 2026-05-06 07:08:09Z',
          '',
          'Base ref: aaa111',
          'Head ref: aaa111',
          'Scope: sdd/memory-bank',
          'Includes worktree: yes',
          '',
          '### Summary',
          '- No changes detected in scope.',
          '',
        ].join('\n'),
      );
      expect(git.calls).toContain('diff --name-status aaa111 -- sdd/memory-bank');
    });

    it('should use the most recent Head ref as the baseline', () => {
      specDiffCommand({ repo: testDir, init: true }, deps);
      git.head = { ok: true, output: 'bbb222' };
      specDiffCommand({ repo: testDir, init: true }, deps);
      git.head = { ok: true, output: 'ccc333' };
      git.calls.length = 0;

      specDiffCommand({ repo: testDir, update: true, worktree: false }, deps);

      expect(git.calls).toEqual([
        'rev-parse HEAD',
        'rev-parse HEAD',
        'diff --name-status bbb222..ccc333 -- sdd/memory-bank',
      ]);
    });

    it('should prefer an explicit --base', () => {
      specDiffCommand({ repo: testDir, init: true }, deps);
      git.calls.length = 0;

      specDiffCommand({ repo: testDir, update: true, base: 'v1.0', stdout: true }, deps);

      expect(git.calls).toContain('diff --name-status v1.0 -- sdd/memory-bank');
      expect(stdout[0]).toContain('Base ref: v1.0\n');
    });

    it('should filter default exclusions and list changes', () => {
      git.nameStatus = {
        ok: true,
        output: 'M\tsdd/memory-bank/core/progress.md\nA\tsdd/memory-bank/spec/api.md\n',
      };

      expect(specDiffCommand({ repo: testDir, update: true, base: 'aaa000' }, deps)).toBe(0);

      const text = reportText();
      expect(text).toContain('### Added\n- `sdd/memory-bank/spec/api.md`\n');
      expect(text).toContain('- Modified: 0\n');
      expect(text).toContain('Excludes:\n- `sdd/memory-bank/core/backlog.md`\n');
      expect(text).not.toContain('### Modified');
    });

    it('should embed patches when requested', () => {
      git.nameStatus = { ok: true, output: 'M\tsdd/memory-bank/spec/api.md\n' };
      git.patches = { 'sdd/memory-bank/spec/api.md': { ok: true, output: '-old\n+new\n' } };

      specDiffCommand({ repo: testDir, update: true, base: 'aaa000', patch: true, stdout: true }, deps);

      expect(stdout[0]).toContain('#### `sdd/memory-bank/spec/api.md`\n\n```diff\n-old\n+new\n```\n');
    });

    it('should fail with exit 1 and write nothing when the diff fails', () => {
      git.nameStatus = { ok: false, error: "fatal: bad revision 'zzz'" };

      expect(specDiffCommand({ repo: testDir, update: true, base: 'zzz' }, deps)).toBe(1);
      expect(existsSync(join(testDir, REPORT))).toBe(false);
      expect(logs.some(line => line.includes("fatal: bad revision 'zzz'"))).toBe(true);
    });

    it('should honour the report and scope from the config file', () => {
      writeFileSync(
        join(testDir, CONFIG_FILENAME),
        JSON.stringify({ reportPath: 'docs/changes.md', scope: 'docs', excludes: [] }),
      );
      git.nameStatus = { ok: true, output: 'D\tdocs/gone.md\n' };

      expect(specDiffCommand({ repo: testDir, update: true, base: 'aaa000' }, deps)).toBe(0);

      const text = readFileSync(join(testDir, 'docs', 'changes.md'), 'utf-8');
      expect(text).toContain('Scope: docs\n');
      expect(text).toContain('### Deleted\n- `docs/gone.md`\n');
      expect(text).not.toContain('Excludes:');
    });
  });
});
