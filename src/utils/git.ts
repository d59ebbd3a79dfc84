import { execFileSync } from 'node:child_process';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import type { DiffTarget, GitResult } from '../types/common.js';

/**
 * spec-diff가 사용하는 git 기능의 최소 인터페이스.
 * 테스트에서는 고정 출력을 돌려주는 가짜 구현으로 대체합니다.
 */
export interface GitClient {
  resolveHead(): GitResult;
  nameStatusDiff(target: DiffTarget, scope: string): GitResult;
  fileDiff(target: DiffTarget, path: string): GitResult;
}

const MAX_BUFFER = 64 * 1024 * 1024;

export function hasGitMarker(repoRoot: string): boolean {
  return existsSync(join(repoRoot, '.git'));
}

export function getGitRoot(cwd: string): string | null {
  const result = runGit(cwd, ['rev-parse', '--show-toplevel']);
  return result.ok ? result.output.trim() : null;
}

/** `git diff`에 넘길 범위 인자 */
export function targetArgs(target: DiffTarget): string[] {
  return target.kind === 'worktree' ? [target.base] : [`${target.base}..${target.head}`];
}

export function runGit(cwd: string, args: string[]): GitResult {
  try {
    const output = execFileSync('git', ['-c', 'core.quotePath=false', ...args], {
      cwd,
      encoding: 'utf-8',
      stdio: 'pipe',
      maxBuffer: MAX_BUFFER,
    });
    return { ok: true, output };
  } catch (err) {
    return { ok: false, error: describeGitError(err, args) };
  }
}

export function describeGitError(err: unknown, args: string[]): string {
  if (typeof err === 'object' && err !== null && 'stderr' in err) {
    const stderr = String(err.stderr ?? '').trim();
    if (stderr) return stderr;
  }
  if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
    return 'git 실행 파일을 찾을 수 없습니다';
  }
  return `git ${args.join(' ')} failed`;
}

export function createGitClient(repoRoot: string): GitClient {
  return {
    resolveHead() {
      const result = runGit(repoRoot, ['rev-parse', 'HEAD']);
      return result.ok ? { ok: true, output: result.output.trim() } : result;
    },
    nameStatusDiff(target, scope) {
      return runGit(repoRoot, ['diff', '--name-status', ...targetArgs(target), '--', scope]);
    },
    fileDiff(target, path) {
      return runGit(repoRoot, ['diff', ...targetArgs(target), '--', path]);
    },
  };
}
