import type { DiffOutcome, DiffSummary, DiffTarget, RenameRecord } from '../types/common.js';
import { formatRename } from '../types/common.js';
import type { GitClient } from '../utils/git.js';

export interface DiffRequest {
  base: string;
  scope: string;
  excludes: ReadonlySet<string>;
  includeWorktree: boolean;
}

/**
 * scope 하위에서 base 이후 변경된 파일을 분류합니다.
 * git 실패는 치명적 오류로 그대로 돌려줍니다 (재시도 없음).
 */
export function computeDiffSummary(git: GitClient, request: DiffRequest): DiffOutcome {
  const target = resolveTarget(git, request);
  if (!target.ok) return target;

  const result = git.nameStatusDiff(target.target, request.scope);
  if (!result.ok) return result;

  return {
    ok: true,
    summary: parseNameStatus(result.output, request.excludes),
    target: target.target,
  };
}

export function resolveTarget(
  git: GitClient,
  request: Pick<DiffRequest, 'base' | 'includeWorktree'>,
): { ok: true; target: DiffTarget } | { ok: false; error: string } {
  if (request.includeWorktree) {
    return { ok: true, target: { kind: 'worktree', base: request.base } };
  }
  const head = git.resolveHead();
  if (!head.ok) return head;
  return { ok: true, target: { kind: 'commits', base: request.base, head: head.output } };
}

/**
 * `git diff --name-status` 출력 파싱
 *
 *   M\tpath/to/file.md
 *   A\tpath/to/file.md
 *   D\tpath/to/file.md
 *   R100\told.md\tnew.md
 *
 * A/D 외의 상태(M, T 등)는 모두 modified로 분류합니다.
 */
export function parseNameStatus(output: string, excludes: ReadonlySet<string>): DiffSummary {
  const added: string[] = [];
  const modified: string[] = [];
  const deleted: string[] = [];
  const renamed: RenameRecord[] = [];

  for (const raw of output.split(/\r?\n/)) {
    if (!raw.trim()) continue;

    const [status, ...paths] = raw.split('\t');

    if (status.startsWith('R') && paths.length >= 2) {
      const [from, to] = paths;
      // 한쪽이라도 제외 대상이면 rename 전체를 버림
      if (!excludes.has(from) && !excludes.has(to)) {
        renamed.push({ from, to });
      }
      continue;
    }

    if (paths.length < 1) continue;
    const path = paths[0];
    if (excludes.has(path)) continue;

    if (status === 'A') {
      added.push(path);
    } else if (status === 'D') {
      deleted.push(path);
    } else {
      modified.push(path);
    }
  }

  return {
    added: added.sort(),
    modified: modified.sort(),
    deleted: deleted.sort(),
    renamed: renamed.sort(compareRenames),
  };
}

function compareRenames(a: RenameRecord, b: RenameRecord): number {
  const left = formatRename(a);
  const right = formatRename(b);
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}
