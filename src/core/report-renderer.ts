/**
 * 리포트 엔트리(섹션) 렌더러
 *
 * 엔트리 하나 = `## <timestamp>` 헤더로 시작하는 마크다운 블록.
 * `Head ref:` 줄은 다음 실행의 baseline으로 다시 읽히므로 형식을 바꾸지 않습니다.
 * 모든 엔트리는 정확히 하나의 개행으로 끝납니다.
 */

import type { DiffSummary, DiffTarget } from '../types/common.js';
import { formatRename, isEmptySummary } from '../types/common.js';
import type { GitClient } from '../utils/git.js';

export const HEAD_REF_LABEL = 'Head ref:';

export interface EntryContext {
  timestamp: string;
  baseRef: string;
  headRef: string;
  scope: string;
  includeWorktree: boolean;
}

export interface PatchSource {
  git: GitClient;
  target: DiffTarget;
}

/** UTC `YYYY-MM-DD HH:MM:SSZ` */
export function formatTimestamp(date: Date): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 10)} ${iso.slice(11, 19)}Z`;
}

function renderHeader(ctx: EntryContext): string[] {
  return [
    `## ${ctx.timestamp}`,
    '',
    `Base ref: ${ctx.baseRef}`,
    `${HEAD_REF_LABEL} ${ctx.headRef}`,
    `Scope: ${ctx.scope}`,
    `Includes worktree: ${ctx.includeWorktree ? 'yes' : 'no'}`,
  ];
}

function finish(lines: string[]): string {
  return lines.join('\n').trimEnd() + '\n';
}

export function renderBaselineEntry(timestamp: string, headRef: string, scope: string): string {
  return finish([
    ...renderHeader({ timestamp, baseRef: headRef, headRef, scope, includeWorktree: false }),
    '',
    '### Summary',
    '- Baseline initialized (no diff).',
  ]);
}

export function renderNoChangesEntry(ctx: EntryContext): string {
  return finish([...renderHeader(ctx), '', '### Summary', '- No changes detected in scope.']);
}

/**
 * 변경 요약 엔트리. 요약이 비어 있으면 "no changes" 변형을 돌려줍니다.
 * patch가 주어지면 added → modified → deleted 순으로 파일별 diff를 붙입니다 (rename 제외).
 */
export function renderEntry(
  ctx: EntryContext,
  summary: DiffSummary,
  excludes: Iterable<string>,
  patch?: PatchSource,
): string {
  if (isEmptySummary(summary)) {
    return renderNoChangesEntry(ctx);
  }

  const lines = renderHeader(ctx);

  const sortedExcludes = [...excludes].sort();
  if (sortedExcludes.length > 0) {
    lines.push('Excludes:');
    for (const path of sortedExcludes) {
      lines.push(`- \`${path}\``);
    }
  }

  lines.push(
    '',
    '### Summary',
    `- Added: ${summary.added.length}`,
    `- Modified: ${summary.modified.length}`,
    `- Deleted: ${summary.deleted.length}`,
    `- Renamed: ${summary.renamed.length}`,
    '',
  );

  const sections: Array<[string, string[]]> = [
    ['Added', summary.added],
    ['Modified', summary.modified],
    ['Deleted', summary.deleted],
    ['Renamed', summary.renamed.map(formatRename)],
  ];
  for (const [title, items] of sections) {
    if (items.length === 0) continue;
    lines.push(`### ${title}`);
    for (const item of items) {
      lines.push(`- \`${item}\``);
    }
    lines.push('');
  }

  if (patch) {
    lines.push(...renderPatchSection(patch, [...summary.added, ...summary.modified, ...summary.deleted]));
  }

  return finish(lines);
}

export function renderPatchSection(source: PatchSource, paths: string[]): string[] {
  const lines = ['### Patch', ''];
  for (const path of paths) {
    lines.push(`#### \`${path}\``, '', '```diff', renderFilePatch(source, path), '```', '');
  }
  return lines;
}

/** 파일 하나의 diff 실패는 엔트리 전체를 중단시키지 않고 오류 줄로 대체 */
function renderFilePatch(source: PatchSource, path: string): string {
  const result = source.git.fileDiff(source.target, path);
  if (!result.ok) {
    return `Error generating diff for ${path}: ${result.error}`;
  }
  const text = result.output.trimEnd();
  return text || '(no changes)';
}
