import { relative, resolve } from 'node:path';
import { resolveConfig } from '../core/config.js';
import { computeDiffSummary } from '../core/diff-engine.js';
import { appendReportEntry, loadReportText, parseLastHeadRef } from '../core/report-file.js';
import { formatTimestamp, renderBaselineEntry, renderEntry } from '../core/report-renderer.js';
import type { DiffSummary } from '../types/common.js';
import { EXIT_FAILURE, EXIT_OK, EXIT_USAGE } from '../types/common.js';
import type { GitClient } from '../utils/git.js';
import { createGitClient, getGitRoot, hasGitMarker } from '../utils/git.js';
import { logger } from '../utils/logger.js';
import { resolveScope, toRepoPath } from '../utils/paths.js';

export interface SpecDiffOptions {
  init?: boolean;
  update?: boolean;
  report?: string;
  scope?: string;
  base?: string;
  /** `--no-worktree`면 false */
  worktree?: boolean;
  patch?: boolean;
  stdout?: boolean;
  repo?: string;
  config?: string;
}

export interface SpecDiffDeps {
  createGit: (repoRoot: string) => GitClient;
  findRepoRoot: (cwd: string) => string;
  writeStdout: (text: string) => void;
  now: () => Date;
}

export const defaultDeps: SpecDiffDeps = {
  createGit: createGitClient,
  findRepoRoot: cwd => getGitRoot(cwd) ?? cwd,
  writeStdout: text => {
    process.stdout.write(text);
  },
  now: () => new Date(),
};

interface RunContext {
  repoRoot: string;
  reportPath: string;
  scope: string;
  git: GitClient;
  headRef: string;
  timestamp: string;
}

/** 종료 코드를 돌려줍니다: 0 성공, 1 git 실패, 2 사용법 오류 */
export function specDiffCommand(options: SpecDiffOptions, deps: SpecDiffDeps = defaultDeps): number {
  if (Boolean(options.init) === Boolean(options.update)) {
    logger.error('--init 또는 --update 중 정확히 하나를 선택하세요.');
    return EXIT_USAGE;
  }

  const repoRoot = deps.findRepoRoot(resolve(options.repo ?? process.cwd()));
  if (!hasGitMarker(repoRoot)) {
    logger.error(`git 레포지토리가 아닙니다 (.git 없음): ${repoRoot}`);
    return EXIT_USAGE;
  }

  const resolved = resolveConfig(
    repoRoot,
    { reportPath: options.report, scope: options.scope },
    options.config,
  );
  if (!resolved.ok) {
    logger.error(resolved.error);
    return EXIT_USAGE;
  }
  const { config } = resolved;

  const scope = resolveScope(repoRoot, config.scope);
  if (scope === null) {
    logger.error(`--scope는 레포지토리 내부여야 합니다: ${config.scope}`);
    return EXIT_USAGE;
  }

  const reportPath = resolve(repoRoot, config.reportPath);

  let baseRef: string | null = null;
  if (options.update) {
    baseRef = options.base ?? parseLastHeadRef(loadReportText(reportPath));
    if (!baseRef) {
      logger.error('base ref를 찾을 수 없습니다. 먼저 --init을 실행하거나 --base <git-ref>를 지정하세요.');
      return EXIT_USAGE;
    }
  }

  const git = deps.createGit(repoRoot);
  const head = git.resolveHead();
  if (!head.ok) {
    logger.error(`HEAD 확인 실패: ${head.error}`);
    return EXIT_FAILURE;
  }

  const ctx: RunContext = {
    repoRoot,
    reportPath,
    scope,
    git,
    headRef: head.output,
    timestamp: formatTimestamp(deps.now()),
  };

  if (baseRef === null) {
    const entry = renderBaselineEntry(ctx.timestamp, ctx.headRef, ctx.scope);
    return emit(ctx, entry, options, deps, null);
  }
  return runUpdate(ctx, baseRef, config.excludes, options, deps);
}

function runUpdate(
  ctx: RunContext,
  baseRef: string,
  excludes: string[],
  options: SpecDiffOptions,
  deps: SpecDiffDeps,
): number {
  const includeWorktree = options.worktree !== false;
  const outcome = computeDiffSummary(ctx.git, {
    base: baseRef,
    scope: ctx.scope,
    excludes: new Set(excludes),
    includeWorktree,
  });
  if (!outcome.ok) {
    logger.error(`git diff 실패: ${outcome.error}`);
    return EXIT_FAILURE;
  }

  const entry = renderEntry(
    {
      timestamp: ctx.timestamp,
      baseRef,
      headRef: ctx.headRef,
      scope: ctx.scope,
      includeWorktree,
    },
    outcome.summary,
    excludes,
    options.patch ? { git: ctx.git, target: outcome.target } : undefined,
  );
  return emit(ctx, entry, options, deps, outcome.summary);
}

function emit(
  ctx: RunContext,
  entry: string,
  options: SpecDiffOptions,
  deps: SpecDiffDeps,
  summary: DiffSummary | null,
): number {
  if (options.stdout) {
    deps.writeStdout(entry);
    return EXIT_OK;
  }

  const { created } = appendReportEntry(ctx.reportPath, entry);
  logger.fileAction(created ? 'create' : 'update', toRepoPath(relative(ctx.repoRoot, ctx.reportPath)));

  if (summary === null) {
    logger.ok(`baseline 기록: ${ctx.headRef}`);
  } else {
    logger.table([
      ['Added', String(summary.added.length)],
      ['Modified', String(summary.modified.length)],
      ['Deleted', String(summary.deleted.length)],
      ['Renamed', String(summary.renamed.length)],
    ]);
  }
  return EXIT_OK;
}
