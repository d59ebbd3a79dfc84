export interface RenameRecord {
  from: string;
  to: string;
}

export interface DiffSummary {
  added: string[];
  modified: string[];
  deleted: string[];
  renamed: RenameRecord[];
}

/** base 대 워킹 트리, 또는 base..head 커밋 범위 */
export type DiffTarget =
  | { kind: 'worktree'; base: string }
  | { kind: 'commits'; base: string; head: string };

export type GitResult =
  | { ok: true; output: string }
  | { ok: false; error: string };

export type DiffOutcome =
  | { ok: true; summary: DiffSummary; target: DiffTarget }
  | { ok: false; error: string };

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export function formatRename(record: RenameRecord): string {
  return `${record.from} -> ${record.to}`;
}

export function isEmptySummary(summary: DiffSummary): boolean {
  return (
    summary.added.length === 0 &&
    summary.modified.length === 0 &&
    summary.deleted.length === 0 &&
    summary.renamed.length === 0
  );
}
