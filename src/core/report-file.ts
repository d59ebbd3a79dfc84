import { existsSync } from 'node:fs';
import { dirname } from 'node:path';
import { ensureDir, readFileContent, safeWriteFile } from './file-ops.js';
import { HEAD_REF_LABEL } from './report-renderer.js';

export const REPORT_HEADER =
  '# Spec Diff Report\n\n' +
  '> This file is generated/updated by `spec-diff`.\n\n';

export function loadReportText(reportPath: string): string {
  return readFileContent(reportPath) ?? '';
}

/** 상위 디렉토리 보장 + 파일이 없으면 헤더로 생성. 생성했으면 true */
export function ensureReportExists(reportPath: string): boolean {
  ensureDir(dirname(reportPath));
  if (existsSync(reportPath)) return false;
  safeWriteFile(reportPath, REPORT_HEADER);
  return true;
}

/**
 * 엔트리를 리포트 끝에 붙입니다.
 * 기존 내용의 끝 공백을 정리하고 빈 줄 하나를 둔 뒤 엔트리를 이어 파일 전체를 다시 씁니다.
 */
export function appendReportEntry(reportPath: string, entry: string): { created: boolean } {
  const created = ensureReportExists(reportPath);
  const current = loadReportText(reportPath).trimEnd();
  safeWriteFile(reportPath, `${current}\n\n${entry}`);
  return { created };
}

/** 파일 순서상 마지막 `Head ref:` 값 (append-only이므로 = 가장 최근) */
export function parseLastHeadRef(reportText: string): string | null {
  let last: string | null = null;
  for (const line of reportText.split(/\r?\n/)) {
    if (!line.startsWith(HEAD_REF_LABEL)) continue;
    const value = line.slice(line.indexOf(':') + 1).trim();
    if (value) last = value;
  }
  return last;
}
