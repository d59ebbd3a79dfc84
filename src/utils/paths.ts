import { resolve, relative, isAbsolute, dirname, posix, sep } from 'node:path';
import { fileURLToPath } from 'node:url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export function getPackageRoot(): string {
  // src/utils 또는 dist/utils에서 두 단계 위
  return resolve(__dirname, '..', '..');
}

/** repo 기준 상대 경로를 `/` 구분자로 정규화 (`./` 접두, 끝 `/` 제거) */
export function toRepoPath(path: string): string {
  const normalized = posix.normalize(path.split(sep).join('/'));
  return normalized.replace(/^\.\//, '').replace(/\/+$/, '') || '.';
}

/**
 * scope를 repo 상대 경로로 바꿉니다.
 * 절대 경로가 repo 밖이면 null.
 */
export function resolveScope(repoRoot: string, scope: string): string | null {
  if (!isAbsolute(scope)) {
    const rel = toRepoPath(scope);
    return rel === '..' || rel.startsWith('../') ? null : rel;
  }
  const rel = relative(resolve(repoRoot), resolve(scope));
  if (rel === '..' || rel.startsWith('..' + sep) || isAbsolute(rel)) return null;
  return rel ? toRepoPath(rel) : '.';
}
