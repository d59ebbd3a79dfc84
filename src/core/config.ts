import { isAbsolute, join } from 'node:path';
import type { ConfigFile, ConfigResult, SpecDiffConfig } from '../types/config.js';
import { CONFIG_FILENAME, ConfigFileSchema, DEFAULT_CONFIG } from '../types/config.js';
import { toRepoPath } from '../utils/paths.js';
import { readFileContent } from './file-ops.js';

export interface ConfigOverrides {
  reportPath?: string;
  scope?: string;
}

/**
 * 설정 파일을 읽어 검증합니다. 파일이 없으면 빈 설정.
 * configPath가 상대 경로면 repo 루트 기준입니다.
 */
export function loadConfigFile(
  repoRoot: string,
  configPath: string = CONFIG_FILENAME,
): { ok: true; file: ConfigFile } | { ok: false; error: string } {
  const fullPath = isAbsolute(configPath) ? configPath : join(repoRoot, configPath);
  const content = readFileContent(fullPath);
  if (content === null) return { ok: true, file: {} };

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    return { ok: false, error: `${configPath}: JSON 파싱 실패 (${err instanceof Error ? err.message : String(err)})` };
  }

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    return { ok: false, error: `${configPath}: 설정 형식 오류 (${issues})` };
  }
  return { ok: true, file: parsed.data };
}

/** 우선순위: CLI 옵션 > 설정 파일 > 기본값 */
export function mergeConfig(file: ConfigFile, overrides: ConfigOverrides = {}): SpecDiffConfig {
  return {
    reportPath: overrides.reportPath ?? file.reportPath ?? DEFAULT_CONFIG.reportPath,
    scope: overrides.scope ?? file.scope ?? DEFAULT_CONFIG.scope,
    excludes: [...new Set((file.excludes ?? DEFAULT_CONFIG.excludes).map(toRepoPath))],
  };
}

export function resolveConfig(
  repoRoot: string,
  overrides: ConfigOverrides = {},
  configPath?: string,
): ConfigResult {
  const loaded = loadConfigFile(repoRoot, configPath);
  if (!loaded.ok) return loaded;
  return { ok: true, config: mergeConfig(loaded.file, overrides) };
}
