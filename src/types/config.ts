import { z } from 'zod';

export interface SpecDiffConfig {
  reportPath: string;
  scope: string;
  excludes: string[];
}

export const DEFAULT_CONFIG: SpecDiffConfig = {
  reportPath: 'sdd/memory-bank/core/spec-diff.md',
  scope: 'sdd/memory-bank',
  // 자주 바뀌는 프로세스/상태 파일 — 스펙 본문 변경만 보이도록 제외
  excludes: [
    'sdd/memory-bank/core/intake-state.md',
    'sdd/memory-bank/core/progress.md',
    'sdd/memory-bank/core/progress-archive.md',
    'sdd/memory-bank/core/sprint-current.md',
    'sdd/memory-bank/core/sprint-plan.md',
    'sdd/memory-bank/core/backlog.md',
    'sdd/memory-bank/core/spec-diff.md', // 리포트 자기 자신
  ],
};

export const CONFIG_FILENAME = 'spec-diff.config.json';

export const ConfigFileSchema = z
  .object({
    reportPath: z.string().min(1).optional(),
    scope: z.string().min(1).optional(),
    excludes: z.array(z.string().min(1)).optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export type ConfigResult =
  | { ok: true; config: SpecDiffConfig }
  | { ok: false; error: string };
