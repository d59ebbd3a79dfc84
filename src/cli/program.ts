import { Command, CommanderError } from 'commander';
import type { OutputConfiguration } from 'commander';
import { getPackageVersion } from '../utils/version.js';
import { specDiffCommand } from './spec-diff.js';
import type { SpecDiffOptions } from './spec-diff.js';
import { EXIT_OK, EXIT_USAGE } from '../types/common.js';

export type CommandRunner = (options: SpecDiffOptions) => number;

export interface RunCliOptions {
  /** 'node'면 argv[0..1]을 건너뜀 (process.argv), 'user'면 인자만 */
  from?: 'node' | 'user';
  run?: CommandRunner;
  output?: OutputConfiguration;
}

export function createProgram(action: (options: SpecDiffOptions) => void): Command {
  return new Command()
    .name('spec-diff')
    .description('스코프 디렉토리의 git 변경 내역을 마크다운 리포트에 누적 기록')
    .version(getPackageVersion())
    .option('--init', '현재 HEAD를 baseline으로 기록 (diff 없음)')
    .option('--update', '마지막 baseline 이후 변경 내역을 리포트에 추가')
    .option('--report <path>', '리포트 파일 경로 (repo 루트 기준)')
    .option('--scope <path>', 'diff 대상 디렉토리')
    .option('--base <ref>', '비교 기준 git ref (기본: 리포트의 마지막 Head ref)')
    .option('--no-worktree', '커밋만 비교 (base..HEAD), 커밋되지 않은 변경 무시')
    .option('--patch', '파일별 diff 패치를 리포트에 포함')
    .option('--stdout', '리포트에 쓰지 않고 엔트리를 stdout으로 출력')
    .option('--repo <path>', '레포지토리 내부 경로 (기본: 현재 디렉토리)')
    .option('--config <path>', '설정 파일 경로 (기본: spec-diff.config.json)')
    .exitOverride()
    .action((options: SpecDiffOptions) => {
      action(options);
    });
}

/** argv를 파싱해 명령을 실행하고 종료 코드를 돌려줍니다 */
export function runCli(argv: string[], options: RunCliOptions = {}): number {
  const run = options.run ?? specDiffCommand;
  let exitCode: number = EXIT_OK;
  const program = createProgram(parsed => {
    exitCode = run(parsed);
  });
  if (options.output) {
    program.configureOutput(options.output);
  }

  try {
    program.parse(argv, { from: options.from ?? 'node' });
  } catch (err) {
    if (!(err instanceof CommanderError)) throw err;
    // --help / --version은 0, 나머지 파싱 오류는 사용법 오류
    return err.exitCode === 0 ? EXIT_OK : EXIT_USAGE;
  }
  return exitCode;
}
