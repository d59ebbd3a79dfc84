/**
 * CLI 로거
 * stdout은 `--stdout` 엔트리 출력 전용이므로 모든 로그는 stderr로 보냅니다.
 */

import chalk from 'chalk';

export type LogSink = (line: string) => void;

class CliLogger {
  private sink: LogSink = line => {
    process.stderr.write(line + '\n');
  };

  /** 출력 대상 교체 (테스트용). 이전 sink를 돌려줍니다 */
  setSink(sink: LogSink): LogSink {
    const previous = this.sink;
    this.sink = sink;
    return previous;
  }

  ok(msg: string): void {
    this.sink(`${chalk.green('✓')} ${msg}`);
  }

  error(msg: string): void {
    this.sink(`${chalk.red('✗')} ${msg}`);
  }

  table(rows: [string, string][]): void {
    const maxKey = Math.max(...rows.map(([k]) => k.length));
    for (const [key, value] of rows) {
      this.sink(`  ${key.padEnd(maxKey)}  ${value}`);
    }
  }

  fileAction(action: 'create' | 'update', path: string): void {
    const icons: Record<typeof action, string> = {
      create: chalk.green('+'),
      update: chalk.yellow('~'),
    };
    this.sink(`  ${icons[action]} ${path}`);
  }
}

export const logger = new CliLogger();
