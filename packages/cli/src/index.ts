#!/usr/bin/env node
/**
 * plugin-atlas CLI 메인 진입점
 * Commander.js 기반 CLI 구성
 */
import * as path from 'node:path';
import { Command } from 'commander';
import chalk from 'chalk';
import dotenv from 'dotenv';
import { createDiscoverCommand } from './commands/discover';
import { createStepsCommand } from './commands/steps';
import { createParamsCommand } from './commands/params';

// .env.local → .env 순서로 로드 (먼저 설정된 값 우선)
dotenv.config({ path: path.resolve(process.cwd(), '.env.local') });
dotenv.config({ path: path.resolve(process.cwd(), '.env') });

const program = new Command();

program
  .name('plugin-atlas')
  .description(
    chalk.bold('Plugin Atlas') +
      ': Python 플러그인 등록 파일 정적 분석기\n' +
      chalk.dim('코드를 실행하지 않고 plugin manifest를 추출합니다.'),
  )
  .version('0.1.0', '-v, --version', '버전 출력');

// 커맨드 등록
program.addCommand(createDiscoverCommand());
program.addCommand(createStepsCommand());
program.addCommand(createParamsCommand());

// 알 수 없는 커맨드 처리
program.on('command:*', (operands: string[]) => {
  console.error(chalk.red(`알 수 없는 커맨드: ${operands.join(' ')}`));
  console.log(chalk.dim('plugin-atlas --help 를 실행하여 사용법을 확인하세요.'));
  process.exit(1);
});

// 커맨드 없이 실행 시 help 출력
if (process.argv.length <= 2) {
  program.help();
}

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red(error instanceof Error ? error.message : String(error)));
  process.exit(1);
});
