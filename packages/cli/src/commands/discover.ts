/**
 * discover 커맨드: 패키지 디렉토리의 등록 파일에서 plugin manifest 추출
 *
 * 결과 JSON은 stdout(또는 --output 파일), 진행 상황과 로그는 stderr
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { discoverPackage, initTreeSitterParsers, toManifestJson } from '@plugin-atlas/discovery';
import { LOCATOR_STRATEGIES, errorMessage, type LocatorStrategy } from '@plugin-atlas/shared';
import { createCommandContext } from '../utils/context';

interface DiscoverCommandOptions {
  name?: string;
  root?: string;
  venv?: string;
  pkgVersion?: string;
  strategy?: string;
  params: boolean;
  pretty?: boolean;
  output?: string;
  verbose?: boolean;
}

function parseStrategy(value: string | undefined, fallback: LocatorStrategy): LocatorStrategy {
  if (value === undefined) return fallback;
  const strategy = LOCATOR_STRATEGIES.find((candidate) => candidate === value.toLowerCase());
  if (!strategy) {
    throw new Error(`--strategy must be one of ${LOCATOR_STRATEGIES.join(', ')} (got '${value}')`);
  }
  return strategy;
}

export function createDiscoverCommand(): Command {
  return new Command('discover')
    .description('등록 파일을 실행하지 않고 plugin manifest JSON을 추출합니다')
    .argument('<package-path>', '패키지 디렉토리 (plugins.py / plugin.py 탐색)')
    .option('-n, --name <name>', 'manifest 패키지 이름 (기본: 디렉토리 이름)')
    .option('-r, --root <dir>', '데코레이터/파라미터 탐색 루트 (기본: 패키지 디렉토리)')
    .option('--venv <dir>', '가상환경 경로 (기본: VIRTUAL_ENV)')
    .option('--pkg-version <version>', 'dist-info 조회에 쓸 설치 버전')
    .option('-s, --strategy <strategy>', `호출 탐색 전략 (${LOCATOR_STRATEGIES.join('|')})`)
    .option('--no-params', '파라미터 시그니처 추출 생략')
    .option('--pretty', '들여쓰기된 JSON 출력')
    .option('-o, --output <file>', '결과를 파일로 저장')
    .option('--verbose', 'debug 로그 출력')
    .action(async (packagePath: string, options: DiscoverCommandOptions) => {
      const { config, logger } = createCommandContext('discover', options.verbose);
      const spinner = ora({ text: '파서 초기화 중...', stream: process.stderr }).start();

      try {
        const strategy = parseStrategy(options.strategy, config.strategy);
        if (strategy !== 'text') {
          const failures = await initTreeSitterParsers();
          for (const failure of failures) logger.warn(`Python grammar unavailable: ${failure}`);
        }

        spinner.text = `${path.resolve(packagePath)} 분석 중...`;
        const { manifest, metrics } = discoverPackage(packagePath, {
          packageName: options.name,
          searchRoot: options.root,
          version: options.pkgVersion,
          virtualEnv: options.venv ?? config.virtualEnv,
          strategy,
          entryPointGroup: config.entryPointGroup,
          registerFunction: config.registerFunction,
          resolveParameters: options.params,
          logger,
        });

        const json = JSON.stringify(toManifestJson(manifest), null, options.pretty ? 2 : undefined);
        spinner.succeed(
          chalk.green(`${metrics.plugins}개 플러그인 추출 완료`) +
            chalk.dim(` (${path.basename(metrics.entryFile)}, ${metrics.strategy}, ${metrics.durationMs}ms)`),
        );
        if (metrics.skipped > 0) console.error(chalk.yellow(`  스킵된 등록: ${metrics.skipped}개`));
        if (metrics.duplicates > 0) console.error(chalk.yellow(`  중복 이름: ${metrics.duplicates}개`));

        if (options.output) {
          const outputPath = path.resolve(options.output);
          fs.mkdirSync(path.dirname(outputPath), { recursive: true });
          fs.writeFileSync(outputPath, `${json}\n`, 'utf8');
          console.error(chalk.dim(`  저장: ${outputPath}`));
        } else {
          process.stdout.write(`${json}\n`);
        }
      } catch (error) {
        spinner.fail(chalk.red('추출 실패'));
        console.error(chalk.red(errorMessage(error)));
        process.exit(1);
      }
    });
}
