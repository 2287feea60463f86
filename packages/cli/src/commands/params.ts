/**
 * params 커맨드: 모듈의 클래스/함수 시그니처에서 파라미터 추출
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { extractCallableParameters, parameterSearchRoots } from '@plugin-atlas/discovery';
import { errorMessage } from '@plugin-atlas/shared';
import { createCommandContext } from '../utils/context';

export function createParamsCommand(): Command {
  return new Command('params')
    .description('callable의 파라미터 시그니처를 출력합니다')
    .argument('<module>', '모듈 경로 (예: my_pkg.parser)')
    .argument('<name>', '클래스 또는 함수 이름')
    .option('-r, --root <dir>', '1순위 탐색 루트', process.cwd())
    .option('--verbose', 'debug 로그 출력')
    .action((module: string, name: string, options: { root: string; verbose?: boolean }) => {
      const { config, logger } = createCommandContext('params', options.verbose);

      try {
        const roots = parameterSearchRoots(options.root, config.virtualEnv);
        const signature = extractCallableParameters(module, name, { roots, logger });
        const entries = Object.entries(signature.parameters);

        if (entries.length === 0) {
          console.log(chalk.yellow(`${module}.${name}: 파라미터 없음 (또는 정의를 찾지 못함)`));
          return;
        }

        console.log(chalk.bold(`${module}.${name}`));
        for (const [paramName, parameter] of entries) {
          const annotation = parameter.annotation ? chalk.cyan(`: ${parameter.annotation}`) : '';
          const defaultValue = parameter.default !== undefined ? chalk.dim(` = ${parameter.default}`) : '';
          const required = parameter.required ? chalk.red(' (required)') : '';
          console.log(`  ${paramName}${annotation}${defaultValue}${required}`);
        }
        if (signature.returnAnnotation) console.log(chalk.dim(`  -> ${signature.returnAnnotation}`));
      } catch (error) {
        console.error(chalk.red(errorMessage(error)));
        process.exit(1);
      }
    });
}
