/**
 * steps 커맨드: @ClassName.register_step 데코레이터로 선언된 업그레이드 스텝 목록
 */
import * as path from 'node:path';
import { Command } from 'commander';
import chalk from 'chalk';
import { scanDecoratorSteps, toUpgradeStepJson } from '@plugin-atlas/discovery';
import { errorMessage, type UpgradeStep } from '@plugin-atlas/shared';
import { createCommandContext } from '../utils/context';

function printSteps(className: string, steps: UpgradeStep[]): void {
  console.log('');
  console.log(chalk.bold(`  ${className}: ${steps.length}개 스텝`));
  console.log('');

  for (const step of steps) {
    const category = chalk.cyan(`[${step.category}]`);
    const priority = chalk.dim(`priority=${step.priority}`);
    console.log(`    ${category} ${step.name} → ${step.targetVersion} ${priority}`);
    console.log(chalk.dim(`       ${step.target.module}.${step.target.name}`));
  }
}

export function createStepsCommand(): Command {
  return new Command('steps')
    .description('데코레이터로 등록된 업그레이드 스텝을 나열합니다')
    .argument('<class-name>', '업그레이더 클래스 이름 (@ClassName.register_step)')
    .option('-r, --root <dir>', '탐색 루트', process.cwd())
    .option('--json', 'manifest 형식 JSON 출력')
    .option('--verbose', 'debug 로그 출력')
    .action((className: string, options: { root: string; json?: boolean; verbose?: boolean }) => {
      const { logger } = createCommandContext('steps', options.verbose);

      try {
        const steps = scanDecoratorSteps(className, path.resolve(options.root), { logger });
        if (options.json) {
          console.log(JSON.stringify(steps.map(toUpgradeStepJson), null, 2));
          return;
        }
        if (steps.length === 0) {
          console.log(chalk.yellow(`@${className}.register_step 데코레이터를 찾지 못했습니다.`));
          return;
        }
        printSteps(className, steps);
      } catch (error) {
        console.error(chalk.red(errorMessage(error)));
        process.exit(1);
      }
    });
}
