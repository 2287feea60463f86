// @ClassName.register_step(...) 데코레이터에서 업그레이드 스텝 추출
// 예: @DataUpgrader.register_step(target_version="2.0", upgrade_type=UpgradeType.FILE, priority=30)
import {
    DEFAULT_STEP_PRIORITY,
    DEFAULT_TARGET_VERSION,
    STEP_DECORATOR,
    findMatchingParen,
    silentLogger,
    splitTopLevel,
    unquote,
    type Logger,
    type UpgradeCategory,
    type UpgradeStep,
} from '@plugin-atlas/shared';
import { modulePathFor, moduleBaseFor, readSourceFile, walkSourceFiles } from './file-walker';

const DEF_REGEX = /(?<![A-Za-z0-9_])def\s+([A-Za-z_][A-Za-z0-9_]*)\s*\(/g;
const INTEGER_REGEX = /^[+-]?\d+$/;

// 점 표현식의 마지막 세그먼트를 대문자로 → 카테고리
export function toUpgradeCategory(value: string): UpgradeCategory {
    const segment = unquote(value.trim()).split('.').pop()?.toUpperCase() ?? '';
    if (segment === 'FILE') return 'File';
    if (segment === 'SYSTEM') return 'System';
    return 'Unknown';
}

// 데코레이터 인자(평탄한 key=value 목록) → 기본값 위에 덮어쓴 스텝
function buildStep(funcName: string, module: string, argsText: string): UpgradeStep {
    const step: UpgradeStep = {
        name: funcName,
        target: { module, name: funcName, type: 'function', parameters: {} },
        targetVersion: DEFAULT_TARGET_VERSION,
        category: 'File',
        priority: DEFAULT_STEP_PRIORITY,
    };

    for (const arg of splitTopLevel(argsText)) {
        const eq = arg.indexOf('=');
        if (eq === -1) continue;
        const key = arg.slice(0, eq).trim();
        const value = arg.slice(eq + 1).trim();

        switch (key) {
            case 'target_version':
                step.targetVersion = unquote(value);
                break;
            case 'upgrade_type':
                step.category = toUpgradeCategory(value);
                break;
            case 'priority':
                if (INTEGER_REGEX.test(value)) step.priority = Number.parseInt(value, 10);
                break;
            case 'min_version':
                step.minVersion = unquote(value);
                break;
            case 'max_version':
                step.maxVersion = unquote(value);
                break;
        }
    }

    return step;
}

/**
 * 파일 하나의 소스에서 스텝 추출 (파일 내 등장 순서)
 * 데코레이터 뒤에 def가 없거나 괄호가 닫히지 않으면 해당 데코레이터는 무시
 */
export function extractStepsFromSource(content: string, className: string, module: string): UpgradeStep[] {
    const prefix = `@${className}.${STEP_DECORATOR}(`;
    const steps: UpgradeStep[] = [];
    let from = 0;

    for (;;) {
        const pos = content.indexOf(prefix, from);
        if (pos === -1) break;
        from = pos + 1;

        const parenStart = pos + prefix.length - 1;
        const parenEnd = findMatchingParen(content, parenStart);
        if (parenEnd === null) continue;

        DEF_REGEX.lastIndex = parenEnd;
        const def = DEF_REGEX.exec(content);
        const funcName = def?.[1];
        if (!funcName) continue;

        steps.push(buildStep(funcName, module, content.slice(parenStart + 1, parenEnd)));
    }

    return steps;
}

export interface DecoratorScanOptions {
    logger?: Logger;
}

/**
 * root 하위 전체 .py 파일에서 className의 스텝 수집
 * 파일 순서는 디렉토리 순회 순서를 따름
 * 찾지 못하면 빈 배열
 */
export function scanDecoratorSteps(
    className: string,
    root: string,
    options: DecoratorScanOptions = {},
): UpgradeStep[] {
    const logger = options.logger ?? silentLogger;
    const base = moduleBaseFor(root);
    const prefix = `@${className}.${STEP_DECORATOR}(`;
    const steps: UpgradeStep[] = [];

    for (const file of walkSourceFiles(root, { logger })) {
        const content = readSourceFile(file, logger);
        if (content === null || !content.includes(prefix)) continue;

        const found = extractStepsFromSource(content, className, modulePathFor(base, file));
        logger.debug(`${found.length} step(s) for ${className} in ${file}`);
        steps.push(...found);
    }

    if (steps.length === 0) logger.debug(`No decorators found for ${className}.steps under ${root}`);
    return steps;
}
