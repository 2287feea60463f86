// 등록 파일 소스 → PackageManifest
// 1. 심볼 테이블  2. 등록 호출 위치  3. 호출별 PluginRecord  4. 파라미터/스텝 보강  5. 이름 중복 제거
import {
    errorMessage,
    isDiscoveryError,
    silentLogger,
    type CallableDescriptor,
    type Logger,
    type PackageManifest,
    type PluginRecord,
    type UpgradeStep,
} from '@plugin-atlas/shared';
import type { CallLocator } from '../locators';
import { buildSymbolTable } from '../resolvers/import-resolver';
import { scanDecoratorSteps } from '../scanners/decorator-steps';
import { SourceFileIndex, extractCallableParameters, type CallableSignature } from '../scanners/parameters';
import { parseRegistration, type ParsedRegistration } from './registration';

export interface AssembleOptions {
    packageName: string;
    locator: CallLocator;
    // 데코레이터 스캔 루트이자 파라미터 탐색 1순위 루트
    searchRoot: string;
    // 파라미터 탐색 루트 전체 (기본: [searchRoot])
    parameterRoots?: string[];
    // 등록 파일 자신의 모듈 경로 (파일 안에서 정의된 클래스도 심볼로 인식)
    localModule?: string;
    resolveParameters?: boolean;
    logger?: Logger;
}

export interface AssembleMetrics {
    registrations: number;
    skipped: number;
    duplicates: number;
}

export interface AssembleResult {
    manifest: PackageManifest;
    metrics: AssembleMetrics;
}

/**
 * @throws NotFoundError 등록 함수가 없거나 등록 호출이 0개
 */
export function assemblePackageManifest(source: string, options: AssembleOptions): AssembleResult {
    const logger = options.logger ?? silentLogger;
    const resolveParameters = options.resolveParameters ?? true;
    const parameterRoots = options.parameterRoots ?? [options.searchRoot];

    const symbols = buildSymbolTable(source, { localModule: options.localModule });
    logger.debug(`${symbols.size} symbol(s) in import table`);

    const calls = options.locator.locate(source);
    logger.debug(`${calls.length} registration call(s) located (${options.locator.strategy})`);

    // 한 번의 추출 안에서만 유지되는 조회 캐시
    const signatures = new Map<string, CallableSignature>();
    const sourceIndex = new SourceFileIndex(logger);
    const stepsByClass = new Map<string, UpgradeStep[]>();

    const enrich = (callable: CallableDescriptor): CallableDescriptor => {
        if (!resolveParameters) return callable;
        const key = `${callable.module}:${callable.name}`;
        let signature = signatures.get(key);
        if (!signature) {
            signature = extractCallableParameters(callable.module, callable.name, {
                roots: parameterRoots,
                index: sourceIndex,
                logger,
            });
            signatures.set(key, signature);
        }
        return {
            ...callable,
            parameters: { ...signature.parameters },
            ...(signature.returnAnnotation !== undefined ? { returnAnnotation: signature.returnAnnotation } : {}),
        };
    };

    const stepsFor = (className: string): UpgradeStep[] => {
        let steps = stepsByClass.get(className);
        if (!steps) {
            steps = scanDecoratorSteps(className, options.searchRoot, { logger });
            if (steps.length === 0) logger.warn(`No @${className}.register_step decorators found`);
            stepsByClass.set(className, steps);
        }
        return steps;
    };

    const plugins: PluginRecord[] = [];
    const seen = new Set<string>();
    let skipped = 0;
    let duplicates = 0;

    for (const call of calls) {
        let parsed: ParsedRegistration;
        try {
            parsed = parseRegistration(call, symbols, logger);
        } catch (error) {
            if (!isDiscoveryError(error)) throw error;
            skipped++;
            logger.warn(`Skipping registration (${error.kind}): ${errorMessage(error)}`);
            continue;
        }

        const { record, pendingStepsClass } = parsed;
        if (seen.has(record.name)) {
            duplicates++;
            logger.warn(`Duplicate plugin name '${record.name}' ignored (first registration wins)`);
            continue;
        }
        seen.add(record.name);

        const plugin: PluginRecord = { ...record, obj: enrich(record.obj) };
        if (record.config) plugin.config = enrich(record.config);
        if (pendingStepsClass) plugin.upgradeSteps = stepsFor(pendingStepsClass).map((step) => ({ ...step }));

        plugins.push(plugin);
    }

    return {
        manifest: { name: options.packageName, plugins, metadata: {} },
        metrics: { registrations: calls.length, skipped, duplicates },
    };
}
