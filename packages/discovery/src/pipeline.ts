// 패키지 디렉토리 → manifest 추출 파이프라인
// 등록 파일 결정 → 소스 읽기 → locator 선택 → manifest 조립
import * as fs from 'node:fs';
import * as path from 'node:path';
import {
    DEFAULT_ENTRY_POINT_GROUP,
    DEFAULT_PLUGINS_KEYWORD,
    DEFAULT_REGISTER_FUNCTION,
    NotFoundError,
    PLUGIN_CONSTRUCTORS,
    errorMessage,
    silentLogger,
    type LocatorStrategy,
    type Logger,
    type PackageManifest,
} from '@plugin-atlas/shared';
import { findEntryFile, type EntryFile } from './entry/entry-file';
import { selectCallLocator } from './locators';
import { assemblePackageManifest, type AssembleMetrics } from './manifest/assembler';
import { getLoadedParser } from './parsers/tree-sitter-loader';
import { parameterSearchRoots } from './scanners/parameters';

export interface DiscoverOptions {
    // manifest name (기본: 패키지 디렉토리 이름)
    packageName?: string;
    // 데코레이터/파라미터 탐색 루트 (기본: 패키지 디렉토리)
    searchRoot?: string;
    version?: string;
    virtualEnv?: string | null;
    strategy?: LocatorStrategy;
    entryPointGroup?: string;
    registerFunction?: string;
    resolveParameters?: boolean;
    logger?: Logger;
}

export interface DiscoveryMetrics extends AssembleMetrics {
    entryFile: string;
    strategy: 'tree' | 'text';
    plugins: number;
    durationMs: number;
}

export interface DiscoveryResult {
    manifest: PackageManifest;
    entryFile: EntryFile;
    metrics: DiscoveryMetrics;
}

/**
 * 패키지 하나의 manifest 추출
 * 호출 전에 initTreeSitterParsers()를 await하면 tree 전략 사용 가능
 * @throws NotFoundError 등록 파일을 찾지 못했거나 읽을 수 없음, 등록 호출이 0개
 */
export function discoverPackage(packagePath: string, options: DiscoverOptions = {}): DiscoveryResult {
    const startedAt = Date.now();
    const logger = options.logger ?? silentLogger;
    const root = path.resolve(packagePath);
    const searchRoot = path.resolve(options.searchRoot ?? root);
    const virtualEnv = options.virtualEnv ?? null;
    const packageName = options.packageName ?? path.basename(root);

    const entryFile = findEntryFile(root, {
        packageName,
        version: options.version,
        virtualEnv,
        entryPointGroup: options.entryPointGroup ?? DEFAULT_ENTRY_POINT_GROUP,
        logger,
    });
    logger.info(`Entry file: ${entryFile.filePath} (${entryFile.source})`);

    let source: string;
    try {
        source = fs.readFileSync(entryFile.filePath, 'utf8');
    } catch (error) {
        throw new NotFoundError(`Failed to read ${entryFile.filePath}: ${errorMessage(error)}`, error);
    }

    const locator = selectCallLocator(
        options.strategy ?? 'auto',
        getLoadedParser('python'),
        {
            functionName: entryFile.functionName ?? options.registerFunction ?? DEFAULT_REGISTER_FUNCTION,
            listKeyword: DEFAULT_PLUGINS_KEYWORD,
            constructors: PLUGIN_CONSTRUCTORS,
        },
        logger,
    );

    const { manifest, metrics } = assemblePackageManifest(source, {
        packageName,
        locator,
        searchRoot,
        parameterRoots: parameterSearchRoots(searchRoot, virtualEnv),
        localModule: entryFile.module,
        resolveParameters: options.resolveParameters ?? true,
        logger,
    });

    const durationMs = Date.now() - startedAt;
    logger.info(
        `${manifest.plugins.length} plugin(s) from ${metrics.registrations} registration(s) ` +
            `[${locator.strategy}] in ${durationMs}ms (skipped=${metrics.skipped}, duplicates=${metrics.duplicates})`,
    );

    return {
        manifest,
        entryFile,
        metrics: {
            ...metrics,
            entryFile: entryFile.filePath,
            strategy: locator.strategy,
            plugins: manifest.plugins.length,
            durationMs,
        },
    };
}
