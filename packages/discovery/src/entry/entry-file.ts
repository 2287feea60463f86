/**
 * 등록 파일(plugins.py) 위치 결정
 * 1. 가상환경의 dist-info/entry_points.txt [group] 항목 (설치된 패키지)
 * 2. 패키지 디렉토리의 plugins.py → plugin.py
 * 3. 한 단계 하위 디렉토리의 같은 후보 (src/ 레이아웃)
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import {
    DEFAULT_ENTRY_POINT_GROUP,
    ENTRY_FILE_CANDIDATES,
    IGNORE_DIRS,
    NotFoundError,
    errorMessage,
    silentLogger,
    type Logger,
} from '@plugin-atlas/shared';
import { moduleNameForFile } from '../scanners/file-walker';

export interface EntryPoint {
    name: string;
    module: string;
    attribute?: string;
}

export interface EntryFile {
    filePath: string;
    // 등록 파일의 모듈 경로 (심볼 테이블의 localModule)
    module: string;
    // entry point가 가리키는 등록 함수 이름 (module:attr)
    functionName?: string;
    source: 'entry-points' | 'package-dir';
}

export interface EntryFileOptions {
    packageName?: string;
    version?: string;
    virtualEnv?: string | null;
    entryPointGroup?: string;
    logger?: Logger;
}

/**
 * entry_points.txt 본문에서 group 섹션의 항목 목록
 * `name = module.path:attr` 형식, 주석과 빈 줄은 무시
 */
export function parseEntryPoints(content: string, group: string = DEFAULT_ENTRY_POINT_GROUP): EntryPoint[] {
    const entries: EntryPoint[] = [];
    let inGroup = false;

    for (const rawLine of content.split('\n')) {
        const line = rawLine.trim();
        if (!line || line.startsWith('#') || line.startsWith(';')) continue;

        if (line.startsWith('[')) {
            inGroup = line === `[${group}]`;
            continue;
        }
        if (!inGroup) continue;

        const eq = line.indexOf('=');
        if (eq === -1) continue;

        const name = line.slice(0, eq).trim();
        const target = line.slice(eq + 1).trim();
        const [module = '', attribute] = target.split(':').map((part) => part.trim());
        if (!module) continue;

        entries.push(attribute ? { name, module, attribute } : { name, module });
    }

    return entries;
}

function listDir(dir: string): fs.Dirent[] {
    try {
        return fs.readdirSync(dir, { withFileTypes: true });
    } catch {
        return [];
    }
}

// 배포 이름 정규화: 하이픈/점 → 밑줄, 소문자
function normalizeDistName(name: string): string {
    return name.replace(/[-.]+/g, '_').toLowerCase();
}

// <venv>/lib/python*/site-packages 목록 (Windows 레이아웃 Lib/site-packages 포함)
function sitePackagesDirs(virtualEnv: string): string[] {
    const dirs: string[] = [];
    const lib = path.join(virtualEnv, 'lib');
    for (const entry of listDir(lib)) {
        if (entry.isDirectory() && entry.name.startsWith('python')) {
            dirs.push(path.join(lib, entry.name, 'site-packages'));
        }
    }
    dirs.push(path.join(virtualEnv, 'Lib', 'site-packages'));
    return dirs.filter((dir) => fs.existsSync(dir));
}

function findDistInfo(sitePackages: string, packageName: string, version?: string): string | null {
    const normalized = normalizeDistName(packageName);
    const distInfos = listDir(sitePackages)
        .filter((entry) => entry.isDirectory() && entry.name.endsWith('.dist-info'))
        .map((entry) => entry.name)
        .sort();

    for (const dirName of distInfos) {
        const stem = dirName.slice(0, -'.dist-info'.length);
        const dash = stem.indexOf('-');
        const distName = dash === -1 ? stem : stem.slice(0, dash);
        const distVersion = dash === -1 ? '' : stem.slice(dash + 1);
        if (normalizeDistName(distName) !== normalized) continue;
        if (version && distVersion !== version) continue;
        return path.join(sitePackages, dirName);
    }
    return null;
}

function findViaEntryPoints(
    virtualEnv: string,
    packageName: string,
    version: string | undefined,
    group: string,
    logger: Logger,
): EntryFile | null {
    for (const sitePackages of sitePackagesDirs(virtualEnv)) {
        const distInfo = findDistInfo(sitePackages, packageName, version);
        if (!distInfo) continue;

        const entryPointsFile = path.join(distInfo, 'entry_points.txt');
        let content: string;
        try {
            content = fs.readFileSync(entryPointsFile, 'utf8');
        } catch (error) {
            logger.debug(`No entry points for ${packageName}: ${errorMessage(error)}`);
            continue;
        }

        for (const entry of parseEntryPoints(content, group)) {
            const moduleFile = path.join(sitePackages, ...entry.module.split('.'));
            for (const filePath of [`${moduleFile}.py`, path.join(moduleFile, '__init__.py')]) {
                if (!fs.existsSync(filePath)) continue;
                logger.debug(`Entry point ${entry.name} → ${filePath}`);
                return {
                    filePath,
                    module: entry.module,
                    ...(entry.attribute ? { functionName: entry.attribute } : {}),
                    source: 'entry-points',
                };
            }
        }
    }
    return null;
}

function candidateIn(dir: string): string | null {
    for (const fileName of ENTRY_FILE_CANDIDATES) {
        const filePath = path.join(dir, fileName);
        if (fs.existsSync(filePath) && fs.statSync(filePath).isFile()) return filePath;
    }
    return null;
}

/**
 * @throws NotFoundError 어떤 경로에서도 등록 파일을 찾지 못함
 */
export function findEntryFile(packagePath: string, options: EntryFileOptions = {}): EntryFile {
    const logger = options.logger ?? silentLogger;
    const root = path.resolve(packagePath);

    if (options.virtualEnv && options.packageName) {
        const viaEntryPoints = findViaEntryPoints(
            options.virtualEnv,
            options.packageName,
            options.version,
            options.entryPointGroup ?? DEFAULT_ENTRY_POINT_GROUP,
            logger,
        );
        if (viaEntryPoints) return viaEntryPoints;
    }

    const direct = candidateIn(root);
    if (direct) return { filePath: direct, module: moduleNameForFile(direct), source: 'package-dir' };

    const subdirs = listDir(root)
        .filter((entry) => entry.isDirectory() && !entry.name.startsWith('.') && !IGNORE_DIRS.has(entry.name))
        .map((entry) => entry.name)
        .sort();

    for (const subdir of subdirs) {
        const nested = candidateIn(path.join(root, subdir));
        if (nested) return { filePath: nested, module: moduleNameForFile(nested), source: 'package-dir' };
    }

    throw new NotFoundError(`plugins.py or plugin.py not found in: ${root}`);
}
