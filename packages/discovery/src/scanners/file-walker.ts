/**
 * Python 소스 트리 순회
 * 명시적 스택 기반 DFS, 디렉토리 안에서는 이름순
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import { IGNORE_DIRS, errorMessage, silentLogger, type Logger } from '@plugin-atlas/shared';

export interface WalkOptions {
    // 파일 이름 필터 (기본: .py)
    accept?: (fileName: string) => boolean;
    logger?: Logger;
}

const isPythonFile = (fileName: string) => fileName.endsWith('.py');

function isSkipped(name: string): boolean {
    return name.startsWith('.') || IGNORE_DIRS.has(name);
}

/**
 * root 하위 파일 경로를 순서대로 생성
 * 숨김 항목과 IGNORE_DIRS는 건너뛰고, 읽을 수 없는 디렉토리는 debug 로그 후 건너뜀
 */
export function* walkSourceFiles(root: string, options: WalkOptions = {}): Generator<string> {
    const accept = options.accept ?? isPythonFile;
    const logger = options.logger ?? silentLogger;
    const stack: string[] = [path.resolve(root)];

    while (stack.length > 0) {
        const dir = stack.pop();
        if (dir === undefined) break;

        let entries: fs.Dirent[];
        try {
            entries = fs.readdirSync(dir, { withFileTypes: true });
        } catch (error) {
            logger.debug(`Skipping unreadable directory ${dir}: ${errorMessage(error)}`);
            continue;
        }

        entries.sort((a, b) => a.name.localeCompare(b.name));

        const subdirs: string[] = [];
        for (const entry of entries) {
            if (isSkipped(entry.name)) continue;
            const fullPath = path.join(dir, entry.name);
            if (entry.isDirectory()) {
                subdirs.push(fullPath);
            } else if (entry.isFile() && accept(entry.name)) {
                yield fullPath;
            }
        }

        // 스택이므로 역순으로 넣어야 이름순으로 방문
        for (let i = subdirs.length - 1; i >= 0; i--) {
            const subdir = subdirs[i];
            if (subdir !== undefined) stack.push(subdir);
        }
    }
}

/** 파일 읽기 (실패 시 null + debug 로그) */
export function readSourceFile(filePath: string, logger: Logger = silentLogger): string | null {
    try {
        return fs.readFileSync(filePath, 'utf8');
    } catch (error) {
        logger.debug(`Skipping unreadable file ${filePath}: ${errorMessage(error)}`);
        return null;
    }
}

/**
 * root 기준 상대 경로 → 점 구분 모듈 경로
 * pkg/upgrader/steps.py → pkg.upgrader.steps, pkg/__init__.py → pkg
 */
export function modulePathFor(root: string, filePath: string): string {
    const relative = path.relative(path.resolve(root), path.resolve(filePath));
    const parts = relative.replace(/\.py$/, '').split(path.sep).filter(Boolean);
    if (parts[parts.length - 1] === '__init__') parts.pop();
    return parts.length > 0 ? parts.join('.') : path.basename(path.resolve(root));
}

/**
 * 모듈 경로 계산 기준 디렉토리
 * root 자체가 패키지(__init__.py 보유)면 그 부모를 기준으로 삼아 패키지 이름을 포함
 */
export function moduleBaseFor(root: string): string {
    const resolved = path.resolve(root);
    return fs.existsSync(path.join(resolved, '__init__.py')) ? path.dirname(resolved) : resolved;
}

/**
 * 파일 위치에서 __init__.py가 있는 상위 디렉토리를 따라 올라가며 모듈 경로 계산
 * site-packages/pkg/plugins.py → pkg.plugins (pkg/__init__.py가 있을 때)
 */
export function moduleNameForFile(filePath: string): string {
    const resolved = path.resolve(filePath);
    const parts = [path.basename(resolved, '.py')];
    let dir = path.dirname(resolved);

    while (fs.existsSync(path.join(dir, '__init__.py'))) {
        parts.unshift(path.basename(dir));
        const parent = path.dirname(dir);
        if (parent === dir) break;
        dir = parent;
    }

    if (parts[parts.length - 1] === '__init__') parts.pop();
    return parts.join('.');
}
