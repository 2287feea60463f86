// web-tree-sitter WASM 파서 초기화 및 싱글톤 관리
// 호출측(cli, 테스트)에서 await initTreeSitterParsers() 후
// 추출 단계에서 getLoadedParser()로 동기 접근
import path from 'node:path';
import Parser from 'web-tree-sitter';
import { errorMessage } from '@plugin-atlas/shared';

export type SupportedLanguage = 'python';

const cache = new Map<SupportedLanguage, Parser>();
let initialized = false;

// require.resolve로 WASM 파일 경로 탐색 (workspace 구조 대응)
function resolveWasmPath(packageName: string, wasmFile: string): string {
    try {
        const pkgJson = require.resolve(`${packageName}/package.json`);
        return path.join(path.dirname(pkgJson), wasmFile);
    } catch {
        // exports 제한으로 package.json 해석 실패 시 루트 node_modules 탐색
        return path.join(process.cwd(), 'node_modules', packageName, wasmFile);
    }
}

// web-tree-sitter 런타임 초기화 (tree-sitter.wasm 경로 명시)
async function ensureParserInit(): Promise<void> {
    if (initialized) return;
    const wasmDir = path.dirname(require.resolve('web-tree-sitter/package.json'));
    await Parser.init({
        locateFile: (scriptName: string) => {
            if (scriptName === 'tree-sitter.wasm') {
                return path.join(wasmDir, 'tree-sitter.wasm');
            }
            return scriptName;
        },
    });
    initialized = true;
}

async function loadLanguage(lang: SupportedLanguage, wasmPath: string): Promise<void> {
    if (cache.has(lang)) return;
    const language = await Parser.Language.load(wasmPath);
    const parser = new Parser();
    parser.setLanguage(language);
    cache.set(lang, parser);
}

// 추출 시작 전 한 번 호출. 문법 로드 실패 메시지 목록 반환 (빈 배열이면 전부 성공)
// 실패한 언어는 getLoadedParser()가 null → 텍스트 fallback으로 진행
export async function initTreeSitterParsers(): Promise<string[]> {
    try {
        await ensureParserInit();
    } catch (error) {
        return [`web-tree-sitter init failed: ${errorMessage(error)}`];
    }
    const results = await Promise.allSettled([
        loadLanguage('python', resolveWasmPath('tree-sitter-python', 'tree-sitter-python.wasm')),
    ]);
    return results.flatMap((result) => (result.status === 'rejected' ? [errorMessage(result.reason)] : []));
}

// 동기적으로 파서 획득 (초기화 미완료 시 null 반환)
export function getLoadedParser(lang: SupportedLanguage): Parser | null {
    return cache.get(lang) ?? null;
}
