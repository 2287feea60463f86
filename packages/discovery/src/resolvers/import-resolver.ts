// Python import 문 → 심볼 테이블
// from MODULE import NAME[, NAME as ALIAS] 형태의 한 줄 import만 인식
// 여러 줄(괄호/백슬래시) import는 잘못 파싱하지 않도록 건너뜀
import type { SymbolReference, SymbolTable } from '@plugin-atlas/shared';

export interface SymbolTableOptions {
    // 소스 파일 자신의 모듈 경로. 지정 시 최상위 class/def 정의도 심볼로 등록하고
    // 상대 import(from .parser import X)를 절대 경로로 변환
    localModule?: string;
}

const IDENTIFIER_REGEX = /^[A-Za-z_][A-Za-z0-9_]*$/;
const TOP_LEVEL_DEFINITION_REGEX = /^(?:class|def)\s+([A-Za-z_][A-Za-z0-9_]*)/gm;

// 이름 토큰에 섞인 괄호/쉼표 제거
function cleanName(raw: string): string {
    return raw.replace(/[(),]/g, '').trim();
}

// 상대 모듈(.parser, ..core.store)을 localModule 기준 절대 경로로 변환
export function resolveRelativeModule(module: string, localModule?: string): string {
    const dots = /^\.+/.exec(module)?.[0].length ?? 0;
    if (dots === 0 || !localModule) return module;

    const base = localModule.split('.').slice(0, -dots);
    const rest = module.slice(dots);
    return [...base, ...(rest ? [rest] : [])].join('.');
}

// 한 줄 import 문 파싱. import 문이 아니거나 여러 줄 형태면 null
export function parseImportLine(rawLine: string): { module: string; specs: Array<[string, string]> } | null {
    const line = rawLine.replace(/#.*$/, '').trim();
    if (!line.startsWith('from ')) return null;

    const importIdx = line.indexOf(' import ');
    if (importIdx === -1) return null;

    const module = line.slice(5, importIdx).trim();
    const importsPart = line.slice(importIdx + 8).trim();
    if (!module || !importsPart) return null;
    if (importsPart.endsWith('\\')) return null;
    if (importsPart.includes('(') && !importsPart.includes(')')) return null;

    const specs: Array<[string, string]> = [];
    for (const part of importsPart.split(',')) {
        const item = part.trim();
        if (!item) continue;

        // "B as C" → 로컬 심볼 C, 원래 이름 B
        const [originalPart, aliasPart] = item.split(/\s+as\s+/);
        const original = cleanName(originalPart ?? '');
        const local = cleanName(aliasPart ?? originalPart ?? '');
        if (!IDENTIFIER_REGEX.test(local) || !IDENTIFIER_REGEX.test(original)) continue;
        specs.push([local, original]);
    }

    return { module, specs };
}

/**
 * 파일 전체 텍스트에서 심볼 테이블 생성
 * 같은 로컬 심볼을 다시 import하면 나중 것이 덮어씀 (일반적인 shadowing과 동일)
 */
export function buildSymbolTable(content: string, options: SymbolTableOptions = {}): SymbolTable {
    const symbols = new Map<string, Readonly<SymbolReference>>();
    const { localModule } = options;

    if (localModule) {
        for (const m of content.matchAll(TOP_LEVEL_DEFINITION_REGEX)) {
            const name = m[1];
            if (name) symbols.set(name, Object.freeze({ module: localModule, name }));
        }
    }

    for (const line of content.split('\n')) {
        const parsed = parseImportLine(line);
        if (!parsed) continue;
        const module = resolveRelativeModule(parsed.module, localModule);
        for (const [local, original] of parsed.specs) {
            symbols.set(local, Object.freeze({ module, name: original }));
        }
    }

    return symbols;
}
