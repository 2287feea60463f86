// Call Locator - 등록 섹션에서 등록 호출 원문을 순서대로 찾는 인터페이스
// 구현: tree-sitter 쿼리(tree) / 들여쓰기·괄호 매칭 텍스트 fallback(text)
import {
    DEFAULT_PLUGINS_KEYWORD,
    DEFAULT_REGISTER_FUNCTION,
    NotFoundError,
    PLUGIN_CONSTRUCTORS,
    type PluginKind,
} from '@plugin-atlas/shared';

export interface CallLocatorOptions {
    // 등록 함수 이름 (def register_plugin(...))
    functionName: string;
    // 등록 호출 목록을 담는 키워드 (plugins=[...])
    listKeyword: string;
    // 인식하는 생성자 이름 → 종류
    constructors: ReadonlyMap<string, PluginKind>;
}

export interface CallLocator {
    readonly strategy: 'tree' | 'text';
    // 등록 호출 원문 목록 (파일 순서). 0개면 NotFoundError
    locate(source: string): string[];
}

export const defaultLocatorOptions: Readonly<CallLocatorOptions> = Object.freeze({
    functionName: DEFAULT_REGISTER_FUNCTION,
    listKeyword: DEFAULT_PLUGINS_KEYWORD,
    constructors: PLUGIN_CONSTRUCTORS,
});

// 섹션 부재/빈 섹션 모두 같은 종류의 에러
export function noRegistrationsFound(functionName: string): NotFoundError {
    return new NotFoundError(`No registrations found in ${functionName}()`);
}

// 위치 순 정렬 후 이미 채택된 범위 안에 중첩된 호출 제거
export function dropNestedRanges<T extends { start: number; end: number }>(ranges: T[]): T[] {
    const sorted = [...ranges].sort((a, b) => a.start - b.start);
    const kept: T[] = [];
    let lastEnd = -1;
    for (const range of sorted) {
        if (range.start < lastEnd) continue;
        kept.push(range);
        lastEnd = range.end;
    }
    return kept;
}
