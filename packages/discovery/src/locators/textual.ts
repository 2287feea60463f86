// 텍스트 기반 Call Locator (tree-sitter 미초기화 시 fallback)
// 1. def <function>( 위치 → 시그니처 괄호 매칭 → ':' 이후 본문을 들여쓰기로 구분
// 2. 본문의 코드 영역(문자열/주석 제외)에서 plugins=[ ... ] 리스트를 대괄호 매칭으로 잘라냄
// 3. 리스트 안의 생성자 토큰을 닫는 괄호까지 잘라냄
import {
    findMatchingBracket,
    findMatchingParen,
    isIdentifierChar,
    isQuote,
    maskNonCode,
    skipComment,
    skipStringLiteral,
} from '@plugin-atlas/shared';
import {
    defaultLocatorOptions,
    dropNestedRanges,
    noRegistrationsFound,
    type CallLocator,
    type CallLocatorOptions,
} from './types';
import { escapeRegExp, extractBlockBody, findDefinition } from '../parsers/python-source';

const DOTTED_NAME_REGEX = /^[A-Za-z_][A-Za-z0-9_]*(?:\.[A-Za-z_][A-Za-z0-9_]*)*/;

/**
 * 함수 본문 텍스트 추출
 * 시그니처 괄호를 매칭으로 건너뛴 뒤 ':' 이후를 들여쓰기로 구분
 * @returns 본문 텍스트 또는 null (함수 없음)
 */
export function extractFunctionBody(source: string, functionName: string): string | null {
    const definition = findDefinition(source, 'def', functionName);
    return definition ? extractBlockBody(source, definition.colon) : null;
}

/**
 * 코드 영역(문자열/주석 제외)에서 `이름(` 형태로 시작하는 호출 위치 탐색
 * 식별자 경계를 확인해 MyParserPlugin 같은 부분 일치는 제외
 */
export function findConstructorCalls(
    text: string,
    names: ReadonlyMap<string, unknown>,
): Array<{ name: string; start: number; parenStart: number }> {
    const found: Array<{ name: string; start: number; parenStart: number }> = [];
    let i = 0;

    while (i < text.length) {
        const ch = text.charAt(i);
        if (isQuote(ch)) {
            i = skipStringLiteral(text, i);
            continue;
        }
        if (ch === '#') {
            i = skipComment(text, i);
            continue;
        }

        const prev = i > 0 ? text.charAt(i - 1) : '';
        if (/[A-Za-z_]/.test(ch) && !isIdentifierChar(prev) && prev !== '.') {
            const name = DOTTED_NAME_REGEX.exec(text.slice(i))?.[0] ?? ch;
            let after = i + name.length;
            while (after < text.length && /[ \t]/.test(text.charAt(after))) after++;
            if (text.charAt(after) === '(' && names.has(name)) {
                found.push({ name, start: i, parenStart: after });
            }
            i += name.length;
            continue;
        }
        i++;
    }

    return found;
}

export class TextualCallLocator implements CallLocator {
    readonly strategy = 'text' as const;

    constructor(private readonly options: CallLocatorOptions = defaultLocatorOptions) {}

    locate(source: string): string[] {
        const { functionName, listKeyword, constructors } = this.options;

        const body = extractFunctionBody(source, functionName);
        if (body === null) throw noRegistrationsFound(functionName);

        const listContent = this.extractListContent(body, listKeyword);
        if (listContent === null) throw noRegistrationsFound(functionName);

        const ranges: Array<{ start: number; end: number }> = [];
        for (const call of findConstructorCalls(listContent, constructors)) {
            const end = findMatchingParen(listContent, call.parenStart);
            if (end === null) continue;
            ranges.push({ start: call.start, end: end + 1 });
        }

        const calls = dropNestedRanges(ranges).map((range) => listContent.slice(range.start, range.end));
        if (calls.length === 0) throw noRegistrationsFound(functionName);
        return calls;
    }

    // plugins = [ ... ] 의 대괄호 안쪽 텍스트 (코드 영역의 첫 번째 대입만)
    private extractListContent(body: string, listKeyword: string): string | null {
        const keywordRegex = new RegExp(`(?<![A-Za-z0-9_.])${escapeRegExp(listKeyword)}\\s*=\\s*\\[`);
        const match = keywordRegex.exec(maskNonCode(body));
        if (!match) return null;

        const bracketStart = match.index + match[0].length - 1;
        const bracketEnd = findMatchingBracket(body, bracketStart);
        if (bracketEnd === null) return null;
        return body.slice(bracketStart + 1, bracketEnd);
    }
}
