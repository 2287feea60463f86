// Python 소스 텍스트에서 블록/정의/문장 경계를 찾는 보조 함수
import {
    findMatchingParen,
    findTopLevel,
    indentOf,
    isQuote,
    skipComment,
    skipStringLiteral,
} from '@plugin-atlas/shared';

export function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * 문자열 리터럴 안이나 열린 괄호 안에서 시작하는 줄 번호 (0부터)
 * 줄 끝 백슬래시로 이어지는 줄도 포함
 */
export function continuationLines(text: string): Set<number> {
    const lines = new Set<number>();
    let line = 0;
    let depth = 0;
    let i = 0;

    while (i < text.length) {
        const ch = text.charAt(i);
        if (isQuote(ch)) {
            const end = skipStringLiteral(text, i);
            for (let j = i; j < end && j < text.length; j++) {
                if (text.charAt(j) === '\n') lines.add(++line);
            }
            i = end;
            continue;
        }
        if (ch === '#') {
            i = skipComment(text, i);
            continue;
        }
        if (ch === '\\' && text.charAt(i + 1) === '\n') {
            lines.add(++line);
            i += 2;
            continue;
        }
        if (ch === '(' || ch === '[' || ch === '{') depth++;
        else if (ch === ')' || ch === ']' || ch === '}') depth = Math.max(0, depth - 1);
        else if (ch === '\n') {
            line++;
            if (depth > 0) lines.add(line);
        }
        i++;
    }

    return lines;
}

/**
 * 헤더의 ':' 다음부터 들여쓰기로 구분되는 블록 본문
 * 첫 비어있지 않은 줄이 기준 들여쓰기, 그보다 얕은 줄에서 종료
 * 주석만 있는 줄, 문자열/괄호 안에서 이어지는 줄은 들여쓰기 판단에서 제외
 */
export function extractBlockBody(source: string, colonIndex: number): string {
    const text = source.slice(colonIndex + 1);
    const continued = continuationLines(text);
    const bodyLines: string[] = [];
    let baseIndent: number | null = null;

    for (const [index, line] of text.split('\n').entries()) {
        const trimmed = line.trim();
        if (bodyLines.length === 0 && !trimmed) continue;

        if (trimmed && !trimmed.startsWith('#') && !continued.has(index)) {
            const indent = indentOf(line);
            if (baseIndent === null) {
                baseIndent = indent;
            } else if (indent < baseIndent) {
                break;
            }
        }
        bodyLines.push(line);
    }

    return bodyLines.join('\n');
}

export interface DefinitionMatch {
    // 정의 키워드 시작 위치
    start: number;
    // 시그니처/베이스 목록의 여는 괄호 (없으면 null, 예: class Foo:)
    parenStart: number | null;
    parenEnd: number | null;
    // 헤더를 끝내는 ':' 위치
    colon: number;
}

/**
 * `def name(` / `class Name(` / `class Name:` 헤더 탐색
 * @param topLevelOnly true면 들여쓰기 없는 정의만
 */
export function findDefinition(
    source: string,
    keyword: 'def' | 'class',
    name: string,
    topLevelOnly = false,
): DefinitionMatch | null {
    const indent = topLevelOnly ? '' : '[ \\t]*';
    const prefix = keyword === 'def' ? '(?:async[ \\t]+)?def' : 'class';
    const regex = new RegExp(`^${indent}${prefix}[ \\t]+${escapeRegExp(name)}[ \\t]*([(:])`, 'gm');

    for (const match of source.matchAll(regex)) {
        const index = match.index ?? 0;
        const delimiter = match[1];
        const delimiterIndex = index + match[0].length - 1;
        const start = index + match[0].length - match[0].trimStart().length;

        if (delimiter === ':') {
            return { start, parenStart: null, parenEnd: null, colon: delimiterIndex };
        }

        const parenEnd = findMatchingParen(source, delimiterIndex);
        if (parenEnd === null) continue;
        const colon = findTopLevel(source.slice(parenEnd + 1), ':');
        if (colon === -1) continue;
        return { start, parenStart: delimiterIndex, parenEnd, colon: parenEnd + 1 + colon };
    }

    return null;
}

/** 문자열 밖의 '#' 주석 제거 */
export function stripComments(text: string): string {
    let result = '';
    let i = 0;
    while (i < text.length) {
        const ch = text.charAt(i);
        if (isQuote(ch)) {
            const end = skipStringLiteral(text, i);
            result += text.slice(i, end);
            i = end;
            continue;
        }
        if (ch === '#') {
            const newline = text.indexOf('\n', i);
            if (newline === -1) break;
            i = newline;
            continue;
        }
        result += ch;
        i++;
    }
    return result;
}

/** start에서 시작하는 문장의 끝 (괄호 깊이 0의 개행 또는 텍스트 끝) */
export function statementEnd(text: string, start: number): number {
    let depth = 0;
    let i = start;
    while (i < text.length) {
        const ch = text.charAt(i);
        if (isQuote(ch)) {
            i = skipStringLiteral(text, i);
            continue;
        }
        if (ch === '(' || ch === '[' || ch === '{') depth++;
        else if (ch === ')' || ch === ']' || ch === '}') depth = Math.max(0, depth - 1);
        else if (ch === '\n' && depth === 0) return i;
        i++;
    }
    return text.length;
}
