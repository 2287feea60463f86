// 등록 호출 하나의 인자 목록을 (key, raw value) 쌍으로 분해
// 괄호/대괄호/중괄호 깊이, 문자열 상태, key/value 모드를 유지하는 단일 스캔
import { InvalidSyntaxError, skipComment } from '@plugin-atlas/shared';

export interface RawKeyValue {
    // 키워드 인자 이름. 위치 인자는 빈 문자열
    key: string;
    // 공백 제거한 값 텍스트 (분류 전)
    value: string;
    // 구분자 사이 원문 그대로의 조각
    raw: string;
}

// 키 텍스트의 "prefix:" 한정자 제거 → 마지막 세그먼트
function reduceKey(key: string): string {
    return key.slice(key.lastIndexOf(':') + 1).trim();
}

// 키 모드에서 허용하는 문자 (식별자, 공백, 한정자)
function isKeyChar(ch: string): boolean {
    return /[A-Za-z0-9_.:\s]/.test(ch);
}

/**
 * 호출 텍스트(괄호 포함)에서 인자 쌍 추출
 * - 깊이 0의 쉼표에서 쌍 종료, 호출 자신의 닫는 괄호에서 스캔 종료
 * - 따옴표 문자열은 이스케이프되지 않은 같은 따옴표로만 닫힘 (삼중 따옴표는 삼중 따옴표로)
 * - 빈 조각(끝 쉼표)은 버림
 * @throws InvalidSyntaxError 여는 괄호가 없거나 호출이 닫히지 않음
 */
export function parseKeywordArguments(callText: string): RawKeyValue[] {
    const open = callText.indexOf('(');
    if (open === -1) {
        throw new InvalidSyntaxError(`No opening parenthesis in call: ${callText.slice(0, 40)}`);
    }

    const pairs: RawKeyValue[] = [];
    let key = '';
    let value = '';
    let inKey = true;
    let positional = false;
    let parenDepth = 0;
    let bracketDepth = 0;
    let braceDepth = 0;
    let inString = false;
    let quote = '';
    let segmentStart = open + 1;

    const flush = (end: number) => {
        const raw = callText.slice(segmentStart, end);
        if (inKey || positional) {
            const text = (inKey ? key : value).trim();
            if (text) pairs.push({ key: '', value: text, raw });
        } else {
            pairs.push({ key: reduceKey(key), value: value.trim(), raw });
        }
        key = '';
        value = '';
        inKey = true;
        positional = false;
        segmentStart = end + 1;
    };

    // 키 모드에서 키에 올 수 없는 문자를 만나면 위치 인자로 전환
    const toPositional = () => {
        value = key;
        key = '';
        inKey = false;
        positional = true;
    };

    for (let i = open + 1; i < callText.length; i++) {
        const ch = callText.charAt(i);

        if (inString) {
            if (ch === '\\' && i + 1 < callText.length) {
                value += ch + callText.charAt(i + 1);
                i++;
            } else if (callText.startsWith(quote, i)) {
                value += quote;
                i += quote.length - 1;
                inString = false;
            } else {
                value += ch;
            }
            continue;
        }

        if (inKey && key === '' && /\s/.test(ch)) continue;

        if (ch === '#') {
            i = skipComment(callText, i) - 1;
            continue;
        }

        const atTopLevel = parenDepth === 0 && bracketDepth === 0 && braceDepth === 0;

        if (ch === '=' && inKey && atTopLevel) {
            inKey = false;
            continue;
        }
        if (ch === ',' && atTopLevel) {
            flush(i);
            continue;
        }
        if (ch === ')' && parenDepth === 0) {
            flush(i);
            return pairs;
        }

        if (inKey && !isKeyChar(ch)) toPositional();
        if (inKey) {
            key += ch;
            continue;
        }

        value += ch;
        switch (ch) {
            case '"':
            case "'":
                inString = true;
                quote = callText.startsWith(ch.repeat(3), i) ? ch.repeat(3) : ch;
                value += quote.slice(1);
                i += quote.length - 1;
                break;
            case '(':
                parenDepth++;
                break;
            case ')':
                parenDepth--;
                break;
            case '[':
                bracketDepth++;
                break;
            case ']':
                bracketDepth = Math.max(0, bracketDepth - 1);
                break;
            case '{':
                braceDepth++;
                break;
            case '}':
                braceDepth = Math.max(0, braceDepth - 1);
                break;
        }
    }

    throw new InvalidSyntaxError(`Unterminated call: ${callText.slice(0, 40)}`);
}

// 키워드 인자만 Map으로 (같은 키가 반복되면 마지막 값)
export function keywordMap(pairs: RawKeyValue[]): Map<string, string> {
    const map = new Map<string, string>();
    for (const pair of pairs) {
        if (pair.key) map.set(pair.key, pair.value);
    }
    return map;
}
