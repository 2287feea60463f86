// raw 인자 값 → 타입이 있는 값
// 규칙 순서대로 첫 매칭 적용: 빈값 → 리터럴 → 문자열 → enum/속성 → 리스트 → 심볼 → opaque
import {
    DECORATED_ATTRIBUTES,
    ENUM_VALUES,
    UnsupportedConstructError,
    isQuotedString,
    unquote,
    type CallableDescriptor,
    type CallableType,
    type SymbolTable,
} from '@plugin-atlas/shared';

export type ClassifiedValue =
    | { kind: 'null' }
    | { kind: 'boolean'; value: boolean }
    | { kind: 'string'; value: string }
    | { kind: 'enum'; value: string }
    | { kind: 'array' }
    | { kind: 'callable'; callable: CallableDescriptor }
    // ClassName.steps → 데코레이터 스캔이 필요하다는 신호 (에러 아님)
    | { kind: 'decorated'; className: string; attribute: string }
    | { kind: 'opaque'; value: string };

const IDENTIFIER_REGEX = /^[A-Za-z_][A-Za-z0-9_]*$/;

// 이름 첫 글자 대문자 → class, 그 외 function (best-effort 휴리스틱)
export function inferCallableType(name: string): CallableType {
    return /^\p{Lu}/u.test(name) ? 'class' : 'function';
}

/**
 * @throws UnsupportedConstructError 예약 속성이 아닌 임의의 속성 접근 (a.b.c)
 */
export function classifyValue(raw: string, symbols: SymbolTable): ClassifiedValue {
    const trimmed = raw.trim();

    if (!trimmed) return { kind: 'null' };
    if (trimmed === 'None') return { kind: 'null' };
    if (trimmed === 'True') return { kind: 'boolean', value: true };
    if (trimmed === 'False') return { kind: 'boolean', value: false };

    if (isQuotedString(trimmed)) {
        return { kind: 'string', value: unquote(trimmed) };
    }

    const enumValue = ENUM_VALUES.get(trimmed);
    if (enumValue !== undefined) return { kind: 'enum', value: enumValue };

    if (trimmed.includes('.') && !trimmed.startsWith('[')) {
        const segments = trimmed.split('.');
        const attribute = segments[segments.length - 1] ?? '';
        const className = segments[segments.length - 2] ?? '';
        if (DECORATED_ATTRIBUTES.has(attribute) && IDENTIFIER_REGEX.test(className)) {
            return { kind: 'decorated', className, attribute };
        }
        throw new UnsupportedConstructError(
            `Attribute access '${trimmed}' requires a Python runtime - unsupported in static mode`,
        );
    }

    // 리스트 내용은 분석하지 않음 (빈 배열 placeholder)
    if (trimmed.startsWith('[') && trimmed.endsWith(']')) return { kind: 'array' };

    const symbol = symbols.get(trimmed);
    if (symbol) {
        return {
            kind: 'callable',
            callable: {
                module: symbol.module,
                name: symbol.name,
                type: inferCallableType(symbol.name),
                parameters: {},
            },
        };
    }

    return { kind: 'opaque', value: trimmed };
}
