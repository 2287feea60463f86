/**
 * callable(클래스 생성자 / 함수) 파라미터 시그니처 추출
 * module의 마지막 세그먼트.py 파일을 검색 루트 순서대로 찾아 텍스트로 분석
 */
import * as path from 'node:path';
import {
    findTopLevel,
    isQuotedString,
    silentLogger,
    splitTopLevel,
    unquote,
    type Logger,
    type ParameterDescriptor,
} from '@plugin-atlas/shared';
import {
    extractBlockBody,
    findDefinition,
    statementEnd,
    stripComments,
} from '../parsers/python-source';
import { readSourceFile, walkSourceFiles } from './file-walker';

export interface CallableSignature {
    parameters: Record<string, ParameterDescriptor>;
    returnAnnotation?: string;
}

export interface ParameterSearchOptions {
    // 검색 루트 (앞쪽 우선)
    roots: string[];
    // 여러 callable을 조회할 때 공유하는 파일 색인 (없으면 호출마다 새로 생성)
    index?: SourceFileIndex;
    logger?: Logger;
}

interface RootIndex {
    byName: Map<string, string[]>;
    // 순회 순서
    position: Map<string, number>;
}

/**
 * 루트별 파일 이름 → 경로 목록 색인
 * 루트마다 첫 조회 때 한 번만 순회
 */
export class SourceFileIndex {
    private readonly roots = new Map<string, RootIndex>();

    constructor(private readonly logger: Logger = silentLogger) {}

    /** root 아래 fileName 파일들 (여러 이름을 주면 순회 순서로 합침) */
    filesNamed(root: string, ...fileNames: string[]): string[] {
        const index = this.rootIndex(path.resolve(root));
        const files = [...new Set(fileNames)].flatMap((fileName) => index.byName.get(fileName) ?? []);
        return files.sort((a, b) => (index.position.get(a) ?? 0) - (index.position.get(b) ?? 0));
    }

    private rootIndex(root: string): RootIndex {
        const cached = this.roots.get(root);
        if (cached) return cached;

        const index: RootIndex = { byName: new Map(), position: new Map() };
        for (const file of walkSourceFiles(root, { logger: this.logger })) {
            index.position.set(file, index.position.size);
            const name = path.basename(file);
            const files = index.byName.get(name);
            if (files) files.push(file);
            else index.byName.set(name, [file]);
        }
        this.logger.debug(`Indexed ${root}: ${index.position.size} file(s)`);
        this.roots.set(root, index);
        return index;
    }
}

const SKIPPED_PARAMETERS = new Set(['self', 'cls', '*', '/']);
const NUMBER_REGEX = /^[+-]?(?:\d[\d_]*)(?:\.\d*)?(?:[eE][+-]?\d+)?$/;
const FIELD_REGEX = /^([A-Za-z_][A-Za-z0-9_]*)[ \t]*:/;

/** 검색 루트 목록: 기본 루트 → 가상환경 → 현재 디렉토리 (중복 제거) */
export function parameterSearchRoots(primary: string, virtualEnv: string | null, cwd = process.cwd()): string[] {
    const roots = [primary, virtualEnv, cwd].flatMap((root) => (root ? [path.resolve(root)] : []));
    return [...new Set(roots)];
}

/** 파이썬 기본값 표현식 → JSON 텍스트 */
export function serializeDefault(expression: string): string {
    const value = expression.trim();
    if (value === 'None') return 'null';
    if (value === 'True') return 'true';
    if (value === 'False') return 'false';
    if (NUMBER_REGEX.test(value)) return value;
    if (isQuotedString(value)) return JSON.stringify(unquote(value));
    return value;
}

function describe(annotation: string | undefined, defaultValue: string | undefined, variadic: boolean): ParameterDescriptor {
    const descriptor: ParameterDescriptor = { required: !variadic && defaultValue === undefined };
    if (annotation) descriptor.annotation = annotation;
    if (defaultValue !== undefined) descriptor.default = serializeDefault(defaultValue);
    return descriptor;
}

// "name: annotation = default" / "name = default" / "name" 분해
function splitParameter(token: string): { name: string; annotation?: string; defaultValue?: string } {
    const colon = findTopLevel(token, ':');
    const head = colon === -1 ? token : token.slice(0, colon);
    const tail = colon === -1 ? '' : token.slice(colon + 1);

    if (colon === -1) {
        const eq = findTopLevel(token, '=');
        if (eq === -1) return { name: token.trim() };
        return { name: token.slice(0, eq).trim(), defaultValue: token.slice(eq + 1).trim() };
    }

    const eq = findTopLevel(tail, '=');
    if (eq === -1) return { name: head.trim(), annotation: tail.trim() };
    return {
        name: head.trim(),
        annotation: tail.slice(0, eq).trim(),
        defaultValue: tail.slice(eq + 1).trim(),
    };
}

/**
 * 괄호 안쪽 파라미터 목록 텍스트 → 이름별 서술자 (선언 순서 유지)
 * self/cls, 단독 '*', '/' 는 제외. *args, **kwargs는 필수가 아님
 */
export function parseParameterList(text: string): Record<string, ParameterDescriptor> {
    const parameters: Record<string, ParameterDescriptor> = {};

    for (const rawToken of splitTopLevel(stripComments(text))) {
        const token = rawToken.trim();
        if (!token || SKIPPED_PARAMETERS.has(token)) continue;

        const variadic = token.startsWith('*');
        const { name, annotation, defaultValue } = splitParameter(token.replace(/^\*{1,2}/, ''));
        if (!name || SKIPPED_PARAMETERS.has(name)) continue;

        parameters[name] = describe(annotation, defaultValue, variadic);
    }

    return parameters;
}

// 클래스 본문 기준 들여쓰기의 "name: T [= default]" 필드
function parseClassFields(body: string): Record<string, ParameterDescriptor> {
    const fields: Record<string, ParameterDescriptor> = {};
    const firstLine = body.split('\n').find((line) => line.trim() && !line.trim().startsWith('#'));
    if (firstLine === undefined) return fields;
    const baseIndent = firstLine.length - firstLine.trimStart().length;

    let offset = 0;
    while (offset < body.length) {
        const end = statementEnd(body, offset);
        const statement = body.slice(offset, end);
        offset = end + 1;

        const indent = statement.length - statement.trimStart().length;
        const text = stripComments(statement).trim();
        if (indent !== baseIndent || !FIELD_REGEX.test(text)) continue;

        const { name, annotation, defaultValue } = splitParameter(text);
        if (name.startsWith('_') || annotation?.startsWith('ClassVar')) continue;
        fields[name] = describe(annotation, defaultValue, false);
    }

    return fields;
}

/**
 * 파일 소스에서 name의 시그니처 분석
 * class → __init__ 파라미터 (없으면 주석된 클래스 필드), 함수 → 최상위 def의 파라미터와 반환 주석
 * @returns 정의를 찾지 못하면 null
 */
export function parseSignature(source: string, name: string): CallableSignature | null {
    const classDef = findDefinition(source, 'class', name);
    if (classDef) {
        const body = extractBlockBody(source, classDef.colon);
        const init = findDefinition(body, 'def', '__init__');
        if (init && init.parenStart !== null && init.parenEnd !== null) {
            return { parameters: parseParameterList(body.slice(init.parenStart + 1, init.parenEnd)) };
        }
        return { parameters: parseClassFields(body) };
    }

    const fnDef = findDefinition(source, 'def', name, true);
    if (!fnDef || fnDef.parenStart === null || fnDef.parenEnd === null) return null;

    const signature: CallableSignature = {
        parameters: parseParameterList(source.slice(fnDef.parenStart + 1, fnDef.parenEnd)),
    };
    const tail = source.slice(fnDef.parenEnd + 1, fnDef.colon);
    const arrow = tail.indexOf('->');
    if (arrow !== -1) {
        const returnAnnotation = tail.slice(arrow + 2).trim();
        if (returnAnnotation) signature.returnAnnotation = returnAnnotation;
    }
    return signature;
}

// <last>.py 또는 <last>/__init__.py 후보
// 같은 이름의 파일이 여러 개면 모듈 경로와 끝이 일치하는 파일 우선
function candidateFiles(index: SourceFileIndex, root: string, module: string): string[] {
    const segments = module.split('.').filter(Boolean);
    const last = segments[segments.length - 1] ?? module;
    const moduleFile = path.join(...segments) + '.py';
    const packageInit = path.join(...segments, '__init__.py');

    const files = index
        .filesNamed(root, `${last}.py`, '__init__.py')
        .filter((file) => path.basename(file) !== '__init__.py' || path.basename(path.dirname(file)) === last);

    const exact = (file: string) =>
        file.endsWith(path.sep + moduleFile) || file.endsWith(path.sep + packageInit);
    return [...files.filter(exact), ...files.filter((file) => !exact(file))];
}

/**
 * module.name의 파라미터 추출. 찾지 못해도 에러 없이 빈 결과
 */
export function extractCallableParameters(
    module: string,
    name: string,
    options: ParameterSearchOptions,
): CallableSignature {
    const logger = options.logger ?? silentLogger;
    const index = options.index ?? new SourceFileIndex(logger);

    for (const root of options.roots) {
        for (const file of candidateFiles(index, root, module)) {
            const source = readSourceFile(file, logger);
            if (source === null) continue;

            const signature = parseSignature(source, name);
            if (signature) {
                logger.debug(
                    `${module}.${name}: ${Object.keys(signature.parameters).length} parameter(s) from ${file}`,
                );
                return signature;
            }
        }
    }

    logger.debug(`${module}.${name}: definition not found in ${options.roots.join(', ')}`);
    return { parameters: {} };
}
