/**
 * Python 소스 텍스트 스캔 유틸리티
 * 문자열 리터럴과 주석을 건너뛰며 괄호 깊이를 계산
 */

const OPENERS: Record<string, string> = { '(': ')', '[': ']', '{': '}' };
const CLOSERS = new Set([')', ']', '}']);

export function isQuote(ch: string): boolean {
  return ch === '"' || ch === "'";
}

/** 식별자 구성 문자 여부 (A-Z, a-z, 0-9, _) */
export function isIdentifierChar(ch: string): boolean {
  return /^[A-Za-z0-9_]$/.test(ch);
}

/**
 * start 위치의 따옴표로 시작하는 문자열 리터럴을 건너뛴 다음 인덱스
 * 삼중 따옴표 지원, 백슬래시 이스케이프 처리
 * 닫히지 않은 한 줄 문자열은 줄 끝에서 종료
 */
export function skipStringLiteral(text: string, start: number): number {
  const quote = text.charAt(start);
  const triple = text.startsWith(quote.repeat(3), start);
  const closing = triple ? quote.repeat(3) : quote;
  let i = start + closing.length;

  while (i < text.length) {
    const ch = text.charAt(i);
    if (ch === '\\') {
      i += 2;
      continue;
    }
    if (!triple && ch === '\n') return i;
    if (text.startsWith(closing, i)) return i + closing.length;
    i++;
  }
  return text.length;
}

/** '#' 주석을 줄 끝(개행 문자 위치)까지 건너뜀 */
export function skipComment(text: string, start: number): number {
  const newline = text.indexOf('\n', start);
  return newline === -1 ? text.length : newline;
}

/**
 * start 위치의 여는 괄호에 대응하는 닫는 괄호 위치
 * @returns 닫는 괄호 인덱스 또는 null (짝이 없을 때)
 */
export function findMatchingDelimiter(
  text: string,
  start: number,
  open = '(',
  close = ')',
): number | null {
  if (text.charAt(start) !== open) return null;

  let depth = 0;
  let i = start;
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
    if (ch === open) {
      depth++;
    } else if (ch === close) {
      depth--;
      if (depth === 0) return i;
    }
    i++;
  }
  return null;
}

export function findMatchingParen(text: string, start: number): number | null {
  return findMatchingDelimiter(text, start, '(', ')');
}

export function findMatchingBracket(text: string, start: number): number | null {
  return findMatchingDelimiter(text, start, '[', ']');
}

/**
 * 괄호 깊이 0, 문자열 밖에서 처음 나오는 target 문자 위치
 * @returns 인덱스 또는 -1
 */
export function findTopLevel(text: string, target: string): number {
  let depth = 0;
  let i = 0;
  while (i < text.length) {
    const ch = text.charAt(i);
    if (isQuote(ch)) {
      i = skipStringLiteral(text, i);
      continue;
    }
    if (ch === target && depth === 0) return i;
    if (OPENERS[ch]) depth++;
    else if (CLOSERS.has(ch)) depth = Math.max(0, depth - 1);
    i++;
  }
  return -1;
}

/** 괄호 깊이 0의 구분자로 분할 (문자열/주석 내부 구분자는 무시) */
export function splitTopLevel(text: string, separator = ','): string[] {
  const parts: string[] = [];
  let depth = 0;
  let segmentStart = 0;
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
    if (OPENERS[ch]) {
      depth++;
    } else if (CLOSERS.has(ch)) {
      depth = Math.max(0, depth - 1);
    } else if (ch === separator && depth === 0) {
      parts.push(text.slice(segmentStart, i));
      segmentStart = i + 1;
    }
    i++;
  }
  parts.push(text.slice(segmentStart));
  return parts;
}

/** 양끝이 같은 따옴표인 문자열 리터럴 여부 */
export function isQuotedString(value: string): boolean {
  if (value.length < 2) return false;
  const first = value.charAt(0);
  return isQuote(first) && value.charAt(value.length - 1) === first;
}

/** 양끝 따옴표 제거 (삼중 따옴표 포함, 따옴표가 없으면 그대로) */
export function unquote(value: string): string {
  if (!isQuotedString(value)) return value;
  const triple = value.charAt(0).repeat(3);
  if (value.length >= 6 && value.startsWith(triple) && value.endsWith(triple)) {
    return value.slice(3, -3);
  }
  return value.slice(1, -1);
}

/**
 * 문자열 리터럴과 주석을 공백으로 덮은 같은 길이의 사본
 * 개행은 유지하므로 원문과 인덱스/줄 번호가 그대로 대응
 */
export function maskNonCode(text: string): string {
  const blank = (segment: string) => segment.replace(/[^\n]/g, ' ');
  let result = '';
  let i = 0;
  while (i < text.length) {
    const ch = text.charAt(i);
    if (isQuote(ch) || ch === '#') {
      const end = ch === '#' ? skipComment(text, i) : skipStringLiteral(text, i);
      result += blank(text.slice(i, end));
      i = end;
      continue;
    }
    result += ch;
    i++;
  }
  return result;
}

/** 줄의 선행 공백 길이 */
export function indentOf(line: string): number {
  return line.length - line.trimStart().length;
}

export * from './logger';
