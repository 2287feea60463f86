import { describe, test, expect } from 'vitest';
import {
  findMatchingParen,
  findTopLevel,
  indentOf,
  isIdentifierChar,
  isQuotedString,
  maskNonCode,
  skipStringLiteral,
  splitTopLevel,
  unquote,
} from '../src/utils';

describe('splitTopLevel', () => {
  test('splits only at depth zero outside strings', () => {
    expect(splitTopLevel('a, f(b, c), "x,y", [1, 2]')).toEqual(['a', ' f(b, c)', ' "x,y"', ' [1, 2]']);
  });

  test('ignores separators inside comments', () => {
    expect(splitTopLevel('a=1, # x, y\nb=2')).toEqual(['a=1', ' # x, y\nb=2']);
  });
});

describe('findMatchingParen', () => {
  test('skips parentheses inside string literals', () => {
    expect(findMatchingParen('f(a, ")", (b))', 1)).toBe(13);
  });

  test('returns null for an unclosed call', () => {
    expect(findMatchingParen('f(a', 1)).toBeNull();
  });

  test('returns null when start is not an opening paren', () => {
    expect(findMatchingParen('f(a)', 0)).toBeNull();
  });
});

test('findTopLevel ignores nested targets', () => {
  expect(findTopLevel('x: Dict[str, int] = {}', '=')).toBe(18);
  expect(findTopLevel('f(a=1)', '=')).toBe(-1);
});

test('skipStringLiteral handles triple quotes with embedded quotes', () => {
  expect(skipStringLiteral('"""a"b"""rest', 0)).toBe(9);
  expect(skipStringLiteral("'it\\'s' + x", 0)).toBe(7);
});

test('quote helpers', () => {
  expect(isQuotedString("'x'")).toBe(true);
  expect(isQuotedString('"x\'')).toBe(false);
  expect(isQuotedString('"')).toBe(false);
  expect(unquote('"ab"')).toBe('ab');
  expect(unquote('ab')).toBe('ab');
  expect(unquote('"""a "b" c"""')).toBe('a "b" c');
  expect(unquote("''")).toBe('');
});

test('maskNonCode blanks strings and comments without moving offsets', () => {
  const text = 'a = "x#y"  # note\nb = [1]';
  const masked = maskNonCode(text);
  expect(masked).toBe(`a = ${' '.repeat(13)}\nb = [1]`);
  expect(masked).toHaveLength(text.length);
  expect(masked.indexOf('[')).toBe(text.indexOf('['));
});

test('position helpers', () => {
  expect(isIdentifierChar('_')).toBe(true);
  expect(isIdentifierChar('.')).toBe(false);
  expect(indentOf('    x = 1')).toBe(4);
});
