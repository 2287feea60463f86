import { test, expect } from 'vitest';
import {
  DiscoveryError,
  InvalidSyntaxError,
  NotFoundError,
  UnsupportedConstructError,
  errorMessage,
  isDiscoveryError,
} from '../src/errors';

test('each error carries its kind', () => {
  const notFound = new NotFoundError('No registrations found in register_plugin()');
  expect(notFound).toBeInstanceOf(DiscoveryError);
  expect(notFound.kind).toBe('NotFound');
  expect(notFound.name).toBe('NotFoundError');
  expect(new InvalidSyntaxError('bad').kind).toBe('InvalidSyntax');
  expect(new UnsupportedConstructError('a.b').kind).toBe('UnsupportedConstruct');
});

test('isDiscoveryError narrows by kind', () => {
  const error: unknown = new UnsupportedConstructError('a.b');
  expect(isDiscoveryError(error)).toBe(true);
  expect(isDiscoveryError(error, 'UnsupportedConstruct')).toBe(true);
  expect(isDiscoveryError(error, 'NotFound')).toBe(false);
  expect(isDiscoveryError(new Error('plain'))).toBe(false);
});

test('cause is kept', () => {
  const cause = new Error('EACCES');
  expect(new NotFoundError('Failed to read plugins.py', cause).cause).toBe(cause);
});

test('errorMessage', () => {
  expect(errorMessage(new Error('boom'))).toBe('boom');
  expect(errorMessage('text')).toBe('text');
});
