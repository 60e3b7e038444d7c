// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

import { describe, it, expect } from 'vitest';
import { parsePartialJson, readRunCodeArguments } from '../src/utils/json-parser.js';

describe('parsePartialJson', () => {
  it('parses complete JSON directly', () => {
    expect(parsePartialJson('{"language": "python", "code": "print(1)"}')).toEqual({
      language: 'python',
      code: 'print(1)',
    });
  });

  it('closes an unterminated string and object', () => {
    expect(parsePartialJson('{"language": "python", "code": "print(1')).toEqual({
      language: 'python',
      code: 'print(1',
    });
  });

  it('returns a truncated language value as written so far', () => {
    expect(parsePartialJson('{"language": "pyth')).toEqual({ language: 'pyth' });
  });

  it('escapes raw newlines inside strings', () => {
    expect(parsePartialJson('{"code": "a = 1\nb = 2')).toEqual({ code: 'a = 1\nb = 2' });
  });

  it('escapes raw newlines in otherwise complete documents', () => {
    expect(parsePartialJson('{"code": "x\ny"}')).toEqual({ code: 'x\ny' });
  });

  it('keeps escaped quotes inside strings', () => {
    expect(parsePartialJson('{"code": "echo \\"hi')).toEqual({ code: 'echo "hi' });
  });

  it('does not treat an escaped backslash as escaping the closing quote', () => {
    expect(parsePartialJson('{"code": "C:\\\\", "language": "shell')).toEqual({
      code: 'C:\\',
      language: 'shell',
    });
  });

  it('closes nested structures innermost first', () => {
    expect(parsePartialJson('{"a": [1, {"b": 2')).toEqual({ a: [1, { b: 2 }] });
  });

  it('ignores brackets inside strings', () => {
    expect(parsePartialJson('{"code": "if x: [1, {')).toEqual({ code: 'if x: [1, {' });
  });

  it('returns undefined for a mismatched closer', () => {
    expect(parsePartialJson('{"a": ]')).toBeUndefined();
  });

  it('returns undefined for a closer with nothing open', () => {
    expect(parsePartialJson('{"a": 1}]')).toBeUndefined();
  });

  it('returns undefined when the repaired text is still invalid', () => {
    expect(parsePartialJson('{"language": ')).toBeUndefined();
    expect(parsePartialJson('{"a": 1,')).toBeUndefined();
  });

  it('returns undefined for empty input', () => {
    expect(parsePartialJson('')).toBeUndefined();
  });

  it('does not accept single-quoted JSON', () => {
    expect(parsePartialJson("{'code': 'x'}")).toBeUndefined();
  });
});

describe('readRunCodeArguments', () => {
  it('keeps string language and code', () => {
    expect(readRunCodeArguments({ language: 'shell', code: 'ls', extra: true })).toEqual({
      language: 'shell',
      code: 'ls',
    });
  });

  it('drops fields that are not strings', () => {
    expect(readRunCodeArguments({ language: 'python', code: 42 })).toEqual({ language: 'python' });
  });

  it('returns an empty object for an object without known fields', () => {
    expect(readRunCodeArguments({})).toEqual({});
  });

  it('returns undefined for non-objects', () => {
    expect(readRunCodeArguments(undefined)).toBeUndefined();
    expect(readRunCodeArguments('python')).toBeUndefined();
    expect(readRunCodeArguments(['python'])).toBeUndefined();
    expect(readRunCodeArguments(null)).toBeUndefined();
  });
});
