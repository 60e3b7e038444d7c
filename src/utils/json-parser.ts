// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

/**
 * JSON parsing utilities for handling streamed LLM output.
 */

import type { RunCodeArguments } from '../types.js';

/**
 * Try to parse JSON, returning undefined instead of throwing.
 */
function tryParseJson(jsonStr: string): unknown {
  try {
    return JSON.parse(jsonStr);
  } catch {
    return undefined;
  }
}

/**
 * Parse a JSON document that may have been cut off mid-stream.
 *
 * Walks the text tracking quote state, escapes and a stack of expected
 * closers, then closes whatever is still open. Raw newlines inside strings
 * are escaped on the way. A closer that does not match the innermost open
 * bracket means the text is malformed rather than truncated, so the result
 * is undefined instead of a guess.
 */
export function parsePartialJson(partialJson: string): unknown {
  const strict = tryParseJson(partialJson);
  if (strict !== undefined) {
    return strict;
  }

  const result: string[] = [];
  const stack: string[] = [];
  let inString = false;
  let isEscaped = false;

  for (const char of partialJson) {
    let out = char;

    if (inString) {
      if (char === '"' && !isEscaped) {
        inString = false;
      } else if (char === '\n' && !isEscaped) {
        out = '\\n';
      } else if (char === '\\') {
        isEscaped = !isEscaped;
      } else {
        isEscaped = false;
      }
    } else if (char === '"') {
      inString = true;
      isEscaped = false;
    } else if (char === '{') {
      stack.push('}');
    } else if (char === '[') {
      stack.push(']');
    } else if (char === '}' || char === ']') {
      if (stack[stack.length - 1] !== char) {
        return undefined;
      }
      stack.pop();
    }

    result.push(out);
  }

  if (inString) {
    result.push('"');
  }

  // Close remaining structures, innermost first
  for (let i = stack.length - 1; i >= 0; i--) {
    result.push(stack[i]);
  }

  return tryParseJson(result.join(''));
}

/**
 * Narrow a parsed `run_code` payload to its known string fields.
 * Returns undefined when the value is not an object.
 */
export function readRunCodeArguments(value: unknown): RunCodeArguments | undefined {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return undefined;
  }

  const args: RunCodeArguments = {};
  const language: unknown = Reflect.get(value, 'language');
  const code: unknown = Reflect.get(value, 'code');
  if (typeof language === 'string') args.language = language;
  if (typeof code === 'string') args.code = code;
  return args;
}
