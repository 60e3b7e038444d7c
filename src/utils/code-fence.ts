// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

/**
 * Markdown code fence detection for models without function calling.
 */

import { CODE_FENCE } from '../constants.js';

export interface CodeFenceState {
  /** True while a fence has been opened and not yet closed */
  inCodeBlock: boolean;
  /** Declared language of the open block, once known */
  language?: string;
  /** Code written into the open block so far */
  code?: string;
}

const DEFAULT_LANGUAGE = 'python';
const LANGUAGE_ALIASES: Record<string, string> = {
  bash: 'shell',
};

/**
 * Count non-overlapping occurrences of `needle` in `text`.
 */
export function countOccurrences(text: string, needle: string): number {
  return text.split(needle).length - 1;
}

/**
 * Strip any of `chars` from both ends of `text`.
 */
function stripChars(text: string, chars: string): string {
  let start = 0;
  let end = text.length;
  while (start < end && chars.includes(text[start])) start++;
  while (end > start && chars.includes(text[end - 1])) end--;
  return text.slice(start, end);
}

/**
 * Work out whether the accumulated text is inside a fenced code block and,
 * if so, which language and code it holds.
 *
 * An odd number of fences means the last block is still open. A block
 * opened without a language defaults to python, unless its first line is a
 * `pip` command, which models tend to write without a tag.
 */
export function extractCodeFence(text: string): CodeFenceState {
  const inCodeBlock = countOccurrences(text, CODE_FENCE) % 2 === 1;
  if (!inCodeBlock) {
    return { inCodeBlock };
  }

  const blocks = text.split(CODE_FENCE);
  const lines = blocks[blocks.length - 1].split('\n');

  let language: string | undefined;
  if (text.trim() !== CODE_FENCE) {
    if (lines[0] !== '') {
      language = lines[0].trim();
    } else {
      language = DEFAULT_LANGUAGE;
      if (lines.length > 1 && lines[1].startsWith('pip')) {
        language = 'shell';
      }
    }
    language = LANGUAGE_ALIASES[language] ?? language;
  }

  const code = stripChars(lines.slice(1).join('\n'), '` \n');

  return language === undefined ? { inCodeBlock, code } : { inCodeBlock, language, code };
}
