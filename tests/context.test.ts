// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect } from 'vitest';
import { trimMessages } from '../src/context.js';
import type { Message } from '../src/types.js';

// 'sys' costs ceil(3 / 4) + 4 = 5 tokens
const SYSTEM = 'sys';
const SYSTEM_COST = 5;

// 40 chars of prose cost 10 + 4 = 14 tokens
function prose(label: string): Message {
  return { role: 'user', content: label.repeat(40) };
}

describe('trimMessages', () => {
  it('puts the system message first', () => {
    const result = trimMessages([], { maxTokens: 100, systemMessage: SYSTEM });
    expect(result).toEqual([{ role: 'system', content: SYSTEM }]);
  });

  it('keeps everything that fits', () => {
    const messages = [prose('a'), prose('b')];
    const result = trimMessages(messages, { maxTokens: 1000, systemMessage: SYSTEM });
    expect(result).toEqual([{ role: 'system', content: SYSTEM }, ...messages]);
  });

  it('drops the oldest entries first', () => {
    const messages = [prose('a'), prose('b'), prose('c')];
    const result = trimMessages(messages, { maxTokens: SYSTEM_COST + 14 * 2, systemMessage: SYSTEM });
    expect(result).toEqual([{ role: 'system', content: SYSTEM }, prose('b'), prose('c')]);
  });

  it('keeps a contiguous suffix', () => {
    const messages: Message[] = [prose('a'), { role: 'assistant', content: 'x'.repeat(400) }, prose('c')];
    const result = trimMessages(messages, { maxTokens: SYSTEM_COST + 14 * 3, systemMessage: SYSTEM });
    expect(result.map((m) => m.content)).toEqual([SYSTEM, 'c'.repeat(40)]);
  });

  it('truncates the newest entry when nothing fits, keeping the tail', () => {
    const message: Message = { role: 'user', content: 'x'.repeat(300) + 'y'.repeat(100) };
    // 20 tokens left; (20 - 4) * 4 = 64 chars
    const result = trimMessages([message], { maxTokens: SYSTEM_COST + 20, systemMessage: SYSTEM });
    expect(result[1]).toEqual({ role: 'user', content: 'y'.repeat(64) });
  });

  it('sends empty content when there is no room at all', () => {
    const result = trimMessages([prose('a')], { maxTokens: SYSTEM_COST, systemMessage: SYSTEM });
    expect(result[1]).toEqual({ role: 'user', content: '' });
  });

  it('does not modify the transcript', () => {
    const messages: Message[] = [{ role: 'user', content: 'z'.repeat(400) }];
    trimMessages(messages, { maxTokens: 10, systemMessage: SYSTEM });
    expect(messages[0].content).toBe('z'.repeat(400));
  });
});
