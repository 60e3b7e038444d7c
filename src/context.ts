// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Context trimming
 *
 * Fits the transcript into the model's prompt budget by dropping the oldest
 * entries. The system message is always sent first.
 */

import type { Message } from './types.js';
import {
  MESSAGE_OVERHEAD_TOKENS,
  charsPerTokenFor,
  estimateMessageTokens,
} from './utils/token-counter.js';

export interface TrimOptions {
  /** Token budget for the whole prompt, system message included */
  maxTokens: number;
  systemMessage: string;
}

/**
 * Cut a message's content down to roughly `tokens` tokens, keeping the end.
 */
function truncateMessage(message: Message, tokens: number): Message {
  const content = message.content ?? '';
  const chars = Math.floor(Math.max(0, tokens - MESSAGE_OVERHEAD_TOKENS) * charsPerTokenFor(content));
  return { ...message, content: chars > 0 ? content.slice(-chars) : '' };
}

/**
 * Build the outgoing message list: the system message followed by the
 * longest run of most recent entries that fits in the budget.
 *
 * When not even the newest entry fits, it is sent with its content cut to
 * what remains, keeping the tail where the latest instructions usually are.
 * The transcript itself is never modified.
 */
export function trimMessages(messages: Message[], options: TrimOptions): Message[] {
  const system: Message = { role: 'system', content: options.systemMessage };
  let remaining = options.maxTokens - estimateMessageTokens(system);
  const kept: Message[] = [];

  for (let i = messages.length - 1; i >= 0; i--) {
    const cost = estimateMessageTokens(messages[i]);
    if (cost <= remaining) {
      kept.unshift(messages[i]);
      remaining -= cost;
      continue;
    }
    if (kept.length === 0) {
      kept.unshift(truncateMessage(messages[i], remaining));
    }
    break;
  }

  return [system, ...kept];
}
