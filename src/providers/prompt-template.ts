// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

/**
 * Prompt rendering for raw-text completion models.
 *
 * Models without a chat endpoint get the transcript flattened into a single
 * prompt, followed by the opening words of the assistant's answer. The
 * lead-in nudges the model towards fenced code and towards reading the
 * output it was just given.
 */

import { FUNCTION_MESSAGES } from '../constants.js';
import type { Message } from '../types.js';

export const CODE_LEAD_IN =
  "Let's explore this. By the way, I can run code on your machine by writing the code " +
  'in a markdown code block. This works for shell, javascript, python, R, and applescript. ' +
  "I'm going to try to do this for your task. Anyway, ";
export const OUTPUT_LEAD_IN = 'Given the output of the code I just ran, ';
export const NO_OUTPUT_LEAD_IN = 'Given the fact that the code I just ran produced no output, ';

/**
 * Upper-case the first character. The lead-in ends mid-sentence, so the
 * model's first word tends to come back lower-case.
 */
export function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

/**
 * Llama-2 instruction format. The first message must be the only system message.
 */
export function renderLlamaPrompt(messages: Message[]): string {
  const [system, ...rest] = messages;
  let prompt = `<s>[INST] <<SYS>>\n${system?.content ?? ''}\n<</SYS>>\n`;

  for (const message of rest) {
    const content = message.content ?? '';
    switch (message.role) {
      case 'user':
        prompt += `${content} [/INST] `;
        break;
      case 'function':
        prompt += `Output: ${content} [/INST] `;
        break;
      case 'system':
        break;
      default:
        prompt += `${content} </s><s>[INST] `;
    }
  }

  // A trailing assistant turn leaves an open instruction tag
  const openTag = '<s>[INST] ';
  if (prompt.endsWith(openTag)) {
    prompt = prompt.slice(0, -openTag.length);
  }
  return prompt;
}

/**
 * Falcon format: one `Role: content` line per message.
 */
export function renderFalconPrompt(messages: Message[]): string {
  return messages
    .map((message) => `${capitalize(message.role ?? 'assistant')}: ${message.content ?? ''}\n`)
    .join('')
    .trim();
}

/**
 * Opening words of the assistant's answer, chosen from the last entry.
 */
export function leadInFor(last: Message | undefined): string {
  if (!last) return '';
  if (last.role !== 'function') return CODE_LEAD_IN;
  return last.content === FUNCTION_MESSAGES.NO_OUTPUT ? NO_OUTPUT_LEAD_IN : OUTPUT_LEAD_IN;
}

/**
 * Render the full prompt for `model`.
 */
export function buildPrompt(messages: Message[], model: string): string {
  const body = model.toLowerCase().includes('falcon')
    ? `${renderFalconPrompt(messages)}\nAssistant: `
    : renderLlamaPrompt(messages);
  return body + leadInFor(messages[messages.length - 1]);
}
