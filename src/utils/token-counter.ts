// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

/**
 * Token counting utilities with content-aware estimation.
 *
 * Different content types have different token densities:
 * - English prose: ~4 chars/token
 * - Code: ~3 chars/token (more punctuation, shorter identifiers)
 * - JSON/structured: ~3.5 chars/token
 */

import type { FunctionDefinition, Message } from '../types.js';

/** Default chars per token for general text */
export const DEFAULT_CHARS_PER_TOKEN = 4;

/** Chars per token for code content */
export const CODE_CHARS_PER_TOKEN = 3;

/** Chars per token for JSON/structured content */
export const JSON_CHARS_PER_TOKEN = 3.5;

/** Overhead per message (role, structure, etc.) in tokens */
export const MESSAGE_OVERHEAD_TOKENS = 4;

/**
 * Detect if text contains code (heuristic).
 */
function isCodeContent(text: string): boolean {
  const codeIndicators = [
    /```[\s\S]*```/,           // Markdown code blocks
    /def\s+\w+\s*\(/,          // Python functions
    /function\s+\w+\s*\(/,     // Function declarations
    /const\s+\w+\s*=/,         // Const declarations
    /=>\s*{/,                  // Arrow functions
    /class\s+\w+/,             // Class declarations
    /import\s+\w+/,            // Imports
    /if\s*\(.*\)\s*{/,         // If statements
    /for\s*\(.*\)\s*{/,        // For loops
    /\.\w+\(.*\)/,             // Method calls
  ];

  return codeIndicators.some(pattern => pattern.test(text));
}

/**
 * Detect if text is JSON-like.
 */
function isJsonContent(text: string): boolean {
  const trimmed = text.trim();
  return (trimmed.startsWith('{') && trimmed.endsWith('}')) ||
         (trimmed.startsWith('[') && trimmed.endsWith(']'));
}

/**
 * Chars per token to assume for a piece of text.
 */
export function charsPerTokenFor(text: string): number {
  if (isCodeContent(text)) return CODE_CHARS_PER_TOKEN;
  if (isJsonContent(text)) return JSON_CHARS_PER_TOKEN;
  return DEFAULT_CHARS_PER_TOKEN;
}

/**
 * Estimate token count for a string with content-aware heuristics.
 */
export function estimateTokens(text: string): number {
  if (!text) return 0;
  return Math.ceil(text.length / charsPerTokenFor(text));
}

/**
 * Estimate tokens for function definitions.
 * Schemas are JSON with descriptions.
 */
export function estimateFunctionTokens(functions: FunctionDefinition[]): number {
  let total = 0;
  for (const fn of functions) {
    total += estimateTokens(fn.name);
    total += estimateTokens(fn.description);
    total += Math.ceil(JSON.stringify(fn.parameters).length / JSON_CHARS_PER_TOKEN);
    // Overhead per function
    total += 10;
  }
  return total;
}

/**
 * Get the text of a message that is sent to the model.
 * Parsed arguments stay local and are not counted.
 */
export function getMessageText(message: Message): string {
  const parts: string[] = [];
  if (message.content) parts.push(message.content);
  if (message.function_call) {
    parts.push(message.function_call.name ?? '');
    parts.push(message.function_call.arguments ?? '');
  }
  return parts.join('\n');
}

/**
 * Estimate tokens for one message, overhead included.
 */
export function estimateMessageTokens(message: Message): number {
  return estimateTokens(getMessageText(message)) + MESSAGE_OVERHEAD_TOKENS;
}

/**
 * Count total tokens in a message array.
 */
export function countMessageTokens(messages: Message[]): number {
  let total = 0;
  for (const message of messages) {
    total += estimateMessageTokens(message);
  }
  return total;
}
