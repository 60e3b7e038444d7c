// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

/**
 * Code-intent detection.
 *
 * "Has the model started writing code, and with what language and code?"
 * is answered one of two ways: through the structured function-call channel,
 * or, for models that only produce text, by counting markdown fences.
 */

import { CODE_FENCE, FUNCTION_MESSAGES } from './constants.js';
import type { CompletionChoice, Delta, Message } from './types.js';
import { extractCodeFence } from './utils/code-fence.js';
import { parsePartialJson, readRunCodeArguments } from './utils/json-parser.js';

export interface CodeIntentDetector {
  /** Short label used in logs */
  readonly mode: 'function-call' | 'markdown';

  /**
   * Whether leaving a code region counts as a function-call finish.
   * Raw-text streams have no finish reason for a call.
   */
  readonly implicitFinish: boolean;

  /** Shape a raw stream choice as a Delta. */
  toDelta(choice: CompletionChoice): Delta;

  /** Whether the entry is currently inside a code region. */
  isCodeIntent(message: Message): boolean;

  /**
   * Refresh `function_call.parsed_arguments` from what has streamed so far.
   * Also called once when a code region has just closed.
   */
  updateArguments(message: Message): void;

  /** Instruction sent back when a finished call cannot be run. */
  readonly correctionMessage: string;
}

/**
 * Detector for backends with a native function-call channel.
 */
export class StructuredCallDetector implements CodeIntentDetector {
  readonly mode = 'function-call';
  readonly implicitFinish = false;
  readonly correctionMessage = FUNCTION_MESSAGES.UNPARSEABLE_CALL;

  toDelta(choice: CompletionChoice): Delta {
    return choice.delta ?? {};
  }

  isCodeIntent(message: Message): boolean {
    return message.function_call !== undefined;
  }

  updateArguments(message: Message): void {
    const call = message.function_call;
    if (!call?.arguments) return;

    const parsed = readRunCodeArguments(parsePartialJson(call.arguments));
    // Keep the last good value when the repair fails
    if (parsed) {
      call.parsed_arguments = parsed;
    }
  }
}

/**
 * Detector for raw-text backends that write code as fenced markdown.
 */
export class FenceDetector implements CodeIntentDetector {
  readonly mode = 'markdown';
  readonly implicitFinish = true;
  readonly correctionMessage = FUNCTION_MESSAGES.UNPARSEABLE_BLOCK;

  toDelta(choice: CompletionChoice): Delta {
    return { content: choice.text ?? '' };
  }

  isCodeIntent(message: Message): boolean {
    return message.content !== undefined && extractCodeFence(message.content).inCodeBlock;
  }

  updateArguments(message: Message): void {
    if (message.content === undefined) return;

    let text = message.content;
    if (!extractCodeFence(text).inCodeBlock) {
      // Just closed: read the block as it stood before its closing fence,
      // which may have arrived in the same fragment as the last line of code
      const closing = text.lastIndexOf(CODE_FENCE);
      if (closing < 0) return;
      text = text.slice(0, closing);
    }

    const { inCodeBlock, language, code } = extractCodeFence(text);
    if (!inCodeBlock) return;

    // There is no function_call property to store this under, so make one
    message.function_call ??= {};
    message.function_call.parsed_arguments = language === undefined ? { code } : { code, language };
  }
}

/**
 * Pick the detector matching a backend's capabilities.
 */
export function createDetector(supportsFunctionCalling: boolean): CodeIntentDetector {
  return supportsFunctionCalling ? new StructuredCallDetector() : new FenceDetector();
}
