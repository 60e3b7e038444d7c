// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

import type { Message } from '../types.js';

/**
 * A region of the screen that follows one transcript entry while it streams.
 *
 * `end()` releases whatever the surface holds on the terminal and may be
 * called more than once.
 */
export interface DisplaySurface {
  update(message: Message): void;
  end(): void;
}

/**
 * Surface for code the model wants to run, and later its output.
 */
export interface CodeSurface extends DisplaySurface {
  setOutput(output: string): void;
}

/**
 * Factory for surfaces, owned by whoever renders the conversation.
 */
export interface Display {
  /** A request has been sent and nothing has streamed back yet. */
  beginWaiting(): void;
  /** Stop showing the waiting state without opening a surface. */
  endWaiting(): void;
  openMessage(): DisplaySurface;
  openCode(): CodeSurface;
  /** Visual break between a user or function entry and new code. */
  separator(): void;
  /** Show a block of code before asking to run it. */
  showCode(language: string, code: string): void;
}
