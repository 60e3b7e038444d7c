// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

import type { ConfirmPrompt } from './cli/confirmation.js';
import { RUN_CODE } from './constants.js';
import { logger } from './logger.js';
import type { RunCodeArguments } from './types.js';
import type { CodeSurface, Display } from './ui/types.js';

export const CONFIRM_QUESTION = 'Would you like to run this code? (y/n)';

export type GateDecision =
  | { approved: true; request: RunCodeArguments; surface: CodeSurface }
  | { approved: false; request: RunCodeArguments };

export interface ExecutionGateOptions {
  display: Display;
  confirm: ConfirmPrompt;
  autoRun?: boolean;
}

/**
 * Decides whether a finished code request may run.
 *
 * With auto-run on the preview surface stays live and execution output goes
 * there. Otherwise the preview is closed, the code is printed in full and the
 * user is asked; an approved request gets a fresh surface for its output.
 */
export class ExecutionGate {
  private readonly display: Display;
  private readonly confirm: ConfirmPrompt;
  private autoRun: boolean;

  constructor(options: ExecutionGateOptions) {
    this.display = options.display;
    this.confirm = options.confirm;
    this.autoRun = options.autoRun ?? false;
  }

  setAutoRun(enabled: boolean): void {
    this.autoRun = enabled;
  }

  isAutoRun(): boolean {
    return this.autoRun;
  }

  /**
   * Show the request and ask before it runs. When `signal` fires while the
   * user is being asked, the question is withdrawn and the abort propagates.
   */
  async review(surface: CodeSurface, request: RunCodeArguments, signal?: AbortSignal): Promise<GateDecision> {
    // Snapshot; the entry may still be mutated by later cleanup
    const captured: RunCodeArguments = { ...request };

    if (this.autoRun) {
      return { approved: true, request: captured, surface };
    }

    surface.end();
    this.display.showCode(captured.language ?? '', captured.code ?? '');

    const approved = await this.confirm(CONFIRM_QUESTION, signal);
    signal?.throwIfAborted();
    logger.debug(`Execution ${approved ? 'approved' : 'declined'} (${captured.language ?? 'unknown'})`);
    if (!approved) {
      return { approved: false, request: captured };
    }

    const live = this.display.openCode();
    live.update({ role: 'assistant', function_call: { name: RUN_CODE, parsed_arguments: captured } });
    return { approved: true, request: captured, surface: live };
  }
}
