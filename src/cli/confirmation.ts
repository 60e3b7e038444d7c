// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Confirmation Utilities
 *
 * Yes/no prompting before code runs.
 */

import chalk from 'chalk';
import type { Interface } from 'readline';

/**
 * Ask the user a yes/no question. Resolves true only on approval; rejects
 * with the signal's reason when it fires before the user answers.
 */
export type ConfirmPrompt = (question: string, signal?: AbortSignal) => Promise<boolean>;

/**
 * Normalize a typed answer: `y` and `yes` (any case, surrounding
 * whitespace ignored) approve, everything else declines.
 */
export function isApproval(answer: string | undefined): boolean {
  const lower = (answer || '').toLowerCase().trim();
  return lower === 'y' || lower === 'yes';
}

/**
 * Prompt user for confirmation using readline.
 */
export function promptConfirmation(rl: Interface, message: string, signal?: AbortSignal): Promise<boolean> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    // readline drops the question on abort and never calls back
    const onAbort = () => reject(signal?.reason);
    signal?.addEventListener('abort', onAbort, { once: true });

    rl.question(chalk.yellow(`${message} `), { signal }, (answer) => {
      signal?.removeEventListener('abort', onAbort);
      resolve(isApproval(answer));
    });
  });
}

/**
 * Bind a readline interface as a ConfirmPrompt.
 */
export function createReadlineConfirm(rl: Interface): ConfirmPrompt {
  return (question, signal) => promptConfirmation(rl, question, signal);
}
