// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Spinner Manager
 *
 * Shows an ora spinner while a request is in flight and nothing has streamed yet.
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';

/**
 * Manages a single spinner instance with TTY detection.
 */
export class SpinnerManager {
  private spinner: Ora | null = null;
  private enabled: boolean;

  constructor(enabled: boolean = process.stdout.isTTY ?? false) {
    // Disable spinners in non-TTY environments (piped output)
    this.enabled = enabled;
  }

  /**
   * Enable or disable spinners globally.
   */
  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
    if (!enabled) {
      this.stop();
    }
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  isSpinning(): boolean {
    return this.spinner !== null;
  }

  /**
   * Start a new spinner with the given text.
   * If a spinner is already running, it will be stopped first.
   */
  start(text: string): void {
    if (!this.enabled) return;

    this.stop();
    this.spinner = ora({
      text,
      color: 'cyan',
      spinner: 'dots',
      discardStdin: false, // Don't interfere with readline's stdin handling
    }).start();
  }

  /**
   * Stop the spinner without any status symbol.
   */
  stop(): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner = null;
    }
  }

  /**
   * Show "Thinking..." spinner while waiting for the model.
   */
  thinking(model?: string): void {
    const text = model ? `Waiting for ${model}...` : 'Thinking...';
    this.start(chalk.cyan(text));
  }
}

/**
 * Singleton spinner instance for global use.
 */
export const spinner = new SpinnerManager();
